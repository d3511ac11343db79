import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString, Min } from 'class-validator';
import { toBoolean } from './ListWeatherForecasts.request.dto';

/** GET /api/weather-forecasts/reports/by-summary?summary=... */
export class WeatherForecastsBySummaryRequestDto {
  @IsOptional()
  @IsString()
  public readonly summary?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  public readonly startIndex?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  public readonly pageSize?: number;

  @IsOptional()
  @IsString()
  public readonly sortField?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  public readonly sortDescending?: boolean;
}
