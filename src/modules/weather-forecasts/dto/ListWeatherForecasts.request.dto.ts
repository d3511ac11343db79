import { Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';

export function toBoolean({ value }: { value: unknown }): unknown {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}

/** GET /api/weather-forecasts/list?startIndex=&pageSize=&sortField=&... */
export class ListWeatherForecastsRequestDto {
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

  /** Maps to the BySummary filter. */
  @IsOptional()
  @IsString()
  public readonly summary?: string;

  /** Maps to the ByTemperature filter. */
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  public readonly temperatureC?: number;

  /** Maps to the TemperatureLessThan filter. */
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  public readonly temperatureLessThan?: number;
}
