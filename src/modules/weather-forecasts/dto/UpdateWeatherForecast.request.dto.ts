import { IsInt, IsNotEmpty, IsString, Matches, ValidateIf } from 'class-validator';
import { ISO_DATE_RX } from './CreateWeatherForecast.request.dto';

/** POST /api/weather-forecasts/update; replaces the whole record. */
export class UpdateWeatherForecastRequestDto {
  @IsString()
  @IsNotEmpty()
  public readonly uid!: string;

  @IsString()
  @Matches(ISO_DATE_RX, { message: 'date must be YYYY-MM-DD' })
  public readonly date!: string;

  @IsInt()
  public readonly temperatureC!: number;

  @ValidateIf((_, value) => value !== null && value !== undefined)
  @IsString()
  public readonly summary?: string | null;
}
