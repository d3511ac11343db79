import {
  IsInt,
  IsOptional,
  IsString,
  Matches,
  ValidateIf,
} from 'class-validator';

export const ISO_DATE_RX = /^\d{4}-\d{2}-\d{2}$/;

/** POST /api/weather-forecasts/create; a missing uid is generated. */
export class CreateWeatherForecastRequestDto {
  @IsOptional()
  @IsString()
  public readonly uid?: string;

  @IsString()
  @Matches(ISO_DATE_RX, { message: 'date must be YYYY-MM-DD' })
  public readonly date!: string;

  @IsInt()
  public readonly temperatureC!: number;

  @ValidateIf((_, value) => value !== null && value !== undefined)
  @IsString()
  public readonly summary?: string | null;
}
