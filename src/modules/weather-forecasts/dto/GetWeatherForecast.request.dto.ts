import { IsNotEmpty, IsString } from 'class-validator';

/** GET /api/weather-forecasts/get?uid=... */
export class GetWeatherForecastRequestDto {
  @IsString()
  @IsNotEmpty()
  public readonly uid!: string;
}
