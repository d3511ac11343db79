import { IsNotEmpty, IsString } from 'class-validator';

/** POST /api/weather-forecasts/delete */
export class DeleteWeatherForecastRequestDto {
  @IsString()
  @IsNotEmpty()
  public readonly uid!: string;
}
