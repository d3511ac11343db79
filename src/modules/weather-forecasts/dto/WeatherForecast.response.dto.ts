export interface WeatherForecastDto {
  readonly uid: string;
  readonly date: string;
  readonly temperatureC: number;
  readonly temperatureF: number;
  readonly summary: string | null;
}

export interface ListWeatherForecastsResponseDto {
  readonly items: WeatherForecastDto[];
  readonly totalCount: number;
}

export interface GetWeatherForecastResponseDto {
  readonly forecast: WeatherForecastDto;
}

export interface WeatherForecastCommandResponseDto {
  readonly uid: string;
  readonly message: string;
}
