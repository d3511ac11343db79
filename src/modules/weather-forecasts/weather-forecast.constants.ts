/** Record property names, as used for sorting. */
export const WeatherForecastFields = {
  Uid: 'uid',
  Date: 'date',
  TemperatureC: 'temperatureC',
  Summary: 'summary',
} as const;

export const WeatherForecastFilters = {
  BySummary: 'BySummary',
  ByTemperature: 'ByTemperature',
  TemperatureLessThan: 'TemperatureLessThan',
} as const;

export const WEATHER_FORECASTS_BY_SUMMARY_REPORT =
  'WeatherForecastsFilteredBySummary';

export const WEATHER_FORECAST_COLLECTION = 'weather_forecasts';

export const WEATHER_SUMMARIES: ReadonlyArray<string> = [
  'Freezing',
  'Bracing',
  'Chilly',
  'Cool',
  'Mild',
  'Warm',
  'Balmy',
  'Hot',
  'Sweltering',
  'Scorching',
];
