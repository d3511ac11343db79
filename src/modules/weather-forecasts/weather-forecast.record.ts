import { DataRecord } from '../../lib/cqs';
import { WEATHER_FORECAST_COLLECTION } from './weather-forecast.constants';

@DataRecord({ collection: WEATHER_FORECAST_COLLECTION })
export class WeatherForecast {
  uid = '';
  /** ISO calendar date, YYYY-MM-DD. */
  date = '';
  temperatureC = 0;
  summary: string | null = null;

  /** Derived; not stored. */
  get temperatureF(): number {
    return 32 + Math.trunc(this.temperatureC / 0.5556);
  }
}
