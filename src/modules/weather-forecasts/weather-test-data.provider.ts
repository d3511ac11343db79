import { Injectable, Logger } from '@nestjs/common';
import { DbContextFactory } from '../data/context/db-context';
import { releaseContext } from '../data/handlers/base/handler.utils';
import { WEATHER_SUMMARIES } from './weather-forecast.constants';
import { WeatherForecast } from './weather-forecast.record';

export const TEST_FORECAST_COUNT = 100;

const FIRST_DATE_UTC = Date.UTC(2024, 0, 1);
const DAY_MS = 24 * 60 * 60 * 1000;

/** Deterministic sample forecasts: ten of each summary, one per day. */
@Injectable()
export class WeatherTestDataProvider {
  private readonly logger = new Logger(WeatherTestDataProvider.name);

  public forecasts(count = TEST_FORECAST_COUNT): WeatherForecast[] {
    return Array.from({ length: count }, (_, i) => WeatherTestDataProvider.forecast(i));
  }

  public static forecast(index: number): WeatherForecast {
    return Object.assign(new WeatherForecast(), {
      uid: `00000000-0000-4000-8000-${String(index + 1).padStart(12, '0')}`,
      date: new Date(FIRST_DATE_UTC + index * DAY_MS).toISOString().slice(0, 10),
      temperatureC: -20 + ((index * 7) % 75),
      summary: WEATHER_SUMMARIES[index % WEATHER_SUMMARIES.length],
    });
  }

  /** Adds the forecasts through one context; resolves to the number stored. */
  public async loadInto(
    factory: DbContextFactory,
    count = TEST_FORECAST_COUNT,
  ): Promise<number> {
    const dbContext = await factory.createDbContext();
    try {
      for (const forecast of this.forecasts(count)) {
        dbContext.add(WeatherForecast, forecast);
      }
      const stored = await dbContext.saveChanges();
      this.logger.log(`Loaded ${stored} test forecasts`);
      return stored;
    } finally {
      await releaseContext(dbContext, this.logger);
    }
  }
}
