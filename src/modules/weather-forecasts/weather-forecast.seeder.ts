import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationBootstrap,
} from '@nestjs/common';
import { ListQueryRequest } from '../../lib/cqs';
import { DataBroker } from '../data/broker/data-broker';
import { DbContextFactory } from '../data/context/db-context';
import { DATA_CONFIG, type DataConfig } from '../data/data.config';
import { WeatherForecast } from './weather-forecast.record';
import { WeatherTestDataProvider } from './weather-test-data.provider';

/** Loads the sample forecasts at startup into an empty collection. */
@Injectable()
export class WeatherForecastSeeder implements OnApplicationBootstrap {
  private readonly logger = new Logger(WeatherForecastSeeder.name);

  constructor(
    private readonly broker: DataBroker,
    private readonly factory: DbContextFactory,
    private readonly testData: WeatherTestDataProvider,
    @Inject(DATA_CONFIG) private readonly config: DataConfig,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.seedTestData) return;
    await this.seed();
  }

  /** Resolves to the number of forecasts added; 0 when data already exists. */
  public async seed(): Promise<number> {
    const existing = await this.broker.getItems(
      WeatherForecast,
      new ListQueryRequest({ pageSize: 1 }),
    );
    if (!existing.successful) {
      this.logger.warn(`Skipping seed: ${existing.message}`);
      return 0;
    }
    if (existing.totalCount > 0) {
      this.logger.log(
        `Skipping seed: ${existing.totalCount} forecasts already stored`,
      );
      return 0;
    }
    return this.testData.loadInto(this.factory);
  }
}
