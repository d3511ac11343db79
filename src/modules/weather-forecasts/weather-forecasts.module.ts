import { Module } from '@nestjs/common';
import { DataModule } from '../data/data.module';
import { WeatherForecastsFilteredBySummaryHandler } from './reports/weather-forecasts-by-summary.handler';
import { WeatherForecastEditService } from './weather-forecast-edit.service';
import { WeatherForecastListService } from './weather-forecast-list.service';
import { WeatherForecastFilter } from './weather-forecast.filter';
import { WeatherForecastSeeder } from './weather-forecast.seeder';
import { WeatherForecastSorter } from './weather-forecast.sorter';
import { WeatherForecastsController } from './weather-forecasts.controller';
import { WeatherTestDataProvider } from './weather-test-data.provider';

@Module({
  imports: [DataModule],
  controllers: [WeatherForecastsController],
  providers: [
    WeatherForecastFilter,
    WeatherForecastSorter,
    WeatherForecastsFilteredBySummaryHandler,
    WeatherForecastListService,
    WeatherForecastEditService,
    WeatherTestDataProvider,
    WeatherForecastSeeder,
  ],
  exports: [
    WeatherForecastListService,
    WeatherForecastEditService,
    WeatherTestDataProvider,
  ],
})
export class WeatherForecastsModule {}
