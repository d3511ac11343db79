// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DataModule } from './modules/data/data.module';
import { WeatherForecastsModule } from './modules/weather-forecasts/weather-forecasts.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    DataModule,
    WeatherForecastsModule,
  ],
})
export class AppModule {}
