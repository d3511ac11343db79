import { Injectable } from '@nestjs/common';
import { ListQueryRequest } from '../../lib/cqs';
import { DataBroker } from '../data/broker/data-broker';
import { WeatherForecast } from './weather-forecast.record';

/** Window requested by a virtualised list. */
export interface ItemsProviderRequest {
  readonly startIndex: number;
  readonly count: number;
  readonly signal?: AbortSignal;
}

export interface ItemsProviderResult<T> {
  readonly items: ReadonlyArray<T>;
  readonly totalItemCount: number;
}

@Injectable()
export class WeatherForecastListService {
  /** Last page loaded by getForecasts. */
  public forecasts: ReadonlyArray<WeatherForecast> = [];

  constructor(private readonly broker: DataBroker) {}

  /** Loads a page into `forecasts`; a failed query leaves them unchanged. */
  public async getForecasts(request: ListQueryRequest): Promise<void> {
    const result = await this.broker.getItems(WeatherForecast, request);
    if (result.successful) this.forecasts = result.items;
  }

  public async provideForecasts(
    itemsRequest: ItemsProviderRequest,
  ): Promise<ItemsProviderResult<WeatherForecast>> {
    const request = new ListQueryRequest({
      startIndex: itemsRequest.startIndex,
      pageSize: itemsRequest.count,
      signal: itemsRequest.signal,
    });
    const result = await this.broker.getItems(WeatherForecast, request);
    return result.successful
      ? { items: result.items, totalItemCount: result.totalCount }
      : { items: [], totalItemCount: 0 };
  }
}
