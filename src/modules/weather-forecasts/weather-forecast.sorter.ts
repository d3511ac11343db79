import { Injectable } from '@nestjs/common';
import { buildSortSpec, type SortSpec } from '../../lib/cqs';
import { RecordSorterFor } from '../data/registry/data.decorators';
import type { RecordSorter } from '../data/strategies/record-strategies';
import { WeatherForecastFields } from './weather-forecast.constants';
import { WeatherForecast } from './weather-forecast.record';

const KNOWN_COLUMNS: ReadonlyMap<string, string> = new Map(
  Object.values(WeatherForecastFields).map((f) => [f.toLowerCase(), f]),
);

@Injectable()
@RecordSorterFor(WeatherForecast)
export class WeatherForecastSorter implements RecordSorter {
  public getSort(
    sortField: string,
    sortDescending: boolean,
  ): SortSpec | undefined {
    const column = KNOWN_COLUMNS.get(sortField.trim().toLowerCase());
    if (!column) {
      return buildSortSpec(WeatherForecast, sortField, sortDescending);
    }
    return { [column]: sortDescending ? -1 : 1 };
  }
}
