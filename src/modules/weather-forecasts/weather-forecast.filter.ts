import { Injectable, Logger } from '@nestjs/common';
import type { FilterDefinition } from '../../lib/cqs';
import type { RecordFilterDocument } from '../data/context/db-context';
import { RecordFilterFor } from '../data/registry/data.decorators';
import type { RecordFilter } from '../data/strategies/record-strategies';
import { WeatherForecastFilters } from './weather-forecast.constants';
import { WeatherForecast } from './weather-forecast.record';

@Injectable()
@RecordFilterFor(WeatherForecast)
export class WeatherForecastFilter implements RecordFilter {
  private readonly logger = new Logger(WeatherForecastFilter.name);

  public getFilter(
    filters: ReadonlyArray<FilterDefinition>,
  ): RecordFilterDocument | undefined {
    const clauses: RecordFilterDocument[] = [];
    for (const def of filters) {
      const clause = this.toClause(def);
      if (clause) clauses.push(clause);
    }

    if (clauses.length === 0) return undefined;
    if (clauses.length === 1) return clauses[0];
    return { $and: clauses };
  }

  private toClause(def: FilterDefinition): RecordFilterDocument | undefined {
    switch (def.filterName) {
      case WeatherForecastFilters.BySummary:
        return { summary: def.filterData };
      case WeatherForecastFilters.ByTemperature: {
        const value = this.parseTemperature(def);
        return value === undefined ? undefined : { temperatureC: value };
      }
      case WeatherForecastFilters.TemperatureLessThan: {
        const value = this.parseTemperature(def);
        return value === undefined ? undefined : { temperatureC: { $lt: value } };
      }
      default:
        this.logger.warn(`Unknown WeatherForecast filter: ${def.filterName}`);
        return undefined;
    }
  }

  private parseTemperature(def: FilterDefinition): number | undefined {
    const value = Number(def.filterData);
    if (def.filterData.trim() === '' || !Number.isFinite(value)) {
      this.logger.warn(
        `${def.filterName} needs a numeric value; got '${def.filterData}'`,
      );
      return undefined;
    }
    return value;
  }
}
