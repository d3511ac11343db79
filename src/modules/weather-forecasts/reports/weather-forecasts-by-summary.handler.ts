import { Injectable, Logger } from '@nestjs/common';
import { ListQueryResult, type ReportRequest } from '../../../lib/cqs';
import { DataPipelineError } from '../../../lib/errors/DataPipelineError';
import { DbContextFactory, type DbContext } from '../../data/context/db-context';
import {
  assertPaging,
  describeError,
  releaseContext,
} from '../../data/handlers/base/handler.utils';
import { ReportHandler } from '../../data/registry/data.decorators';
import type { ReportRequestHandler } from '../../data/reports/report-request-handler';
import { WEATHER_FORECASTS_BY_SUMMARY_REPORT } from '../weather-forecast.constants';
import { WeatherForecast } from '../weather-forecast.record';
import { WeatherForecastSorter } from '../weather-forecast.sorter';
import { WeatherForecastsFilteredBySummaryRequest } from './weather-forecasts-by-summary.request';

@Injectable()
@ReportHandler(WEATHER_FORECASTS_BY_SUMMARY_REPORT)
export class WeatherForecastsFilteredBySummaryHandler
  implements ReportRequestHandler<WeatherForecast>
{
  private readonly logger = new Logger(
    WeatherForecastsFilteredBySummaryHandler.name,
  );

  constructor(
    private readonly factory: DbContextFactory,
    private readonly sorter: WeatherForecastSorter,
  ) {}

  public async execute(
    req: ReportRequest,
  ): Promise<ListQueryResult<WeatherForecast>> {
    if (!(req instanceof WeatherForecastsFilteredBySummaryRequest)) {
      throw new DataPipelineError(
        `No WeatherForecastsFilteredBySummaryRequest provided in ${WeatherForecastsFilteredBySummaryHandler.name}`,
      );
    }
    assertPaging(
      req,
      WeatherForecastsFilteredBySummaryRequest.name,
      WeatherForecastsFilteredBySummaryHandler.name,
    );

    let dbContext: DbContext | undefined;
    try {
      dbContext = await this.factory.createDbContext();
      req.signal?.throwIfAborted();

      const set = await dbContext.set(WeatherForecast);
      let query = set.query();
      if (req.summary != null) query = query.where({ summary: req.summary });

      const totalCount = await query.count();

      const sort = req.sortField
        ? this.sorter.getSort(req.sortField, req.sortDescending)
        : undefined;
      if (sort) query = query.orderBy(sort);

      if (req.pageSize > 0) {
        query = query.skip(req.startIndex).take(req.pageSize);
      }

      return ListQueryResult.success(await query.toArray(), totalCount);
    } catch (err) {
      if (err instanceof DataPipelineError) throw err;
      this.logger.error(
        `${WEATHER_FORECASTS_BY_SUMMARY_REPORT} failed: ${describeError(err)}`,
      );
      return ListQueryResult.failure(
        `Error running report ${WEATHER_FORECASTS_BY_SUMMARY_REPORT}`,
      );
    } finally {
      await releaseContext(dbContext, this.logger);
    }
  }
}
