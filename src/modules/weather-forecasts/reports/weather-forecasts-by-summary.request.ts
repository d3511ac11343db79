import {
  DEFAULT_PAGE_SIZE,
  DEFAULT_START_INDEX,
  type ReportRequest,
} from '../../../lib/cqs';
import { WEATHER_FORECASTS_BY_SUMMARY_REPORT } from '../weather-forecast.constants';

export class WeatherForecastsFilteredBySummaryRequest implements ReportRequest {
  public readonly reportName = WEATHER_FORECASTS_BY_SUMMARY_REPORT;
  /** Exact summary to match; null or undefined returns every forecast. */
  public readonly summary?: string | null;
  public readonly startIndex: number;
  public readonly pageSize: number;
  public readonly sortField?: string;
  public readonly sortDescending: boolean;
  public readonly signal?: AbortSignal;

  constructor(
    init: Partial<Omit<WeatherForecastsFilteredBySummaryRequest, 'reportName'>> = {},
  ) {
    this.summary = init.summary;
    this.startIndex = init.startIndex ?? DEFAULT_START_INDEX;
    this.pageSize = init.pageSize ?? DEFAULT_PAGE_SIZE;
    this.sortField = init.sortField;
    this.sortDescending = init.sortDescending ?? false;
    this.signal = init.signal;
  }
}
