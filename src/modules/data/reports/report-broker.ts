import type { ListQueryResult, ReportRequest } from '../../../lib/cqs';

export abstract class ReportBroker {
  /** Run the report named by `request.reportName`. */
  abstract getReport<T extends object>(
    request: ReportRequest,
  ): Promise<ListQueryResult<T>>;
}
