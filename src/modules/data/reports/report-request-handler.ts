import type { ListQueryResult, ReportRequest } from '../../../lib/cqs';

/**
 * Handler of one named report, registered with @ReportHandler(name).
 * Receives the base request shape and narrows it to its own.
 */
export interface ReportRequestHandler<T extends object> {
  execute(request: ReportRequest): Promise<ListQueryResult<T>>;
}
