import { Injectable, Logger } from '@nestjs/common';
import { ListQueryResult, type ReportRequest } from '../../../lib/cqs';
import { DataPipelineError } from '../../../lib/errors/DataPipelineError';
import { assertPaging } from '../handlers/base/handler.utils';
import { DataHandlerRegistry } from '../registry/data-handler.registry';
import { ReportBroker } from './report-broker';

@Injectable()
export class ServerReportBroker extends ReportBroker {
  private readonly logger = new Logger(ServerReportBroker.name);

  constructor(private readonly registry: DataHandlerRegistry) {
    super();
  }

  public async getReport<T extends object>(
    request: ReportRequest,
  ): Promise<ListQueryResult<T>> {
    if (request == null) {
      throw new DataPipelineError(
        `No ReportRequest defined in ${ServerReportBroker.name}`,
      );
    }
    assertPaging(request, 'ReportRequest', ServerReportBroker.name);

    const handler = this.registry.getReportHandler<T>(request.reportName);
    if (!handler) {
      const message = `A report for ${request.reportName} is not defined in the services container.`;
      this.logger.error(message);
      return ListQueryResult.failure(message);
    }
    return handler.execute(request);
  }
}
