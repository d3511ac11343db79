import { Injectable, Logger } from '@nestjs/common';
import {
  ListQueryResult,
  type ListQueryRequest,
  type RecordType,
} from '../../../../lib/cqs';
import { DataHandlerRegistry } from '../../registry/data-handler.registry';
import { assertListRequest, describeError } from '../base/handler.utils';
import { ListRequestBaseServerHandler } from '../base/list-request.base-handler';
import { ListRequestHandler } from '../data-handlers';
import type { RecordHandlerMap } from '../record-handlers';

@Injectable()
export class ListRequestServerHandler implements ListRequestHandler {
  private readonly logger = new Logger(ListRequestServerHandler.name);

  constructor(
    private readonly registry: DataHandlerRegistry,
    private readonly baseHandler: ListRequestBaseServerHandler,
  ) {}

  public async execute<T extends object>(
    recordType: RecordType<T>,
    request: ListQueryRequest,
  ): Promise<ListQueryResult<T>> {
    assertListRequest(request, ListRequestServerHandler.name);

    let custom: RecordHandlerMap<T>['list'] | undefined;
    try {
      custom = this.registry.getRecordHandler(recordType, 'list');
    } catch (err) {
      this.logger.error(
        `${ListRequestServerHandler.name} could not resolve a list handler for ${recordType.name}: ${describeError(err)}`,
      );
      return ListQueryResult.failure(`Error retrieving ${recordType.name} records`);
    }

    if (custom) {
      this.logger.debug(`Using custom list handler for ${recordType.name}`);
      return custom.execute(request);
    }
    return this.baseHandler.execute(recordType, request);
  }
}
