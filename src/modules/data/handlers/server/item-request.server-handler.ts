import { Injectable, Logger } from '@nestjs/common';
import {
  ItemQueryResult,
  type ItemQueryRequest,
  type RecordType,
} from '../../../../lib/cqs';
import { DataHandlerRegistry } from '../../registry/data-handler.registry';
import { assertItemRequest, describeError } from '../base/handler.utils';
import { ItemRequestBaseServerHandler } from '../base/item-request.base-handler';
import { ItemRequestHandler } from '../data-handlers';
import type { RecordHandlerMap } from '../record-handlers';

@Injectable()
export class ItemRequestServerHandler implements ItemRequestHandler {
  private readonly logger = new Logger(ItemRequestServerHandler.name);

  constructor(
    private readonly registry: DataHandlerRegistry,
    private readonly baseHandler: ItemRequestBaseServerHandler,
  ) {}

  public async execute<T extends object>(
    recordType: RecordType<T>,
    request: ItemQueryRequest,
  ): Promise<ItemQueryResult<T>> {
    assertItemRequest(request, ItemRequestServerHandler.name);

    let custom: RecordHandlerMap<T>['item'] | undefined;
    try {
      custom = this.registry.getRecordHandler(recordType, 'item');
    } catch (err) {
      this.logger.error(
        `${ItemRequestServerHandler.name} could not resolve a item handler for ${recordType.name}: ${describeError(err)}`,
      );
      return ItemQueryResult.failure('Error retrieving Record');
    }

    if (custom) {
      this.logger.debug(`Using custom item handler for ${recordType.name}`);
      return custom.execute(request);
    }
    return this.baseHandler.execute(recordType, request);
  }
}
