import { Injectable, Logger } from '@nestjs/common';
import {
  ItemQueryResult,
  type ItemQueryRequest,
  type RecordType,
} from '../../../../lib/cqs';
import { DataPipelineError } from '../../../../lib/errors/DataPipelineError';
import { DbContextFactory, type DbContext } from '../../context/db-context';
import type { ItemRequestHandler } from '../data-handlers';
import {
  assertItemRequest,
  describeError,
  releaseContext,
} from './handler.utils';

@Injectable()
export class ItemRequestBaseServerHandler implements ItemRequestHandler {
  private readonly logger = new Logger(ItemRequestBaseServerHandler.name);

  constructor(private readonly factory: DbContextFactory) {}

  public async execute<T extends object>(
    recordType: RecordType<T>,
    request: ItemQueryRequest,
  ): Promise<ItemQueryResult<T>> {
    assertItemRequest(request, ItemRequestBaseServerHandler.name);

    let dbContext: DbContext | undefined;
    try {
      dbContext = await this.factory.createDbContext();
      request.signal?.throwIfAborted();

      const set = await dbContext.set(recordType);
      const record = await set.findByKey(request.uid);

      if (!record) {
        this.logger.error(
          `${ItemRequestBaseServerHandler.name} failed to find the Record with Uid: ${request.uid}`,
        );
        return ItemQueryResult.failure('No record retrieved');
      }
      return ItemQueryResult.success(record);
    } catch (err) {
      if (err instanceof DataPipelineError) throw err;
      this.logger.error(
        `${ItemRequestBaseServerHandler.name} failed to read ${recordType.name} ${request.uid}: ${describeError(err)}`,
      );
      return ItemQueryResult.failure('Error retrieving Record');
    } finally {
      await releaseContext(dbContext, this.logger);
    }
  }
}
