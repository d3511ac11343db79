import { Injectable, Logger } from '@nestjs/common';
import {
  buildSortSpec,
  ListQueryResult,
  type ListQueryRequest,
  type RecordType,
  type SortSpec,
} from '../../../../lib/cqs';
import { DataPipelineError } from '../../../../lib/errors/DataPipelineError';
import {
  DbContextFactory,
  type DbContext,
  type RecordFilterDocument,
} from '../../context/db-context';
import { DataHandlerRegistry } from '../../registry/data-handler.registry';
import type { ListRequestHandler } from '../data-handlers';
import {
  assertListRequest,
  describeError,
  releaseContext,
} from './handler.utils';

/**
 * Generic list query: filter, count, sort, then page.
 *
 * The total count is taken after filtering and before paging, so it is the
 * number of matching records rather than the page length. A pageSize of 0
 * returns every matching record.
 */
@Injectable()
export class ListRequestBaseServerHandler implements ListRequestHandler {
  private readonly logger = new Logger(ListRequestBaseServerHandler.name);

  constructor(
    private readonly factory: DbContextFactory,
    private readonly registry: DataHandlerRegistry,
  ) {}

  public async execute<T extends object>(
    recordType: RecordType<T>,
    request: ListQueryRequest,
  ): Promise<ListQueryResult<T>> {
    assertListRequest(request, ListRequestBaseServerHandler.name);

    let dbContext: DbContext | undefined;
    try {
      dbContext = await this.factory.createDbContext();
      request.signal?.throwIfAborted();

      const set = await dbContext.set(recordType);
      let query = set.query();

      const filter = this.resolveFilter(recordType, request);
      if (filter) query = query.where(filter);

      const totalCount = await query.count();

      const sort = this.resolveSort(recordType, request);
      if (sort) query = query.orderBy(sort);

      if (request.pageSize > 0) {
        query = query.skip(request.startIndex).take(request.pageSize);
      }

      const items = await query.toArray();
      return ListQueryResult.success(items, totalCount);
    } catch (err) {
      if (err instanceof DataPipelineError) throw err;
      this.logger.error(
        `${ListRequestBaseServerHandler.name} failed to list ${recordType.name} records: ${describeError(err)}`,
      );
      return ListQueryResult.failure(
        `Error retrieving ${recordType.name} records`,
      );
    } finally {
      await releaseContext(dbContext, this.logger);
    }
  }

  private resolveFilter(
    recordType: RecordType,
    request: ListQueryRequest,
  ): RecordFilterDocument | undefined {
    if (request.filters.length === 0) return undefined;
    const recordFilter = this.registry.getFilter(recordType);
    if (!recordFilter) {
      this.logger.warn(
        `No RecordFilter registered for ${recordType.name}; ignoring ${request.filters.length} filter(s).`,
      );
      return undefined;
    }
    return recordFilter.getFilter(request.filters);
  }

  private resolveSort(
    recordType: RecordType,
    request: ListQueryRequest,
  ): SortSpec | undefined {
    if (!request.sortField) return undefined;
    const sorter = this.registry.getSorter(recordType);
    return sorter
      ? sorter.getSort(request.sortField, request.sortDescending)
      : buildSortSpec(recordType, request.sortField, request.sortDescending);
  }
}
