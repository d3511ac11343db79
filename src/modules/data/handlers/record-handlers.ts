import type {
  CommandRequest,
  CommandResult,
  ItemQueryRequest,
  ItemQueryResult,
  ListQueryRequest,
  ListQueryResult,
} from '../../../lib/cqs';

export type DataOperation = 'list' | 'item' | 'create' | 'update' | 'delete';

/*
 * Record-specific handlers. A provider implementing one of these and
 * decorated with @RecordHandlerFor(recordType, operation) replaces the
 * generic handler for that record type and operation.
 */

export interface RecordListRequestHandler<T extends object> {
  execute(request: ListQueryRequest): Promise<ListQueryResult<T>>;
}

export interface RecordItemRequestHandler<T extends object> {
  execute(request: ItemQueryRequest): Promise<ItemQueryResult<T>>;
}

export interface RecordCommandHandler<T extends object> {
  execute(request: CommandRequest<T>): Promise<CommandResult>;
}

export interface RecordHandlerMap<T extends object> {
  list: RecordListRequestHandler<T>;
  item: RecordItemRequestHandler<T>;
  create: RecordCommandHandler<T>;
  update: RecordCommandHandler<T>;
  delete: RecordCommandHandler<T>;
}
