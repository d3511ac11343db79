import type {
  CommandRequest,
  CommandResult,
  ItemQueryRequest,
  ItemQueryResult,
  ListQueryRequest,
  ListQueryResult,
  RecordType,
} from '../../../lib/cqs';

/*
 * Generic per-operation handlers. The abstract classes double as DI tokens:
 * DataModule binds each to its server handler, and an application can bind
 * its own implementation instead.
 */

export abstract class ListRequestHandler {
  abstract execute<T extends object>(
    recordType: RecordType<T>,
    request: ListQueryRequest,
  ): Promise<ListQueryResult<T>>;
}

export abstract class ItemRequestHandler {
  abstract execute<T extends object>(
    recordType: RecordType<T>,
    request: ItemQueryRequest,
  ): Promise<ItemQueryResult<T>>;
}

export abstract class CreateRequestHandler {
  abstract execute<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult>;
}

export abstract class UpdateRequestHandler {
  abstract execute<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult>;
}

export abstract class DeleteRequestHandler {
  abstract execute<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult>;
}
