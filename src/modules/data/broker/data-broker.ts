import type {
  CommandRequest,
  CommandResult,
  ItemQueryRequest,
  ItemQueryResult,
  ListQueryRequest,
  ListQueryResult,
  RecordType,
} from '../../../lib/cqs';

/**
 * Single entry point for record CRUD and list queries. Consumers depend on
 * this token; DataModule binds it to ServerDataBroker.
 */
export abstract class DataBroker {
  abstract getItems<T extends object>(
    recordType: RecordType<T>,
    request: ListQueryRequest,
  ): Promise<ListQueryResult<T>>;

  abstract getItem<T extends object>(
    recordType: RecordType<T>,
    request: ItemQueryRequest,
  ): Promise<ItemQueryResult<T>>;

  abstract createItem<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult>;

  abstract updateItem<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult>;

  abstract deleteItem<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult>;
}
