import { Injectable } from '@nestjs/common';
import type {
  CommandRequest,
  CommandResult,
  ItemQueryRequest,
  ItemQueryResult,
  ListQueryRequest,
  ListQueryResult,
  RecordType,
} from '../../../lib/cqs';
import {
  CreateRequestHandler,
  DeleteRequestHandler,
  ItemRequestHandler,
  ListRequestHandler,
  UpdateRequestHandler,
} from '../handlers/data-handlers';
import { DataBroker } from './data-broker';

/** Forwards each call to the handler bound for its operation. */
@Injectable()
export class ServerDataBroker extends DataBroker {
  constructor(
    private readonly listHandler: ListRequestHandler,
    private readonly itemHandler: ItemRequestHandler,
    private readonly createHandler: CreateRequestHandler,
    private readonly updateHandler: UpdateRequestHandler,
    private readonly deleteHandler: DeleteRequestHandler,
  ) {
    super();
  }

  public getItems<T extends object>(
    recordType: RecordType<T>,
    request: ListQueryRequest,
  ): Promise<ListQueryResult<T>> {
    return this.listHandler.execute(recordType, request);
  }

  public getItem<T extends object>(
    recordType: RecordType<T>,
    request: ItemQueryRequest,
  ): Promise<ItemQueryResult<T>> {
    return this.itemHandler.execute(recordType, request);
  }

  public createItem<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult> {
    return this.createHandler.execute(recordType, request);
  }

  public updateItem<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult> {
    return this.updateHandler.execute(recordType, request);
  }

  public deleteItem<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult> {
    return this.deleteHandler.execute(recordType, request);
  }
}
