import { Injectable, Logger } from '@nestjs/common';
import type {
  CommandRequest,
  CommandResult,
  RecordType,
} from '../../../../lib/cqs';
import { DbContextFactory } from '../../context/db-context';
import type { DeleteRequestHandler } from '../data-handlers';
import { assertCommandRequest, executeCommand } from './handler.utils';

@Injectable()
export class DeleteRequestBaseServerHandler implements DeleteRequestHandler {
  private readonly logger = new Logger(DeleteRequestBaseServerHandler.name);

  constructor(private readonly factory: DbContextFactory) {}

  public async execute<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult> {
    assertCommandRequest(recordType, request, DeleteRequestBaseServerHandler.name);

    return executeCommand(
      this.factory,
      this.logger,
      {
        handlerName: DeleteRequestBaseServerHandler.name,
        verb: 'delete',
        successMessage: 'Record Deleted',
        failureMessage: 'Error deleting Record',
      },
      request.signal,
      (dbContext) => dbContext.remove(recordType, request.item),
    );
  }
}
