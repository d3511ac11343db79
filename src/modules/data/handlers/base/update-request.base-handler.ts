import { Injectable, Logger } from '@nestjs/common';
import type {
  CommandRequest,
  CommandResult,
  RecordType,
} from '../../../../lib/cqs';
import { DbContextFactory } from '../../context/db-context';
import type { UpdateRequestHandler } from '../data-handlers';
import { assertCommandRequest, executeCommand } from './handler.utils';

@Injectable()
export class UpdateRequestBaseServerHandler implements UpdateRequestHandler {
  private readonly logger = new Logger(UpdateRequestBaseServerHandler.name);

  constructor(private readonly factory: DbContextFactory) {}

  public async execute<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult> {
    assertCommandRequest(recordType, request, UpdateRequestBaseServerHandler.name);

    return executeCommand(
      this.factory,
      this.logger,
      {
        handlerName: UpdateRequestBaseServerHandler.name,
        verb: 'update',
        successMessage: 'Record Saved',
        failureMessage: 'Error saving Record',
      },
      request.signal,
      (dbContext) => dbContext.update(recordType, request.item),
    );
  }
}
