import { Injectable, Logger } from '@nestjs/common';
import type {
  CommandRequest,
  CommandResult,
  RecordType,
} from '../../../../lib/cqs';
import { DbContextFactory } from '../../context/db-context';
import type { CreateRequestHandler } from '../data-handlers';
import { assertCommandRequest, executeCommand } from './handler.utils';

@Injectable()
export class CreateRequestBaseServerHandler implements CreateRequestHandler {
  private readonly logger = new Logger(CreateRequestBaseServerHandler.name);

  constructor(private readonly factory: DbContextFactory) {}

  public async execute<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult> {
    assertCommandRequest(recordType, request, CreateRequestBaseServerHandler.name);

    return executeCommand(
      this.factory,
      this.logger,
      {
        handlerName: CreateRequestBaseServerHandler.name,
        verb: 'create',
        successMessage: 'Record Created',
        failureMessage: 'Error creating Record',
      },
      request.signal,
      (dbContext) => dbContext.add(recordType, request.item),
    );
  }
}
