import { Injectable, Logger } from '@nestjs/common';
import {
  CommandResult,
  type CommandRequest,
  type RecordType,
} from '../../../../lib/cqs';
import { DataHandlerRegistry } from '../../registry/data-handler.registry';
import { CreateRequestBaseServerHandler } from '../base/create-request.base-handler';
import { assertCommandRequest, describeError } from '../base/handler.utils';
import { CreateRequestHandler } from '../data-handlers';
import type { RecordHandlerMap } from '../record-handlers';

@Injectable()
export class CreateRequestServerHandler implements CreateRequestHandler {
  private readonly logger = new Logger(CreateRequestServerHandler.name);

  constructor(
    private readonly registry: DataHandlerRegistry,
    private readonly baseHandler: CreateRequestBaseServerHandler,
  ) {}

  public async execute<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult> {
    assertCommandRequest(recordType, request, CreateRequestServerHandler.name);

    let custom: RecordHandlerMap<T>['create'] | undefined;
    try {
      custom = this.registry.getRecordHandler(recordType, 'create');
    } catch (err) {
      this.logger.error(
        `${CreateRequestServerHandler.name} could not resolve a create handler for ${recordType.name}: ${describeError(err)}`,
      );
      return CommandResult.failure('Error creating Record');
    }

    if (custom) {
      this.logger.debug(`Using custom create handler for ${recordType.name}`);
      return custom.execute(request);
    }
    return this.baseHandler.execute(recordType, request);
  }
}
