import { Injectable, Logger } from '@nestjs/common';
import {
  CommandResult,
  type CommandRequest,
  type RecordType,
} from '../../../../lib/cqs';
import { DataHandlerRegistry } from '../../registry/data-handler.registry';
import { UpdateRequestBaseServerHandler } from '../base/update-request.base-handler';
import { assertCommandRequest, describeError } from '../base/handler.utils';
import { UpdateRequestHandler } from '../data-handlers';
import type { RecordHandlerMap } from '../record-handlers';

@Injectable()
export class UpdateRequestServerHandler implements UpdateRequestHandler {
  private readonly logger = new Logger(UpdateRequestServerHandler.name);

  constructor(
    private readonly registry: DataHandlerRegistry,
    private readonly baseHandler: UpdateRequestBaseServerHandler,
  ) {}

  public async execute<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult> {
    assertCommandRequest(recordType, request, UpdateRequestServerHandler.name);

    let custom: RecordHandlerMap<T>['update'] | undefined;
    try {
      custom = this.registry.getRecordHandler(recordType, 'update');
    } catch (err) {
      this.logger.error(
        `${UpdateRequestServerHandler.name} could not resolve a update handler for ${recordType.name}: ${describeError(err)}`,
      );
      return CommandResult.failure('Error saving Record');
    }

    if (custom) {
      this.logger.debug(`Using custom update handler for ${recordType.name}`);
      return custom.execute(request);
    }
    return this.baseHandler.execute(recordType, request);
  }
}
