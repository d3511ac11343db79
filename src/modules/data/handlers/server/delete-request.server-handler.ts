import { Injectable, Logger } from '@nestjs/common';
import {
  CommandResult,
  type CommandRequest,
  type RecordType,
} from '../../../../lib/cqs';
import { DataHandlerRegistry } from '../../registry/data-handler.registry';
import { DeleteRequestBaseServerHandler } from '../base/delete-request.base-handler';
import { assertCommandRequest, describeError } from '../base/handler.utils';
import { DeleteRequestHandler } from '../data-handlers';
import type { RecordHandlerMap } from '../record-handlers';

@Injectable()
export class DeleteRequestServerHandler implements DeleteRequestHandler {
  private readonly logger = new Logger(DeleteRequestServerHandler.name);

  constructor(
    private readonly registry: DataHandlerRegistry,
    private readonly baseHandler: DeleteRequestBaseServerHandler,
  ) {}

  public async execute<T extends object>(
    recordType: RecordType<T>,
    request: CommandRequest<T>,
  ): Promise<CommandResult> {
    assertCommandRequest(recordType, request, DeleteRequestServerHandler.name);

    let custom: RecordHandlerMap<T>['delete'] | undefined;
    try {
      custom = this.registry.getRecordHandler(recordType, 'delete');
    } catch (err) {
      this.logger.error(
        `${DeleteRequestServerHandler.name} could not resolve a delete handler for ${recordType.name}: ${describeError(err)}`,
      );
      return CommandResult.failure('Error deleting Record');
    }

    if (custom) {
      this.logger.debug(`Using custom delete handler for ${recordType.name}`);
      return custom.execute(request);
    }
    return this.baseHandler.execute(recordType, request);
  }
}
