import type { Logger } from '@nestjs/common';
import {
  CommandResult,
  getRecordMetadata,
  readRecordKey,
  type CommandRequest,
  type ItemQueryRequest,
  type ListQueryRequest,
  type RecordType,
} from '../../../../lib/cqs';
import { DataPipelineError } from '../../../../lib/errors/DataPipelineError';
import { MongoActionError } from '../../../../lib/errors/MongoActionError';
import type { DbContext, DbContextFactory } from '../../context/db-context';

export function describeError(err: unknown): string {
  if (err instanceof MongoActionError) return err.summary();
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

function isNonNegativeInteger(n: unknown): boolean {
  return typeof n === 'number' && Number.isInteger(n) && n >= 0;
}

/** Paging shared by list and report requests: both values non-negative integers. */
export function assertPaging(
  request: { readonly startIndex: number; readonly pageSize: number },
  requestName: string,
  handlerName: string,
): void {
  if (!isNonNegativeInteger(request.startIndex)) {
    throw new DataPipelineError(
      `${requestName}.startIndex must be a non-negative integer (got ${String(request.startIndex)}) in ${handlerName}`,
    );
  }
  if (!isNonNegativeInteger(request.pageSize)) {
    throw new DataPipelineError(
      `${requestName}.pageSize must be a non-negative integer (got ${String(request.pageSize)}) in ${handlerName}`,
    );
  }
}

export function assertListRequest(
  request: ListQueryRequest | null | undefined,
  handlerName: string,
): asserts request is ListQueryRequest {
  if (request == null) {
    throw new DataPipelineError(`No ListQueryRequest defined in ${handlerName}`);
  }
  assertPaging(request, 'ListQueryRequest', handlerName);
}

export function assertItemRequest(
  request: ItemQueryRequest | null | undefined,
  handlerName: string,
): asserts request is ItemQueryRequest {
  if (request == null) {
    throw new DataPipelineError(`No ItemQueryRequest defined in ${handlerName}`);
  }
  if (typeof request.uid !== 'string' || request.uid.length === 0) {
    throw new DataPipelineError(`ItemQueryRequest has no uid in ${handlerName}`);
  }
}

export function assertCommandRequest<T extends object>(
  recordType: RecordType<T>,
  request: CommandRequest<T> | null | undefined,
  handlerName: string,
): asserts request is CommandRequest<T> {
  if (request == null) {
    throw new DataPipelineError(`No CommandRequest defined in ${handlerName}`);
  }
  if (request.item == null) {
    throw new DataPipelineError(`CommandRequest has no item in ${handlerName}`);
  }
  const { key } = getRecordMetadata(recordType);
  const keyValue = readRecordKey(request.item, key);
  if (keyValue === undefined || keyValue === null || keyValue === '') {
    throw new DataPipelineError(
      `${recordType.name} record has no '${key}' value in ${handlerName}`,
    );
  }
}

/** End the context; a failure here is logged, never returned to the caller. */
export async function releaseContext(
  dbContext: DbContext | undefined,
  logger: Logger,
): Promise<void> {
  if (!dbContext) return;
  try {
    await dbContext.dispose();
  } catch (err) {
    logger.warn(`Failed to dispose DbContext: ${describeError(err)}`);
  }
}

export interface CommandSpec {
  readonly handlerName: string;
  /** Verb for log lines: create, update, delete. */
  readonly verb: string;
  readonly successMessage: string;
  readonly failureMessage: string;
}

/**
 * Shared body of the command handlers: open a context, queue one change,
 * save, and read the affected count as success (exactly 1) or failure.
 */
export async function executeCommand(
  factory: DbContextFactory,
  logger: Logger,
  spec: CommandSpec,
  signal: AbortSignal | undefined,
  queue: (dbContext: DbContext) => void,
): Promise<CommandResult> {
  let dbContext: DbContext | undefined;
  try {
    dbContext = await factory.createDbContext();
    signal?.throwIfAborted();
    queue(dbContext);
    const recordsChanged = await dbContext.saveChanges(signal);

    if (recordsChanged !== 1) {
      logger.error(
        `${spec.handlerName} failed to ${spec.verb} the Record. The returned update count was ${recordsChanged}`,
      );
      return CommandResult.failure(spec.failureMessage);
    }
    return CommandResult.success(spec.successMessage);
  } catch (err) {
    if (err instanceof DataPipelineError) throw err;
    logger.error(
      `${spec.handlerName} failed to ${spec.verb} the Record: ${describeError(err)}`,
    );
    return CommandResult.failure(spec.failureMessage);
  } finally {
    await releaseContext(dbContext, logger);
  }
}
