import { AppError } from './AppError';

/**
 * Driver operations a database context performs.
 * Left open (string intersection) so callers can name composite steps.
 */
export type MongoOperation =
  | 'getDb'
  | 'getCollection'
  | 'startSession'
  | 'endSession'
  | 'find'
  | 'countDocuments'
  | 'findOne'
  | 'insertOne'
  | 'replaceOne'
  | 'deleteOne'
  | 'createIndex'
  | 'withTransaction'
  | (string & {});

/**
 * Structured context attached to a driver failure.
 */
export interface MongoErrorContext {
  readonly operation: MongoOperation;
  readonly dbName?: string;
  readonly collection?: string;
  /** Name of the record class being read or written, when there is one. */
  readonly recordType?: string;
  /**
   * Sanitized preview of the arguments. Keys and counts only,
   * never whole documents.
   */
  readonly argsPreview?: Readonly<Record<string, unknown>>;
  /** Driver error code (e.g. 11000 for a duplicate key). */
  readonly driverCode?: number | string;
}

/**
 * A failed MongoDB action, wrapping the driver error when there is one.
 */
export class MongoActionError extends AppError {
  public readonly context: Readonly<MongoErrorContext>;
  private readonly driverError?: Error;

  constructor(message: string, context: MongoErrorContext, cause?: Error) {
    super(message, 'MONGO_ACTION_FAILED', cause);
    this.context = Object.freeze({ ...context });
    this.driverError = cause;
  }

  /** One-line summary for logs. */
  public summary(): string {
    const parts: string[] = [`op=${this.context.operation}`];
    if (this.context.dbName) parts.push(`db=${this.context.dbName}`);
    if (this.context.collection) parts.push(`coll=${this.context.collection}`);
    if (this.context.recordType) parts.push(`record=${this.context.recordType}`);
    if (this.context.driverCode !== undefined) {
      parts.push(`driverCode=${String(this.context.driverCode)}`);
    }
    return `Mongo action failed: ${parts.join(' ')} (${this.message})`;
  }

  public toJSON(): {
    name: string;
    message: string;
    context: MongoErrorContext;
    cause?: { name: string; message: string };
  } {
    const c = this.driverError;
    return {
      name: this.name,
      message: this.message,
      context: this.context,
      cause: c ? { name: c.name, message: c.message } : undefined,
    };
  }

  /**
   * Wrap anything thrown by the driver. An existing MongoActionError is
   * returned untouched so the innermost context wins.
   */
  public static wrap(
    err: unknown,
    context: MongoErrorContext,
    fallbackMessage = 'Mongo action failed',
  ): MongoActionError {
    if (err instanceof MongoActionError) {
      return err;
    }
    const { message, driverCode } = extractDriverDetails(err);
    return new MongoActionError(
      message ?? fallbackMessage,
      { ...context, driverCode },
      err instanceof Error ? err : undefined,
    );
  }
}

function extractDriverDetails(err: unknown): {
  message?: string;
  driverCode?: number | string;
} {
  if (!(err instanceof Error)) return {};
  const message = err.message.length > 0 ? err.message : undefined;
  const code: unknown = Reflect.get(err, 'code');
  return {
    message,
    driverCode:
      typeof code === 'number' || typeof code === 'string' ? code : undefined,
  };
}
