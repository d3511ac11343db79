import type { Db } from 'mongodb';
import { loadMongoConfig } from '../../../infra/mongo/mongo.config';

/** Database used when callers don't pass one. */
export function defaultDbName(): string {
  return loadMongoConfig().dbName;
}

/** Guard for collection names. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** Signature for a function that returns a Db instance for a given name. */
export type GetDb = (dbName?: string) => Promise<Db>;
