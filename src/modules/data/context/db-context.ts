import type { Document, Filter } from 'mongodb';
import type { RecordType, SortSpec } from '../../../lib/cqs';

export type RecordFilterDocument = Filter<Document>;

/**
 * Immutable query over one record collection. Every builder call returns a
 * new query; nothing runs until `toArray()` or `count()`.
 */
export interface RecordQuery<T extends object> {
  /** AND-combined with any filter already applied. */
  where(filter: RecordFilterDocument): RecordQuery<T>;
  orderBy(sort: SortSpec): RecordQuery<T>;
  skip(count: number): RecordQuery<T>;
  take(count: number): RecordQuery<T>;
  toArray(): Promise<T[]>;
  /** Number of records matching the filter; skip/take are ignored. */
  count(): Promise<number>;
}

export interface RecordSet<T extends object> {
  query(): RecordQuery<T>;
  findByKey(key: unknown): Promise<T | null>;
}

/**
 * A unit of work: one session, reads against record sets, and a queue of
 * changes applied by `saveChanges`.
 */
export interface DbContext {
  set<T extends object>(recordType: RecordType<T>): Promise<RecordSet<T>>;
  add<T extends object>(recordType: RecordType<T>, item: T): void;
  /** Replace the stored record that has the same key. */
  update<T extends object>(recordType: RecordType<T>, item: T): void;
  /** Delete the stored record that has the same key. */
  remove<T extends object>(recordType: RecordType<T>, item: T): void;
  /** Apply queued changes; resolves to the number of records affected. */
  saveChanges(signal?: AbortSignal): Promise<number>;
  /** End the session. Safe to call more than once. */
  dispose(): Promise<void>;
}

/** Opens a fresh DbContext per operation. */
export abstract class DbContextFactory {
  abstract createDbContext(): Promise<DbContext>;
}
