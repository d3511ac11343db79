import type { ClientSession, Collection, Document } from 'mongodb';
import {
  getRecordMetadata,
  hydrateRecord,
  toDocument,
  type DataRecordMetadata,
  type RecordType,
  type SortSpec,
} from '../../../lib/cqs';
import { MongoActionError } from '../../../lib/errors/MongoActionError';
import { MongodbService } from '../../mongodb/mongodb.service';
import type {
  DbContext,
  RecordFilterDocument,
  RecordQuery,
  RecordSet,
} from './db-context';

export interface MongoDbContextOptions {
  readonly dbName?: string;
  readonly useTransactions: boolean;
}

type ChangeKind = 'add' | 'update' | 'remove';

interface PendingChange {
  readonly kind: ChangeKind;
  readonly meta: DataRecordMetadata;
  readonly doc: Readonly<Record<string, unknown>>;
}

interface QueryState {
  readonly filters: ReadonlyArray<RecordFilterDocument>;
  readonly sort?: SortSpec;
  readonly skip?: number;
  readonly take?: number;
}

class MongoRecordQuery<T extends object> implements RecordQuery<T> {
  constructor(
    private readonly recordType: RecordType<T>,
    private readonly collection: Collection<Document>,
    private readonly session: ClientSession,
    private readonly state: QueryState,
  ) {}

  public where(filter: RecordFilterDocument): RecordQuery<T> {
    return this.with({ filters: [...this.state.filters, filter] });
  }

  public orderBy(sort: SortSpec): RecordQuery<T> {
    return this.with({ sort });
  }

  public skip(count: number): RecordQuery<T> {
    return this.with({ skip: count });
  }

  public take(count: number): RecordQuery<T> {
    return this.with({ take: count });
  }

  public async toArray(): Promise<T[]> {
    try {
      let cursor = this.collection.find(this.combinedFilter(), {
        session: this.session,
      });
      if (this.state.sort) cursor = cursor.sort(this.state.sort);
      if (this.state.skip !== undefined) cursor = cursor.skip(this.state.skip);
      if (this.state.take !== undefined) cursor = cursor.limit(this.state.take);
      const docs = await cursor.toArray();
      return docs.map((doc) => hydrateRecord(this.recordType, doc));
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'find',
        collection: this.collection.collectionName,
        recordType: this.recordType.name,
      });
    }
  }

  public async count(): Promise<number> {
    try {
      return await this.collection.countDocuments(this.combinedFilter(), {
        session: this.session,
      });
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'countDocuments',
        collection: this.collection.collectionName,
        recordType: this.recordType.name,
      });
    }
  }

  private with(patch: Partial<QueryState>): MongoRecordQuery<T> {
    return new MongoRecordQuery(this.recordType, this.collection, this.session, {
      ...this.state,
      ...patch,
    });
  }

  private combinedFilter(): RecordFilterDocument {
    const filters = this.state.filters;
    if (filters.length === 0) return {};
    if (filters.length === 1) return filters[0];
    return { $and: [...filters] };
  }
}

class MongoRecordSet<T extends object> implements RecordSet<T> {
  constructor(
    private readonly recordType: RecordType<T>,
    private readonly meta: DataRecordMetadata,
    private readonly collection: Collection<Document>,
    private readonly session: ClientSession,
  ) {}

  public query(): RecordQuery<T> {
    return new MongoRecordQuery(this.recordType, this.collection, this.session, {
      filters: [],
    });
  }

  public async findByKey(key: unknown): Promise<T | null> {
    try {
      const doc = await this.collection.findOne(
        { [this.meta.key]: key },
        { session: this.session },
      );
      return doc ? hydrateRecord(this.recordType, doc) : null;
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'findOne',
        collection: this.meta.collection,
        recordType: this.recordType.name,
        argsPreview: { [this.meta.key]: String(key) },
      });
    }
  }
}

/**
 * DbContext over one driver session. Reads run immediately; writes are
 * queued and applied in order by `saveChanges`.
 */
export class MongoDbContext implements DbContext {
  private readonly pending: PendingChange[] = [];
  private disposed = false;

  constructor(
    private readonly mongo: MongodbService,
    private readonly session: ClientSession,
    private readonly options: MongoDbContextOptions,
  ) {}

  public async set<T extends object>(
    recordType: RecordType<T>,
  ): Promise<RecordSet<T>> {
    this.assertOpen();
    const meta = getRecordMetadata(recordType);
    const collection = await this.mongo.getCollection(
      meta.collection,
      this.options.dbName,
    );
    return new MongoRecordSet(recordType, meta, collection, this.session);
  }

  public add<T extends object>(recordType: RecordType<T>, item: T): void {
    this.enqueue('add', recordType, item);
  }

  public update<T extends object>(recordType: RecordType<T>, item: T): void {
    this.enqueue('update', recordType, item);
  }

  public remove<T extends object>(recordType: RecordType<T>, item: T): void {
    this.enqueue('remove', recordType, item);
  }

  public async saveChanges(signal?: AbortSignal): Promise<number> {
    this.assertOpen();
    signal?.throwIfAborted();
    const changes = this.pending.splice(0, this.pending.length);
    if (changes.length === 0) return 0;

    if (!this.options.useTransactions) {
      return this.applyAll(changes, signal);
    }

    let affected = 0;
    try {
      await this.session.withTransaction(async () => {
        affected = await this.applyAll(changes, signal);
      });
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'withTransaction',
        dbName: this.options.dbName,
        argsPreview: { changes: changes.length },
      });
    }
    return affected;
  }

  public async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.pending.length = 0;
    try {
      await this.session.endSession();
    } catch (err) {
      throw MongoActionError.wrap(err, { operation: 'endSession' });
    }
  }

  private enqueue<T extends object>(
    kind: ChangeKind,
    recordType: RecordType<T>,
    item: T,
  ): void {
    this.assertOpen();
    const meta = getRecordMetadata(recordType);
    this.pending.push({ kind, meta, doc: toDocument(recordType, item) });
  }

  private async applyAll(
    changes: ReadonlyArray<PendingChange>,
    signal?: AbortSignal,
  ): Promise<number> {
    let affected = 0;
    for (const change of changes) {
      signal?.throwIfAborted();
      affected += await this.apply(change);
    }
    return affected;
  }

  private async apply(change: PendingChange): Promise<number> {
    const { meta, doc } = change;
    const collection = await this.mongo.getCollection(
      meta.collection,
      this.options.dbName,
    );
    const byKey = { [meta.key]: doc[meta.key] };
    const options = { session: this.session };

    try {
      switch (change.kind) {
        case 'add': {
          // insertOne stamps _id on the document it is given
          const res = await collection.insertOne({ ...doc }, options);
          return res.acknowledged ? 1 : 0;
        }
        case 'update': {
          const res = await collection.replaceOne(byKey, { ...doc }, options);
          return typeof res.matchedCount === 'number' ? res.matchedCount : 0;
        }
        case 'remove': {
          const res = await collection.deleteOne(byKey, options);
          return res.deletedCount;
        }
      }
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: OPERATION_BY_KIND[change.kind],
        dbName: this.options.dbName,
        collection: meta.collection,
        recordType: meta.recordType.name,
        argsPreview: { [meta.key]: String(doc[meta.key]) },
      });
    }
  }

  private assertOpen(): void {
    if (this.disposed) {
      throw new MongoActionError('DbContext has been disposed', {
        operation: 'assertOpen',
      });
    }
  }
}

const OPERATION_BY_KIND: Readonly<Record<ChangeKind, string>> = {
  add: 'insertOne',
  update: 'replaceOne',
  remove: 'deleteOne',
};
