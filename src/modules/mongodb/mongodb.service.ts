import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { ClientSession, Collection, Db, Document } from 'mongodb';
import {
  getDb,
  getMongoClient,
  closeMongoClient,
  defaultDbName,
  isNonEmptyString,
} from './internal';
import { MongoActionError } from '../../lib/errors/MongoActionError';

/**
 * Thin, typed bridge to the native driver. Everything above this service
 * talks to collections and sessions; connection handling stays here.
 */
@Injectable()
export class MongodbService implements OnModuleDestroy {
  private readonly logger = new Logger(MongodbService.name);

  public async getDb(dbName?: string): Promise<Db> {
    const name = dbName ?? defaultDbName();
    try {
      return await getDb(name);
    } catch (err) {
      throw MongoActionError.wrap(err, { operation: 'getDb', dbName: name });
    }
  }

  public async getCollection<T extends Document = Document>(
    collection: string,
    dbName?: string,
  ): Promise<Collection<T>> {
    const name = dbName ?? defaultDbName();
    if (!isNonEmptyString(collection)) {
      throw new MongoActionError('Collection name must be a non-empty string', {
        operation: 'getCollection',
        dbName: name,
        argsPreview: { collection: String(collection) },
      });
    }

    try {
      const db = await getDb(name);
      return db.collection<T>(collection);
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'getCollection',
        dbName: name,
        collection,
      });
    }
  }

  /**
   * Start a client session. The caller owns it and must end it.
   */
  public async startSession(): Promise<ClientSession> {
    try {
      const client = await getMongoClient();
      return client.startSession();
    } catch (err) {
      throw MongoActionError.wrap(err, { operation: 'startSession' });
    }
  }

  public async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing MongoDB client.');
    await closeMongoClient();
  }
}
