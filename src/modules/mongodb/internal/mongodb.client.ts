import { Logger } from '@nestjs/common';
import { MongoClient, Db, MongoClientOptions } from 'mongodb';
import {
  loadMongoConfig,
  buildMongoUri,
  maskMongoUri,
} from '../../../infra/mongo/mongo.config';
import type { GetDb } from './mongodb.types';

/**
 * Lazy singleton MongoClient.
 * - Concurrent first calls share one connect attempt.
 * - A failed connect is forgotten so the next call retries.
 */
class LazyMongoClient {
  private readonly logger = new Logger('MongoClient');
  private client?: MongoClient;
  private connecting?: Promise<MongoClient>;

  public async getClient(): Promise<MongoClient> {
    if (this.client) return this.client;
    if (this.connecting) return this.connecting;

    const uri = buildMongoUri(loadMongoConfig());
    const options: MongoClientOptions = { ignoreUndefined: true };

    const connectPromise: Promise<MongoClient> = (async () => {
      this.logger.log(`Connecting to ${maskMongoUri(uri)}`);
      const created = new MongoClient(uri, options);
      await created.connect();
      this.client = created;
      this.connecting = undefined;
      return created;
    })();

    this.connecting = connectPromise;

    try {
      return await connectPromise;
    } catch (err) {
      this.connecting = undefined;
      this.client = undefined;
      if (err instanceof Error) throw err;
      throw new Error('Failed to connect to MongoDB');
    }
  }

  public async getDb(dbName?: string): Promise<Db> {
    const client = await this.getClient();
    return client.db(dbName ?? loadMongoConfig().dbName);
  }

  /** Idempotent. */
  public async close(): Promise<void> {
    const current = this.client;
    if (!current) return;
    this.client = undefined;
    this.connecting = undefined;
    await current.close();
  }
}

const lazyClient = new LazyMongoClient();

export const getDb: GetDb = (dbName?: string): Promise<Db> =>
  lazyClient.getDb(dbName);

export function getMongoClient(): Promise<MongoClient> {
  return lazyClient.getClient();
}

export function closeMongoClient(): Promise<void> {
  return lazyClient.close();
}
