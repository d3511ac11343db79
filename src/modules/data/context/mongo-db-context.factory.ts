import { Inject, Injectable } from '@nestjs/common';
import { MongodbService } from '../../mongodb/mongodb.service';
import { DATA_CONFIG, type DataConfig } from '../data.config';
import { DbContextFactory, type DbContext } from './db-context';
import { MongoDbContext } from './mongo-db-context';

@Injectable()
export class MongoDbContextFactory extends DbContextFactory {
  constructor(
    private readonly mongo: MongodbService,
    @Inject(DATA_CONFIG) private readonly config: DataConfig,
  ) {
    super();
  }

  /** A new session per context; contexts are never shared between calls. */
  public async createDbContext(): Promise<DbContext> {
    const session = await this.mongo.startSession();
    return new MongoDbContext(this.mongo, session, {
      useTransactions: this.config.useTransactions,
    });
  }
}
