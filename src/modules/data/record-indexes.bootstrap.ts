import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationBootstrap,
} from '@nestjs/common';
import { listRecordMetadata } from '../../lib/cqs';
import { MongoActionError } from '../../lib/errors/MongoActionError';
import { MongodbService } from '../mongodb/mongodb.service';
import { DATA_CONFIG, type DataConfig } from './data.config';

/** Creates the unique key index of every @DataRecord collection. */
@Injectable()
export class RecordIndexesBootstrap implements OnApplicationBootstrap {
  private readonly logger = new Logger(RecordIndexesBootstrap.name);

  constructor(
    private readonly mongo: MongodbService,
    @Inject(DATA_CONFIG) private readonly config: DataConfig,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.ensureIndexes) return;

    for (const meta of listRecordMetadata()) {
      const collection = await this.mongo.getCollection(meta.collection);
      try {
        await collection.createIndex(
          { [meta.key]: 1 },
          { unique: true, name: `${meta.key}_unique` },
        );
      } catch (err) {
        throw MongoActionError.wrap(err, {
          operation: 'createIndex',
          collection: meta.collection,
          recordType: meta.recordType.name,
        });
      }
      this.logger.log(
        `Ensured unique index on ${meta.collection}.${meta.key}`,
      );
    }
  }
}
