import { Module } from '@nestjs/common';
import { MongodbService } from './mongodb.service';

/**
 * Internal-only MongoDB module: no controllers, exports the driver bridge.
 */
@Module({
  providers: [MongodbService],
  exports: [MongodbService],
})
export class MongodbModule {}
