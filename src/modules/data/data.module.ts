import { Module } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { MongodbModule } from '../mongodb/mongodb.module';
import { DataBroker } from './broker/data-broker';
import { ServerDataBroker } from './broker/server-data-broker';
import { DbContextFactory } from './context/db-context';
import { MongoDbContextFactory } from './context/mongo-db-context.factory';
import { DATA_CONFIG, loadDataConfig } from './data.config';
import { CreateRequestBaseServerHandler } from './handlers/base/create-request.base-handler';
import { DeleteRequestBaseServerHandler } from './handlers/base/delete-request.base-handler';
import { ItemRequestBaseServerHandler } from './handlers/base/item-request.base-handler';
import { ListRequestBaseServerHandler } from './handlers/base/list-request.base-handler';
import { UpdateRequestBaseServerHandler } from './handlers/base/update-request.base-handler';
import {
  CreateRequestHandler,
  DeleteRequestHandler,
  ItemRequestHandler,
  ListRequestHandler,
  UpdateRequestHandler,
} from './handlers/data-handlers';
import { CreateRequestServerHandler } from './handlers/server/create-request.server-handler';
import { DeleteRequestServerHandler } from './handlers/server/delete-request.server-handler';
import { ItemRequestServerHandler } from './handlers/server/item-request.server-handler';
import { ListRequestServerHandler } from './handlers/server/list-request.server-handler';
import { UpdateRequestServerHandler } from './handlers/server/update-request.server-handler';
import { RecordIndexesBootstrap } from './record-indexes.bootstrap';
import { DataHandlerRegistry } from './registry/data-handler.registry';
import { ReportBroker } from './reports/report-broker';
import { ServerReportBroker } from './reports/server-report-broker';

/**
 * Data broker wiring. Every generic piece is bound to an abstract-class
 * token; override a token in the importing module to replace it.
 */
@Module({
  imports: [DiscoveryModule, MongodbModule],
  providers: [
    { provide: DATA_CONFIG, useFactory: () => loadDataConfig() },
    DataHandlerRegistry,
    { provide: DbContextFactory, useClass: MongoDbContextFactory },

    ListRequestBaseServerHandler,
    ItemRequestBaseServerHandler,
    CreateRequestBaseServerHandler,
    UpdateRequestBaseServerHandler,
    DeleteRequestBaseServerHandler,

    { provide: ListRequestHandler, useClass: ListRequestServerHandler },
    { provide: ItemRequestHandler, useClass: ItemRequestServerHandler },
    { provide: CreateRequestHandler, useClass: CreateRequestServerHandler },
    { provide: UpdateRequestHandler, useClass: UpdateRequestServerHandler },
    { provide: DeleteRequestHandler, useClass: DeleteRequestServerHandler },

    { provide: DataBroker, useClass: ServerDataBroker },
    { provide: ReportBroker, useClass: ServerReportBroker },

    RecordIndexesBootstrap,
  ],
  exports: [
    DATA_CONFIG,
    DataHandlerRegistry,
    DbContextFactory,
    ListRequestHandler,
    ItemRequestHandler,
    CreateRequestHandler,
    UpdateRequestHandler,
    DeleteRequestHandler,
    DataBroker,
    ReportBroker,
  ],
})
export class DataModule {}
