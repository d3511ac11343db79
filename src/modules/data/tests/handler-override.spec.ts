import { Injectable, Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  CommandRequest,
  CommandResult,
  DataRecord,
  ItemQueryRequest,
  ListQueryRequest,
  ListQueryResult,
} from '../../../lib/cqs';
import { AppError } from '../../../lib/errors/AppError';
import { DataPipelineError } from '../../../lib/errors/DataPipelineError';
import { InMemoryMongo } from '../../../../test/helpers/in-memory-mongo';
import { MongodbService } from '../../mongodb/mongodb.service';
import { DataBroker } from '../broker/data-broker';
import { DataModule } from '../data.module';
import type {
  RecordCommandHandler,
  RecordListRequestHandler,
} from '../handlers/record-handlers';
import { RecordHandlerFor } from '../registry/data.decorators';
import { DataHandlerRegistry } from '../registry/data-handler.registry';

@DataRecord({ collection: 'override_gizmos' })
class Gizmo {
  uid = '';
  name = '';
}

@DataRecord({ collection: 'override_doohickeys' })
class Doohickey {
  uid = '';
  name = '';
}

@Injectable()
@RecordHandlerFor(Gizmo, 'list')
class GizmoListHandler implements RecordListRequestHandler<Gizmo> {
  public readonly requests: ListQueryRequest[] = [];

  async execute(request: ListQueryRequest): Promise<ListQueryResult<Gizmo>> {
    this.requests.push(request);
    const item = Object.assign(new Gizmo(), { uid: 'custom', name: 'From custom handler' });
    return Promise.resolve(ListQueryResult.success([item], 1, 'custom list'));
  }
}

@Injectable()
@RecordHandlerFor(Gizmo, 'delete')
class GizmoDeleteHandler implements RecordCommandHandler<Gizmo> {
  async execute(): Promise<CommandResult> {
    return Promise.resolve(CommandResult.failure('Gizmos are never deleted'));
  }
}

@Injectable()
@RecordHandlerFor(Gizmo, 'delete')
class SecondGizmoDeleteHandler implements RecordCommandHandler<Gizmo> {
  async execute(): Promise<CommandResult> {
    return Promise.resolve(CommandResult.success());
  }
}

describe('record-specific handler resolution', () => {
  let moduleRef: TestingModule;
  let mongo: InMemoryMongo;
  let broker: DataBroker;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    mongo = new InMemoryMongo();
    mongo.collection('override_gizmos').seed([{ uid: 'g1', name: 'Stored gizmo' }]);
    mongo.collection('override_doohickeys').seed([{ uid: 'd1', name: 'Stored doohickey' }]);

    moduleRef = await Test.createTestingModule({
      imports: [DataModule],
      providers: [GizmoListHandler, GizmoDeleteHandler],
    })
      .overrideProvider(MongodbService)
      .useValue(mongo)
      .compile();
    broker = moduleRef.get(DataBroker);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await moduleRef.close();
  });

  it('delegates to the registered handler for that record and operation', async () => {
    const request = new ListQueryRequest({ pageSize: 5 });
    const res = await broker.getItems(Gizmo, request);

    expect(res.message).toBe('custom list');
    expect(res.items.map((g) => g.uid)).toEqual(['custom']);
    expect(moduleRef.get(GizmoListHandler).requests).toEqual([request]);
    expect(mongo.sessions).toHaveLength(0);
  });

  it('keeps the generic handler for other operations on the same record', async () => {
    const res = await broker.getItem(Gizmo, new ItemQueryRequest({ uid: 'g1' }));
    expect(res.item?.name).toBe('Stored gizmo');
  });

  it('keeps the generic handler for other record types', async () => {
    const res = await broker.getItems(Doohickey, new ListQueryRequest());
    expect(res.items.map((d) => d.name)).toEqual(['Stored doohickey']);
    expect(res.message).toBe('');
  });

  it('routes commands to a registered command handler', async () => {
    const item = Object.assign(new Gizmo(), { uid: 'g1', name: 'x' });
    const res = await broker.deleteItem(Gizmo, new CommandRequest({ item }));
    expect(res).toEqual({ successful: false, message: 'Gizmos are never deleted' });
    expect(mongo.collection('override_gizmos').size).toBe(1);
  });

  it('rejects a missing request before it reaches the registered handler', async () => {
    await expect(
      broker.getItems(Gizmo, undefined as unknown as ListQueryRequest),
    ).rejects.toBeInstanceOf(DataPipelineError);
    await expect(
      broker.deleteItem(Gizmo, null as unknown as CommandRequest<Gizmo>),
    ).rejects.toThrow('No CommandRequest defined in DeleteRequestServerHandler');
    expect(moduleRef.get(GizmoListHandler).requests).toHaveLength(0);
  });
});

describe('DataHandlerRegistry', () => {
  it('rejects two handlers for the same record and operation', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [DataModule],
      providers: [GizmoDeleteHandler, SecondGizmoDeleteHandler],
    })
      .overrideProvider(MongodbService)
      .useValue(new InMemoryMongo())
      .compile();

    const registry = moduleRef.get(DataHandlerRegistry);
    expect(() => registry.getRecordHandler(Gizmo, 'delete')).toThrow(AppError);
    expect(() => registry.getFilter(Gizmo)).toThrow(
      'Duplicate delete handler for Gizmo',
    );
    await moduleRef.close();
  });

  it('turns a duplicate registration into a failure result at the broker', async () => {
    const errorSpy = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    const moduleRef = await Test.createTestingModule({
      imports: [DataModule],
      providers: [GizmoDeleteHandler, SecondGizmoDeleteHandler],
    })
      .overrideProvider(MongodbService)
      .useValue(new InMemoryMongo())
      .compile();

    const item = Object.assign(new Gizmo(), { uid: 'g1', name: 'x' });
    const res = await moduleRef
      .get(DataBroker)
      .deleteItem(Gizmo, new CommandRequest({ item }));

    expect(res).toEqual({ successful: false, message: 'Error deleting Record' });
    expect(errorSpy).toHaveBeenCalledWith(
      'DeleteRequestServerHandler could not resolve a delete handler for Gizmo: AppError: Duplicate delete handler for Gizmo',
    );
    errorSpy.mockRestore();
    await moduleRef.close();
  });

  it('fails application startup on a duplicate registration', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [DataModule],
      providers: [GizmoDeleteHandler, SecondGizmoDeleteHandler],
    })
      .overrideProvider(MongodbService)
      .useValue(new InMemoryMongo())
      .compile();

    await expect(moduleRef.init()).rejects.toThrow(
      'Duplicate delete handler for Gizmo',
    );
    await moduleRef.close();
  });
});
