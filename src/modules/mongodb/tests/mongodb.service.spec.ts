import { Logger } from '@nestjs/common';
import { MongoActionError } from '../../../lib/errors/MongoActionError';
import * as client from '../internal/mongodb.client';
import { MongodbService } from '../mongodb.service';

jest.mock('../internal/mongodb.client', () => ({
  getDb: jest.fn(),
  getMongoClient: jest.fn(),
  closeMongoClient: jest.fn(),
}));

const mocked = jest.mocked(client);

describe('MongodbService', () => {
  const service = new MongodbService();

  beforeEach(() => {
    jest.resetAllMocks();
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  it('resolves a collection from the default database', async () => {
    const collection = { collectionName: 'weather_forecasts' };
    const db = { collection: jest.fn().mockReturnValue(collection) };
    mocked.getDb.mockResolvedValue(db as unknown as Awaited<ReturnType<typeof client.getDb>>);

    await expect(service.getCollection('weather_forecasts')).resolves.toBe(collection);
    expect(mocked.getDb).toHaveBeenCalledWith('databroker');
    expect(db.collection).toHaveBeenCalledWith('weather_forecasts');
  });

  it('rejects an empty collection name before connecting', async () => {
    await expect(service.getCollection('')).rejects.toThrow(
      'Collection name must be a non-empty string',
    );
    expect(mocked.getDb).not.toHaveBeenCalled();
  });

  it('wraps connection failures', async () => {
    mocked.getDb.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const err: unknown = await service.getDb('other').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MongoActionError);
    expect(err).toMatchObject({
      message: 'connect ECONNREFUSED',
      context: { operation: 'getDb', dbName: 'other' },
    });
  });

  it('starts a session on the shared client', async () => {
    const session = { id: 's1' };
    const mongoClient = { startSession: jest.fn().mockReturnValue(session) };
    mocked.getMongoClient.mockResolvedValue(
      mongoClient as unknown as Awaited<ReturnType<typeof client.getMongoClient>>,
    );

    await expect(service.startSession()).resolves.toBe(session);
  });

  it('closes the client on module destroy', async () => {
    mocked.closeMongoClient.mockResolvedValue(undefined);
    await service.onModuleDestroy();
    expect(mocked.closeMongoClient).toHaveBeenCalledTimes(1);
  });
});
