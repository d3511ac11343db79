import { Test, TestingModule } from '@nestjs/testing';
import {
  CommandResult,
  ItemQueryResult,
  ListQueryRequest,
  ListQueryResult,
} from '../../../lib/cqs';
import { DataBroker } from '../../data/broker/data-broker';
import { WeatherForecastEditService } from '../weather-forecast-edit.service';
import { WeatherForecastListService } from '../weather-forecast-list.service';
import { WeatherForecast } from '../weather-forecast.record';

function forecast(uid: string, summary: string): WeatherForecast {
  return Object.assign(new WeatherForecast(), {
    uid,
    date: '2025-01-10',
    temperatureC: 5,
    summary,
  });
}

describe('weather forecast services', () => {
  let moduleRef: TestingModule;
  let broker: jest.Mocked<DataBroker>;

  beforeEach(async () => {
    const mockBroker: Partial<jest.Mocked<DataBroker>> = {
      getItems: jest.fn(),
      getItem: jest.fn(),
      createItem: jest.fn(),
      updateItem: jest.fn(),
      deleteItem: jest.fn(),
    };

    moduleRef = await Test.createTestingModule({
      providers: [
        WeatherForecastListService,
        WeatherForecastEditService,
        { provide: DataBroker, useValue: mockBroker },
      ],
    }).compile();

    broker = moduleRef.get(DataBroker);
  });

  describe('WeatherForecastListService', () => {
    it('keeps the loaded page', async () => {
      const items = [forecast('a', 'Hot'), forecast('b', 'Cool')];
      broker.getItems.mockResolvedValue(ListQueryResult.success(items, 50));
      const svc = moduleRef.get(WeatherForecastListService);

      await svc.getForecasts(new ListQueryRequest({ pageSize: 2 }));
      expect(svc.forecasts).toBe(items);
    });

    it('leaves forecasts untouched on failure', async () => {
      broker.getItems.mockResolvedValue(ListQueryResult.failure('down'));
      const svc = moduleRef.get(WeatherForecastListService);

      await svc.getForecasts(new ListQueryRequest());
      expect(svc.forecasts).toEqual([]);
    });

    it('serves a virtualised window with the total item count', async () => {
      const items = [forecast('c', 'Mild')];
      broker.getItems.mockResolvedValue(ListQueryResult.success(items, 73));
      const svc = moduleRef.get(WeatherForecastListService);

      const res = await svc.provideForecasts({ startIndex: 40, count: 20 });
      expect(res).toEqual({ items, totalItemCount: 73 });

      const [recordType, request] = broker.getItems.mock.calls[0];
      expect(recordType).toBe(WeatherForecast);
      expect(request).toMatchObject({ startIndex: 40, pageSize: 20 });
    });

    it('serves an empty window on failure', async () => {
      broker.getItems.mockResolvedValue(ListQueryResult.failure('down'));
      const res = await moduleRef
        .get(WeatherForecastListService)
        .provideForecasts({ startIndex: 0, count: 10 });
      expect(res).toEqual({ items: [], totalItemCount: 0 });
    });
  });

  describe('WeatherForecastEditService', () => {
    async function editService(): Promise<WeatherForecastEditService> {
      return moduleRef.resolve(WeatherForecastEditService);
    }

    it('loads the forecast into its edit context', async () => {
      broker.getItem.mockResolvedValue(ItemQueryResult.success(forecast('e1', 'Warm')));
      const svc = await editService();

      await expect(svc.getForecast('e1')).resolves.toBe(true);
      expect(svc.editContext.uid).toBe('e1');
      expect(svc.editContext.summary).toBe('Warm');
    });

    it('reports a missing forecast', async () => {
      broker.getItem.mockResolvedValue(ItemQueryResult.failure('No record retrieved'));
      const svc = await editService();
      await expect(svc.getForecast('nope')).resolves.toBe(false);
      expect(svc.editContext.isNew).toBe(true);
    });

    it('does not save a clean context', async () => {
      const svc = await editService();
      await svc.updateForecast();
      expect(broker.updateItem).not.toHaveBeenCalled();
    });

    it('saves a dirty context and marks it saved', async () => {
      broker.getItem.mockResolvedValue(ItemQueryResult.success(forecast('e2', 'Cool')));
      broker.updateItem.mockResolvedValue(CommandResult.success('Record Saved'));
      const svc = await editService();
      await svc.getForecast('e2');

      svc.editContext.summary = 'Balmy';
      await svc.updateForecast();

      const [, request] = broker.updateItem.mock.calls[0];
      expect(request.item).toMatchObject({ uid: 'e2', summary: 'Balmy' });
      expect(svc.lastResult).toEqual({ successful: true, message: 'Record Saved' });
      expect(svc.editContext.isDirty).toBe(false);
    });

    it('stays dirty when the save fails', async () => {
      broker.getItem.mockResolvedValue(ItemQueryResult.success(forecast('e3', 'Cool')));
      broker.updateItem.mockResolvedValue(CommandResult.failure('Error saving Record'));
      const svc = await editService();
      await svc.getForecast('e3');

      svc.editContext.temperatureC = 40;
      await svc.updateForecast();

      expect(svc.lastResult.message).toBe('Error saving Record');
      expect(svc.editContext.isDirty).toBe(true);
    });

    it('gives each consumer its own instance', async () => {
      expect(await editService()).not.toBe(await editService());
    });
  });
});
