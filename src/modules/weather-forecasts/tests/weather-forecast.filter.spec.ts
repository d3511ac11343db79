import { Logger } from '@nestjs/common';
import { WeatherForecastFilter } from '../weather-forecast.filter';
import { WeatherForecastSorter } from '../weather-forecast.sorter';

describe('WeatherForecastFilter', () => {
  const filter = new WeatherForecastFilter();
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => warnSpy.mockRestore());

  it('returns undefined for no filters', () => {
    expect(filter.getFilter([])).toBeUndefined();
  });

  it('maps BySummary to equality', () => {
    expect(filter.getFilter([{ filterName: 'BySummary', filterData: 'Hot' }])).toEqual({
      summary: 'Hot',
    });
  });

  it('maps temperature filters to numbers', () => {
    expect(filter.getFilter([{ filterName: 'ByTemperature', filterData: '12' }])).toEqual({
      temperatureC: 12,
    });
    expect(
      filter.getFilter([{ filterName: 'TemperatureLessThan', filterData: '-5' }]),
    ).toEqual({ temperatureC: { $lt: -5 } });
  });

  it('AND-combines several filters', () => {
    expect(
      filter.getFilter([
        { filterName: 'BySummary', filterData: 'Cool' },
        { filterName: 'TemperatureLessThan', filterData: '10' },
      ]),
    ).toEqual({ $and: [{ summary: 'Cool' }, { temperatureC: { $lt: 10 } }] });
  });

  it('skips unknown names and non-numeric temperatures with a warning', () => {
    expect(
      filter.getFilter([
        { filterName: 'ByRainfall', filterData: '3' },
        { filterName: 'ByTemperature', filterData: 'warm' },
        { filterName: 'TemperatureLessThan', filterData: ' ' },
      ]),
    ).toBeUndefined();
    expect(warnSpy).toHaveBeenCalledWith('Unknown WeatherForecast filter: ByRainfall');
    expect(warnSpy).toHaveBeenCalledWith("ByTemperature needs a numeric value; got 'warm'");
    expect(warnSpy).toHaveBeenCalledTimes(3);
  });
});

describe('WeatherForecastSorter', () => {
  const sorter = new WeatherForecastSorter();

  it('maps known columns regardless of case', () => {
    expect(sorter.getSort('Date', false)).toEqual({ date: 1 });
    expect(sorter.getSort('temperaturec', true)).toEqual({ temperatureC: -1 });
    expect(sorter.getSort(' SUMMARY ', false)).toEqual({ summary: 1 });
  });

  it('leaves unknown columns unsorted', () => {
    expect(sorter.getSort('temperatureF', false)).toBeUndefined();
  });
});
