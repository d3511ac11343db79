import { WeatherForecastEditContext } from '../weather-forecast.edit-context';
import { WeatherForecast } from '../weather-forecast.record';

function stored(): WeatherForecast {
  return Object.assign(new WeatherForecast(), {
    uid: 'wf-1',
    date: '2025-03-01',
    temperatureC: 8,
    summary: 'Chilly',
  });
}

describe('WeatherForecastEditContext', () => {
  it('starts clean after load', () => {
    const ctx = new WeatherForecastEditContext(stored());
    expect(ctx.isDirty).toBe(false);
    expect(ctx.isNew).toBe(false);
    expect(ctx.summary).toBe('Chilly');
  });

  it('treats a record without a uid as new', () => {
    expect(new WeatherForecastEditContext().isNew).toBe(true);
  });

  it('notifies field changes and dirty state', () => {
    const ctx = new WeatherForecastEditContext(stored());
    const fields: string[] = [];
    const states: boolean[] = [];
    ctx.onFieldChanged((f) => fields.push(f));
    ctx.onEditStateChanged((d) => states.push(d));

    ctx.temperatureC = 20;
    ctx.temperatureC = 20;
    ctx.summary = 'Mild';

    expect(fields).toEqual(['temperatureC', 'summary']);
    expect(states).toEqual([true, true]);
    expect(ctx.isDirty).toBe(true);
    expect(ctx.record.temperatureF).toBe(67);
  });

  it('is clean again once values return to the original', () => {
    const ctx = new WeatherForecastEditContext(stored());
    ctx.date = '2025-03-02';
    ctx.date = '2025-03-01';
    expect(ctx.isDirty).toBe(false);
  });

  it('reset restores the loaded values', () => {
    const ctx = new WeatherForecastEditContext(stored());
    ctx.summary = null;
    ctx.reset();
    expect(ctx.summary).toBe('Chilly');
    expect(ctx.isDirty).toBe(false);
  });

  it('setAsSaved makes the current values the new baseline', () => {
    const ctx = new WeatherForecastEditContext(stored());
    ctx.summary = 'Warm';
    ctx.setAsSaved();
    expect(ctx.isDirty).toBe(false);
    expect(ctx.original.summary).toBe('Warm');
  });

  it('asNewRecord copies values under a new uid', () => {
    const ctx = new WeatherForecastEditContext(stored());
    const copy = ctx.asNewRecord();
    expect(copy).toBeInstanceOf(WeatherForecast);
    expect(copy.uid).not.toBe('wf-1');
    expect(copy.uid).toMatch(/^[0-9a-f-]{36}$/);
    expect(copy.summary).toBe('Chilly');
  });

  it('stops notifying after unsubscribe', () => {
    const ctx = new WeatherForecastEditContext(stored());
    const fields: string[] = [];
    const off = ctx.onFieldChanged((f) => fields.push(f));
    off();
    ctx.temperatureC = 1;
    expect(fields).toEqual([]);
  });
});
