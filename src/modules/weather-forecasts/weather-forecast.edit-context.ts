import { randomUUID } from 'node:crypto';
import { RecordEditContextBase } from '../data/edit/record-edit-context.base';
import { WeatherForecastFields } from './weather-forecast.constants';
import { WeatherForecast } from './weather-forecast.record';

export class WeatherForecastEditContext extends RecordEditContextBase<WeatherForecast> {
  private _uid = '';
  private _date = '';
  private _temperatureC = 0;
  private _summary: string | null = null;

  constructor(record: WeatherForecast = new WeatherForecast()) {
    super(WeatherForecast, record);
    this.load(record, false);
  }

  get uid(): string {
    return this._uid;
  }

  get date(): string {
    return this._date;
  }
  set date(value: string) {
    this.setField(WeatherForecastFields.Date, this._date, value, (v) => {
      this._date = v;
    });
  }

  get temperatureC(): number {
    return this._temperatureC;
  }
  set temperatureC(value: number) {
    this.setField(
      WeatherForecastFields.TemperatureC,
      this._temperatureC,
      value,
      (v) => {
        this._temperatureC = v;
      },
    );
  }

  get summary(): string | null {
    return this._summary;
  }
  set summary(value: string | null) {
    this.setField(WeatherForecastFields.Summary, this._summary, value, (v) => {
      this._summary = v;
    });
  }

  public get record(): WeatherForecast {
    return Object.assign(new WeatherForecast(), {
      uid: this._uid,
      date: this._date,
      temperatureC: this._temperatureC,
      summary: this._summary,
    });
  }

  public load(record: WeatherForecast, notify = true): void {
    this.baseRecord = record;
    this._uid = record.uid;
    this._date = record.date;
    this._temperatureC = record.temperatureC;
    this._summary = record.summary;
    if (notify) this.notifyFieldChanged(WeatherForecastFields.Uid);
  }

  public asNewRecord(): WeatherForecast {
    return Object.assign(this.record, { uid: randomUUID() });
  }
}
