import { Injectable, Scope } from '@nestjs/common';
import {
  CommandRequest,
  CommandResult,
  ItemQueryRequest,
} from '../../lib/cqs';
import { DataBroker } from '../data/broker/data-broker';
import { WeatherForecastEditContext } from './weather-forecast.edit-context';
import { WeatherForecast } from './weather-forecast.record';

/** Holds one forecast being edited; one instance per consumer. */
@Injectable({ scope: Scope.TRANSIENT })
export class WeatherForecastEditService {
  public readonly editContext = new WeatherForecastEditContext();
  public lastResult: CommandResult = CommandResult.success();

  constructor(private readonly broker: DataBroker) {}

  /** Loads the forecast into the edit context; returns false when not found. */
  public async getForecast(uid: string): Promise<boolean> {
    const result = await this.broker.getItem(
      WeatherForecast,
      new ItemQueryRequest({ uid }),
    );
    if (result.successful && result.item) {
      this.editContext.load(result.item);
      return true;
    }
    return false;
  }

  /** Saves pending edits. Does nothing when the context is clean. */
  public async updateForecast(): Promise<void> {
    if (!this.editContext.isDirty) return;

    const result = await this.broker.updateItem(
      WeatherForecast,
      new CommandRequest({ item: this.editContext.record }),
    );
    if (result.successful) this.editContext.setAsSaved();
    this.lastResult = result;
  }
}
