import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  InternalServerErrorException,
  NotFoundException,
  Post,
  Query,
} from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import {
  CommandRequest,
  ItemQueryRequest,
  ListQueryRequest,
  type FilterDefinition,
} from '../../lib/cqs';
import { DataPipelineError } from '../../lib/errors/DataPipelineError';
import { DataBroker } from '../data/broker/data-broker';
import { ReportBroker } from '../data/reports/report-broker';
import { CreateWeatherForecastRequestDto } from './dto/CreateWeatherForecast.request.dto';
import { DeleteWeatherForecastRequestDto } from './dto/DeleteWeatherForecast.request.dto';
import { GetWeatherForecastRequestDto } from './dto/GetWeatherForecast.request.dto';
import { ListWeatherForecastsRequestDto } from './dto/ListWeatherForecasts.request.dto';
import { UpdateWeatherForecastRequestDto } from './dto/UpdateWeatherForecast.request.dto';
import type {
  GetWeatherForecastResponseDto,
  ListWeatherForecastsResponseDto,
  WeatherForecastCommandResponseDto,
  WeatherForecastDto,
} from './dto/WeatherForecast.response.dto';
import { WeatherForecastsBySummaryRequestDto } from './dto/WeatherForecastsBySummary.request.dto';
import { WeatherForecastsFilteredBySummaryRequest } from './reports/weather-forecasts-by-summary.request';
import { WeatherForecastFilters } from './weather-forecast.constants';
import { WeatherForecast } from './weather-forecast.record';

export function toWeatherForecastDto(f: WeatherForecast): WeatherForecastDto {
  return {
    uid: f.uid,
    date: f.date,
    temperatureC: f.temperatureC,
    temperatureF: f.temperatureF,
    summary: f.summary,
  };
}

function toFilters(query: ListWeatherForecastsRequestDto): FilterDefinition[] {
  const filters: FilterDefinition[] = [];
  if (query.summary !== undefined) {
    filters.push({
      filterName: WeatherForecastFilters.BySummary,
      filterData: query.summary,
    });
  }
  if (query.temperatureC !== undefined) {
    filters.push({
      filterName: WeatherForecastFilters.ByTemperature,
      filterData: String(query.temperatureC),
    });
  }
  if (query.temperatureLessThan !== undefined) {
    filters.push({
      filterName: WeatherForecastFilters.TemperatureLessThan,
      filterData: String(query.temperatureLessThan),
    });
  }
  return filters;
}

function toRecord(
  body: CreateWeatherForecastRequestDto | UpdateWeatherForecastRequestDto,
  uid: string,
): WeatherForecast {
  return Object.assign(new WeatherForecast(), {
    uid,
    date: body.date,
    temperatureC: body.temperatureC,
    summary: body.summary ?? null,
  });
}

@Controller('api/weather-forecasts')
export class WeatherForecastsController {
  constructor(
    private readonly broker: DataBroker,
    private readonly reports: ReportBroker,
  ) {}

  private mapPipelineError(err: unknown): never {
    if (err instanceof DataPipelineError) {
      throw new BadRequestException(err.message);
    }
    throw err;
  }

  /** GET /api/weather-forecasts/list */
  @Get('list')
  public async list(
    @Query() query: ListWeatherForecastsRequestDto,
  ): Promise<ListWeatherForecastsResponseDto> {
    try {
      const result = await this.broker.getItems(
        WeatherForecast,
        new ListQueryRequest({
          startIndex: query.startIndex,
          pageSize: query.pageSize,
          sortField: query.sortField,
          sortDescending: query.sortDescending,
          filters: toFilters(query),
        }),
      );
      if (!result.successful) {
        throw new InternalServerErrorException(result.message);
      }
      return {
        items: result.items.map(toWeatherForecastDto),
        totalCount: result.totalCount,
      };
    } catch (err) {
      this.mapPipelineError(err);
    }
  }

  /** GET /api/weather-forecasts/reports/by-summary */
  @Get('reports/by-summary')
  public async bySummary(
    @Query() query: WeatherForecastsBySummaryRequestDto,
  ): Promise<ListWeatherForecastsResponseDto> {
    try {
      const result = await this.reports.getReport<WeatherForecast>(
        new WeatherForecastsFilteredBySummaryRequest({
          summary: query.summary,
          startIndex: query.startIndex,
          pageSize: query.pageSize,
          sortField: query.sortField,
          sortDescending: query.sortDescending,
        }),
      );
      if (!result.successful) {
        throw new InternalServerErrorException(result.message);
      }
      return {
        items: result.items.map(toWeatherForecastDto),
        totalCount: result.totalCount,
      };
    } catch (err) {
      this.mapPipelineError(err);
    }
  }

  /** GET /api/weather-forecasts/get?uid=... */
  @Get('get')
  public async get(
    @Query() query: GetWeatherForecastRequestDto,
  ): Promise<GetWeatherForecastResponseDto> {
    try {
      const result = await this.broker.getItem(
        WeatherForecast,
        new ItemQueryRequest({ uid: query.uid }),
      );
      if (!result.successful || !result.item) {
        throw new NotFoundException(result.message);
      }
      return { forecast: toWeatherForecastDto(result.item) };
    } catch (err) {
      this.mapPipelineError(err);
    }
  }

  /** POST /api/weather-forecasts/create */
  @Post('create')
  public async create(
    @Body() body: CreateWeatherForecastRequestDto,
  ): Promise<WeatherForecastCommandResponseDto> {
    const uid = body.uid ?? randomUUID();
    try {
      const result = await this.broker.createItem(
        WeatherForecast,
        new CommandRequest({ item: toRecord(body, uid) }),
      );
      if (!result.successful) throw new ConflictException(result.message);
      return { uid, message: result.message };
    } catch (err) {
      this.mapPipelineError(err);
    }
  }

  /** POST /api/weather-forecasts/update */
  @Post('update')
  @HttpCode(200)
  public async update(
    @Body() body: UpdateWeatherForecastRequestDto,
  ): Promise<WeatherForecastCommandResponseDto> {
    try {
      const result = await this.broker.updateItem(
        WeatherForecast,
        new CommandRequest({ item: toRecord(body, body.uid) }),
      );
      if (!result.successful) throw new NotFoundException(result.message);
      return { uid: body.uid, message: result.message };
    } catch (err) {
      this.mapPipelineError(err);
    }
  }

  /** POST /api/weather-forecasts/delete */
  @Post('delete')
  @HttpCode(200)
  public async delete(
    @Body() body: DeleteWeatherForecastRequestDto,
  ): Promise<WeatherForecastCommandResponseDto> {
    try {
      const item = Object.assign(new WeatherForecast(), { uid: body.uid });
      const result = await this.broker.deleteItem(
        WeatherForecast,
        new CommandRequest({ item }),
      );
      if (!result.successful) throw new NotFoundException(result.message);
      return { uid: body.uid, message: result.message };
    } catch (err) {
      this.mapPipelineError(err);
    }
  }
}
