import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import type { RecordType } from '../../../lib/cqs';
import { AppError } from '../../../lib/errors/AppError';
import type {
  DataOperation,
  RecordHandlerMap,
} from '../handlers/record-handlers';
import type { ReportRequestHandler } from '../reports/report-request-handler';
import type {
  RecordFilter,
  RecordSorter,
} from '../strategies/record-strategies';
import {
  RECORD_FILTER_METADATA,
  RECORD_HANDLER_METADATA,
  RECORD_SORTER_METADATA,
  REPORT_HANDLER_METADATA,
  type RecordHandlerMetadata,
} from './data.decorators';

function hasMethod(value: unknown, method: string): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, method) === 'function'
  );
}

function isRecordFilter(value: unknown): value is RecordFilter {
  return hasMethod(value, 'getFilter');
}

function isRecordSorter(value: unknown): value is RecordSorter {
  return hasMethod(value, 'getSort');
}

/** Registration is keyed by record type, which fixes the handler's T. */
function isExecutable<H extends { execute: unknown }>(
  value: unknown,
): value is H {
  return hasMethod(value, 'execute');
}

/**
 * Record-specific strategies and handlers found in the DI container.
 *
 * Providers opt in through the decorators in data.decorators.ts. The
 * container is scanned at application bootstrap, so a duplicate registration
 * stops startup; lookups made before that scan it on first use. Only
 * statically scoped providers take part.
 */
@Injectable()
export class DataHandlerRegistry implements OnApplicationBootstrap {
  private readonly logger = new Logger(DataHandlerRegistry.name);
  private scanned = false;
  private readonly filters = new Map<RecordType, RecordFilter>();
  private readonly sorters = new Map<RecordType, RecordSorter>();
  private readonly handlers = new Map<
    RecordType,
    Map<DataOperation, unknown>
  >();
  private readonly reports = new Map<string, unknown>();

  constructor(
    private readonly discovery: DiscoveryService,
    private readonly reflector: Reflector,
  ) {}

  public onApplicationBootstrap(): void {
    this.ensureScanned();
  }

  public getFilter(recordType: RecordType): RecordFilter | undefined {
    this.ensureScanned();
    return this.filters.get(recordType);
  }

  public getSorter(recordType: RecordType): RecordSorter | undefined {
    this.ensureScanned();
    return this.sorters.get(recordType);
  }

  public getRecordHandler<T extends object, K extends DataOperation>(
    recordType: RecordType<T>,
    operation: K,
  ): RecordHandlerMap<T>[K] | undefined {
    this.ensureScanned();
    const handler = this.handlers.get(recordType)?.get(operation);
    return isExecutable<RecordHandlerMap<T>[K]>(handler) ? handler : undefined;
  }

  public getReportHandler<T extends object>(
    reportName: string,
  ): ReportRequestHandler<T> | undefined {
    this.ensureScanned();
    const handler = this.reports.get(reportName);
    return isExecutable<ReportRequestHandler<T>>(handler) ? handler : undefined;
  }

  private ensureScanned(): void {
    if (this.scanned) return;
    this.filters.clear();
    this.sorters.clear();
    this.handlers.clear();
    this.reports.clear();

    for (const wrapper of this.discovery.getProviders()) {
      const instance: unknown = wrapper.instance;
      const metatype = wrapper.metatype;
      if (!instance || !metatype || !wrapper.isDependencyTreeStatic()) continue;

      const filterFor = this.reflector.get<RecordType | undefined>(
        RECORD_FILTER_METADATA,
        metatype,
      );
      if (filterFor && isRecordFilter(instance)) {
        this.claim(this.filters, filterFor, instance, `filter for ${filterFor.name}`);
      }

      const sorterFor = this.reflector.get<RecordType | undefined>(
        RECORD_SORTER_METADATA,
        metatype,
      );
      if (sorterFor && isRecordSorter(instance)) {
        this.claim(this.sorters, sorterFor, instance, `sorter for ${sorterFor.name}`);
      }

      const handlerFor = this.reflector.get<RecordHandlerMetadata | undefined>(
        RECORD_HANDLER_METADATA,
        metatype,
      );
      if (handlerFor && isExecutable(instance)) {
        const byOperation =
          this.handlers.get(handlerFor.recordType) ??
          new Map<DataOperation, unknown>();
        this.handlers.set(handlerFor.recordType, byOperation);
        this.claim(
          byOperation,
          handlerFor.operation,
          instance,
          `${handlerFor.operation} handler for ${handlerFor.recordType.name}`,
        );
      }

      const reportName = this.reflector.get<string | undefined>(
        REPORT_HANDLER_METADATA,
        metatype,
      );
      if (reportName && isExecutable(instance)) {
        this.claim(this.reports, reportName, instance, `report ${reportName}`);
      }
    }

    this.scanned = true;
    this.logger.log(
      `Registered ${this.filters.size} filter(s), ${this.sorters.size} sorter(s), ` +
        `${this.countHandlers()} record handler(s), ${this.reports.size} report(s).`,
    );
  }

  private claim<K, V>(map: Map<K, V>, key: K, value: V, what: string): void {
    if (map.has(key)) {
      throw new AppError(`Duplicate ${what}`, 'DATA_DUPLICATE_REGISTRATION');
    }
    map.set(key, value);
  }

  private countHandlers(): number {
    let n = 0;
    for (const byOperation of this.handlers.values()) n += byOperation.size;
    return n;
  }
}
