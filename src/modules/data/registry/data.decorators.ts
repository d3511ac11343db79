import { SetMetadata } from '@nestjs/common';
import type { RecordType } from '../../../lib/cqs';
import type { DataOperation } from '../handlers/record-handlers';

export const RECORD_FILTER_METADATA = 'data-broker:record-filter';
export const RECORD_SORTER_METADATA = 'data-broker:record-sorter';
export const RECORD_HANDLER_METADATA = 'data-broker:record-handler';
export const REPORT_HANDLER_METADATA = 'data-broker:report-handler';

export interface RecordHandlerMetadata {
  readonly recordType: RecordType;
  readonly operation: DataOperation;
}

/** Registers the decorated provider as the RecordFilter for `recordType`. */
export const RecordFilterFor = (recordType: RecordType) =>
  SetMetadata(RECORD_FILTER_METADATA, recordType);

/** Registers the decorated provider as the RecordSorter for `recordType`. */
export const RecordSorterFor = (recordType: RecordType) =>
  SetMetadata(RECORD_SORTER_METADATA, recordType);

/**
 * Registers the decorated provider as the handler for one operation on
 * `recordType`, in place of the generic handler.
 */
export const RecordHandlerFor = (
  recordType: RecordType,
  operation: DataOperation,
) =>
  SetMetadata<string, RecordHandlerMetadata>(RECORD_HANDLER_METADATA, {
    recordType,
    operation,
  });

/** Registers the decorated provider as the handler of the named report. */
export const ReportHandler = (reportName: string) =>
  SetMetadata(REPORT_HANDLER_METADATA, reportName);
