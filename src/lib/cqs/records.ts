import { DataPipelineError } from '../errors/DataPipelineError';

/**
 * A persisted record class. The no-argument constructor must initialise every
 * persisted property: a fresh instance is the template used for hydration,
 * serialization and sort-field lookup.
 */
export type RecordType<T extends object = object> = new () => T;

export interface DataRecordOptions {
  /** Collection holding the records. */
  readonly collection: string;
  /** Property that uniquely identifies a record. Defaults to `uid`. */
  readonly key?: string;
}

export interface DataRecordMetadata {
  readonly recordType: RecordType;
  readonly collection: string;
  readonly key: string;
}

const registeredRecords = new Map<RecordType, DataRecordMetadata>();

/**
 * Marks a class as a data record stored in `options.collection`.
 *
 * @example
 * ```ts
 * @DataRecord({ collection: 'weather_forecasts' })
 * export class WeatherForecast {
 *   uid = '';
 *   summary: string | null = null;
 * }
 * ```
 */
export function DataRecord(
  options: DataRecordOptions,
): (target: RecordType) => void {
  return (target: RecordType): void => {
    registeredRecords.set(target, {
      recordType: target,
      collection: options.collection,
      key: options.key ?? 'uid',
    });
  };
}

export function getRecordMetadata(recordType: RecordType): DataRecordMetadata {
  const meta = registeredRecords.get(recordType);
  if (!meta) {
    throw new DataPipelineError(
      `${recordType.name} is not registered as a data record. Decorate it with @DataRecord().`,
    );
  }
  return meta;
}

/** Every record class decorated so far, in declaration order. */
export function listRecordMetadata(): ReadonlyArray<DataRecordMetadata> {
  return [...registeredRecords.values()];
}

/** Names of the properties a record persists (own properties of a fresh instance). */
export function recordProperties(recordType: RecordType): string[] {
  return Object.keys(new recordType());
}

export function readRecordKey(item: object, key: string): unknown {
  return Reflect.get(item, key);
}

/** Plain document holding the persisted properties of `item`. */
export function toDocument(
  recordType: RecordType,
  item: object,
): Record<string, unknown> {
  const doc: Record<string, unknown> = {};
  for (const prop of recordProperties(recordType)) {
    doc[prop] = Reflect.get(item, prop);
  }
  return doc;
}

/**
 * Build a record instance from a stored document. Only properties the record
 * declares are copied, so driver fields such as `_id` are dropped.
 */
export function hydrateRecord<T extends object>(
  recordType: RecordType<T>,
  doc: Readonly<Record<string, unknown>>,
): T {
  const record = new recordType();
  for (const prop of Object.keys(record)) {
    if (prop in doc) {
      Reflect.set(record, prop, doc[prop]);
    }
  }
  return record;
}
