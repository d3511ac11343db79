import { recordProperties, type RecordType } from './records';

/** Driver-ready sort document: property name to direction. */
export type SortSpec = Readonly<Record<string, 1 | -1>>;

/**
 * Resolve `sortField` against the record's own properties, ignoring case, so
 * `Summary` and `summary` bind to the same column.
 */
export function resolveSortProperty(
  recordType: RecordType,
  sortField: string | undefined,
): string | undefined {
  if (!sortField) return undefined;
  const wanted = sortField.trim().toLowerCase();
  if (wanted.length === 0) return undefined;
  return recordProperties(recordType).find((p) => p.toLowerCase() === wanted);
}

/**
 * Reflective default sort. Returns undefined when the field is empty or the
 * record has no such property; callers then leave the query unsorted.
 */
export function buildSortSpec(
  recordType: RecordType,
  sortField: string | undefined,
  sortDescending: boolean,
): SortSpec | undefined {
  const prop = resolveSortProperty(recordType, sortField);
  if (!prop) return undefined;
  return { [prop]: sortDescending ? -1 : 1 };
}
