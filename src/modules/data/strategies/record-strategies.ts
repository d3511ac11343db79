import type { FilterDefinition, SortSpec } from '../../../lib/cqs';
import type { RecordFilterDocument } from '../context/db-context';

/**
 * Turns a request's filter definitions into a driver filter for one record
 * type. Returning undefined leaves the query unfiltered.
 */
export interface RecordFilter {
  getFilter(
    filters: ReadonlyArray<FilterDefinition>,
  ): RecordFilterDocument | undefined;
}

/**
 * Maps a request's sort field to a sort document for one record type.
 * Returning undefined leaves the query unsorted.
 */
export interface RecordSorter {
  getSort(sortField: string, sortDescending: boolean): SortSpec | undefined;
}
