/** A named filter plus its argument, interpreted by a record's RecordFilter. */
export interface FilterDefinition {
  readonly filterName: string;
  readonly filterData: string;
}

export const DEFAULT_START_INDEX = 0;
export const DEFAULT_PAGE_SIZE = 1000;

/** Page/sort/filter request for a list of records. */
export class ListQueryRequest {
  public readonly startIndex: number;
  /** 0 disables paging: every matching record is returned. */
  public readonly pageSize: number;
  /** Record property to sort on; empty means unsorted. */
  public readonly sortField: string;
  public readonly sortDescending: boolean;
  public readonly filters: ReadonlyArray<FilterDefinition>;
  public readonly signal?: AbortSignal;

  constructor(init: Partial<ListQueryRequest> = {}) {
    this.startIndex = init.startIndex ?? DEFAULT_START_INDEX;
    this.pageSize = init.pageSize ?? DEFAULT_PAGE_SIZE;
    this.sortField = init.sortField ?? '';
    this.sortDescending = init.sortDescending ?? false;
    this.filters = init.filters ?? [];
    this.signal = init.signal;
  }
}

/** Fetch a single record by its key. */
export class ItemQueryRequest {
  public readonly uid: string;
  public readonly signal?: AbortSignal;

  constructor(init: { uid: string; signal?: AbortSignal }) {
    this.uid = init.uid;
    this.signal = init.signal;
  }
}

/** Create, update or delete one record. */
export class CommandRequest<T extends object> {
  public readonly item: T;
  public readonly signal?: AbortSignal;

  constructor(init: { item: T; signal?: AbortSignal }) {
    this.item = init.item;
    this.signal = init.signal;
  }
}

/**
 * Base shape of a named report request. Concrete reports add their own
 * parameters and are dispatched on `reportName`.
 */
export interface ReportRequest {
  readonly reportName: string;
  readonly startIndex: number;
  readonly pageSize: number;
  readonly sortField?: string;
  readonly sortDescending: boolean;
  readonly signal?: AbortSignal;
}
