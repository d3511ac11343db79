export interface ListQueryResult<T> {
  readonly items: ReadonlyArray<T>;
  /** Records matching the filter, regardless of paging. */
  readonly totalCount: number;
  readonly successful: boolean;
  readonly message: string;
}

export const ListQueryResult = {
  success<T>(
    items: ReadonlyArray<T>,
    totalCount: number,
    message = '',
  ): ListQueryResult<T> {
    return { items, totalCount, successful: true, message };
  },
  failure<T>(message: string): ListQueryResult<T> {
    return { items: [], totalCount: 0, successful: false, message };
  },
};

export interface ItemQueryResult<T> {
  readonly item?: T;
  readonly successful: boolean;
  readonly message: string;
}

export const ItemQueryResult = {
  success<T>(item: T, message = ''): ItemQueryResult<T> {
    return { item, successful: true, message };
  },
  failure<T>(message: string): ItemQueryResult<T> {
    return { successful: false, message };
  },
};

export interface CommandResult {
  readonly successful: boolean;
  readonly message: string;
}

export const CommandResult = {
  success(message = ''): CommandResult {
    return { successful: true, message };
  },
  failure(message: string): CommandResult {
    return { successful: false, message };
  },
};
