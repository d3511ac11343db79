import {
  CommandResult,
  DEFAULT_PAGE_SIZE,
  ItemQueryResult,
  ListQueryRequest,
  ListQueryResult,
} from '..';

describe('ListQueryRequest', () => {
  it('applies defaults', () => {
    const req = new ListQueryRequest();
    expect(req.startIndex).toBe(0);
    expect(req.pageSize).toBe(DEFAULT_PAGE_SIZE);
    expect(req.pageSize).toBe(1000);
    expect(req.sortField).toBe('');
    expect(req.sortDescending).toBe(false);
    expect(req.filters).toEqual([]);
    expect(req.signal).toBeUndefined();
  });

  it('keeps explicit values, including a zero page size', () => {
    const req = new ListQueryRequest({ startIndex: 20, pageSize: 0, sortField: 'date' });
    expect(req.startIndex).toBe(20);
    expect(req.pageSize).toBe(0);
    expect(req.sortField).toBe('date');
  });
});

describe('result factories', () => {
  it('list failure carries no items', () => {
    expect(ListQueryResult.failure('nope')).toEqual({
      items: [],
      totalCount: 0,
      successful: false,
      message: 'nope',
    });
  });

  it('list success keeps total count separate from page length', () => {
    const res = ListQueryResult.success(['a', 'b'], 40);
    expect(res.items).toEqual(['a', 'b']);
    expect(res.totalCount).toBe(40);
    expect(res.successful).toBe(true);
    expect(res.message).toBe('');
  });

  it('item failure has no item', () => {
    const res = ItemQueryResult.failure<string>('No record retrieved');
    expect(res.item).toBeUndefined();
    expect(res.successful).toBe(false);
  });

  it('command results', () => {
    expect(CommandResult.success('Record Created')).toEqual({
      successful: true,
      message: 'Record Created',
    });
    expect(CommandResult.failure('Error creating Record').successful).toBe(false);
  });
});
