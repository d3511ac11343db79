import { DataRecord } from '../../../lib/cqs';
import { MongoActionError } from '../../../lib/errors/MongoActionError';
import { InMemoryMongo } from '../../../../test/helpers/in-memory-mongo';
import { MongoDbContext } from '../context/mongo-db-context';
import { MongoDbContextFactory } from '../context/mongo-db-context.factory';
import type { ClientSession } from 'mongodb';

@DataRecord({ collection: 'ctx_widgets' })
class Widget {
  uid = '';
  name = '';
  rank = 0;
}

function widget(uid: string, name: string, rank: number): Widget {
  return Object.assign(new Widget(), { uid, name, rank });
}

describe('MongoDbContext', () => {
  let mongo: InMemoryMongo;

  beforeEach(() => {
    mongo = new InMemoryMongo();
    mongo.collection('ctx_widgets').seed([
      { uid: 'w1', name: 'Bolt', rank: 3 },
      { uid: 'w2', name: 'Anchor', rank: 1 },
      { uid: 'w3', name: 'Cog', rank: 2 },
    ]);
  });

  async function open(useTransactions = false): Promise<MongoDbContext> {
    const session = await mongo.startSession();
    return new MongoDbContext(
      mongo.asService(),
      session as unknown as ClientSession,
      { useTransactions },
    );
  }

  it('queries with filter, sort, skip and take', async () => {
    const ctx = await open();
    const set = await ctx.set(Widget);
    const query = set.query().where({ rank: { $gte: 2 } }).orderBy({ name: 1 });

    expect(await query.count()).toBe(2);
    const page = await query.skip(1).take(1).toArray();
    expect(page).toHaveLength(1);
    expect(page[0]).toBeInstanceOf(Widget);
    expect(page[0].uid).toBe('w3');
    expect(Object.keys(page[0])).toEqual(['uid', 'name', 'rank']);
  });

  it('AND-combines successive where clauses', async () => {
    const ctx = await open();
    const set = await ctx.set(Widget);
    const query = set.query().where({ rank: { $lt: 3 } }).where({ name: 'Cog' });
    expect((await query.toArray()).map((w) => w.uid)).toEqual(['w3']);
  });

  it('count ignores skip and take', async () => {
    const ctx = await open();
    const set = await ctx.set(Widget);
    expect(await set.query().skip(2).take(1).count()).toBe(3);
  });

  it('finds by key or returns null', async () => {
    const ctx = await open();
    const set = await ctx.set(Widget);
    expect((await set.findByKey('w2'))?.name).toBe('Anchor');
    expect(await set.findByKey('nope')).toBeNull();
  });

  it('applies queued changes on saveChanges and reports the affected count', async () => {
    const ctx = await open();
    ctx.add(Widget, widget('w4', 'Dial', 4));
    ctx.update(Widget, widget('w1', 'Bolt XL', 5));
    ctx.remove(Widget, widget('w2', '', 0));

    expect(await ctx.saveChanges()).toBe(3);
    const names = mongo
      .collection('ctx_widgets')
      .all()
      .map((d) => d.name);
    expect(names).toEqual(['Bolt XL', 'Cog', 'Dial']);
  });

  it('counts zero for an update or delete that matches nothing', async () => {
    const ctx = await open();
    ctx.update(Widget, widget('missing', 'x', 0));
    expect(await ctx.saveChanges()).toBe(0);
    ctx.remove(Widget, widget('missing', 'x', 0));
    expect(await ctx.saveChanges()).toBe(0);
  });

  it('returns 0 when nothing is queued', async () => {
    const ctx = await open();
    expect(await ctx.saveChanges()).toBe(0);
  });

  it('runs inside a transaction when enabled', async () => {
    const ctx = await open(true);
    ctx.add(Widget, widget('w5', 'Eye', 5));
    expect(await ctx.saveChanges()).toBe(1);
    expect(mongo.sessions[0].transactions).toBe(1);
  });

  it('wraps driver failures in MongoActionError', async () => {
    mongo.collection('ctx_widgets').failNext('insertOne', new Error('disk full'));
    const ctx = await open();
    ctx.add(Widget, widget('w6', 'Fan', 6));

    const err: unknown = await ctx.saveChanges().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MongoActionError);
    expect(err).toMatchObject({
      message: 'disk full',
      context: { operation: 'insertOne', collection: 'ctx_widgets', recordType: 'Widget' },
    });
  });

  it('rejects a pre-aborted signal before writing', async () => {
    const ctx = await open();
    ctx.add(Widget, widget('w7', 'Gear', 7));
    const ac = new AbortController();
    ac.abort();

    await expect(ctx.saveChanges(ac.signal)).rejects.toThrow();
    expect(mongo.collection('ctx_widgets').size).toBe(3);
  });

  it('ends the session once and refuses use after dispose', async () => {
    const ctx = await open();
    await ctx.dispose();
    await ctx.dispose();

    expect(mongo.sessions[0].ended).toBe(true);
    await expect(ctx.set(Widget)).rejects.toThrow('DbContext has been disposed');
    expect(() => ctx.add(Widget, widget('w8', 'Hub', 8))).toThrow(MongoActionError);
  });
});

describe('MongoDbContextFactory', () => {
  it('opens a fresh session per context', async () => {
    const mongo = new InMemoryMongo();
    const factory = new MongoDbContextFactory(mongo.asService(), {
      useTransactions: false,
      ensureIndexes: false,
      seedTestData: false,
    });

    const a = await factory.createDbContext();
    const b = await factory.createDbContext();
    expect(mongo.sessions).toHaveLength(2);

    await a.dispose();
    await b.dispose();
    expect(mongo.openSessionCount()).toBe(0);
  });
});
