import { decodeSnapshot } from '../src/storage/snapshotCodec.js';
import { SupabaseStore, SupabaseStoreError } from '../src/storage/supabaseStore.js';

import { FakeTable } from './support/fakeSupabase.js';
import { T0, makeLedger, silentLogger } from './support/fixtures.js';

function storeWith(table: FakeTable, pageSize = 500, requestTimeoutMs = 1000): SupabaseStore {
  return new SupabaseStore({
    client: table.client() as never,
    logger: silentLogger(),
    pageSize,
    retryCount: 2,
    requestTimeoutMs,
    now: () => T0
  });
}

async function portfolioAt(userId: string, deposits: number) {
  const ledger = makeLedger();
  await ledger.ensurePortfolio(userId);
  for (let index = 0; index < deposits; index += 1) {
    await ledger.deposit(userId, 10);
  }
  const portfolio = ledger.snapshot(userId);
  if (!portfolio) {
    throw new Error('portfolio missing');
  }
  return portfolio;
}

describe('SupabaseStore', () => {
  it('inserts the first snapshot and loads it back with a valid checksum', async () => {
    const table = new FakeTable();
    const store = storeWith(table);
    const portfolio = await portfolioAt('user-1', 0);

    await expect(store.save('user-1', portfolio, 0)).resolves.toEqual({ status: 'ok', version: 1 });

    const record = await store.load('user-1');
    expect(record?.version).toBe(1);
    expect(record?.updatedAt).toBe(T0);
    expect(record && decodeSnapshot(record)).toEqual(portfolio);
  });

  it('updates only when the stored version matches', async () => {
    const table = new FakeTable();
    const store = storeWith(table);
    await store.save('user-1', await portfolioAt('user-1', 0), 0);

    const next = await portfolioAt('user-1', 2);
    await expect(store.save('user-1', next, 1)).resolves.toEqual({ status: 'ok', version: 3 });
    await expect(store.save('user-1', next, 1)).resolves.toEqual({ status: 'conflict', remoteVersion: 3 });
  });

  it('reports a conflict when another writer inserted first', async () => {
    const table = new FakeTable();
    const store = storeWith(table);
    await store.save('user-1', await portfolioAt('user-1', 1), 0);

    await expect(store.save('user-1', await portfolioAt('user-1', 0), 0)).resolves.toEqual({
      status: 'conflict',
      remoteVersion: 2
    });
  });

  it('pages through every stored snapshot', async () => {
    const table = new FakeTable();
    const store = storeWith(table, 2);
    for (const userId of ['user-1', 'user-2', 'user-3']) {
      await store.save(userId, await portfolioAt(userId, 0), 0);
    }

    const records = await store.loadAll();

    expect(records.map((record) => record.userId)).toEqual(['user-1', 'user-2', 'user-3']);
  });

  it('retries transient failures', async () => {
    const table = new FakeTable();
    const store = storeWith(table);
    table.failures.push({ message: 'upstream connect error', code: '503' });

    await expect(store.save('user-1', await portfolioAt('user-1', 0), 0)).resolves.toEqual({ status: 'ok', version: 1 });
    expect(table.calls).toEqual(['insert', 'insert']);
  });

  it('does not retry schema errors', async () => {
    const table = new FakeTable();
    const store = storeWith(table);
    table.failures.push({ message: 'relation "paper_portfolios" does not exist', code: '42P01' });

    await expect(store.load('user-1')).rejects.toBeInstanceOf(SupabaseStoreError);
    expect(table.calls).toEqual(['select']);
  });

  it('times out a request that never answers and retries it', async () => {
    const table = new FakeTable();
    const store = storeWith(table, 500, 20);
    table.hangs = 1;

    await expect(store.save('user-1', await portfolioAt('user-1', 0), 0)).resolves.toEqual({ status: 'ok', version: 1 });
    expect(table.calls).toEqual(['insert', 'insert']);
    expect(table.abortedRequests).toBe(1);
  });

  it('fails once every attempt has timed out', async () => {
    const table = new FakeTable();
    const store = storeWith(table, 500, 20);
    table.hangs = 3;

    await expect(store.load('user-1')).rejects.toThrow('Supabase load failed: request timed out after 20ms');
    expect(table.calls).toEqual(['select', 'select', 'select']);
  });
});
