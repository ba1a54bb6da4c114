import { DataSource } from 'typeorm';
import { IN_MEMORY_DATABASE, sqliteOptions } from '../../database/sqlite-options.js';
import type { KeyValueStore } from '../key-value.store.js';
import { MemoryKeyValueStore } from '../memory-key-value.store.js';
import { SqliteKeyValueStore } from '../sqlite-key-value.store.js';

const b = (text: string) => Buffer.from(text, 'utf8');
const keys = (entries: Array<{ key: Buffer }>) => entries.map((e) => e.key.toString('utf8'));

interface Driver {
  store: KeyValueStore;
  close: () => Promise<void>;
}

const drivers: Array<[string, () => Promise<Driver>]> = [
  ['memory', async () => ({ store: new MemoryKeyValueStore(2), close: async () => undefined })],
  [
    'sqlite',
    async () => {
      const ds = new DataSource(sqliteOptions({ databasePath: IN_MEMORY_DATABASE }));
      await ds.initialize();
      return { store: new SqliteKeyValueStore(ds, 2), close: () => ds.destroy() };
    },
  ],
];

describe.each(drivers)('%s key-value store', (_name, open) => {
  let driver: Driver;
  let store: KeyValueStore;

  beforeEach(async () => {
    driver = await open();
    store = driver.store;
    for (const n of [2, 10, 1]) {
      await store.put('issue', b(`octo/app#${n}`), b(`issue ${n}`));
    }
  });

  afterEach(async () => {
    await driver.close();
  });

  it('gets, overwrites and deletes values', async () => {
    expect(await store.get('issue', b('octo/app#2'))).toEqual(b('issue 2'));
    expect(await store.get('issue', b('octo/app#3'))).toBeNull();

    await store.put('issue', b('octo/app#2'), b('issue 2, edited'));
    expect(await store.get('issue', b('octo/app#2'))).toEqual(b('issue 2, edited'));

    expect(await store.delete('issue', b('octo/app#2'))).toBe(true);
    expect(await store.delete('issue', b('octo/app#2'))).toBe(false);
    expect(await store.get('issue', b('octo/app#2'))).toBeNull();
  });

  it('keeps partitions apart', async () => {
    await store.put('discussion', b('octo/app#1'), b('discussion 1'));
    expect(await store.get('discussion', b('octo/app#1'))).toEqual(b('discussion 1'));
    expect(await store.get('issue', b('octo/app#1'))).toEqual(b('issue 1'));
    expect(await store.get('pull_request', b('octo/app#1'))).toBeNull();

    await store.clear('issue');
    expect(await store.get('issue', b('octo/app#1'))).toBeNull();
    expect(await store.get('discussion', b('octo/app#1'))).toEqual(b('discussion 1'));
  });

  it('orders keys bytewise', async () => {
    const all = await store.read('issue', { direction: 'ASC', limit: 10 });
    expect(keys(all)).toEqual(['octo/app#1', 'octo/app#10', 'octo/app#2']);
  });

  it('honours bounds, direction and limit', async () => {
    expect(
      keys(
        await store.read('issue', {
          lower: { key: b('octo/app#1'), inclusive: false },
          direction: 'ASC',
          limit: 10,
        }),
      ),
    ).toEqual(['octo/app#10', 'octo/app#2']);

    expect(
      keys(
        await store.read('issue', {
          upper: { key: b('octo/app#2'), inclusive: false },
          direction: 'DESC',
          limit: 10,
        }),
      ),
    ).toEqual(['octo/app#10', 'octo/app#1']);

    expect(
      keys(
        await store.read('issue', {
          lower: { key: b('octo/app#10'), inclusive: true },
          upper: { key: b('octo/app#2'), inclusive: true },
          direction: 'DESC',
          limit: 1,
        }),
      ),
    ).toEqual(['octo/app#2']);
  });

  it('scans [low, high) lazily across batches', async () => {
    await store.put('issue', b('octo/app#3'), b('issue 3'));
    const seen: string[] = [];
    for await (const entry of store.scan('issue', b('octo/app#10'), b('octo/app#3'))) {
      seen.push(entry.value.toString('utf8'));
    }
    expect(seen).toEqual(['issue 10', 'issue 2']);
  });
});
