import { MemoryKeyValueStore } from '../memory-key-value.store.js';
import {
  MIN_KEY,
  RangeIterator,
  type KeyValueEntry,
  type RangeQuery,
  type RangeReader,
} from '../range-iterator.js';

const b = (text: string) => Buffer.from(text, 'utf8');
const keysOf = (entries: Array<KeyValueEntry | undefined>) =>
  entries.map((entry) => entry?.key.toString('utf8'));

describe('RangeIterator', () => {
  let store: MemoryKeyValueStore;
  let reads: RangeQuery[];
  let reader: RangeReader;

  beforeEach(async () => {
    store = new MemoryKeyValueStore();
    for (const k of ['k3', 'k1', 'k5', 'k2', 'k4']) {
      await store.put('issue', b(k), b(`v-${k}`));
    }
    reads = [];
    reader = (query) => {
      reads.push(query);
      return store.read('issue', query);
    };
  });

  it('iterates the whole range forward', async () => {
    const seen: string[] = [];
    for await (const entry of new RangeIterator(reader, undefined, undefined, 2)) {
      seen.push(entry.key.toString('utf8'));
    }
    expect(seen).toEqual(['k1', 'k2', 'k3', 'k4', 'k5']);
  });

  it('iterates the whole range backward', async () => {
    const seen: string[] = [];
    for await (const entry of new RangeIterator(reader, undefined, undefined, 2).reverse()) {
      seen.push(entry.key.toString('utf8'));
    }
    expect(seen).toEqual(['k5', 'k4', 'k3', 'k2', 'k1']);
  });

  it('includes start and excludes end', async () => {
    const iter = new RangeIterator(reader, b('k2'), b('k4'), 2);
    expect(keysOf([await iter.next(), await iter.next(), await iter.next()])).toEqual([
      'k2',
      'k3',
      undefined,
    ]);

    const back = new RangeIterator(reader, b('k2'), b('k4'), 2);
    expect(keysOf([await back.nextFromEnd(), await back.nextFromEnd(), await back.nextFromEnd()])).toEqual([
      'k3',
      'k2',
      undefined,
    ]);
  });

  it('never lets the two ends cross', async () => {
    const iter = new RangeIterator(reader, undefined, undefined, 2);
    const steps = [
      await iter.next(),
      await iter.nextFromEnd(),
      await iter.next(),
      await iter.nextFromEnd(),
      await iter.next(),
      await iter.nextFromEnd(),
      await iter.next(),
    ];
    expect(keysOf(steps)).toEqual(['k1', 'k5', 'k2', 'k4', 'k3', undefined, undefined]);
  });

  it('drops read-ahead entries the other end already returned', async () => {
    const iter = new RangeIterator(reader, undefined, undefined, 10);
    const steps = [
      await iter.next(),
      await iter.nextFromEnd(),
      await iter.nextFromEnd(),
      await iter.nextFromEnd(),
      await iter.nextFromEnd(),
      await iter.next(),
    ];
    expect(keysOf(steps)).toEqual(['k1', 'k5', 'k4', 'k3', 'k2', undefined]);
  });

  it('reads one batch at a time', async () => {
    const iter = new RangeIterator(reader, undefined, undefined, 2);
    await iter.next();
    await iter.next();
    await iter.next();

    expect(reads).toEqual([
      { lower: { key: MIN_KEY, inclusive: true }, upper: undefined, direction: 'ASC', limit: 2 },
      { lower: { key: b('k2'), inclusive: false }, upper: undefined, direction: 'ASC', limit: 2 },
    ]);
  });

  it('stops reading after a short batch', async () => {
    const iter = new RangeIterator(reader, undefined, undefined, 2);
    for await (const _entry of iter) {
      // drain
    }
    expect(reads).toHaveLength(3);
    expect(await iter.next()).toBeUndefined();
    expect(reads).toHaveLength(3);
  });

  it('rejects a batch size below one', () => {
    expect(() => new RangeIterator(reader, undefined, undefined, 0)).toThrow(
      'batch size must be a positive integer, got 0',
    );
  });
});
