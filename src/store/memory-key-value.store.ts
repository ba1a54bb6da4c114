// src/store/memory-key-value.store.ts
import { KeyValueStore } from './key-value.store.js';
import { PARTITIONS, type Partition } from './partition.entity.js';
import { isAbove, isBelow, type KeyValueEntry, type RangeQuery } from './range-iterator.js';

/**
 * In-process stand-in for the SQLite store.
 * Each partition is an array kept sorted by key bytes.
 */
export class MemoryKeyValueStore extends KeyValueStore {
  private readonly partitions = new Map<Partition, KeyValueEntry[]>(
    PARTITIONS.map((p) => [p, []]),
  );

  constructor(scanBatchSize?: number) {
    super();
    if (scanBatchSize) this.scanBatchSize = scanBatchSize;
  }

  async put(partition: Partition, key: Buffer, value: Buffer): Promise<void> {
    const entries = this.entries(partition);
    const at = lowerBound(entries, key);
    const entry = { key: Buffer.from(key), value: Buffer.from(value) };

    if (at < entries.length && entries[at].key.equals(key)) {
      entries[at] = entry;
    } else {
      entries.splice(at, 0, entry);
    }
  }

  async get(partition: Partition, key: Buffer): Promise<Buffer | null> {
    const entries = this.entries(partition);
    const at = lowerBound(entries, key);
    return at < entries.length && entries[at].key.equals(key) ? entries[at].value : null;
  }

  async delete(partition: Partition, key: Buffer): Promise<boolean> {
    const entries = this.entries(partition);
    const at = lowerBound(entries, key);
    if (at < entries.length && entries[at].key.equals(key)) {
      entries.splice(at, 1);
      return true;
    }
    return false;
  }

  async clear(partition: Partition): Promise<void> {
    this.partitions.set(partition, []);
  }

  async read(
    partition: Partition,
    { lower, upper, direction, limit }: RangeQuery,
  ): Promise<KeyValueEntry[]> {
    const entries = this.entries(partition);
    const out: KeyValueEntry[] = [];

    if (direction === 'ASC') {
      let i = lower ? lowerBound(entries, lower.key) : 0;
      for (; i < entries.length && out.length < limit; i++) {
        const entry = entries[i];
        if (!isAbove(entry.key, lower)) continue;
        if (!isBelow(entry.key, upper)) break;
        out.push(entry);
      }
    } else {
      let i = upper ? upperBound(entries, upper.key) - 1 : entries.length - 1;
      for (; i >= 0 && out.length < limit; i--) {
        const entry = entries[i];
        if (!isBelow(entry.key, upper)) continue;
        if (!isAbove(entry.key, lower)) break;
        out.push(entry);
      }
    }

    return out;
  }

  private entries(partition: Partition): KeyValueEntry[] {
    const entries = this.partitions.get(partition);
    if (!entries) throw new Error(`unknown partition: ${partition}`);
    return entries;
  }
}

/** Index of the first entry whose key is >= `key`. */
function lowerBound(entries: KeyValueEntry[], key: Buffer): number {
  let lo = 0;
  let hi = entries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (Buffer.compare(entries[mid].key, key) < 0) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Index of the first entry whose key is > `key`. */
function upperBound(entries: KeyValueEntry[], key: Buffer): number {
  let lo = 0;
  let hi = entries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (Buffer.compare(entries[mid].key, key) <= 0) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
