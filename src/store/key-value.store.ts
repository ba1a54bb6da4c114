import type { Partition } from './partition.entity.js';
import {
  DEFAULT_SCAN_BATCH_SIZE,
  RangeIterator,
  type KeyValueEntry,
  type RangeQuery,
} from './range-iterator.js';

/**
 * Ordered key-value store split into partitions.
 * Bound in DI to either the SQLite or the in-memory implementation.
 */
export abstract class KeyValueStore {
  protected scanBatchSize = DEFAULT_SCAN_BATCH_SIZE;

  abstract put(partition: Partition, key: Buffer, value: Buffer): Promise<void>;
  abstract get(partition: Partition, key: Buffer): Promise<Buffer | null>;
  abstract delete(partition: Partition, key: Buffer): Promise<boolean>;
  abstract clear(partition: Partition): Promise<void>;
  abstract read(partition: Partition, query: RangeQuery): Promise<KeyValueEntry[]>;

  /** Iterate `[low, high)`; `low` defaults to 0x00 and a missing `high` is unbounded. */
  scan(partition: Partition, low?: Buffer, high?: Buffer): RangeIterator {
    return new RangeIterator(
      (query) => this.read(partition, query),
      low,
      high,
      this.scanBatchSize,
    );
  }
}
