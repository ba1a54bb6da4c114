import { HttpException, Logger } from '@nestjs/common';
import { StoreReadError } from '../connection/connection.errors.js';
import type { KeyValueStore } from '../store/key-value.store.js';
import type { Partition } from '../store/partition.entity.js';
import { DecodingIterator, type RecordDecoder } from '../store/record-decoder.js';
import { recordKeyBytes, type RecordKeyParts } from '../store/record-key.js';

/**
 * Typed access to one partition of the store.
 * Writes stand in for the ingestion side; reads are lazy decoded scans.
 */
export abstract class RecordRepo<R extends RecordKeyParts, S extends { number: number }> {
  protected abstract readonly log: Logger;

  protected constructor(
    protected readonly store: KeyValueStore,
    readonly partition: Partition,
    protected readonly decoder: RecordDecoder<R, S>,
  ) {}

  /** Scan `[low, high)` of this partition, decoding as it goes. */
  range(low?: Buffer, high?: Buffer): DecodingIterator<R> {
    return new DecodingIterator(this.store.scan(this.partition, low, high), this.decoder);
  }

  async insertMany(owner: string, repo: string, items: S[]): Promise<void> {
    for (const item of items) {
      await this.store.put(
        this.partition,
        recordKeyBytes({ owner, repo, number: item.number }),
        this.decoder.encode(item),
      );
    }
    this.log.debug(`${this.partition}: stored ${items.length} records for ${owner}/${repo}`);
  }

  /**
   * Every record in key order, for the statistics queries. A record that fails
   * to decode fails the whole read rather than being left out of the totals.
   */
  async all(): Promise<R[]> {
    const out: R[] = [];
    try {
      for await (const record of this.range()) {
        out.push(record);
      }
    } catch (error: unknown) {
      if (error instanceof HttpException) throw error;
      throw new StoreReadError(error);
    }
    return out;
  }
}
