// src/store/range-iterator.ts

export interface KeyValueEntry {
  key: Buffer;
  value: Buffer;
}

export interface RangeBound {
  key: Buffer;
  inclusive: boolean;
}

export type ScanDirection = 'ASC' | 'DESC';

export interface RangeQuery {
  lower?: RangeBound;
  upper?: RangeBound;
  direction: ScanDirection;
  limit: number;
}

/** Reads one ordered batch of entries inside the query bounds. */
export type RangeReader = (query: RangeQuery) => Promise<KeyValueEntry[]>;

/**
 * Lazy iterator that can be consumed from either end.
 * The two ends share one range: an entry handed out by one end is never
 * handed out by the other.
 */
export interface BidirectionalIterator<T> extends AsyncIterable<T> {
  next(): Promise<T | undefined>;
  nextFromEnd(): Promise<T | undefined>;
  reverse(): AsyncIterable<T>;
}

/** Smallest possible key; used when a scan has no lower bound. */
export const MIN_KEY = Buffer.from([0x00]);

export const DEFAULT_SCAN_BATCH_SIZE = 64;

export function isAbove(key: Buffer, bound: RangeBound | undefined): boolean {
  if (!bound) return true;
  const cmp = Buffer.compare(key, bound.key);
  return bound.inclusive ? cmp >= 0 : cmp > 0;
}

export function isBelow(key: Buffer, bound: RangeBound | undefined): boolean {
  if (!bound) return true;
  const cmp = Buffer.compare(key, bound.key);
  return bound.inclusive ? cmp <= 0 : cmp < 0;
}

/**
 * Double-ended cursor over the half-open interval `[start, end)` of a store.
 *
 * Each end keeps its own read-ahead buffer and its own position; reads go to
 * the store one batch at a time, so stopping early never scans the rest of
 * the range.
 */
export class RangeIterator implements BidirectionalIterator<KeyValueEntry> {
  private lower: RangeBound;
  private upper: RangeBound | undefined;
  private front: KeyValueEntry[] = [];
  private back: KeyValueEntry[] = [];
  private frontExhausted = false;
  private backExhausted = false;

  constructor(
    private readonly reader: RangeReader,
    start?: Buffer,
    end?: Buffer,
    private readonly batchSize = DEFAULT_SCAN_BATCH_SIZE,
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batch size must be a positive integer, got ${batchSize}`);
    }
    this.lower = { key: start ?? MIN_KEY, inclusive: true };
    this.upper = end ? { key: end, inclusive: false } : undefined;
  }

  async next(): Promise<KeyValueEntry | undefined> {
    if (this.front.length === 0 && !this.frontExhausted) {
      this.front = await this.fill('ASC');
      this.frontExhausted = this.front.length < this.batchSize;
    }

    const entry = this.front.shift();
    if (!entry || !isBelow(entry.key, this.upper)) {
      // everything left was already handed out from the other end
      this.front = [];
      this.frontExhausted = true;
      return undefined;
    }

    this.lower = { key: entry.key, inclusive: false };
    return entry;
  }

  async nextFromEnd(): Promise<KeyValueEntry | undefined> {
    if (this.back.length === 0 && !this.backExhausted) {
      this.back = await this.fill('DESC');
      this.backExhausted = this.back.length < this.batchSize;
    }

    const entry = this.back.shift();
    if (!entry || !isAbove(entry.key, this.lower)) {
      this.back = [];
      this.backExhausted = true;
      return undefined;
    }

    this.upper = { key: entry.key, inclusive: false };
    return entry;
  }

  reverse(): AsyncIterable<KeyValueEntry> {
    return { [Symbol.asyncIterator]: () => this.drainFromEnd() };
  }

  async *[Symbol.asyncIterator](): AsyncIterator<KeyValueEntry> {
    for (let entry = await this.next(); entry; entry = await this.next()) {
      yield entry;
    }
  }

  private async *drainFromEnd(): AsyncGenerator<KeyValueEntry> {
    for (let entry = await this.nextFromEnd(); entry; entry = await this.nextFromEnd()) {
      yield entry;
    }
  }

  private fill(direction: ScanDirection): Promise<KeyValueEntry[]> {
    return this.reader({
      lower: this.lower,
      upper: this.upper,
      direction,
      limit: this.batchSize,
    });
  }
}
