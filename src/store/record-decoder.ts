import type { BidirectionalIterator, KeyValueEntry } from './range-iterator.js';
import type { RecordKeyParts } from './record-key.js';

/**
 * Turns a stored key/value pair into a typed record and back.
 * `decode` throws `DecodeError` on malformed bytes.
 */
export interface RecordDecoder<R extends RecordKeyParts, S> {
  decode(key: Buffer, value: Buffer): R;
  encode(stored: S): Buffer;
}

/** Applies a decoder to every entry a range iterator yields. */
export class DecodingIterator<R extends RecordKeyParts>
  implements BidirectionalIterator<R>
{
  constructor(
    private readonly inner: BidirectionalIterator<KeyValueEntry>,
    private readonly decoder: Pick<RecordDecoder<R, unknown>, 'decode'>,
  ) {}

  async next(): Promise<R | undefined> {
    return this.decodeEntry(await this.inner.next());
  }

  async nextFromEnd(): Promise<R | undefined> {
    return this.decodeEntry(await this.inner.nextFromEnd());
  }

  reverse(): AsyncIterable<R> {
    return { [Symbol.asyncIterator]: () => this.drainFromEnd() };
  }

  async *[Symbol.asyncIterator](): AsyncIterator<R> {
    for (let record = await this.next(); record; record = await this.next()) {
      yield record;
    }
  }

  private async *drainFromEnd(): AsyncGenerator<R> {
    for (let record = await this.nextFromEnd(); record; record = await this.nextFromEnd()) {
      yield record;
    }
  }

  private decodeEntry(entry: KeyValueEntry | undefined): R | undefined {
    return entry ? this.decoder.decode(entry.key, entry.value) : undefined;
  }
}
