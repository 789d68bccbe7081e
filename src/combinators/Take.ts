import type { DecodeBuf } from '../DecodeBuf';
import { ErrorKind, assertCodec } from '../errors';
import type { Decode } from '../codecs/Decode';

/**
 * Decoder yielding at most `limit` items of the inner decoder.
 */
export class Take<T> implements Decode<T> {
  private readonly decoder: Decode<T>;
  private readonly limit: number;
  private decodedItems = 0;

  constructor(decoder: Decode<T>, limit: number) {
    assertCodec(Number.isInteger(limit) && limit >= 0, ErrorKind.Other, `Take: invalid limit ${limit}`);
    this.decoder = decoder;
    this.limit = limit;
  }

  /** Items yielded so far. */
  get count(): number {
    return this.decodedItems;
  }

  decode(buf: DecodeBuf): T | undefined {
    assertCodec(this.decodedItems < this.limit, ErrorKind.DecoderTerminated, 'Take: item limit reached', {
      limit: this.limit,
    });
    const item = this.decoder.decode(buf);
    if (item !== undefined) {
      this.decodedItems++;
    }
    return item;
  }

  hasTerminated(): boolean {
    return this.decodedItems === this.limit || this.decoder.hasTerminated();
  }

  isIdle(): boolean {
    return this.decodedItems === this.limit || this.decoder.isIdle();
  }

  requiringBytesHint(): number | undefined {
    return this.hasTerminated() ? 0 : this.decoder.requiringBytesHint();
  }
}
