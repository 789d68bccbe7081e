import type { DecodeBuf } from '../DecodeBuf';
import type { Eos } from '../Eos';
import { ErrorKind, assertCodec } from '../errors';
import type { Decode } from '../codecs/Decode';
import type { Encode, ExactBytesEncode } from '../codecs/Encode';
import { awaitsEndOfStream, exactRequiringBytes, isExactBytesEncode } from '../codecs/Encode';

function assertMaxBytes(maxBytes: number): void {
  assertCodec(Number.isSafeInteger(maxBytes) && maxBytes >= 0, ErrorKind.Other, `Invalid byte limit ${maxBytes}`);
}

/**
 * Decoder failing with `InvalidInput` when an item needs more than
 * `maxBytes` bytes.
 */
export class MaxBytesDecoder<T> implements Decode<T> {
  private readonly decoder: Decode<T>;
  private readonly maxBytes: number;
  private consumedBytes = 0;

  constructor(decoder: Decode<T>, maxBytes: number) {
    assertMaxBytes(maxBytes);
    this.decoder = decoder;
    this.maxBytes = maxBytes;
  }

  decode(buf: DecodeBuf): T | undefined {
    const start = buf.offset;
    const limit = Math.min(buf.length, this.maxBytes - this.consumedBytes);
    const item = buf.withLimit(limit, inner => this.decoder.decode(inner));
    this.consumedBytes += buf.offset - start;

    if (this.consumedBytes === this.maxBytes) {
      assertCodec(item !== undefined, ErrorKind.InvalidInput, 'Max bytes limit exceeded', {
        maxBytes: this.maxBytes,
      });
    }
    if (item !== undefined) {
      this.consumedBytes = 0;
    }
    return item;
  }

  hasTerminated(): boolean {
    return this.decoder.hasTerminated();
  }

  isIdle(): boolean {
    return this.decoder.isIdle();
  }

  requiringBytesHint(): number | undefined {
    return this.decoder.requiringBytesHint();
  }
}

/**
 * Encoder failing with `InvalidInput` when an item needs more than
 * `maxBytes` bytes.
 */
export class MaxBytesEncoder<T> implements ExactBytesEncode<T> {
  private readonly encoder: Encode<T>;
  private readonly maxBytes: number;
  private consumedBytes = 0;

  constructor(encoder: Encode<T>, maxBytes: number) {
    assertMaxBytes(maxBytes);
    this.encoder = encoder;
    this.maxBytes = maxBytes;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    const limit = Math.min(buf.length, this.maxBytes - this.consumedBytes);
    const size = this.encoder.encode(buf.subarray(0, limit), eos.back(buf.length - limit));
    this.consumedBytes += size;

    if (this.consumedBytes === this.maxBytes) {
      assertCodec(this.isIdle(), ErrorKind.InvalidInput, 'Max bytes limit exceeded', {
        maxBytes: this.maxBytes,
      });
    }
    if (this.isIdle()) {
      this.consumedBytes = 0;
    }
    return size;
  }

  startEncoding(item: T): void {
    this.encoder.startEncoding(item);
  }

  requiringBytesHint(): number | undefined {
    return this.encoder.requiringBytesHint();
  }

  requiringBytes(): number {
    return exactRequiringBytes(this.encoder);
  }

  isExact(): boolean {
    return isExactBytesEncode(this.encoder);
  }

  isAwaitingEos(): boolean {
    return awaitsEndOfStream(this.encoder);
  }

  isIdle(): boolean {
    return this.encoder.isIdle();
  }
}
