import type { Eos } from '../Eos';
import { CodecError, ErrorKind } from '../errors';
import type { Encode, ExactBytesEncode } from '../codecs/Encode';
import { awaitsEndOfStream, exactRequiringBytes, isExactBytesEncode } from '../codecs/Encode';

/**
 * Encoder converting each item with `from` before handing it to the inner encoder.
 */
export class MapFrom<T, U> implements ExactBytesEncode<T> {
  private readonly encoder: Encode<U>;
  private readonly from: (item: T) => U;

  constructor(encoder: Encode<U>, from: (item: T) => U) {
    this.encoder = encoder;
    this.from = from;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    return this.encoder.encode(buf, eos);
  }

  startEncoding(item: T): void {
    this.encoder.startEncoding(this.from(item));
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

/**
 * Encoder converting each item with a function that may throw.
 * Anything thrown that is not a `CodecError` becomes `InvalidInput`.
 */
export class TryMapFrom<T, U> implements ExactBytesEncode<T> {
  private readonly encoder: Encode<U>;
  private readonly tryFrom: (item: T) => U;

  constructor(encoder: Encode<U>, tryFrom: (item: T) => U) {
    this.encoder = encoder;
    this.tryFrom = tryFrom;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    return this.encoder.encode(buf, eos);
  }

  startEncoding(item: T): void {
    let mapped: U;
    try {
      mapped = this.tryFrom(item);
    } catch (e) {
      throw CodecError.from(e, ErrorKind.InvalidInput);
    }
    this.encoder.startEncoding(mapped);
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
