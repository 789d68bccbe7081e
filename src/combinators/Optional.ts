import type { Eos } from '../Eos';
import { ErrorKind, assertCodec } from '../errors';
import type { Encode, ExactBytesEncode } from '../codecs/Encode';
import { awaitsEndOfStream, exactRequiringBytes, isExactBytesEncode } from '../codecs/Encode';

/**
 * Encoder for an optional item; `null` and `undefined` produce no bytes.
 */
export class Optional<T> implements ExactBytesEncode<T | null | undefined> {
  private readonly encoder: Encode<T>;

  constructor(encoder: Encode<T>) {
    this.encoder = encoder;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    return this.encoder.encode(buf, eos);
  }

  startEncoding(item: T | null | undefined): void {
    assertCodec(this.isIdle(), ErrorKind.EncoderFull, 'Optional: an item is being encoded');
    if (item !== null && item !== undefined) {
      this.encoder.startEncoding(item);
    }
  }

  requiringBytesHint(): number | undefined {
    return this.encoder.requiringBytesHint();
  }

  requiringBytes(): number {
    return this.isIdle() ? 0 : exactRequiringBytes(this.encoder);
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
