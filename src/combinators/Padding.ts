import type { Eos } from '../Eos';
import { ErrorKind, assertCodec } from '../errors';
import type { Encode } from '../codecs/Encode';

/**
 * Encoder that, once the item is written, fills every further byte it is
 * offered with `paddingByte` until an `encode` call made at end-of-stream.
 *
 * Idle only after that call, not when the inner encoder is.
 */
export class Padding<T> implements Encode<T> {
  private readonly encoder: Encode<T>;
  private readonly paddingByte: number;
  private eosReached = true;

  constructor(encoder: Encode<T>, paddingByte: number) {
    assertCodec(
      Number.isInteger(paddingByte) && paddingByte >= 0 && paddingByte <= 0xff,
      ErrorKind.Other,
      `Padding: invalid padding byte ${paddingByte}`,
    );
    this.encoder = encoder;
    this.paddingByte = paddingByte;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    if (!this.encoder.isIdle()) {
      return this.encoder.encode(buf, eos);
    }
    buf.fill(this.paddingByte);
    this.eosReached = eos.isReached();
    return buf.length;
  }

  startEncoding(item: T): void {
    assertCodec(this.isIdle(), ErrorKind.EncoderFull, 'Padding: an item is being encoded');
    this.eosReached = false;
    this.encoder.startEncoding(item);
  }

  requiringBytesHint(): number | undefined {
    return this.isIdle() ? 0 : undefined;
  }

  isIdle(): boolean {
    return this.eosReached;
  }

  isAwaitingEos(): boolean {
    return !this.eosReached && this.encoder.isIdle();
  }
}
