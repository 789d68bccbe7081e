import type { Eos } from '../Eos';
import { ErrorKind, assertCodec } from '../errors';
import type { Encode } from '../codecs/Encode';

/**
 * Encoder for a sequence of items written back to back by one inner encoder.
 * The next item is taken from the iterator only once the inner encoder is idle.
 */
export class Repeat<T> implements Encode<Iterable<T>> {
  private readonly encoder: Encode<T>;
  private items: Iterator<T> | undefined;

  constructor(encoder: Encode<T>) {
    this.encoder = encoder;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    while (this.encoder.isIdle()) {
      const next = this.items?.next();
      if (next === undefined || next.done === true) {
        this.items = undefined;
        break;
      }
      this.encoder.startEncoding(next.value);
    }
    return this.encoder.encode(buf, eos);
  }

  startEncoding(items: Iterable<T>): void {
    assertCodec(this.isIdle(), ErrorKind.EncoderFull, 'Repeat: a sequence is being encoded');
    this.items = items[Symbol.iterator]();
  }

  requiringBytesHint(): number | undefined {
    return this.isIdle() ? 0 : undefined;
  }

  isIdle(): boolean {
    return this.items === undefined;
  }
}
