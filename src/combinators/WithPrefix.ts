import type { Eos } from '../Eos';
import { ErrorKind, assertCodec } from '../errors';
import type { Encode, ExactBytesEncode } from '../codecs/Encode';
import { awaitsEndOfStream, exactRequiringBytes, isExactBytesEncode } from '../codecs/Encode';

/**
 * Encoder writing a prefix item before each body.
 *
 * The prefix is computed by `prefixOf` right after the body encoder has
 * started the item, e.g. to write the body's length first.
 */
export class WithPrefix<T, E extends Encode<T>, P> implements ExactBytesEncode<T> {
  private readonly body: E;
  private readonly prefix: Encode<P>;
  private readonly prefixOf: (body: E) => P;

  constructor(body: E, prefix: Encode<P>, prefixOf: (body: E) => P) {
    this.body = body;
    this.prefix = prefix;
    this.prefixOf = prefixOf;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    let offset = 0;
    if (!this.prefix.isIdle()) {
      offset = this.prefix.encode(buf, this.body.isIdle() ? eos : eos.back(this.body.requiringBytesHint() ?? 0));
      if (!this.prefix.isIdle()) return offset;
    }
    return offset + this.body.encode(buf.subarray(offset), eos);
  }

  startEncoding(item: T): void {
    assertCodec(this.isIdle(), ErrorKind.EncoderFull, 'WithPrefix: an item is being encoded');
    this.body.startEncoding(item);
    this.prefix.startEncoding(this.prefixOf(this.body));
  }

  requiringBytesHint(): number | undefined {
    const prefix = this.prefix.requiringBytesHint();
    const body = this.body.requiringBytesHint();
    return prefix === undefined || body === undefined ? undefined : prefix + body;
  }

  requiringBytes(): number {
    return exactRequiringBytes(this.prefix) + exactRequiringBytes(this.body);
  }

  isExact(): boolean {
    return isExactBytesEncode(this.prefix) && isExactBytesEncode(this.body);
  }

  isAwaitingEos(): boolean {
    return this.prefix.isIdle() && awaitsEndOfStream(this.body);
  }

  isIdle(): boolean {
    return this.prefix.isIdle() && this.body.isIdle();
  }
}
