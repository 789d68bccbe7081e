import type { DecodeBuf } from '../DecodeBuf';
import type { Eos } from '../Eos';
import { ErrorKind, assertCodec } from '../errors';
import type { Decode } from '../codecs/Decode';
import type { Encode, ExactBytesEncode } from '../codecs/Encode';
import { awaitsEndOfStream, exactRequiringBytes, isExactBytesEncode } from '../codecs/Encode';

/**
 * Decoder for a pair: an item of the first decoder followed by an item of the second.
 */
export class DecoderChain<A, B> implements Decode<[A, B]> {
  private readonly first: Decode<A>;
  private readonly second: Decode<B>;
  private head: A | undefined;

  constructor(first: Decode<A>, second: Decode<B>) {
    this.first = first;
    this.second = second;
  }

  decode(buf: DecodeBuf): [A, B] | undefined {
    if (this.head === undefined) {
      this.head = this.first.decode(buf);
      if (this.head === undefined) return undefined;
    }
    const tail = this.second.decode(buf);
    if (tail === undefined) return undefined;

    const head = this.head;
    this.head = undefined;
    return [head, tail];
  }

  hasTerminated(): boolean {
    return this.head === undefined ? this.first.hasTerminated() : this.second.hasTerminated();
  }

  isIdle(): boolean {
    return this.head === undefined && this.first.isIdle() && this.second.isIdle();
  }

  requiringBytesHint(): number | undefined {
    if (this.head !== undefined) return this.second.requiringBytesHint();
    const first = this.first.requiringBytesHint();
    const second = this.second.requiringBytesHint();
    return first === undefined || second === undefined ? undefined : first + second;
  }
}

/**
 * Encoder for a pair: the first item is written, then the second.
 */
export class EncoderChain<A, B> implements ExactBytesEncode<[A, B]> {
  private readonly first: Encode<A>;
  private readonly second: Encode<B>;

  constructor(first: Encode<A>, second: Encode<B>) {
    this.first = first;
    this.second = second;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    let offset = 0;
    if (!this.first.isIdle()) {
      offset = this.first.encode(buf, eos.back(this.second.requiringBytesHint() ?? 0));
      if (!this.first.isIdle()) return offset;
    }
    return offset + this.second.encode(buf.subarray(offset), eos);
  }

  startEncoding([a, b]: [A, B]): void {
    assertCodec(this.isIdle(), ErrorKind.EncoderFull, 'EncoderChain: an item is being encoded');
    this.first.startEncoding(a);
    this.second.startEncoding(b);
  }

  requiringBytesHint(): number | undefined {
    const first = this.first.requiringBytesHint();
    const second = this.second.requiringBytesHint();
    return first === undefined || second === undefined ? undefined : first + second;
  }

  requiringBytes(): number {
    return exactRequiringBytes(this.first) + exactRequiringBytes(this.second);
  }

  isExact(): boolean {
    return isExactBytesEncode(this.first) && isExactBytesEncode(this.second);
  }

  isAwaitingEos(): boolean {
    return this.first.isIdle() && awaitsEndOfStream(this.second);
  }

  isIdle(): boolean {
    return this.first.isIdle() && this.second.isIdle();
  }
}
