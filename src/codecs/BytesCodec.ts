import type { DecodeBuf } from '../DecodeBuf';
import type { Eos } from '../Eos';
import { ErrorKind, assertCodec } from '../errors';
import type { Decode } from './Decode';
import type { ExactBytesEncode } from './Encode';

/**
 * Encoder writing a byte array as is.
 * The item is not copied; it must not be modified while being encoded.
 */
export class BytesEncoder implements ExactBytesEncode<Uint8Array> {
  private bytes: Uint8Array = new Uint8Array(0);
  private offset = 0;

  encode(buf: Uint8Array, eos: Eos): number {
    const size = Math.min(buf.length, this.bytes.length - this.offset);
    buf.set(this.bytes.subarray(this.offset, this.offset + size));
    this.offset += size;
    if (this.offset < this.bytes.length) {
      assertCodec(!eos.isReached(), ErrorKind.UnexpectedEos, 'BytesEncoder: no room left for the remaining bytes', {
        remaining: this.bytes.length - this.offset,
      });
    }
    return size;
  }

  startEncoding(item: Uint8Array): void {
    assertCodec(this.isIdle(), ErrorKind.EncoderFull, 'BytesEncoder: an item is being encoded');
    this.bytes = item;
    this.offset = 0;
  }

  requiringBytesHint(): number | undefined {
    return this.requiringBytes();
  }

  requiringBytes(): number {
    return this.bytes.length - this.offset;
  }

  isExact(): boolean {
    return true;
  }

  isIdle(): boolean {
    return this.offset === this.bytes.length;
  }
}

/**
 * Decoder for a byte run of a fixed length.
 * Every item is a fresh copy.
 */
export class BytesDecoder implements Decode<Uint8Array> {
  private bytes: Uint8Array;
  private filled = 0;

  constructor(size: number) {
    this.bytes = new Uint8Array(size);
  }

  /** Length of the decoded byte runs. */
  get size(): number {
    return this.bytes.length;
  }

  /** Change the length of the following items. Only allowed while idle. */
  setSize(size: number): void {
    assertCodec(this.isIdle(), ErrorKind.Other, 'BytesDecoder: an item is being decoded', {
      filled: this.filled,
    });
    this.bytes = new Uint8Array(size);
  }

  decode(buf: DecodeBuf): Uint8Array | undefined {
    const chunk = buf.read(this.bytes.length - this.filled);
    this.bytes.set(chunk, this.filled);
    this.filled += chunk.length;

    if (this.filled < this.bytes.length) {
      assertCodec(!buf.isEos(), ErrorKind.UnexpectedEos, 'BytesDecoder: stream ended mid-item', {
        expected: this.bytes.length,
        actual: this.filled,
      });
      return undefined;
    }
    this.filled = 0;
    return this.bytes.slice();
  }

  hasTerminated(): boolean {
    return false;
  }

  isIdle(): boolean {
    return this.filled === 0;
  }

  requiringBytesHint(): number | undefined {
    return this.bytes.length - this.filled;
  }
}

/**
 * Decoder collecting every byte until end-of-stream.
 * Usually wrapped in a length frame, whose edge is the end-of-stream it sees.
 */
export class RemainingBytesDecoder implements Decode<Uint8Array> {
  private chunks: Uint8Array[] = [];
  private size = 0;

  decode(buf: DecodeBuf): Uint8Array | undefined {
    const chunk = buf.read(buf.length);
    if (chunk.length > 0) {
      this.chunks.push(chunk.slice());
      this.size += chunk.length;
    }
    if (!buf.isEos()) return undefined;

    const result = new Uint8Array(this.size);
    let offset = 0;
    for (const c of this.chunks) {
      result.set(c, offset);
      offset += c.length;
    }
    this.chunks = [];
    this.size = 0;
    return result;
  }

  hasTerminated(): boolean {
    return false;
  }

  isIdle(): boolean {
    return this.size === 0;
  }

  requiringBytesHint(): number | undefined {
    return undefined;
  }
}
