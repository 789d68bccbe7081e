import type { DecodeBuf } from '../DecodeBuf';
import { Eos } from '../Eos';
import { ErrorKind, assertCodec } from '../errors';
import { getCodecLogger } from '../logger';
import type { Decode } from '../codecs/Decode';
import type { Encode, ExactBytesEncode } from '../codecs/Encode';

const logger = getCodecLogger('length');

function assertFrameSize(bytes: number): void {
  assertCodec(Number.isSafeInteger(bytes) && bytes >= 0, ErrorKind.Other, `Invalid frame size ${bytes}`);
}

/**
 * Decoder reading each item from a frame of exactly `expectedBytes` bytes.
 *
 * The inner decoder sees at most the rest of the frame, and the end of the
 * frame as its end-of-stream.
 */
export class LengthDecoder<T> implements Decode<T> {
  private readonly decoder: Decode<T>;
  private _expectedBytes: number;
  private _remainingBytes: number;

  constructor(decoder: Decode<T>, expectedBytes: number) {
    assertFrameSize(expectedBytes);
    this.decoder = decoder;
    this._expectedBytes = expectedBytes;
    this._remainingBytes = expectedBytes;
  }

  get expectedBytes(): number {
    return this._expectedBytes;
  }

  /** Bytes of the current frame not consumed yet. */
  get remainingBytes(): number {
    return this._remainingBytes;
  }

  /** Change the frame size. Only allowed between items. */
  setExpectedBytes(bytes: number): void {
    assertFrameSize(bytes);
    assertCodec(this._remainingBytes === this._expectedBytes, ErrorKind.Other, 'LengthDecoder: an item is being decoded', {
      expectedBytes: this._expectedBytes,
      remainingBytes: this._remainingBytes,
    });
    this._expectedBytes = bytes;
    this._remainingBytes = bytes;
  }

  decode(buf: DecodeBuf): T | undefined {
    const visible = Math.min(buf.length, this._remainingBytes);
    const expectedRemaining = this._remainingBytes - visible;
    if (buf.remainingBytes !== undefined) {
      assertCodec(buf.remainingBytes >= expectedRemaining, ErrorKind.UnexpectedEos, 'LengthDecoder: stream ends inside the frame', {
        remainingBytes: buf.remainingBytes,
        expectedRemaining,
      });
    }

    const start = buf.offset;
    const item = buf.withLimitAndRemainingBytes(visible, expectedRemaining, inner => this.decoder.decode(inner));
    const consumed = buf.offset - start;
    this._remainingBytes -= consumed;

    if (item === undefined) {
      assertCodec(
        consumed === visible || this.decoder.hasTerminated(),
        ErrorKind.Other,
        'LengthDecoder: inner decoder left offered bytes unconsumed',
        { offered: visible, consumed },
      );
      return undefined;
    }

    assertCodec(this._remainingBytes === 0, ErrorKind.InvalidInput, 'LengthDecoder: item ended before the frame', {
      expectedBytes: this._expectedBytes,
      remainingBytes: this._remainingBytes,
    });
    logger.trace('Decoded a frame of {size} bytes.', { size: this._expectedBytes });
    this._remainingBytes = this._expectedBytes;
    return item;
  }

  hasTerminated(): boolean {
    return this._remainingBytes === this._expectedBytes && this.decoder.hasTerminated();
  }

  isIdle(): boolean {
    return this._remainingBytes === this._expectedBytes && this.decoder.isIdle();
  }

  requiringBytesHint(): number | undefined {
    return this.hasTerminated() ? 0 : this._remainingBytes;
  }
}

/**
 * Encoder writing each item into a frame of exactly `expectedBytes` bytes.
 *
 * The inner encoder is told that the stream ends at the frame edge, and must
 * finish exactly there.
 */
export class LengthEncoder<T> implements ExactBytesEncode<T> {
  private readonly encoder: Encode<T>;
  private _expectedBytes: number;
  private _remainingBytes = 0;

  constructor(encoder: Encode<T>, expectedBytes: number) {
    assertFrameSize(expectedBytes);
    this.encoder = encoder;
    this._expectedBytes = expectedBytes;
  }

  get expectedBytes(): number {
    return this._expectedBytes;
  }

  /** Bytes of the current frame not written yet (0 when idle). */
  get remainingBytes(): number {
    return this._remainingBytes;
  }

  /** Change the frame size of the following items. Only allowed while idle. */
  setExpectedBytes(bytes: number): void {
    assertFrameSize(bytes);
    assertCodec(this.isIdle(), ErrorKind.Other, 'LengthEncoder: an item is being encoded', {
      remainingBytes: this._remainingBytes,
    });
    this._expectedBytes = bytes;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    const short = buf.length < this._remainingBytes;
    if (short) {
      assertCodec(!eos.isReached(), ErrorKind.UnexpectedEos, 'LengthEncoder: no room left for the frame', {
        available: buf.length,
        remainingBytes: this._remainingBytes,
      });
    }

    const size = short
      ? this.encoder.encode(buf, eos)
      : this.encoder.encode(buf.subarray(0, this._remainingBytes), Eos.reached());
    this._remainingBytes -= size;

    if (this.encoder.isIdle()) {
      assertCodec(this._remainingBytes === 0, ErrorKind.InvalidInput, 'LengthEncoder: item ended before the frame', {
        expectedBytes: this._expectedBytes,
        remainingBytes: this._remainingBytes,
      });
    }
    return size;
  }

  startEncoding(item: T): void {
    assertCodec(this.isIdle(), ErrorKind.EncoderFull, 'LengthEncoder: an item is being encoded');
    this.encoder.startEncoding(item);
    this._remainingBytes = this._expectedBytes;
  }

  requiringBytesHint(): number | undefined {
    return this._remainingBytes;
  }

  requiringBytes(): number {
    return this._remainingBytes;
  }

  isExact(): boolean {
    return true;
  }

  isIdle(): boolean {
    return this._remainingBytes === 0 && this.encoder.isIdle();
  }
}
