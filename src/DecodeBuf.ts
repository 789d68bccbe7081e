import { CodecError, ErrorKind } from './errors';

/**
 * Byte window handed to `Decode.decode`.
 * Wraps caller-supplied bytes (no copy) with a consumption cursor and an
 * optional hint of how many bytes will still follow this window.
 *
 * `remainingBytes === undefined` means the hint is unknown (assume more is
 * coming); `0` means end-of-stream.
 */
export class DecodeBuf {
  private readonly _bytes: Uint8Array;
  private _offset: number;
  private _end: number;
  private _remainingBytes: number | undefined;

  constructor(bytes: Uint8Array, remainingBytes?: number) {
    if (remainingBytes !== undefined && (!Number.isSafeInteger(remainingBytes) || remainingBytes < 0)) {
      throw new CodecError(ErrorKind.Other, `DecodeBuf: invalid remaining bytes ${remainingBytes}`);
    }
    this._bytes = bytes;
    this._offset = 0;
    this._end = bytes.length;
    this._remainingBytes = remainingBytes;
  }

  /** Window followed by exactly `remainingBytes` more bytes. */
  static withRemainingBytes(bytes: Uint8Array, remainingBytes: number): DecodeBuf {
    return new DecodeBuf(bytes, remainingBytes);
  }

  /** Empty window at end-of-stream. */
  static eos(): DecodeBuf {
    return new DecodeBuf(new Uint8Array(0), 0);
  }

  /** Unconsumed bytes in the window. */
  get length(): number {
    return this._end - this._offset;
  }

  /** Bytes consumed so far. */
  get offset(): number {
    return this._offset;
  }

  /** Bytes that will follow this window, or undefined if unknown. */
  get remainingBytes(): number | undefined {
    return this._remainingBytes;
  }

  isEmpty(): boolean {
    return this._offset === this._end;
  }

  /** True when no byte will follow this window. */
  isEos(): boolean {
    return this._remainingBytes === 0;
  }

  /** View of the unconsumed bytes. */
  peek(): Uint8Array {
    return this._bytes.subarray(this._offset, this._end);
  }

  /** Advance the cursor by `size` bytes. */
  consume(size: number): void {
    if (size < 0 || this._offset + size > this._end) {
      throw new CodecError(ErrorKind.InvalidInput, `DecodeBuf: cannot consume ${size} bytes`, {
        context: { offset: this._offset, size, length: this.length },
      });
    }
    this._offset += size;
  }

  consumeAll(): void {
    this._offset = this._end;
  }

  /** Consume up to `size` bytes and return them (a view, not a copy). */
  read(size: number): Uint8Array {
    const n = Math.min(size, this.length);
    const chunk = this._bytes.subarray(this._offset, this._offset + n);
    this._offset += n;
    return chunk;
  }

  /**
   * Run `fn` against this buffer with the visible window capped at `limit`
   * bytes. Bytes hidden by the cap count as remaining bytes when the hint
   * is known. Consumption done by `fn` is kept.
   */
  withLimit<R>(limit: number, fn: (buf: DecodeBuf) => R): R {
    const hidden = this.length - Math.min(limit, this.length);
    const remaining = this._remainingBytes === undefined ? undefined : this._remainingBytes + hidden;
    return this.limited(limit, remaining, fn);
  }

  /**
   * Run `fn` with the visible window capped at `limit` bytes and the
   * remaining bytes hint replaced by `remainingBytes`.
   */
  withLimitAndRemainingBytes<R>(limit: number, remainingBytes: number, fn: (buf: DecodeBuf) => R): R {
    return this.limited(limit, remainingBytes, fn);
  }

  private limited<R>(limit: number, remainingBytes: number | undefined, fn: (buf: DecodeBuf) => R): R {
    if (limit < 0) {
      throw new CodecError(ErrorKind.Other, `DecodeBuf: negative limit ${limit}`);
    }
    const savedEnd = this._end;
    const savedRemaining = this._remainingBytes;
    this._end = Math.min(this._end, this._offset + limit);
    this._remainingBytes = remainingBytes;
    try {
      return fn(this);
    } finally {
      this._end = savedEnd;
      this._remainingBytes = savedRemaining;
    }
  }
}
