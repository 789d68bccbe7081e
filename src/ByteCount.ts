import { CodecError, ErrorKind } from './errors';

export type ByteCountKind = 'finite' | 'infinite' | 'unknown';

/**
 * Number of bytes of interest: a finite count, an endless stream, or unknown.
 *
 * Only partially ordered. Two finite counts compare numerically, infinite
 * is greater than any finite count, and `unknown` compares to nothing.
 */
export class ByteCount {
  static readonly INFINITE = new ByteCount('infinite', 0);
  static readonly UNKNOWN = new ByteCount('unknown', 0);

  readonly kind: ByteCountKind;
  private readonly _value: number;

  private constructor(kind: ByteCountKind, value: number) {
    this.kind = kind;
    this._value = value;
  }

  static finite(bytes: number): ByteCount {
    if (!Number.isSafeInteger(bytes) || bytes < 0) {
      throw new CodecError(ErrorKind.Other, `ByteCount: invalid byte count ${bytes}`, {
        context: { bytes },
      });
    }
    return new ByteCount('finite', bytes);
  }

  isFinite(): boolean {
    return this.kind === 'finite';
  }

  isInfinite(): boolean {
    return this.kind === 'infinite';
  }

  isUnknown(): boolean {
    return this.kind === 'unknown';
  }

  /** The finite count, or undefined for infinite and unknown counts. */
  toNumber(): number | undefined {
    return this.kind === 'finite' ? this._value : undefined;
  }

  /**
   * Compare with another count.
   * Returns -1, 0 or 1, or undefined when the two are incomparable.
   */
  partialCompare(other: ByteCount): -1 | 0 | 1 | undefined {
    if (this.kind === 'unknown' || other.kind === 'unknown') return undefined;
    if (this.kind === 'infinite') return other.kind === 'infinite' ? 0 : 1;
    if (other.kind === 'infinite') return -1;
    if (this._value === other._value) return 0;
    return this._value < other._value ? -1 : 1;
  }

  equals(other: ByteCount): boolean {
    return this.kind === other.kind && this._value === other._value;
  }

  /** Finite counts grow by `bytes`; infinite and unknown counts are unchanged. */
  add(bytes: number): ByteCount {
    return this.kind === 'finite' ? ByteCount.finite(this._value + bytes) : this;
  }

  toString(): string {
    return this.kind === 'finite' ? `Finite(${this._value})` : this.kind === 'infinite' ? 'Infinite' : 'Unknown';
  }
}
