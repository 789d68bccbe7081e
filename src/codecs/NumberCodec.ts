import type { DecodeBuf } from '../DecodeBuf';
import type { Eos } from '../Eos';
import { CodecError, ErrorKind, assertCodec } from '../errors';
import type { Decode } from './Decode';
import type { ExactBytesEncode } from './Encode';

/**
 * Layout of a fixed-width number.
 * The order of bytes is decided by `read`/`write`.
 */
export interface NumberFormat<T> {
  /** Name used in error messages. */
  readonly name: string;
  /** Size of the number in bytes. */
  readonly size: number;
  read(view: DataView, offset: number): T;
  write(view: DataView, offset: number, value: T): void;
  /** Returns false for values the format cannot represent. */
  accepts(value: T): boolean;
}

function intRange(min: number, max: number): (value: number) => boolean {
  return value => Number.isInteger(value) && value >= min && value <= max;
}

function bigIntRange(min: bigint, max: bigint): (value: bigint) => boolean {
  return value => value >= min && value <= max;
}

type Getter<T> = (dv: DataView, offset: number, littleEndian: boolean) => T;
type Setter<T> = (dv: DataView, offset: number, value: T, littleEndian: boolean) => void;

function format<T>(
  name: string,
  size: number,
  littleEndian: boolean,
  get: Getter<T>,
  set: Setter<T>,
  accepts: (value: T) => boolean,
): NumberFormat<T> {
  return {
    name,
    size,
    read: (dv, o) => get(dv, o, littleEndian),
    write: (dv, o, v) => set(dv, o, v, littleEndian),
    accepts,
  };
}

const isNumber = (value: number): boolean => typeof value === 'number';

/**
 * Built-in fixed-width number formats.
 * Suffix `be` is big-endian, `le` little-endian.
 */
export const NumberFormats = {
  u8: format<number>('u8', 1, false, (dv, o) => dv.getUint8(o), (dv, o, v) => dv.setUint8(o, v), intRange(0, 0xff)),
  i8: format<number>('i8', 1, false, (dv, o) => dv.getInt8(o), (dv, o, v) => dv.setInt8(o, v), intRange(-0x80, 0x7f)),

  u16be: format<number>('u16be', 2, false, (dv, o, le) => dv.getUint16(o, le), (dv, o, v, le) => dv.setUint16(o, v, le), intRange(0, 0xffff)),
  u16le: format<number>('u16le', 2, true, (dv, o, le) => dv.getUint16(o, le), (dv, o, v, le) => dv.setUint16(o, v, le), intRange(0, 0xffff)),
  i16be: format<number>('i16be', 2, false, (dv, o, le) => dv.getInt16(o, le), (dv, o, v, le) => dv.setInt16(o, v, le), intRange(-0x8000, 0x7fff)),
  i16le: format<number>('i16le', 2, true, (dv, o, le) => dv.getInt16(o, le), (dv, o, v, le) => dv.setInt16(o, v, le), intRange(-0x8000, 0x7fff)),

  u32be: format<number>('u32be', 4, false, (dv, o, le) => dv.getUint32(o, le), (dv, o, v, le) => dv.setUint32(o, v, le), intRange(0, 0xffffffff)),
  u32le: format<number>('u32le', 4, true, (dv, o, le) => dv.getUint32(o, le), (dv, o, v, le) => dv.setUint32(o, v, le), intRange(0, 0xffffffff)),
  i32be: format<number>('i32be', 4, false, (dv, o, le) => dv.getInt32(o, le), (dv, o, v, le) => dv.setInt32(o, v, le), intRange(-0x80000000, 0x7fffffff)),
  i32le: format<number>('i32le', 4, true, (dv, o, le) => dv.getInt32(o, le), (dv, o, v, le) => dv.setInt32(o, v, le), intRange(-0x80000000, 0x7fffffff)),

  u64be: format<bigint>('u64be', 8, false, (dv, o, le) => dv.getBigUint64(o, le), (dv, o, v, le) => dv.setBigUint64(o, v, le), bigIntRange(0n, 0xffffffffffffffffn)),
  u64le: format<bigint>('u64le', 8, true, (dv, o, le) => dv.getBigUint64(o, le), (dv, o, v, le) => dv.setBigUint64(o, v, le), bigIntRange(0n, 0xffffffffffffffffn)),
  i64be: format<bigint>('i64be', 8, false, (dv, o, le) => dv.getBigInt64(o, le), (dv, o, v, le) => dv.setBigInt64(o, v, le), bigIntRange(-0x8000000000000000n, 0x7fffffffffffffffn)),
  i64le: format<bigint>('i64le', 8, true, (dv, o, le) => dv.getBigInt64(o, le), (dv, o, v, le) => dv.setBigInt64(o, v, le), bigIntRange(-0x8000000000000000n, 0x7fffffffffffffffn)),

  f32be: format<number>('f32be', 4, false, (dv, o, le) => dv.getFloat32(o, le), (dv, o, v, le) => dv.setFloat32(o, v, le), isNumber),
  f32le: format<number>('f32le', 4, true, (dv, o, le) => dv.getFloat32(o, le), (dv, o, v, le) => dv.setFloat32(o, v, le), isNumber),
  f64be: format<number>('f64be', 8, false, (dv, o, le) => dv.getFloat64(o, le), (dv, o, v, le) => dv.setFloat64(o, v, le), isNumber),
  f64le: format<number>('f64le', 8, true, (dv, o, le) => dv.getFloat64(o, le), (dv, o, v, le) => dv.setFloat64(o, v, le), isNumber),
} as const;

/**
 * Decoder for one fixed-width number.
 * Bytes of a partially received number are kept across calls.
 */
export class NumberDecoder<T> implements Decode<T> {
  private readonly format: NumberFormat<T>;
  private readonly scratch: Uint8Array;
  private readonly view: DataView;
  private filled = 0;

  constructor(format: NumberFormat<T>) {
    this.format = format;
    this.scratch = new Uint8Array(format.size);
    this.view = new DataView(this.scratch.buffer);
  }

  decode(buf: DecodeBuf): T | undefined {
    const chunk = buf.read(this.format.size - this.filled);
    this.scratch.set(chunk, this.filled);
    this.filled += chunk.length;

    if (this.filled < this.format.size) {
      assertCodec(!buf.isEos(), ErrorKind.UnexpectedEos, `${this.format.name}: stream ended mid-number`, {
        expected: this.format.size,
        actual: this.filled,
      });
      return undefined;
    }
    this.filled = 0;
    return this.format.read(this.view, 0);
  }

  hasTerminated(): boolean {
    return false;
  }

  isIdle(): boolean {
    return this.filled === 0;
  }

  requiringBytesHint(): number | undefined {
    return this.format.size - this.filled;
  }
}

/**
 * Encoder for one fixed-width number.
 */
export class NumberEncoder<T> implements ExactBytesEncode<T> {
  private readonly format: NumberFormat<T>;
  private readonly scratch: Uint8Array;
  private readonly view: DataView;
  private written: number;

  constructor(format: NumberFormat<T>) {
    this.format = format;
    this.scratch = new Uint8Array(format.size);
    this.view = new DataView(this.scratch.buffer);
    this.written = format.size;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    const size = Math.min(buf.length, this.format.size - this.written);
    buf.set(this.scratch.subarray(this.written, this.written + size));
    this.written += size;
    if (this.written < this.format.size) {
      assertCodec(!eos.isReached(), ErrorKind.UnexpectedEos, `${this.format.name}: no room left for the number`, {
        remaining: this.format.size - this.written,
      });
    }
    return size;
  }

  startEncoding(item: T): void {
    assertCodec(this.isIdle(), ErrorKind.EncoderFull, `${this.format.name}: an item is being encoded`);
    if (!this.format.accepts(item)) {
      throw new CodecError(ErrorKind.InvalidInput, `${this.format.name}: value ${String(item)} out of range`, {
        context: { value: item },
      });
    }
    this.format.write(this.view, 0, item);
    this.written = 0;
  }

  requiringBytesHint(): number | undefined {
    return this.requiringBytes();
  }

  requiringBytes(): number {
    return this.format.size - this.written;
  }

  isExact(): boolean {
    return true;
  }

  isIdle(): boolean {
    return this.written === this.format.size;
  }
}
