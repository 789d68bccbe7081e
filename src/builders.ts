/**
 * Fluent wrappers giving every decoder and encoder the combinator methods.
 *
 * Each method wraps the current codec in a combinator and returns a new
 * wrapper; the wrapped combinator stays reachable through `inner`.
 */
import type { DecodeBuf } from './DecodeBuf';
import type { Eos } from './Eos';
import type { EncodeToBytesOptions } from './io';
import type { Decode } from './codecs/Decode';
import type { Encode, ExactBytesEncode } from './codecs/Encode';
import { awaitsEndOfStream, exactRequiringBytes, isExactBytesEncode } from './codecs/Encode';
import { AndThen } from './combinators/AndThen';
import { Assert, Validate } from './combinators/Assert';
import { DecoderChain, EncoderChain } from './combinators/Chain';
import type { Collector } from './combinators/Collect';
import { Collect, arrayCollector } from './combinators/Collect';
import { LengthDecoder, LengthEncoder } from './combinators/Length';
import { MapDecoder, TryMapDecoder } from './combinators/Map';
import type { ErrorMapper } from './combinators/MapErr';
import { MapErrDecoder, MapErrEncoder } from './combinators/MapErr';
import { MapFrom, TryMapFrom } from './combinators/MapFrom';
import { MaxBytesDecoder, MaxBytesEncoder } from './combinators/MaxBytes';
import { OmitDecoder } from './combinators/Omit';
import { Optional } from './combinators/Optional';
import { Padding } from './combinators/Padding';
import { PreEncode } from './combinators/PreEncode';
import { Repeat } from './combinators/Repeat';
import { SkipRemaining } from './combinators/SkipRemaining';
import { Take } from './combinators/Take';
import { WithPrefix } from './combinators/WithPrefix';

/**
 * Decoder wrapper with combinator methods.
 *
 * @example
 * const decoder = DecodeExt.of(new Utf8Decoder()).length(3).take(2).collect();
 */
export class DecodeExt<T, D extends Decode<T> = Decode<T>> implements Decode<T> {
  readonly inner: D;

  constructor(inner: D) {
    this.inner = inner;
  }

  static of<T>(decoder: Decode<T>): DecodeExt<T> {
    return new DecodeExt<T>(decoder);
  }

  decode(buf: DecodeBuf): T | undefined {
    return this.inner.decode(buf);
  }

  hasTerminated(): boolean {
    return this.inner.hasTerminated();
  }

  isIdle(): boolean {
    return this.inner.isIdle();
  }

  requiringBytesHint(): number | undefined {
    return this.inner.requiringBytesHint();
  }

  map<U>(map: (item: T) => U): DecodeExt<U, MapDecoder<T, U>> {
    return new DecodeExt<U, MapDecoder<T, U>>(new MapDecoder<T, U>(this.inner, map));
  }

  tryMap<U>(tryMap: (item: T) => U): DecodeExt<U, TryMapDecoder<T, U>> {
    return new DecodeExt<U, TryMapDecoder<T, U>>(new TryMapDecoder<T, U>(this.inner, tryMap));
  }

  mapErr(mapErr: ErrorMapper): DecodeExt<T, MapErrDecoder<T>> {
    return new DecodeExt<T, MapErrDecoder<T>>(new MapErrDecoder<T>(this.inner, mapErr));
  }

  andThen<U>(andThen: (item: T) => Decode<U>): DecodeExt<U, AndThen<T, U>> {
    return new DecodeExt<U, AndThen<T, U>>(new AndThen<T, U>(this.inner, andThen));
  }

  chain<B>(second: Decode<B>): DecodeExt<[T, B], DecoderChain<T, B>> {
    return new DecodeExt<[T, B], DecoderChain<T, B>>(new DecoderChain<T, B>(this.inner, second));
  }

  /** Skip this decoder entirely when `omit` is true, yielding `null`. */
  omit(omit: boolean): DecodeExt<T | null, OmitDecoder<T>> {
    return new DecodeExt<T | null, OmitDecoder<T>>(new OmitDecoder<T>(this.inner, omit));
  }

  /** Same as `omit(!present)`. */
  present(present: boolean): DecodeExt<T | null, OmitDecoder<T>> {
    return this.omit(!present);
  }

  collect(): DecodeExt<T[], Collect<T, T[]>> {
    return this.collectInto(arrayCollector<T>());
  }

  collectInto<C>(collector: Collector<T, C>): DecodeExt<C, Collect<T, C>> {
    return new DecodeExt<C, Collect<T, C>>(new Collect<T, C>(this.inner, collector));
  }

  length(expectedBytes: number): DecodeExt<T, LengthDecoder<T>> {
    return new DecodeExt<T, LengthDecoder<T>>(new LengthDecoder<T>(this.inner, expectedBytes));
  }

  take(limit: number): DecodeExt<T, Take<T>> {
    return new DecodeExt<T, Take<T>>(new Take<T>(this.inner, limit));
  }

  skipRemaining(): DecodeExt<T, SkipRemaining<T>> {
    return new DecodeExt<T, SkipRemaining<T>>(new SkipRemaining<T>(this.inner));
  }

  maxBytes(maxBytes: number): DecodeExt<T, MaxBytesDecoder<T>> {
    return new DecodeExt<T, MaxBytesDecoder<T>>(new MaxBytesDecoder<T>(this.inner, maxBytes));
  }

  assert(predicate: (item: T) => boolean): DecodeExt<T, Assert<T>> {
    return new DecodeExt<T, Assert<T>>(new Assert<T>(this.inner, predicate));
  }

  validate(validate: (item: T) => void): DecodeExt<T, Validate<T>> {
    return new DecodeExt<T, Validate<T>>(new Validate<T>(this.inner, validate));
  }
}

/**
 * Encoder wrapper with combinator methods.
 *
 * `requiringBytes()` only works when the wrapped encoder is exact.
 */
export class EncodeExt<T, E extends Encode<T> = Encode<T>> implements ExactBytesEncode<T> {
  readonly inner: E;

  constructor(inner: E) {
    this.inner = inner;
  }

  static of<T>(encoder: Encode<T>): EncodeExt<T> {
    return new EncodeExt<T>(encoder);
  }

  encode(buf: Uint8Array, eos: Eos): number {
    return this.inner.encode(buf, eos);
  }

  startEncoding(item: T): void {
    this.inner.startEncoding(item);
  }

  requiringBytesHint(): number | undefined {
    return this.inner.requiringBytesHint();
  }

  requiringBytes(): number {
    return exactRequiringBytes(this.inner);
  }

  isExact(): boolean {
    return isExactBytesEncode(this.inner);
  }

  isAwaitingEos(): boolean {
    return awaitsEndOfStream(this.inner);
  }

  isIdle(): boolean {
    return this.inner.isIdle();
  }

  mapFrom<U>(from: (item: U) => T): EncodeExt<U, MapFrom<U, T>> {
    return new EncodeExt<U, MapFrom<U, T>>(new MapFrom<U, T>(this.inner, from));
  }

  tryMapFrom<U>(tryFrom: (item: U) => T): EncodeExt<U, TryMapFrom<U, T>> {
    return new EncodeExt<U, TryMapFrom<U, T>>(new TryMapFrom<U, T>(this.inner, tryFrom));
  }

  mapErr(mapErr: ErrorMapper): EncodeExt<T, MapErrEncoder<T>> {
    return new EncodeExt<T, MapErrEncoder<T>>(new MapErrEncoder<T>(this.inner, mapErr));
  }

  chain<B>(second: Encode<B>): EncodeExt<[T, B], EncoderChain<T, B>> {
    return new EncodeExt<[T, B], EncoderChain<T, B>>(new EncoderChain<T, B>(this.inner, second));
  }

  repeat(): EncodeExt<Iterable<T>, Repeat<T>> {
    return new EncodeExt<Iterable<T>, Repeat<T>>(new Repeat<T>(this.inner));
  }

  optional(): EncodeExt<T | null | undefined, Optional<T>> {
    return new EncodeExt<T | null | undefined, Optional<T>>(new Optional<T>(this.inner));
  }

  length(expectedBytes: number): EncodeExt<T, LengthEncoder<T>> {
    return new EncodeExt<T, LengthEncoder<T>>(new LengthEncoder<T>(this.inner, expectedBytes));
  }

  maxBytes(maxBytes: number): EncodeExt<T, MaxBytesEncoder<T>> {
    return new EncodeExt<T, MaxBytesEncoder<T>>(new MaxBytesEncoder<T>(this.inner, maxBytes));
  }

  padding(paddingByte: number): EncodeExt<T, Padding<T>> {
    return new EncodeExt<T, Padding<T>>(new Padding<T>(this.inner, paddingByte));
  }

  /**
   * Write `prefix` before each item. `prefixOf` receives this wrapper once
   * the item has started, so it can read e.g. `requiringBytes()`.
   */
  withPrefix<P>(prefix: Encode<P>, prefixOf: (body: EncodeExt<T, E>) => P): EncodeExt<T, WithPrefix<T, EncodeExt<T, E>, P>> {
    return new EncodeExt<T, WithPrefix<T, EncodeExt<T, E>, P>>(new WithPrefix<T, EncodeExt<T, E>, P>(this, prefix, prefixOf));
  }

  preEncode(options?: EncodeToBytesOptions): EncodeExt<T, PreEncode<T>> {
    return new EncodeExt<T, PreEncode<T>>(new PreEncode<T>(this.inner, options));
  }
}
