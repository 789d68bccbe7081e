import type { Eos } from '../Eos';
import { CodecError, ErrorKind } from '../errors';

/**
 * Incremental encoder.
 * @template T The type of items to encode.
 */
export interface Encode<T> {
  /**
   * Write up to `buf.length` bytes of the current item into `buf` and
   * return how many were written.
   * Throws `UnexpectedEos` if more room is needed and `eos` is reached.
   */
  encode(buf: Uint8Array, eos: Eos): number;

  /** Accept the next item. Throws `EncoderFull` unless idle. */
  startEncoding(item: T): void;

  /** Bytes still needed to finish the current item, or undefined if open-ended. */
  requiringBytesHint(): number | undefined;

  /** True when no item is being encoded. */
  isIdle(): boolean;

  /**
   * True when the current item is written and only an `encode` call made at
   * end-of-stream is needed to finish it. Omitted by encoders that never wait.
   */
  isAwaitingEos?(): boolean;
}

/**
 * Encoder whose output length for the current item is known exactly
 * before any byte of it is written.
 */
export interface ExactBytesEncode<T> extends Encode<T> {
  /** Exact number of bytes left to write for the current item (0 when idle). */
  requiringBytes(): number;

  /** False for wrappers whose inner encoder does not know its exact count. */
  isExact(): boolean;
}

function hasExactnessCheck<T>(encoder: Encode<T>): encoder is Encode<T> & Pick<ExactBytesEncode<T>, 'isExact'> {
  return 'isExact' in encoder && typeof encoder.isExact === 'function';
}

/** Type guard: checks if an encoder knows its exact byte count. */
export function isExactBytesEncode<T>(encoder: Encode<T>): encoder is ExactBytesEncode<T> {
  return (
    hasExactnessCheck(encoder) &&
    'requiringBytes' in encoder &&
    typeof encoder.requiringBytes === 'function' &&
    encoder.isExact()
  );
}

/** Whether `encoder` only needs an end-of-stream call to finish its item. */
export function awaitsEndOfStream<T>(encoder: Encode<T>): boolean {
  return encoder.isAwaitingEos?.() === true;
}

/**
 * Exact remaining bytes of a wrapped encoder.
 * Used by wrappers that are exact only when their inner encoder is.
 */
export function exactRequiringBytes<T>(encoder: Encode<T>): number {
  if (!isExactBytesEncode(encoder)) {
    throw new CodecError(ErrorKind.Other, 'Inner encoder does not know its exact byte count', {
      context: { encoder: encoder.constructor.name },
    });
  }
  return encoder.requiringBytes();
}
