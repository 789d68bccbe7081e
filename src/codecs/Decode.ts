import type { DecodeBuf } from '../DecodeBuf';

/**
 * Incremental decoder.
 * @template T The type of decoded items. Items are never `undefined`.
 */
export interface Decode<T> {
  /**
   * Consume bytes from `buf` and return the next item once it is complete.
   *
   * Returns `undefined` when the window did not hold enough bytes; every
   * byte offered must have been consumed in that case. Also returns
   * `undefined`, forever, once the decoder has terminated.
   */
  decode(buf: DecodeBuf): T | undefined;

  /** True once the decoder can never produce another item. */
  hasTerminated(): boolean;

  /** True when no partially decoded item is pending. */
  isIdle(): boolean;

  /**
   * Lower bound of the bytes needed before the next item can be returned,
   * or undefined if unknowable.
   *
   * 0 means either an item is already buffered or decoding has finished;
   * see {@link decoderStatus}.
   */
  requiringBytesHint(): number | undefined;
}

export type DecoderStatus =
  | { status: 'terminated' }
  | { status: 'ready' }
  | { status: 'pending'; requiringBytes?: number };

/**
 * Resolve what a decoder's requiring-bytes hint means by also asking
 * whether it has terminated.
 */
export function decoderStatus<T>(decoder: Decode<T>): DecoderStatus {
  if (decoder.hasTerminated()) return { status: 'terminated' };
  const hint = decoder.requiringBytesHint();
  if (hint === 0) return { status: 'ready' };
  return hint === undefined ? { status: 'pending' } : { status: 'pending', requiringBytes: hint };
}
