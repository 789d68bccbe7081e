/**
 * Error taxonomy shared by every encoder, decoder and combinator.
 */

/**
 * Closed set of error kinds.
 */
export const ErrorKind = {
  /** The stream ended before a structurally required number of bytes arrived. */
  UnexpectedEos: 'UnexpectedEos',
  /** The bytes (or the item to encode) violate a format or application constraint. */
  InvalidInput: 'InvalidInput',
  /** `startEncoding` was called while an item was still being encoded. */
  EncoderFull: 'EncoderFull',
  /** `decode` was called on a decoder that can never produce another item. */
  DecoderTerminated: 'DecoderTerminated',
  /** API misuse or a broken internal invariant. */
  Other: 'Other',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Free-form diagnostic values attached to an error (counts, limits, offsets). */
export type ErrorContext = Record<string, unknown>;

export interface CodecErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Error thrown by codecs.
 */
export class CodecError extends Error {
  override readonly name = 'CodecError';

  readonly kind: ErrorKind;
  readonly context: ErrorContext;

  constructor(kind: ErrorKind, message: string, options: CodecErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.kind = kind;
    this.context = options.context ?? {};
    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CodecError);
    }
  }

  /**
   * Convert anything thrown by user code into a `CodecError`.
   * A `CodecError` is returned as is; anything else is wrapped with `kind`.
   */
  static from(error: unknown, kind: ErrorKind = ErrorKind.Other): CodecError {
    if (error instanceof CodecError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new CodecError(kind, message, { cause: error });
  }

  /** Copy of this error with extra diagnostic context merged in. */
  withContext(context: ErrorContext): CodecError {
    return new CodecError(this.kind, this.message, {
      context: { ...this.context, ...context },
      cause: this.cause,
    });
  }
}

/**
 * Throw a `CodecError` of the given kind unless `condition` holds.
 */
export function assertCodec(
  condition: boolean,
  kind: ErrorKind,
  message: string,
  context?: ErrorContext,
): asserts condition {
  if (!condition) {
    throw new CodecError(kind, message, { context });
  }
}

/** Type guard: checks if a value is a CodecError of the given kind. */
export function isCodecError(value: unknown, kind?: ErrorKind): value is CodecError {
  return value instanceof CodecError && (kind === undefined || value.kind === kind);
}
