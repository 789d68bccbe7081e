import { CodecError } from '../src/errors';

const textEncoder = new TextEncoder();

/** UTF-8 bytes of `text`. */
export function utf8(text: string): Uint8Array {
  return textEncoder.encode(text);
}

/** Run `fn` and return the `CodecError` it throws. */
export function catchCodecError(fn: () => unknown): CodecError {
  try {
    fn();
  } catch (e) {
    if (e instanceof CodecError) return e;
    throw e;
  }
  throw new Error('Expected a CodecError to be thrown');
}
