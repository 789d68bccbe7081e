/**
 * In-memory drivers running encoders and decoders to completion.
 */
import type { Decode } from './codecs/Decode';
import type { Encode } from './codecs/Encode';
import { awaitsEndOfStream } from './codecs/Encode';
import { DecodeBuf } from './DecodeBuf';
import { Eos } from './Eos';
import { CodecError, ErrorKind, assertCodec } from './errors';
import { getCodecLogger } from './logger';

const logger = getCodecLogger('io');

export interface EncodeToBytesOptions {
  /** Size of each scratch chunk handed to the encoder (default: 4096). */
  chunkSize?: number;
  /** Largest accepted output; more is `InvalidInput` (default: unlimited). */
  maxBytes?: number;
}

export interface DecodeFromBytesOptions {
  /** Accept bytes left over after the item (default: false). */
  allowTrailingBytes?: boolean;
}

const ENCODE_DEFAULTS: Required<EncodeToBytesOptions> = {
  chunkSize: 4096,
  maxBytes: Number.POSITIVE_INFINITY,
};

const DECODE_DEFAULTS: Required<DecodeFromBytesOptions> = {
  allowTrailingBytes: false,
};

/**
 * Encode the item already started on `encoder` into `buf`, which is the
 * only buffer the encoder will get. Returns the number of bytes written.
 */
export function encodeAll<T>(encoder: Encode<T>, buf: Uint8Array): number {
  let offset = 0;
  while (!encoder.isIdle()) {
    const size = encoder.encode(buf.subarray(offset), Eos.reached());
    offset += size;
    if (size === 0 && !encoder.isIdle()) {
      throw new CodecError(ErrorKind.Other, 'Encoder made no progress', {
        context: { offset, length: buf.length },
      });
    }
  }
  return offset;
}

/**
 * Start encoding `item` and collect the whole output in memory.
 * The stream ends with the item: an encoder waiting for end-of-stream
 * (such as `Padding`) gets it as soon as the item is written.
 */
export function encodeToBytes<T>(encoder: Encode<T>, item: T, options?: EncodeToBytesOptions): Uint8Array {
  const { chunkSize, maxBytes } = { ...ENCODE_DEFAULTS, ...options };
  assertCodec(Number.isInteger(chunkSize) && chunkSize > 0, ErrorKind.Other, `Invalid chunk size ${chunkSize}`);

  encoder.startEncoding(item);

  const chunks: Uint8Array[] = [];
  let total = 0;
  while (!encoder.isIdle()) {
    if (awaitsEndOfStream(encoder)) {
      encoder.encode(new Uint8Array(0), Eos.reached());
      assertCodec(encoder.isIdle(), ErrorKind.Other, 'Encoder did not finish at end-of-stream', { total });
      break;
    }
    const chunk = new Uint8Array(chunkSize);
    const size = encoder.encode(chunk, Eos.notReached());
    if (size === 0 && !encoder.isIdle()) {
      throw new CodecError(ErrorKind.Other, 'Encoder made no progress', { context: { total } });
    }
    total += size;
    assertCodec(total <= maxBytes, ErrorKind.InvalidInput, 'Encoded item exceeds the size limit', {
      maxBytes,
      total,
    });
    chunks.push(chunk.subarray(0, size));
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  logger.trace('Encoded {total} bytes in {chunks} chunk(s).', { total, chunks: chunks.length });
  return result;
}

/**
 * Decode one item from a complete byte sequence.
 * Running out of bytes is `UnexpectedEos`.
 */
export function decodeFromBytes<T>(decoder: Decode<T>, bytes: Uint8Array, options?: DecodeFromBytesOptions): T {
  const { allowTrailingBytes } = { ...DECODE_DEFAULTS, ...options };
  const buf = DecodeBuf.withRemainingBytes(bytes, 0);

  const item = decoder.decode(buf);
  if (item === undefined) {
    assertCodec(!decoder.hasTerminated(), ErrorKind.DecoderTerminated, 'Decoder has terminated');
    throw new CodecError(ErrorKind.UnexpectedEos, 'Input ended before an item was decoded', {
      context: { length: bytes.length },
    });
  }
  if (!allowTrailingBytes) {
    assertCodec(buf.isEmpty(), ErrorKind.InvalidInput, 'Trailing bytes after the decoded item', {
      trailing: buf.length,
    });
  }
  return item;
}
