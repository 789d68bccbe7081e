/**
 * Randomized chunk-boundary tests: decoding a byte sequence window by
 * window, split anywhere, gives the same items as decoding it at once, and
 * encoding into buffers of any size gives the same bytes.
 */

import { DecodeBuf } from '../src/DecodeBuf';
import { decodeFromBytes, encodeToBytes } from '../src/io';
import { DecodeExt, EncodeExt } from '../src/builders';
import type { Decode } from '../src/codecs/Decode';
import { NumberDecoder, NumberEncoder, NumberFormats } from '../src/codecs/NumberCodec';
import { Utf8Decoder, Utf8Encoder } from '../src/codecs/Utf8Codec';
import { Rng } from './generators/rng';

const FUZZ_ITERATIONS = Number(process.env.FUZZ_ITERATIONS) || 200;

const ALPHABET = ['a', 'b', 'z', '0', ' ', 'é', 'ß', '€', '😀'];

function stringDecoder(): DecodeExt<string> {
  return DecodeExt.of(new NumberDecoder(NumberFormats.u8)).andThen(size =>
    DecodeExt.of(new Utf8Decoder()).length(size),
  );
}

function stringEncoder(): EncodeExt<string> {
  return EncodeExt.of(new Utf8Encoder()).withPrefix(new NumberEncoder(NumberFormats.u8), body => body.requiringBytes());
}

/** Feed `chunks` one window at a time; the last window ends the stream. */
/** Feeds every chunk as an open window, then the end-of-stream as an empty one. */
function decodeChunks<T>(decoder: Decode<T>, chunks: Uint8Array[]): T[] {
  const items: T[] = [];
  const drain = (buf: DecodeBuf): void => {
    do {
      const item = decoder.decode(buf);
      if (item !== undefined) items.push(item);
    } while (!buf.isEmpty());
  };
  chunks.forEach(chunk => drain(new DecodeBuf(chunk)));
  if (!decoder.isIdle()) drain(DecodeBuf.eos());
  return items;
}

function concat(parts: Uint8Array[]): Uint8Array {
  const result = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

describe('chunk-boundary invariance', () => {
  it('decodes length-prefixed strings split at random points', () => {
    const rng = new Rng(42);
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const texts = Array.from({ length: rng.int(1, 6) }, () => rng.string(ALPHABET, 12));
      const bytes = concat(texts.map(text => encodeToBytes(stringEncoder(), text)));

      const whole = decodeChunks(stringDecoder(), [bytes]);
      const split = decodeChunks(stringDecoder(), rng.split(bytes, 5));
      expect(whole).toEqual(texts);
      expect(split).toEqual(texts);
    }
  });

  it('collects numbers split at random points', () => {
    const rng = new Rng(7);
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const values = Array.from({ length: rng.int(1, 10) }, () => rng.int(0, 0xffff));
      const bytes = encodeToBytes(EncodeExt.of(new NumberEncoder(NumberFormats.u16le)).repeat(), values);

      const decoder = DecodeExt.of(new NumberDecoder(NumberFormats.u16le)).collect();
      expect(decodeChunks(decoder, rng.split(bytes, 3))).toEqual([values]);
    }
  });

  it('encodes the same bytes whatever the chunk size', () => {
    const rng = new Rng(1234);
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const texts = Array.from({ length: rng.int(0, 5) }, () => rng.string(ALPHABET, 8));
      const encoder = stringEncoder().repeat();
      const expected = encodeToBytes(encoder, texts);
      const chunked = encodeToBytes(encoder, texts, { chunkSize: rng.int(1, 7) });
      expect(chunked).toEqual(expected);
    }
  });

  it('round-trips framed records', () => {
    const rng = new Rng(99);
    const encoder = EncodeExt.of(new NumberEncoder(NumberFormats.u32be)).chain(EncodeExt.of(new Utf8Encoder()));
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const record: [number, string] = [rng.int(0, 0xffffffff), rng.string(ALPHABET, 10)];
      const bytes = encodeToBytes(encoder, record);
      const decoder = DecodeExt.of(new NumberDecoder(NumberFormats.u32be)).chain(new Utf8Decoder());
      expect(decodeFromBytes(decoder, bytes)).toEqual(record);
    }
  });
});
