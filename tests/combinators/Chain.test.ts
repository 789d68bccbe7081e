import { DecodeBuf } from '../../src/DecodeBuf';
import { ErrorKind } from '../../src/errors';
import { decodeFromBytes, encodeToBytes } from '../../src/io';
import { NumberDecoder, NumberEncoder, NumberFormats } from '../../src/codecs/NumberCodec';
import { Utf8Decoder, Utf8Encoder } from '../../src/codecs/Utf8Codec';
import { DecoderChain, EncoderChain } from '../../src/combinators/Chain';
import { catchCodecError, utf8 } from '../support';

describe('DecoderChain', () => {
  it('decodes a pair', () => {
    const decoder = new DecoderChain(new NumberDecoder(NumberFormats.u8), new NumberDecoder(NumberFormats.u16be));
    expect(decodeFromBytes(decoder, new Uint8Array([1, 0, 2]))).toEqual([1, 2]);
  });

  it('keeps the first item across windows', () => {
    const decoder = new DecoderChain(new NumberDecoder(NumberFormats.u8), new NumberDecoder(NumberFormats.u16be));
    expect(decoder.requiringBytesHint()).toBe(3);
    expect(decoder.decode(new DecodeBuf(new Uint8Array([1])))).toBeUndefined();
    expect(decoder.isIdle()).toBe(false);
    expect(decoder.requiringBytesHint()).toBe(2);
    expect(decoder.decode(new DecodeBuf(new Uint8Array([0, 2])))).toEqual([1, 2]);
    expect(decoder.isIdle()).toBe(true);
  });

  it('ends with a body read to end-of-stream', () => {
    const decoder = new DecoderChain(new NumberDecoder(NumberFormats.u8), new Utf8Decoder());
    expect(decodeFromBytes(decoder, new Uint8Array([7, ...utf8('hi')]))).toEqual([7, 'hi']);
  });
});

describe('EncoderChain', () => {
  it('writes both items in order', () => {
    const encoder = new EncoderChain(new NumberEncoder(NumberFormats.u8), new Utf8Encoder());
    expect(encodeToBytes(encoder, [3, 'hey'])).toEqual(new Uint8Array([3, ...utf8('hey')]));
  });

  it('knows the exact length of the pair', () => {
    const encoder = new EncoderChain(new NumberEncoder(NumberFormats.u8), new Utf8Encoder());
    encoder.startEncoding([3, 'hey']);
    expect(encoder.requiringBytes()).toBe(4);
    expect(catchCodecError(() => encoder.startEncoding([1, 'a'])).kind).toBe(ErrorKind.EncoderFull);
  });
});
