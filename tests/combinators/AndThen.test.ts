import { DecodeBuf } from '../../src/DecodeBuf';
import { NumberDecoder, NumberFormats } from '../../src/codecs/NumberCodec';
import { Utf8Decoder } from '../../src/codecs/Utf8Codec';
import { AndThen } from '../../src/combinators/AndThen';
import { LengthDecoder } from '../../src/combinators/Length';
import { utf8 } from '../support';

function lengthPrefixedString(): AndThen<number, string> {
  return new AndThen(new NumberDecoder(NumberFormats.u8), size => new LengthDecoder(new Utf8Decoder(), size));
}

describe('AndThen', () => {
  it('decodes consecutive dependent items', () => {
    const decoder = lengthPrefixedString();
    const buf = DecodeBuf.withRemainingBytes(new Uint8Array([3, ...utf8('foo'), 2, ...utf8('hi')]), 0);
    expect(decoder.decode(buf)).toBe('foo');
    expect(decoder.isIdle()).toBe(true);
    expect(decoder.decode(buf)).toBe('hi');
    expect(buf.isEmpty()).toBe(true);
  });

  it('lets the second decoder span several windows', () => {
    const decoder = lengthPrefixedString();
    expect(decoder.decode(new DecodeBuf(new Uint8Array([3, ...utf8('f')])))).toBeUndefined();
    expect(decoder.isIdle()).toBe(false);
    expect(decoder.requiringBytesHint()).toBe(2);
    expect(decoder.decode(DecodeBuf.withRemainingBytes(utf8('oo'), 0))).toBe('foo');
  });
});
