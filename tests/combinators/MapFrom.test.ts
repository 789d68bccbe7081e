import { ErrorKind } from '../../src/errors';
import { encodeToBytes } from '../../src/io';
import { NumberEncoder, NumberFormats } from '../../src/codecs/NumberCodec';
import { MapFrom, TryMapFrom } from '../../src/combinators/MapFrom';
import { catchCodecError } from '../support';

describe('MapFrom', () => {
  it('converts items before encoding', () => {
    const encoder = new MapFrom(new NumberEncoder(NumberFormats.u8), (text: string) => text.length);
    expect(encodeToBytes(encoder, 'abc')).toEqual(new Uint8Array([3]));
  });

  it('keeps the exact byte count of the inner encoder', () => {
    const encoder = new MapFrom(new NumberEncoder(NumberFormats.u16be), (flag: boolean) => (flag ? 1 : 0));
    encoder.startEncoding(true);
    expect(encoder.requiringBytes()).toBe(2);
  });
});

describe('TryMapFrom', () => {
  const encoder = new TryMapFrom(new NumberEncoder(NumberFormats.u8), (text: string) => {
    const n = Number(text);
    if (Number.isNaN(n)) throw new Error(`not a number: ${text}`);
    return n;
  });

  it('encodes converted items', () => {
    expect(encodeToBytes(encoder, '7')).toEqual(new Uint8Array([7]));
  });

  it('turns a thrown Error into InvalidInput', () => {
    const err = catchCodecError(() => encoder.startEncoding('x'));
    expect(err.kind).toBe(ErrorKind.InvalidInput);
    expect(err.message).toBe('not a number: x');
    expect(encoder.isIdle()).toBe(true);
  });
});
