import { DecodeBuf } from '../../src/DecodeBuf';
import { Eos } from '../../src/Eos';
import { ErrorKind } from '../../src/errors';
import { encodeAll } from '../../src/io';
import { BytesDecoder } from '../../src/codecs/BytesCodec';
import { NumberEncoder, NumberFormats } from '../../src/codecs/NumberCodec';
import { Utf8Decoder, Utf8Encoder } from '../../src/codecs/Utf8Codec';
import { LengthDecoder, LengthEncoder } from '../../src/combinators/Length';
import { catchCodecError, utf8 } from '../support';

describe('LengthDecoder', () => {
  it('decodes fixed-size frames until the stream runs out', () => {
    const decoder = new LengthDecoder(new Utf8Decoder(), 3);
    const buf = DecodeBuf.withRemainingBytes(utf8('foobarba'), 0);
    expect(decoder.decode(buf)).toBe('foo');
    expect(decoder.decode(buf)).toBe('bar');

    const err = catchCodecError(() => decoder.decode(buf));
    expect(err.kind).toBe(ErrorKind.UnexpectedEos);
    expect(err.context).toEqual({ remainingBytes: 0, expectedRemaining: 1 });
  });

  it('assembles a frame across windows', () => {
    const decoder = new LengthDecoder(new Utf8Decoder(), 3);
    expect(decoder.decode(new DecodeBuf(utf8('f')))).toBeUndefined();
    expect(decoder.remainingBytes).toBe(2);
    expect(decoder.requiringBytesHint()).toBe(2);
    expect(decoder.isIdle()).toBe(false);
    expect(decoder.decode(DecodeBuf.withRemainingBytes(utf8('oo'), 0))).toBe('foo');
    expect(decoder.remainingBytes).toBe(3);
  });

  it('rejects an item shorter than the frame', () => {
    const decoder = new LengthDecoder(new BytesDecoder(2), 3);
    const err = catchCodecError(() => decoder.decode(DecodeBuf.withRemainingBytes(new Uint8Array([1, 2, 3]), 0)));
    expect(err.kind).toBe(ErrorKind.InvalidInput);
    expect(err.context).toEqual({ expectedBytes: 3, remainingBytes: 1 });
  });

  it('changes the frame size only between items', () => {
    const decoder = new LengthDecoder(new Utf8Decoder(), 3);
    decoder.setExpectedBytes(5);
    expect(decoder.expectedBytes).toBe(5);
    expect(decoder.decode(DecodeBuf.withRemainingBytes(utf8('hello'), 0))).toBe('hello');

    decoder.decode(new DecodeBuf(utf8('a')));
    expect(catchCodecError(() => decoder.setExpectedBytes(2)).kind).toBe(ErrorKind.Other);
  });
});

describe('LengthEncoder', () => {
  it('writes an item that fills the frame', () => {
    const encoder = new LengthEncoder(new Utf8Encoder(), 3);
    encoder.startEncoding('hey');
    expect(encoder.requiringBytes()).toBe(3);
    const output = new Uint8Array(4);
    expect(encodeAll(encoder, output)).toBe(3);
    expect(output).toEqual(new Uint8Array([104, 101, 121, 0]));
    expect(encoder.isIdle()).toBe(true);
  });

  it('stays usable after the inner encoder rejects an item', () => {
    const encoder = new LengthEncoder(new NumberEncoder(NumberFormats.u8), 1);
    expect(catchCodecError(() => encoder.startEncoding(300)).kind).toBe(ErrorKind.InvalidInput);
    expect(encoder.isIdle()).toBe(true);
    expect(encoder.remainingBytes).toBe(0);

    encoder.startEncoding(7);
    const output = new Uint8Array(1);
    expect(encodeAll(encoder, output)).toBe(1);
    expect(output).toEqual(new Uint8Array([7]));
  });

  it('rejects an item longer than the frame', () => {
    const encoder = new LengthEncoder(new Utf8Encoder(), 3);
    encoder.startEncoding('hello');
    expect(catchCodecError(() => encodeAll(encoder, new Uint8Array(4))).kind).toBe(ErrorKind.UnexpectedEos);
  });

  it('rejects an item shorter than the frame', () => {
    const encoder = new LengthEncoder(new Utf8Encoder(), 3);
    encoder.startEncoding('hi');
    const err = catchCodecError(() => encodeAll(encoder, new Uint8Array(4)));
    expect(err.kind).toBe(ErrorKind.InvalidInput);
    expect(err.context).toEqual({ expectedBytes: 3, remainingBytes: 1 });
  });

  it('writes a frame across buffers', () => {
    const encoder = new LengthEncoder(new Utf8Encoder(), 3);
    encoder.startEncoding('hey');
    expect(encoder.encode(new Uint8Array(2), Eos.notReached())).toBe(2);
    expect(encoder.remainingBytes).toBe(1);
    expect(encoder.encode(new Uint8Array(2), Eos.reached())).toBe(1);
    expect(encoder.isIdle()).toBe(true);
  });

  it('fails when the last buffer cannot hold the frame', () => {
    const encoder = new LengthEncoder(new Utf8Encoder(), 3);
    encoder.startEncoding('hey');
    expect(catchCodecError(() => encoder.encode(new Uint8Array(2), Eos.reached())).kind).toBe(ErrorKind.UnexpectedEos);
  });

  it('can be reused for the next item', () => {
    const encoder = new LengthEncoder(new Utf8Encoder(), 3);
    encoder.startEncoding('hey');
    encodeAll(encoder, new Uint8Array(3));
    encoder.startEncoding('you');
    const output = new Uint8Array(3);
    encodeAll(encoder, output);
    expect(output).toEqual(utf8('you'));
  });

  it('guards the frame size and the current item', () => {
    const encoder = new LengthEncoder(new Utf8Encoder(), 3);
    encoder.setExpectedBytes(2);
    expect(encoder.expectedBytes).toBe(2);
    encoder.startEncoding('hi');
    expect(catchCodecError(() => encoder.startEncoding('yo')).kind).toBe(ErrorKind.EncoderFull);
    expect(catchCodecError(() => encoder.setExpectedBytes(4)).kind).toBe(ErrorKind.Other);
  });
});
