import { CodecError, ErrorKind, assertCodec, isCodecError } from '../src/errors';
import { catchCodecError } from './support';

describe('CodecError', () => {
  it('carries a kind and a context', () => {
    const err = new CodecError(ErrorKind.InvalidInput, 'bad byte', { context: { byte: 7 } });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('CodecError');
    expect(err.kind).toBe(ErrorKind.InvalidInput);
    expect(err.message).toBe('bad byte');
    expect(err.context).toEqual({ byte: 7 });
    expect(new CodecError(ErrorKind.Other, 'x').context).toEqual({});
  });

  describe('from', () => {
    it('returns a CodecError unchanged', () => {
      const err = new CodecError(ErrorKind.Other, 'x');
      expect(CodecError.from(err, ErrorKind.InvalidInput)).toBe(err);
    });

    it('wraps an Error with the given kind', () => {
      const cause = new Error('boom');
      const err = CodecError.from(cause, ErrorKind.InvalidInput);
      expect(err.kind).toBe(ErrorKind.InvalidInput);
      expect(err.message).toBe('boom');
      expect(err.cause).toBe(cause);
    });

    it('wraps other thrown values as Other', () => {
      const err = CodecError.from('text');
      expect(err.kind).toBe(ErrorKind.Other);
      expect(err.message).toBe('text');
    });
  });

  it('merges context into a copy', () => {
    const err = new CodecError(ErrorKind.Other, 'm', { context: { a: 1 } });
    const copy = err.withContext({ b: 2 });
    expect(copy.context).toEqual({ a: 1, b: 2 });
    expect(copy.kind).toBe(ErrorKind.Other);
    expect(err.context).toEqual({ a: 1 });
  });
});

describe('assertCodec', () => {
  it('throws when the condition fails', () => {
    const err = catchCodecError(() => assertCodec(false, ErrorKind.EncoderFull, 'busy', { pending: 2 }));
    expect(err.kind).toBe(ErrorKind.EncoderFull);
    expect(err.message).toBe('busy');
    expect(err.context).toEqual({ pending: 2 });
  });

  it('does nothing when the condition holds', () => {
    expect(() => assertCodec(true, ErrorKind.Other, 'unused')).not.toThrow();
  });
});

describe('isCodecError', () => {
  it('checks the kind when given', () => {
    const err = new CodecError(ErrorKind.UnexpectedEos, 'eos');
    expect(isCodecError(err)).toBe(true);
    expect(isCodecError(err, ErrorKind.UnexpectedEos)).toBe(true);
    expect(isCodecError(err, ErrorKind.Other)).toBe(false);
    expect(isCodecError(new Error('eos'))).toBe(false);
  });
});
