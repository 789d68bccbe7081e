import type { DecodeBuf } from '../DecodeBuf';
import type { Eos } from '../Eos';
import { CodecError } from '../errors';
import type { Decode } from '../codecs/Decode';
import { awaitsEndOfStream, exactRequiringBytes, isExactBytesEncode, type Encode, type ExactBytesEncode } from '../codecs/Encode';

/** Rewrites an error raised by the wrapped codec. */
export type ErrorMapper = (error: CodecError) => CodecError;

/**
 * Decoder passing every error of the inner decoder through `mapErr`.
 */
export class MapErrDecoder<T> implements Decode<T> {
  private readonly decoder: Decode<T>;
  private readonly mapErr: ErrorMapper;

  constructor(decoder: Decode<T>, mapErr: ErrorMapper) {
    this.decoder = decoder;
    this.mapErr = mapErr;
  }

  decode(buf: DecodeBuf): T | undefined {
    try {
      return this.decoder.decode(buf);
    } catch (e) {
      throw this.mapErr(CodecError.from(e));
    }
  }

  hasTerminated(): boolean {
    return this.decoder.hasTerminated();
  }

  isIdle(): boolean {
    return this.decoder.isIdle();
  }

  requiringBytesHint(): number | undefined {
    return this.decoder.requiringBytesHint();
  }
}

/**
 * Encoder passing every error of the inner encoder through `mapErr`.
 */
export class MapErrEncoder<T> implements ExactBytesEncode<T> {
  private readonly encoder: Encode<T>;
  private readonly mapErr: ErrorMapper;

  constructor(encoder: Encode<T>, mapErr: ErrorMapper) {
    this.encoder = encoder;
    this.mapErr = mapErr;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    try {
      return this.encoder.encode(buf, eos);
    } catch (e) {
      throw this.mapErr(CodecError.from(e));
    }
  }

  startEncoding(item: T): void {
    try {
      this.encoder.startEncoding(item);
    } catch (e) {
      throw this.mapErr(CodecError.from(e));
    }
  }

  requiringBytesHint(): number | undefined {
    return this.encoder.requiringBytesHint();
  }

  requiringBytes(): number {
    return exactRequiringBytes(this.encoder);
  }

  isExact(): boolean {
    return isExactBytesEncode(this.encoder);
  }

  isAwaitingEos(): boolean {
    return awaitsEndOfStream(this.encoder);
  }

  isIdle(): boolean {
    return this.encoder.isIdle();
  }
}
