import type { Eos } from '../Eos';
import { ErrorKind, assertCodec } from '../errors';
import type { EncodeToBytesOptions } from '../io';
import { encodeToBytes } from '../io';
import { getCodecLogger } from '../logger';
import { BytesEncoder } from '../codecs/BytesCodec';
import type { Encode, ExactBytesEncode } from '../codecs/Encode';

const logger = getCodecLogger('pre-encode');

/**
 * Encoder serializing the whole item into memory when encoding starts.
 * Errors of the inner encoder are thrown by `startEncoding`, and the exact
 * length is known from then on.
 */
export class PreEncode<T> implements ExactBytesEncode<T> {
  private readonly encoder: Encode<T>;
  private readonly options: EncodeToBytesOptions;
  private readonly preEncoded = new BytesEncoder();

  constructor(encoder: Encode<T>, options: EncodeToBytesOptions = {}) {
    this.encoder = encoder;
    this.options = options;
  }

  encode(buf: Uint8Array, eos: Eos): number {
    return this.preEncoded.encode(buf, eos);
  }

  startEncoding(item: T): void {
    assertCodec(this.isIdle(), ErrorKind.EncoderFull, 'PreEncode: an item is being encoded');
    const bytes = encodeToBytes(this.encoder, item, this.options);
    logger.debug('Pre-encoded {size} bytes.', { size: bytes.length });
    this.preEncoded.startEncoding(bytes);
  }

  requiringBytesHint(): number | undefined {
    return this.requiringBytes();
  }

  requiringBytes(): number {
    return this.preEncoded.requiringBytes();
  }

  isExact(): boolean {
    return true;
  }

  isIdle(): boolean {
    return this.preEncoded.isIdle();
  }
}
