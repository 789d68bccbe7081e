import type { DecodeBuf } from '../DecodeBuf';
import type { Decode } from '../codecs/Decode';

/**
 * Decoder that is either the inner decoder or nothing at all.
 * When omitted, every call yields `null` without consuming a byte.
 */
export class OmitDecoder<T> implements Decode<T | null> {
  private readonly decoder: Decode<T> | undefined;

  constructor(decoder: Decode<T>, omit: boolean) {
    this.decoder = omit ? undefined : decoder;
  }

  /** Whether the inner decoder is skipped. */
  get omitted(): boolean {
    return this.decoder === undefined;
  }

  decode(buf: DecodeBuf): T | null | undefined {
    if (this.decoder === undefined) return null;
    return this.decoder.decode(buf);
  }

  hasTerminated(): boolean {
    return this.decoder !== undefined && this.decoder.hasTerminated();
  }

  isIdle(): boolean {
    return this.decoder === undefined || this.decoder.isIdle();
  }

  requiringBytesHint(): number | undefined {
    return this.decoder === undefined ? 0 : this.decoder.requiringBytesHint();
  }
}
