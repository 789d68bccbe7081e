import type { DecodeBuf } from '../DecodeBuf';
import { ErrorKind, assertCodec } from '../errors';
import { getCodecLogger } from '../logger';
import type { Decode } from '../codecs/Decode';

const logger = getCodecLogger('skip-remaining');

/**
 * Decoder that, once the inner decoder has produced an item, discards
 * every byte up to end-of-stream and only then yields the item.
 * The remaining bytes hint must be known.
 */
export class SkipRemaining<T> implements Decode<T> {
  private readonly decoder: Decode<T>;
  private item: T | undefined;
  private skipped = 0;

  constructor(decoder: Decode<T>) {
    this.decoder = decoder;
  }

  decode(buf: DecodeBuf): T | undefined {
    assertCodec(
      buf.remainingBytes !== undefined,
      ErrorKind.InvalidInput,
      'SkipRemaining: cannot skip the rest of a stream of unknown length',
    );

    if (this.item === undefined) {
      this.item = this.decoder.decode(buf);
    }
    if (this.item === undefined) return undefined;

    this.skipped += buf.length;
    buf.consumeAll();
    if (!buf.isEos()) return undefined;

    const item = this.item;
    logger.trace('Skipped {skipped} trailing byte(s).', { skipped: this.skipped });
    this.item = undefined;
    this.skipped = 0;
    return item;
  }

  hasTerminated(): boolean {
    return this.item === undefined && this.decoder.hasTerminated();
  }

  isIdle(): boolean {
    return this.item === undefined && this.decoder.isIdle();
  }

  requiringBytesHint(): number | undefined {
    return this.item === undefined ? this.decoder.requiringBytesHint() : undefined;
  }
}
