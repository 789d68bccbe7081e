import type { DecodeBuf } from '../DecodeBuf';
import type { Decode } from '../codecs/Decode';

/**
 * Decoder for dependent items: decodes an item with the first decoder,
 * builds a second decoder from it with `andThen`, and yields the second
 * decoder's item.
 *
 * Afterwards it waits for the next item of the first decoder again.
 */
export class AndThen<T, U> implements Decode<U> {
  private readonly decoder0: Decode<T>;
  private readonly andThen: (item: T) => Decode<U>;
  private decoder1: Decode<U> | undefined;

  constructor(decoder: Decode<T>, andThen: (item: T) => Decode<U>) {
    this.decoder0 = decoder;
    this.andThen = andThen;
  }

  decode(buf: DecodeBuf): U | undefined {
    for (;;) {
      if (this.decoder1 !== undefined) {
        const item = this.decoder1.decode(buf);
        if (item !== undefined) {
          this.decoder1 = undefined;
        }
        return item;
      }
      const first = this.decoder0.decode(buf);
      if (first === undefined) return undefined;
      this.decoder1 = this.andThen(first);
    }
  }

  hasTerminated(): boolean {
    return this.decoder1 !== undefined ? this.decoder1.hasTerminated() : this.decoder0.hasTerminated();
  }

  isIdle(): boolean {
    return this.decoder1 === undefined && this.decoder0.isIdle();
  }

  requiringBytesHint(): number | undefined {
    return this.decoder1 !== undefined ? this.decoder1.requiringBytesHint() : this.decoder0.requiringBytesHint();
  }
}
