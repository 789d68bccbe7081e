import type { DecodeBuf } from '../DecodeBuf';
import { ErrorKind, assertCodec } from '../errors';
import { getCodecLogger } from '../logger';
import type { Decode } from '../codecs/Decode';

const logger = getCodecLogger('collect');

/** How decoded items are gathered into a container. */
export interface Collector<T, C> {
  create(): C;
  add(container: C, item: T): void;
}

/** Collects items into an array. */
export function arrayCollector<T>(): Collector<T, T[]> {
  return {
    create: () => [],
    add: (container, item) => {
      container.push(item);
    },
  };
}

/**
 * Decoder of one aggregate item: runs the inner decoder until it
 * terminates or the stream ends, gathering its items with `collector`.
 *
 * One-shot: once the aggregate has been returned, the decoder has terminated.
 */
export class Collect<T, C> implements Decode<C> {
  private readonly decoder: Decode<T>;
  private readonly collector: Collector<T, C>;
  private items: C | undefined;
  private count = 0;
  private done = false;

  constructor(decoder: Decode<T>, collector: Collector<T, C>) {
    this.decoder = decoder;
    this.collector = collector;
  }

  decode(buf: DecodeBuf): C | undefined {
    assertCodec(!this.done, ErrorKind.DecoderTerminated, 'Collect: the aggregate has already been decoded');

    // Initialized right here when absent; the local alias is never undefined.
    const items = this.items ?? this.collector.create();
    this.items = items;

    while (!this.decoder.hasTerminated()) {
      // At end-of-stream a partial item is handed back to the inner decoder to finish or reject.
      const atEnd = buf.isEmpty() && buf.isEos();
      if (atEnd && this.decoder.isIdle()) break;

      const item = this.decoder.decode(buf);
      if (item === undefined) {
        if (this.decoder.hasTerminated()) break;
        assertCodec(!atEnd, ErrorKind.UnexpectedEos, 'Collect: stream ended inside an item', { count: this.count });
        return undefined;
      }
      this.collector.add(items, item);
      this.count++;
    }

    logger.trace('Collected {count} item(s).', { count: this.count });
    this.items = undefined;
    this.count = 0;
    this.done = true;
    return items;
  }

  hasTerminated(): boolean {
    return this.done;
  }

  isIdle(): boolean {
    return this.items === undefined;
  }

  requiringBytesHint(): number | undefined {
    return this.done ? 0 : this.decoder.requiringBytesHint();
  }
}
