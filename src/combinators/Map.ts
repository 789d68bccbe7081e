import type { DecodeBuf } from '../DecodeBuf';
import { CodecError, ErrorKind } from '../errors';
import type { Decode } from '../codecs/Decode';

/**
 * Decoder converting each decoded item with `map`.
 */
export class MapDecoder<T, U> implements Decode<U> {
  private readonly decoder: Decode<T>;
  private readonly map: (item: T) => U;

  constructor(decoder: Decode<T>, map: (item: T) => U) {
    this.decoder = decoder;
    this.map = map;
  }

  decode(buf: DecodeBuf): U | undefined {
    const item = this.decoder.decode(buf);
    return item === undefined ? undefined : this.map(item);
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
 * Decoder converting each decoded item with a function that may throw.
 * Anything thrown that is not a `CodecError` becomes `InvalidInput`.
 */
export class TryMapDecoder<T, U> implements Decode<U> {
  private readonly decoder: Decode<T>;
  private readonly tryMap: (item: T) => U;

  constructor(decoder: Decode<T>, tryMap: (item: T) => U) {
    this.decoder = decoder;
    this.tryMap = tryMap;
  }

  decode(buf: DecodeBuf): U | undefined {
    const item = this.decoder.decode(buf);
    if (item === undefined) return undefined;
    try {
      return this.tryMap(item);
    } catch (e) {
      throw CodecError.from(e, ErrorKind.InvalidInput);
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
