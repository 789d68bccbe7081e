import type { DecodeBuf } from '../DecodeBuf';
import { CodecError, ErrorKind } from '../errors';
import type { Decode } from '../codecs/Decode';

/**
 * Decoder rejecting items for which `predicate` returns false.
 */
export class Assert<T> implements Decode<T> {
  private readonly decoder: Decode<T>;
  private readonly predicate: (item: T) => boolean;

  constructor(decoder: Decode<T>, predicate: (item: T) => boolean) {
    this.decoder = decoder;
    this.predicate = predicate;
  }

  decode(buf: DecodeBuf): T | undefined {
    const item = this.decoder.decode(buf);
    if (item !== undefined && !this.predicate(item)) {
      throw new CodecError(ErrorKind.InvalidInput, 'Decoded item failed the assertion', {
        context: { item },
      });
    }
    return item;
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
 * Decoder running `validate` on each item; the item is rejected when it throws.
 * Anything thrown that is not a `CodecError` becomes `InvalidInput`.
 */
export class Validate<T> implements Decode<T> {
  private readonly decoder: Decode<T>;
  private readonly validate: (item: T) => void;

  constructor(decoder: Decode<T>, validate: (item: T) => void) {
    this.decoder = decoder;
    this.validate = validate;
  }

  decode(buf: DecodeBuf): T | undefined {
    const item = this.decoder.decode(buf);
    if (item !== undefined) {
      try {
        this.validate(item);
      } catch (e) {
        throw CodecError.from(e, ErrorKind.InvalidInput);
      }
    }
    return item;
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
