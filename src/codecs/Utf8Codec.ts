import type { DecodeBuf } from '../DecodeBuf';
import type { Eos } from '../Eos';
import { CodecError, ErrorKind } from '../errors';
import { BytesEncoder, RemainingBytesDecoder } from './BytesCodec';
import type { Decode } from './Decode';
import type { ExactBytesEncode } from './Encode';

/**
 * UTF-8 string encoder.
 * The string is converted to bytes once, when encoding starts.
 */
export class Utf8Encoder implements ExactBytesEncode<string> {
  private readonly bytes = new BytesEncoder();
  private readonly textEncoder = new TextEncoder();

  encode(buf: Uint8Array, eos: Eos): number {
    return this.bytes.encode(buf, eos);
  }

  startEncoding(item: string): void {
    this.bytes.startEncoding(this.textEncoder.encode(item));
  }

  requiringBytesHint(): number | undefined {
    return this.bytes.requiringBytesHint();
  }

  requiringBytes(): number {
    return this.bytes.requiringBytes();
  }

  isExact(): boolean {
    return true;
  }

  isIdle(): boolean {
    return this.bytes.isIdle();
  }
}

/**
 * UTF-8 string decoder reading every byte until end-of-stream.
 * Malformed UTF-8 is `InvalidInput`.
 */
export class Utf8Decoder implements Decode<string> {
  private readonly bytes = new RemainingBytesDecoder();
  private readonly textDecoder = new TextDecoder('utf-8', { fatal: true });

  decode(buf: DecodeBuf): string | undefined {
    const bytes = this.bytes.decode(buf);
    if (bytes === undefined) return undefined;
    try {
      return this.textDecoder.decode(bytes);
    } catch (e) {
      throw new CodecError(ErrorKind.InvalidInput, 'Utf8Decoder: malformed UTF-8', {
        context: { length: bytes.length },
        cause: e,
      });
    }
  }

  hasTerminated(): boolean {
    return this.bytes.hasTerminated();
  }

  isIdle(): boolean {
    return this.bytes.isIdle();
  }

  requiringBytesHint(): number | undefined {
    return this.bytes.requiringBytesHint();
  }
}
