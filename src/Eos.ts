import { ByteCount } from './ByteCount';

/**
 * End-of-stream marker passed to every `Encode.encode` call.
 *
 * Carries the number of bytes that will still be accepted after the buffer
 * of the current call. The end is reached when that number is exactly 0,
 * i.e. the current buffer is the last one the encoder will get.
 */
export class Eos {
  readonly remainingBytes: ByteCount;

  private constructor(remainingBytes: ByteCount) {
    this.remainingBytes = remainingBytes;
  }

  static of(reached: boolean): Eos {
    return new Eos(reached ? ByteCount.finite(0) : ByteCount.UNKNOWN);
  }

  static reached(): Eos {
    return Eos.of(true);
  }

  static notReached(): Eos {
    return Eos.of(false);
  }

  static withRemainingBytes(remainingBytes: ByteCount): Eos {
    return new Eos(remainingBytes);
  }

  isReached(): boolean {
    return this.remainingBytes.toNumber() === 0;
  }

  /**
   * Marker for a callee that writes into the front of the caller's buffer
   * while `bytes` bytes of that buffer stay reserved after it.
   */
  back(bytes: number): Eos {
    return bytes === 0 ? this : new Eos(this.remainingBytes.add(bytes));
  }
}
