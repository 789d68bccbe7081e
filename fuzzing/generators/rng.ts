/** PRNG with seedable state for reproducible fuzzing. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    // xorshift32
    this.state ^= this.state << 13;
    this.state ^= this.state >> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns a string of up to `maxLength` characters drawn from `alphabet`. */
  string(alphabet: readonly string[], maxLength: number): string {
    let result = '';
    const length = this.int(0, maxLength);
    for (let i = 0; i < length; i++) {
      result += this.pick(alphabet);
    }
    return result;
  }

  /**
   * Splits `bytes` into consecutive non-empty chunks of at most
   * `maxChunk` bytes each.
   */
  split(bytes: Uint8Array, maxChunk: number): Uint8Array[] {
    const chunks: Uint8Array[] = [];
    let offset = 0;
    while (offset < bytes.length) {
      const size = this.int(1, maxChunk);
      chunks.push(bytes.subarray(offset, offset + size));
      offset += size;
    }
    return chunks;
  }
}
