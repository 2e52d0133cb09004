/**
 * Seeded random number generator for reproducible sequences.
 */
export class SeededRandom {
  private seed: number

  constructor(seed: number) {
    // Keep the state a non-negative 32-bit integer
    this.seed = ((seed % 4294967296) + 4294967296) % 4294967296
  }

  /**
   * Get next random number between 0 and 1.
   */
  next(): number {
    // Simple LCG (Linear Congruential Generator)
    this.seed = (this.seed * 1664525 + 1013904223) % 4294967296
    return this.seed / 4294967296
  }

  /**
   * Get random integer in range [min, max].
   */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min
  }

  /**
   * Get random bigint in range [min, max]. The range must fit a safe integer.
   */
  bigint(min: bigint, max: bigint): bigint {
    return min + BigInt(this.int(0, Number(max - min)))
  }

  /**
   * Pick random element from a non-empty array.
   */
  pick<T>(arr: ReadonlyArray<T>): T {
    const item = arr[this.int(0, arr.length - 1)]
    if (item === undefined) {
      throw new Error(`Cannot pick from an empty array`)
    }
    return item
  }

  /**
   * Return true with given probability.
   */
  chance(probability: number): boolean {
    return this.next() < probability
  }

  /**
   * Generate random string.
   */
  string(length: number): string {
    const chars = `abcdefghijklmnopqrstuvwxyz0123456789`
    let result = ``
    for (let i = 0; i < length; i++) {
      result += chars.charAt(this.int(0, chars.length - 1))
    }
    return result
  }
}
