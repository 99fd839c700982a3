/**
 * Deterministic seeded random number generator using xorshift32 algorithm.
 * Every random decision in a session (spawn points, speeds, spins) draws from
 * one instance so a seed reproduces the whole run.
 */
export class SeededRandom {
  private state: number

  constructor(seed: number) {
    this.state = seed >>> 0 || 1
  }

  /**
   * Returns a random float between 0 (inclusive) and 1 (exclusive)
   */
  next(): number {
    let x = this.state
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    this.state = x >>> 0
    return this.state / 0x100000000
  }

  /**
   * Returns a random integer from 0 (inclusive) to max (exclusive)
   */
  nextInt(max: number): number {
    return Math.floor(this.next() * max)
  }

  /**
   * Returns a random integer in [start, stop), like a half-open range
   */
  nextIntBetween(start: number, stop: number): number {
    if (stop <= start) return start
    return start + this.nextInt(stop - start)
  }

  /**
   * Returns a random boolean with given probability of true (default 0.5)
   */
  nextBool(probability = 0.5): boolean {
    return this.next() < probability
  }

  /**
   * Returns a random element from an array
   */
  pick<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined
    return array[this.nextInt(array.length)]
  }

  /**
   * Returns the current internal state
   */
  getSeed(): number {
    return this.state
  }
}
