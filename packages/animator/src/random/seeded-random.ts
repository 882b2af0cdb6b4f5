/**
 * Source of uniform numbers in [0, 1)
 */
export interface RandomSource {
  next(): number;
}

/**
 * Deterministic pseudo-random number generator using xorshift128+
 */
export class SeededRandom implements RandomSource {
  private s0: bigint;
  private s1: bigint;

  constructor(seed: bigint) {
    // Initialize state from seed using splitmix64
    let state = seed;

    state = ((state ^ (state >> 30n)) * 0xbf58476d1ce4e5b9n) & 0xffffffffffffffffn;
    this.s0 = state;

    state = ((state ^ (state >> 30n)) * 0x94d049bb133111ebn) & 0xffffffffffffffffn;
    this.s1 = state;
  }

  /**
   * Generate next random number in [0, 1)
   */
  next(): number {
    const result = (this.s0 + this.s1) & 0xffffffffffffffffn;

    const s1 = this.s0 ^ this.s1;
    this.s0 = ((this.s0 << 55n) | (this.s0 >> 9n)) ^ s1 ^ (s1 << 14n);
    this.s0 = this.s0 & 0xffffffffffffffffn;
    this.s1 = ((s1 << 36n) | (s1 >> 28n)) & 0xffffffffffffffffn;

    return Number(result & 0x1fffffffffffffn) / 0x20000000000000;
  }
}

/**
 * Integer in [min, max]
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(random.next() * (max - min + 1)) + min;
}

/**
 * Uniformly chosen element, or undefined for an empty list
 */
export function pick<T>(random: RandomSource, items: ArrayLike<T>): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.floor(random.next() * items.length)];
}
