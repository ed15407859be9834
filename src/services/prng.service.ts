/**
 * PRNG Service - Seeded Random Source for Sampling
 *
 * SplitMix64 expands a 64-bit seed into the two state words of a
 * Xoroshiro128+ generator. The same seed always yields the same sequence,
 * which is what makes `--seed` runs replayable.
 *
 * References:
 * - SplitMix64: https://prng.di.unimi.it/splitmix64.c
 * - Xoroshiro128+: https://prng.di.unimi.it/xoroshiro128plus.c
 *
 * @example
 * ```typescript
 * const prng = new PRNG(12345n);
 * const index = prng.nextIndex(10);           // 0..9
 * const show = choice(prng, [101, 205, 330]); // one of the three
 * ```
 */

const UINT64_MAX = 0xffffffffffffffffn;
const UINT32_RANGE = 0x100000000;
const SPLITMIX64_CONST_1 = 0xbf58476d1ce4e5b9n;
const SPLITMIX64_CONST_2 = 0x94d049bb133111ebn;
const XOROSHIRO_ROTL_A = 24n;
const XOROSHIRO_ROTL_B = 37n;
const XOROSHIRO_SHIFT = 16n;

/**
 * Anything that can pick a uniformly distributed index into a sequence.
 * The sampling engine depends on this, not on a concrete generator, so
 * tests can script the exact draws.
 */
export interface RandomSource {
  /**
   * Returns an integer in `[0, length)`.
   * @throws {RangeError} If length is not a positive integer
   */
  nextIndex(length: number): number;
}

/**
 * Picks one element of a non-empty array using the given random source.
 *
 * @throws {RangeError} If the array is empty
 */
export function choice<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot choose from empty array');
  }
  return items[random.nextIndex(items.length)];
}

function mix(value: bigint): bigint {
  let z = value & UINT64_MAX;
  z = ((z ^ (z >> 30n)) * SPLITMIX64_CONST_1) & UINT64_MAX;
  z = ((z ^ (z >> 27n)) * SPLITMIX64_CONST_2) & UINT64_MAX;
  return z ^ (z >> 31n);
}

/**
 * Xoroshiro128+ generator seeded through SplitMix64.
 */
export class PRNG implements RandomSource {
  private state0: bigint;
  private state1: bigint;

  /**
   * @param seed - 64-bit seed; wider values are truncated to their low 64 bits
   * @throws {TypeError} If seed is not a BigInt
   */
  constructor(seed: bigint) {
    if (typeof seed !== 'bigint') {
      throw new TypeError('seed must be a BigInt');
    }

    this.state0 = mix(seed);
    // Second word from the first so two nearby seeds diverge immediately
    this.state1 = mix(this.state0 + 1n);

    // All-zero state would only ever produce zeros
    if (this.state0 === 0n && this.state1 === 0n) {
      this.state1 = SPLITMIX64_CONST_1;
    }
  }

  private next(): bigint {
    const s0 = this.state0;
    let s1 = this.state1;
    const result = (s0 + s1) & UINT64_MAX;

    s1 ^= s0;
    this.state0 =
      (this.rotl(s0, XOROSHIRO_ROTL_A) ^ s1 ^ (s1 << XOROSHIRO_SHIFT)) &
      UINT64_MAX;
    this.state1 = this.rotl(s1, XOROSHIRO_ROTL_B);

    return result;
  }

  private rotl(x: bigint, k: bigint): bigint {
    return ((x << k) | (x >> (64n - k))) & UINT64_MAX;
  }

  /**
   * Upper 32 bits of the next output, in `[0, 2^32)`.
   */
  nextUint(): number {
    return Number(this.next() >> 32n) >>> 0;
  }

  /**
   * Float in `[0, 1)`.
   */
  nextFloat(): number {
    return this.nextUint() / UINT32_RANGE;
  }

  nextIndex(length: number): number {
    if (!Number.isInteger(length) || length <= 0) {
      throw new RangeError(`length must be a positive integer, got ${length}`);
    }
    return Math.floor(this.nextFloat() * length);
  }
}
