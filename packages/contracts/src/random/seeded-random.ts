import { choice, index, type RandomSource, range, shuffle } from "./rng";

/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * - 32-bit operations only, four words of state seeded through SplitMix32
 * - `next()` returns a double in [0, 1)
 * - State can be saved and restored to replay a generation exactly
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * State type for xoshiro128++ (4 x 32-bit words)
 */
export type RngState = readonly [number, number, number, number];

export class SeededRandom implements RandomSource {
  readonly seed: number;
  private s0: number;
  private s1: number;
  private s2: number;
  private s3: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    const mix = splitmix32(this.seed);
    this.s0 = mix();
    this.s1 = mix();
    this.s2 = mix();
    this.s3 = mix();

    // xoshiro needs at least one non-zero word
    if ((this.s0 | this.s1 | this.s2 | this.s3) === 0) {
      this.s0 = 1;
    }

    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const result = (rotl((this.s0 + this.s3) >>> 0, 7) + this.s0) >>> 0;
    const t = (this.s1 << 9) >>> 0;

    this.s2 = (this.s2 ^ this.s0) >>> 0;
    this.s3 = (this.s3 ^ this.s1) >>> 0;
    this.s1 = (this.s1 ^ this.s2) >>> 0;
    this.s0 = (this.s0 ^ this.s3) >>> 0;

    this.s2 = (this.s2 ^ t) >>> 0;
    this.s3 = rotl(this.s3, 11);

    return result;
  }

  /**
   * Next double in [0, 1)
   */
  next(): number {
    return this.next32() / 0x100000000;
  }

  /**
   * Random integer between min and max (inclusive)
   */
  range(min: number, max: number): number {
    return range(this, min, max);
  }

  /**
   * Uniform index in [0, length)
   */
  index(length: number): number {
    return index(this, length);
  }

  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    return choice(this, array);
  }

  /**
   * Fisher-Yates shuffle; the input is left untouched.
   */
  shuffle<T>(array: readonly T[]): T[] {
    return shuffle(this, array);
  }

  /**
   * Independent generator seeded from this one's next output.
   */
  fork(): SeededRandom {
    return new SeededRandom(this.next32());
  }

  getState(): RngState {
    return [this.s0, this.s1, this.s2, this.s3];
  }

  setState(state: RngState): void {
    this.s0 = state[0] >>> 0;
    this.s1 = state[1] >>> 0;
    this.s2 = state[2] >>> 0;
    this.s3 = state[3] >>> 0;
  }
}
