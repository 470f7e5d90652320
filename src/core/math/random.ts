// src/core/math/random.ts
/**
 * Seeded random number generation
 */

import { Random, MersenneTwister19937 } from 'random-js';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private readonly random: Random;

  /**
   * @param seed - A single seed, or several integers mixed into one seed
   *   state. Omitted: seeded from the environment.
   */
  constructor(seed?: number | readonly number[]) {
    this.random = new Random(RNG.createEngine(seed));
  }

  private static createEngine(seed?: number | readonly number[]): MersenneTwister19937 {
    if (seed === undefined) {
      return MersenneTwister19937.autoSeed();
    }
    return typeof seed === 'number'
      ? MersenneTwister19937.seed(seed)
      : MersenneTwister19937.seedWithArray(seed);
  }

  /**
   * Uniform random in [min, max]
   */
  real(min: number, max: number): number {
    return this.random.real(min, max, true);
  }
}
