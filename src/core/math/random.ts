/**
 * Seeded random number generation for resampling procedures
 */

import { Random, MersenneTwister19937 } from 'random-js';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private readonly random: Random;

  constructor(seed?: number) {
    const engine =
      seed !== undefined ? MersenneTwister19937.seed(seed) : MersenneTwister19937.autoSeed();
    this.random = new Random(engine);
  }

  /**
   * Fisher-Yates shuffle of a copy; the input is left untouched
   */
  shuffle<T>(items: readonly T[]): T[] {
    return this.random.shuffle([...items]);
  }

  /**
   * Random permutation of the characters of a string
   */
  shuffleString(value: string): string {
    if (value.length < 2) return value;
    return this.shuffle(value.split('')).join('');
  }
}
