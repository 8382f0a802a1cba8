/**
 * Seeded random source.
 *
 * Every stochastic component owns one of these, created from an explicit
 * seed, so that episode traces are reproducible given (seed, parameters).
 * Math.random() is never used.
 */

import seedrandom from 'seedrandom';
import { InvalidArgumentError } from './errors.js';

export type RandomSeed = number | string;

export class SeededRandom {
  private readonly prng: seedrandom.PRNG;

  constructor(public readonly seed: RandomSeed) {
    this.prng = seedrandom(String(seed));
  }

  /** Uniform float in [0, 1) */
  next(): number {
    return this.prng();
  }

  /** Uniform integer in [0, n) */
  nextInt(n: number): number {
    return Math.floor(this.prng() * n);
  }

  /** Choose one element of a non-empty array */
  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new InvalidArgumentError('Cannot choose from an empty array');
    }
    return items[this.nextInt(items.length)];
  }
}
