/**
 * Seedable randomness for the Random strategy
 *
 * Every consumer receives its source explicitly; nothing in the core touches
 * Math.random, so sweeps replay exactly and scenarios can run in any order.
 */

import seedrandom from 'seedrandom';

export interface RandomSource {
  /** Uniform in [0, 1) */
  next(): number;
  /** Uniform pick; items must be non-empty */
  choice<T>(items: readonly T[]): T;
}

class SeededRandom implements RandomSource {
  private readonly prng: seedrandom.PRNG;

  constructor(seed: string) {
    this.prng = seedrandom(seed);
  }

  next(): number {
    return this.prng();
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    return items[Math.floor(this.next() * items.length)];
  }
}

export function createRandomSource(seed: number | string): RandomSource {
  return new SeededRandom(String(seed));
}

/**
 * Independent source for one scenario of a sweep, derived from the sweep seed
 */
export function scenarioRandomSource(baseSeed: number, scenarioId: number): RandomSource {
  return createRandomSource(`${baseSeed}:${scenarioId}`);
}
