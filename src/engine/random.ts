/**
 * Seeded random number generator for deterministic generation and simulation.
 *
 * One instance is shared by the generator, the world and every entity, so a
 * fixed seed and a fixed call order always replay the same run.
 */

import seedrandom from 'seedrandom';

export interface Weighted<T> {
  value: T;
  weight?: number;
}

export class Random {
  readonly seed: number;
  private prng: () => number;

  constructor(seed: number = Date.now()) {
    this.seed = seed;
    this.prng = seedrandom(String(seed));
  }

  next(): number {
    return this.prng();
  }

  /**
   * Integer in [min, max], both inclusive
   */
  nextInt(min: number, max: number): number {
    const lo = Math.ceil(min);
    const hi = Math.floor(max);
    if (hi < lo) return lo;
    return lo + Math.floor(this.next() * (hi - lo + 1));
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  choice<T>(array: readonly T[]): T {
    if (array.length === 0) {
      throw new Error('Cannot choose from empty array');
    }
    return array[Math.floor(this.next() * array.length)];
  }

  /**
   * Pick up to `count` distinct elements, in draw order.
   */
  sample<T>(array: readonly T[], count: number): T[] {
    const pool = [...array];
    const picked: T[] = [];
    const target = Math.min(Math.max(0, count), pool.length);
    while (picked.length < target) {
      const index = Math.floor(this.next() * pool.length);
      picked.push(pool[index]);
      pool.splice(index, 1);
    }
    return picked;
  }

  /**
   * Select with probability weight / sum(weights). A missing weight counts as
   * 1.0; if every weight is zero the pick is uniform.
   */
  weightedChoice<T>(entries: readonly Weighted<T>[]): T {
    if (entries.length === 0) {
      throw new Error('Cannot choose from empty array');
    }

    const weights = entries.map((entry) => entry.weight ?? 1);
    if (weights.some((weight) => weight < 0 || !Number.isFinite(weight))) {
      throw new RangeError('Weights must be finite and non-negative');
    }

    const total = weights.reduce((acc, weight) => acc + weight, 0);
    if (total === 0) {
      return this.choice(entries).value;
    }

    let roll = this.next() * total;
    for (let i = 0; i < entries.length; i++) {
      roll -= weights[i];
      if (roll < 0) return entries[i].value;
    }
    // Float drift can leave roll at exactly 0 after the last subtraction
    for (let i = entries.length - 1; i >= 0; i--) {
      if (weights[i] > 0) return entries[i].value;
    }
    return entries[entries.length - 1].value;
  }

  /**
   * Short hex identifier drawn from the seeded stream.
   */
  id(length: number = 8): string {
    let out = '';
    while (out.length < length) {
      out += Math.floor(this.next() * 16).toString(16);
    }
    return out;
  }
}
