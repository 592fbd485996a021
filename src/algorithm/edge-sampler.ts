/**
 * Floor Elements - Edge Sampler
 *
 * Length-weighted random edge selection.
 */

import { GEOMETRY_EPSILON } from '../types/geometry';
import { Rng } from './seeding';

export class EdgeSampler {
  private readonly cumulative: number[];
  readonly totalLength: number;

  /**
   * @param lengths - Edge lengths in edge order. Lengths below epsilon
   *                  (and non-finite ones) get zero weight.
   */
  constructor(lengths: ReadonlyArray<number>) {
    this.cumulative = [];
    let total = 0;
    for (const length of lengths) {
      const weight = Number.isFinite(length) && length >= GEOMETRY_EPSILON ? length : 0;
      total += weight;
      this.cumulative.push(total);
    }
    this.totalLength = total;
  }

  /**
   * Draws one edge index with probability proportional to its length.
   * Consumes exactly one value from `rng`.
   *
   * @returns The edge index, or null when no edge has positive weight
   */
  sample(rng: Rng): number | null {
    if (this.totalLength < GEOMETRY_EPSILON) {
      return null;
    }

    const r = rng.next() * this.totalLength;
    for (let i = 0; i < this.cumulative.length; i++) {
      // Strict comparison: a zero-weight edge never owns any part of the range
      if (r < this.cumulative[i]) {
        return i;
      }
    }

    // Floating rounding at the top of the range
    for (let i = this.cumulative.length - 1; i >= 0; i--) {
      const previous = i === 0 ? 0 : this.cumulative[i - 1];
      if (this.cumulative[i] > previous) return i;
    }
    return null;
  }
}
