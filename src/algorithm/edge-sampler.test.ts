/**
 * Edge Sampler Tests
 */

import { EdgeSampler } from './edge-sampler';
import { Rng, createRng } from './seeding';

function fixedRng(value: number): Rng {
  return {
    next: () => value,
    uniform: (min, max) => min + (max - min) * value
  };
}

describe('EdgeSampler', () => {
  const sampler = new EdgeSampler([0, 4, 0, 6]);

  it('should sum the edge lengths', () => {
    expect(sampler.totalLength).toBe(10);
  });

  it('should map the low part of the range to the first non-empty edge', () => {
    expect(sampler.sample(fixedRng(0))).toBe(1);
    expect(sampler.sample(fixedRng(0.39999))).toBe(1);
  });

  it('should map the rest of the range to the last edge', () => {
    expect(sampler.sample(fixedRng(0.4))).toBe(3);
    expect(sampler.sample(fixedRng(0.99))).toBe(3);
  });

  it('should never pick a zero-length edge', () => {
    const rng = createRng(31337);
    for (let i = 0; i < 500; i++) {
      const index = sampler.sample(rng);
      expect(index === 1 || index === 3).toBe(true);
    }
  });

  it('should give non-finite lengths zero weight', () => {
    const withNaN = new EdgeSampler([NaN, 5]);
    expect(withNaN.totalLength).toBe(5);
    expect(withNaN.sample(fixedRng(0))).toBe(1);
  });

  it('should return null when every edge is degenerate', () => {
    const empty = new EdgeSampler([0, 0, 0]);
    expect(empty.sample(createRng(1))).toBeNull();
  });

  it('should return null for no edges', () => {
    expect(new EdgeSampler([]).sample(createRng(1))).toBeNull();
  });
});
