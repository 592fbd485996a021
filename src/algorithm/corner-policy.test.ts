/**
 * Corner Policy Tests
 */

import { placeCorners } from './corner-policy';
import { resolveOptions } from './config';
import { Footprint } from './footprint';
import { deriveSeed } from './seeding';
import { SQUARE_10, L_SHAPE } from '../../test/fixtures/footprints';
import { REFERENCE_SEED } from '../../test/fixtures/configs';

describe('placeCorners', () => {
  const square = new Footprint(SQUARE_10);

  it('should place one corner per vertex', () => {
    const corners = placeCorners({ footprint: square, floorIndex: 0, seed: REFERENCE_SEED, options: resolveOptions() });

    expect(corners.map(c => c.vertexIndex)).toEqual([0, 1, 2, 3]);
    expect(corners.map(c => c.position)).toEqual(SQUARE_10);
  });

  it('should record the neighbouring vertices', () => {
    const [first] = placeCorners({ footprint: square, floorIndex: 0, seed: REFERENCE_SEED, options: resolveOptions() });

    expect(first.previousPosition).toEqual({ x: 0, y: 10 });
    expect(first.nextPosition).toEqual({ x: 10, y: 0 });
  });

  it('should carry width, style and a derived seed', () => {
    const corners = placeCorners({
      footprint: square,
      floorIndex: 3,
      seed: REFERENCE_SEED,
      options: resolveOptions({ cornerWidth: 0.3, extras: { corner_style: 'quoin' } })
    });

    expect(corners[2].floorIndex).toBe(3);
    expect(corners[2].properties).toEqual({
      seed: deriveSeed(REFERENCE_SEED, 'corner', 2),
      width: 0.3,
      style: 'quoin'
    });
  });

  it('should handle concave footprints', () => {
    const corners = placeCorners({
      footprint: new Footprint(L_SHAPE),
      floorIndex: 0,
      seed: REFERENCE_SEED,
      options: resolveOptions()
    });

    expect(corners.length).toBe(6);
    expect(corners[3].position).toEqual({ x: 1, y: 1 });
  });

  it('should not depend on densities', () => {
    const sparse = placeCorners({ footprint: square, floorIndex: 0, seed: 9, options: resolveOptions({ doorDensity: 0 }) });
    const dense = placeCorners({ footprint: square, floorIndex: 0, seed: 9, options: resolveOptions({ windowDensity: 3 }) });
    expect(sparse).toEqual(dense);
  });
});
