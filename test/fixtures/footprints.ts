/**
 * Test Fixtures - Footprint Outlines
 *
 * Raw vertex lists for testing element placement.
 * All dimensions are in meters.
 */

import { Point } from '../../src/types/geometry';

/**
 * 10m x 10m square, counter-clockwise. Perimeter 40m.
 */
export const SQUARE_10: Point[] = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 }
];

/**
 * Same square listed clockwise
 */
export const SQUARE_10_CLOCKWISE: Point[] = [
  { x: 0, y: 0 },
  { x: 0, y: 10 },
  { x: 10, y: 10 },
  { x: 10, y: 0 }
];

/**
 * Concave L-shape, 12m x 12m with a 5m x 5m notch. Perimeter 48m.
 */
export const L_SHAPE: Point[] = [
  { x: -6, y: -6 },
  { x: 6, y: -6 },
  { x: 6, y: 1 },
  { x: 1, y: 1 },
  { x: 1, y: 6 },
  { x: -6, y: 6 }
];

/**
 * Square with its left side split so that the last edge
 * (0,0.4) → (0,0) is only 0.4m long. Perimeter 40m.
 */
export const SHORT_EDGE_PENTAGON: Point[] = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 },
  { x: 0, y: 0.4 }
];

/** Index of the 0.4m edge in SHORT_EDGE_PENTAGON */
export const SHORT_EDGE_INDEX = 4;

/**
 * Square with a repeated vertex, giving a zero-length edge 1
 */
export const SQUARE_WITH_DUPLICATE_VERTEX: Point[] = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 }
];

/**
 * Lopsided self-intersecting "bowtie". The two lobes differ in size, so the
 * signed area is not zero and only the crossing check rejects it.
 */
export const BOWTIE: Point[] = [
  { x: 0, y: 0 },
  { x: 10, y: 10 },
  { x: 10, y: 0 },
  { x: 0, y: 4 }
];

/**
 * Long thin bar, 40m x 3m. Perimeter 86m.
 */
export const NARROW_BAR: Point[] = [
  { x: 0, y: 0 },
  { x: 40, y: 0 },
  { x: 40, y: 3 },
  { x: 0, y: 3 }
];
