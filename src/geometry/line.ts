/**
 * Line utility functions
 * A line is defined by two endpoints (start and end)
 */

import { GEOMETRY_EPSILON, Line, Point } from '../types/geometry';
import { cross, distance, lerp } from './point';

/**
 * Calculates the length of a line segment
 */
export function lineLength(line: Line): number {
  return distance(line.start, line.end);
}

/**
 * Returns a point along the line at parameter t (0=start, 1=end)
 */
export function pointOnLine(line: Line, t: number): Point {
  return lerp(line.start, line.end, t);
}

/**
 * Returns the normalized direction vector of a line.
 * Zero-length lines yield the zero vector rather than NaN.
 */
export function lineDirectionNormalized(line: Line): Point {
  const len = lineLength(line);
  if (len < GEOMETRY_EPSILON) return { x: 0, y: 0 };
  return {
    x: (line.end.x - line.start.x) / len,
    y: (line.end.y - line.start.y) / len
  };
}

/**
 * Returns the right-hand perpendicular of the line direction
 * (rotated 90 degrees clockwise). For an edge of a counter-clockwise
 * polygon this points away from the interior.
 */
export function rightNormal(line: Line): Point {
  const dir = lineDirectionNormalized(line);
  return {
    x: dir.y,
    y: -dir.x
  };
}

function onSegment(p: Point, q: Point, r: Point): boolean {
  return (
    Math.min(p.x, r.x) - GEOMETRY_EPSILON <= q.x && q.x <= Math.max(p.x, r.x) + GEOMETRY_EPSILON &&
    Math.min(p.y, r.y) - GEOMETRY_EPSILON <= q.y && q.y <= Math.max(p.y, r.y) + GEOMETRY_EPSILON
  );
}

function orientation(p: Point, q: Point, r: Point): number {
  const value = cross(p, q, r);
  if (Math.abs(value) < GEOMETRY_EPSILON) return 0;
  return value > 0 ? 1 : -1;
}

/**
 * Tests whether two closed segments share at least one point,
 * including touching endpoints and collinear overlap.
 */
export function segmentsIntersect(a: Line, b: Line): boolean {
  const o1 = orientation(a.start, a.end, b.start);
  const o2 = orientation(a.start, a.end, b.end);
  const o3 = orientation(b.start, b.end, a.start);
  const o4 = orientation(b.start, b.end, a.end);

  if (o1 !== o2 && o3 !== o4) return true;

  // Collinear cases
  if (o1 === 0 && onSegment(a.start, b.start, a.end)) return true;
  if (o2 === 0 && onSegment(a.start, b.end, a.end)) return true;
  if (o3 === 0 && onSegment(b.start, a.start, b.end)) return true;
  if (o4 === 0 && onSegment(b.start, a.end, b.end)) return true;

  return false;
}
