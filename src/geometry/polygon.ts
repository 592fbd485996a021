/**
 * Polygon utility functions
 * Polygons are defined by an array of vertices in order (clockwise or counter-clockwise)
 * The polygon is implicitly closed (last vertex connects to first)
 */

import { Polygon, Line } from '../types/geometry';
import { distance, equals } from './point';
import { segmentsIntersect } from './line';

/**
 * Returns the edges of a polygon as an array of line segments
 */
export function getEdges(polygon: Polygon): Line[] {
  const edges: Line[] = [];
  const n = polygon.vertices.length;

  for (let i = 0; i < n; i++) {
    edges.push({
      start: polygon.vertices[i],
      end: polygon.vertices[(i + 1) % n]
    });
  }

  return edges;
}

/**
 * Calculates the perimeter of a polygon
 */
export function polygonPerimeter(polygon: Polygon): number {
  let perimeter = 0;
  const n = polygon.vertices.length;

  for (let i = 0; i < n; i++) {
    perimeter += distance(polygon.vertices[i], polygon.vertices[(i + 1) % n]);
  }

  return perimeter;
}

/**
 * Shoelace area: positive for counter-clockwise, negative for clockwise
 */
export function signedArea(polygon: Polygon): number {
  let area = 0;
  const n = polygon.vertices.length;

  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    area += polygon.vertices[i].x * polygon.vertices[j].y;
    area -= polygon.vertices[j].x * polygon.vertices[i].y;
  }

  return area / 2;
}

export function polygonArea(polygon: Polygon): number {
  return Math.abs(signedArea(polygon));
}

export function isClockwise(polygon: Polygon): boolean {
  return signedArea(polygon) < 0;
}

export function reverseWinding(polygon: Polygon): Polygon {
  return { vertices: [...polygon.vertices].reverse() };
}

export function ensureCounterClockwise(polygon: Polygon): Polygon {
  return isClockwise(polygon) ? reverseWinding(polygon) : polygon;
}

/**
 * Finds the first pair of non-adjacent edges that cross or touch.
 *
 * Runs of repeated vertices are collapsed first, so a zero-length edge only
 * makes its two neighbours adjacent. Any other contact, including a ring
 * that passes through the same vertex twice, is reported. O(n²).
 *
 * @returns Original indices of the offending edges, or null for a simple polygon
 */
export function findSelfIntersection(polygon: Polygon): [number, number] | null {
  const { vertices } = polygon;

  // Original index of the last vertex of each run of equal vertices
  const runEnds: number[] = [];
  vertices.forEach((v, i) => {
    const previous = runEnds.length > 0 ? vertices[runEnds[runEnds.length - 1]] : null;
    if (previous !== null && equals(previous, v)) {
      runEnds[runEnds.length - 1] = i;
    } else {
      runEnds.push(i);
    }
  });
  // Trailing run that wraps onto the first vertex
  if (runEnds.length > 1 && equals(vertices[runEnds[runEnds.length - 1]], vertices[0])) {
    runEnds.pop();
  }

  const n = runEnds.length;
  const edges: Line[] = runEnds.map((start, k) => ({
    start: vertices[start],
    end: vertices[runEnds[(k + 1) % n]]
  }));

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      if (j === i + 1 || (i === 0 && j === n - 1)) continue;

      if (segmentsIntersect(edges[i], edges[j])) {
        return [runEnds[i], runEnds[j]];
      }
    }
  }

  return null;
}
