/**
 * Footprint Module
 *
 * Validated floor outline. Raw vertices go in; a closed, simple,
 * counter-clockwise vertex sequence comes out, or an `InvalidGeometryError`.
 * No repair is attempted.
 */

import { GEOMETRY_EPSILON, Point, Polygon } from '../types/geometry';
import { equals, isFinitePoint } from '../geometry/point';
import { lineDirectionNormalized, lineLength, pointOnLine, rightNormal } from '../geometry/line';
import {
  ensureCounterClockwise,
  findSelfIntersection,
  getEdges,
  polygonArea,
  polygonPerimeter
} from '../geometry/polygon';
import { FootprintEdge } from './types';

/**
 * Error thrown when raw vertices do not describe a usable footprint.
 */
export class InvalidGeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidGeometryError';
  }
}

function freezePoint(p: Point): Readonly<Point> {
  return Object.freeze({ x: p.x, y: p.y });
}

/**
 * Immutable, validated floor outline.
 *
 * **Validation performed:**
 * 1. Every coordinate is finite
 * 2. A trailing vertex equal to the first is dropped (explicit closing vertex)
 * 3. At least 3 distinct vertices remain
 * 4. Non-zero area
 * 5. No two non-adjacent edges cross
 *
 * Winding is normalized to counter-clockwise, so the right-hand normal of
 * every edge points outward.
 *
 * @example
 * ```typescript
 * const footprint = new Footprint([
 *   { x: 0, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 }, { x: 0, y: 10 }
 * ]);
 * footprint.perimeter; // 40
 * footprint.edges[0].normal; // { x: 0, y: -1 }
 * ```
 */
export class Footprint {
  readonly vertices: ReadonlyArray<Readonly<Point>>;
  readonly edges: ReadonlyArray<Readonly<FootprintEdge>>;
  readonly perimeter: number;
  readonly area: number;

  constructor(rawVertices: ReadonlyArray<Point>) {
    if (rawVertices.length === 0) {
      throw new InvalidGeometryError('footprint has no vertices');
    }

    rawVertices.forEach((v, i) => {
      if (!isFinitePoint(v)) {
        throw new InvalidGeometryError(`vertex ${i} has non-finite coordinates (${v.x}, ${v.y})`);
      }
    });

    let vertices = rawVertices.map(v => ({ x: v.x, y: v.y }));
    if (vertices.length > 1 && equals(vertices[0], vertices[vertices.length - 1], GEOMETRY_EPSILON)) {
      vertices = vertices.slice(0, -1);
    }

    const distinct = vertices.filter(
      (v, i) => vertices.findIndex(other => equals(other, v, GEOMETRY_EPSILON)) === i
    );
    if (distinct.length < 3) {
      throw new InvalidGeometryError(
        `footprint needs at least 3 distinct vertices (got ${distinct.length})`
      );
    }

    const polygon: Polygon = ensureCounterClockwise({ vertices });

    const area = polygonArea(polygon);
    if (area < GEOMETRY_EPSILON) {
      throw new InvalidGeometryError('footprint has zero area (collinear vertices)');
    }

    const crossing = findSelfIntersection(polygon);
    if (crossing !== null) {
      throw new InvalidGeometryError(
        `footprint is self-intersecting (edges ${crossing[0]} and ${crossing[1]} cross)`
      );
    }

    this.vertices = Object.freeze(polygon.vertices.map(freezePoint));
    this.edges = Object.freeze(
      getEdges(polygon).map((line, index) =>
        Object.freeze({
          index,
          start: freezePoint(line.start),
          end: freezePoint(line.end),
          length: lineLength(line),
          direction: freezePoint(lineDirectionNormalized(line)),
          normal: freezePoint(rightNormal(line))
        })
      )
    );
    this.perimeter = polygonPerimeter(polygon);
    this.area = area;
  }

  get vertexCount(): number {
    return this.vertices.length;
  }

  /**
   * Edge lengths in edge order
   */
  edgeLengths(): number[] {
    return this.edges.map(e => e.length);
  }

  /**
   * World position at normalized parameter t along an edge
   *
   * @throws {RangeError} If the edge index is out of range
   */
  pointOnEdge(edgeIndex: number, t: number): Point {
    const edge = this.edges[edgeIndex];
    if (edge === undefined) {
      throw new RangeError(`edge index ${edgeIndex} out of range (0..${this.edges.length - 1})`);
    }
    return pointOnLine(edge, t);
  }
}
