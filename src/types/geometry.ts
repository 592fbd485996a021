/**
 * Core geometry types for floor element placement
 * All measurements are in meters
 */

/**
 * A 2D point (or vector) on the floor plane
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * A line segment defined by two endpoints
 */
export interface Line {
  start: Point;
  end: Point;
}

/**
 * A polygon defined by an array of vertices (points)
 * The polygon is implicitly closed (last vertex connects to first)
 */
export interface Polygon {
  vertices: Point[];
}

/**
 * Tolerance below which a length is treated as zero.
 * Guards every division by an edge length.
 */
export const GEOMETRY_EPSILON = 1e-9;
