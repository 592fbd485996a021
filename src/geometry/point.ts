/**
 * Point utility functions
 * All functions are pure and return new objects (no mutation)
 */

import { Point } from '../types/geometry';

/**
 * Calculates the Euclidean distance between two points
 */
export function distance(p1: Point, p2: Point): number {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Interpolates between two points (t=0 returns p1, t=1 returns p2)
 */
export function lerp(p1: Point, p2: Point, t: number): Point {
  return {
    x: p1.x + (p2.x - p1.x) * t,
    y: p1.y + (p2.y - p1.y) * t
  };
}

/**
 * Checks if two points are equal (within epsilon tolerance)
 */
export function equals(p1: Point, p2: Point, epsilon: number = 0.0001): boolean {
  return Math.abs(p1.x - p2.x) < epsilon && Math.abs(p1.y - p2.y) < epsilon;
}

/**
 * Whether both coordinates are finite numbers
 */
export function isFinitePoint(p: Point): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}

/**
 * Cross product of vectors OA and OB where O is the origin point.
 * Positive when O→A→B turns counter-clockwise.
 */
export function cross(o: Point, a: Point, b: Point): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}
