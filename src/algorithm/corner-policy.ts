/**
 * Floor Elements - Corner Policy
 *
 * One corner per footprint vertex, always. The seed only feeds the
 * property bundle; it never changes how many corners there are or where.
 */

import {
  CornerContext,
  CornerPlacement,
  CornerProperties,
  FloorElementOptions,
  PropertyGenerator
} from './types';
import { Footprint } from './footprint';
import { defaultCornerProperties } from './properties';
import { deriveSeed } from './seeding';

export interface CornerPolicyInput {
  footprint: Footprint;
  floorIndex: number;
  /** Corner branch seed */
  seed: number;
  options: FloorElementOptions;
  properties?: PropertyGenerator<CornerContext, CornerProperties>;
}

export function placeCorners(input: CornerPolicyInput): CornerPlacement[] {
  const { footprint, floorIndex, seed, options } = input;
  const generator = input.properties ?? defaultCornerProperties;
  const vertices = footprint.vertices;
  const n = vertices.length;

  return vertices.map((vertex, i) => {
    const previous = vertices[(i - 1 + n) % n];
    const next = vertices[(i + 1) % n];

    const properties = generator.generate(
      {
        floorIndex,
        cornerIndex: i,
        cornerWidth: options.cornerWidth,
        extras: options.extras
      },
      deriveSeed(seed, 'corner', i)
    );

    return {
      vertexIndex: i,
      position: { x: vertex.x, y: vertex.y },
      previousPosition: { x: previous.x, y: previous.y },
      nextPosition: { x: next.x, y: next.y },
      floorIndex,
      properties
    };
  });
}
