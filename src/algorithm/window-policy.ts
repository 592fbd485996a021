/**
 * Floor Elements - Window Policy
 *
 * Windows go on every floor, starting from the door occupancy so they never
 * crowd a door. Doors are not re-checked against windows.
 */

import {
  FloorElementOptions,
  PropertyGenerator,
  WindowContext,
  WindowPlacement,
  WindowProperties
} from './types';
import { WINDOW_MIN_USABLE_LENGTH } from './constants';
import { Footprint } from './footprint';
import { OccupancyMap } from './occupancy-map';
import { placeAlongEdges, toElementPlacement } from './placement-engine';
import { defaultWindowProperties } from './properties';
import { deriveSeed } from './seeding';

export interface WindowPolicyInput {
  footprint: Footprint;
  floorIndex: number;
  /** Window branch seed */
  seed: number;
  options: FloorElementOptions;
  /** Reservations made by doors on this floor */
  doorOccupancy?: OccupancyMap;
  properties?: PropertyGenerator<WindowContext, WindowProperties>;
}

export interface WindowPolicyResult {
  windows: WindowPlacement[];
  occupancy: OccupancyMap;
  targetCount: number;
  dropped: number[];
}

/**
 * Target window count: `floor(perimeter * density)`, zero allowed
 */
export function targetWindowCount(perimeter: number, windowDensity: number): number {
  return Math.max(0, Math.floor(perimeter * windowDensity));
}

export function placeWindows(input: WindowPolicyInput): WindowPolicyResult {
  const { footprint, floorIndex, seed, options, doorOccupancy } = input;
  const generator = input.properties ?? defaultWindowProperties;

  const targetCount = targetWindowCount(footprint.perimeter, options.windowDensity);
  const result = placeAlongEdges({
    edges: footprint.edges,
    seed,
    targetCount,
    edgeSpacing: options.edgeSpacing,
    elementSpacing: options.windowSpacing,
    minUsableLength: WINDOW_MIN_USABLE_LENGTH,
    occupancy: doorOccupancy,
    maxAttempts: options.maxAttempts,
    label: 'window'
  });

  const windows = result.placements.map(placement => {
    const properties = generator.generate(
      {
        floorIndex,
        windowIndex: placement.slot,
        totalWindows: targetCount,
        extras: options.extras
      },
      deriveSeed(seed, 'window', placement.slot)
    );
    return toElementPlacement(footprint.edges[placement.edgeIndex], placement, floorIndex, properties);
  });

  return { windows, occupancy: result.occupancy, targetCount, dropped: result.dropped };
}
