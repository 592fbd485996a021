/**
 * Floor Elements - Door Policy
 *
 * Doors go on the ground floor only. Their occupancy map is handed on to the
 * window policy so windows keep clear of doors.
 */

import { DoorPlacement, FloorElementOptions, PropertyGenerator, DoorContext, DoorProperties } from './types';
import { DOOR_MIN_USABLE_LENGTH, GROUND_FLOOR_INDEX } from './constants';
import { Footprint } from './footprint';
import { OccupancyMap } from './occupancy-map';
import { placeAlongEdges, toElementPlacement } from './placement-engine';
import { defaultDoorProperties } from './properties';
import { deriveSeed } from './seeding';

export interface DoorPolicyInput {
  footprint: Footprint;
  floorIndex: number;
  /** Door branch seed */
  seed: number;
  options: FloorElementOptions;
  properties?: PropertyGenerator<DoorContext, DoorProperties>;
}

export interface DoorPolicyResult {
  doors: DoorPlacement[];
  occupancy: OccupancyMap;
  targetCount: number;
  dropped: number[];
}

/**
 * Target door count: `max(1, floor(perimeter * density))`
 */
export function targetDoorCount(perimeter: number, doorDensity: number): number {
  return Math.max(1, Math.floor(perimeter * doorDensity));
}

export function placeDoors(input: DoorPolicyInput): DoorPolicyResult {
  const { footprint, floorIndex, seed, options } = input;
  const generator = input.properties ?? defaultDoorProperties;

  if (floorIndex !== GROUND_FLOOR_INDEX) {
    return {
      doors: [],
      occupancy: new OccupancyMap(footprint.edges.length),
      targetCount: 0,
      dropped: []
    };
  }

  const targetCount = targetDoorCount(footprint.perimeter, options.doorDensity);
  const result = placeAlongEdges({
    edges: footprint.edges,
    seed,
    targetCount,
    edgeSpacing: options.edgeSpacing,
    elementSpacing: options.doorSpacing,
    minUsableLength: DOOR_MIN_USABLE_LENGTH,
    maxAttempts: options.maxAttempts,
    label: 'door'
  });

  const doors = result.placements.map(placement => {
    const properties = generator.generate(
      {
        floorIndex,
        doorIndex: placement.slot,
        totalDoors: targetCount,
        extras: options.extras
      },
      deriveSeed(seed, 'door', placement.slot)
    );
    return toElementPlacement(footprint.edges[placement.edgeIndex], placement, floorIndex, properties);
  });

  return { doors, occupancy: result.occupancy, targetCount, dropped: result.dropped };
}
