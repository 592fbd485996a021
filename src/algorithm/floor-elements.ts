/**
 * Floor Elements - Orchestrator
 *
 * Runs the three placement policies for one floor in precedence order:
 * doors, then windows (seeded with door occupancy), then corners.
 */

import { FloorElementOptions, FloorElements, PropertyGenerators } from './types';
import { SEED_BRANCHES } from './constants';
import { resolveOptions } from './config';
import { Footprint } from './footprint';
import { placeDoors } from './door-policy';
import { placeWindows } from './window-policy';
import { placeCorners } from './corner-policy';
import { DEFAULT_PROPERTY_GENERATORS } from './properties';
import { deriveSeed } from './seeding';
import { Logger } from './utils/logger';

const log = Logger.scoped('floor-elements');

export interface FloorElementRequest {
  footprint: Footprint;
  floorIndex: number;
  /** Base seed of the floor */
  seed: number;
  /** Partial options are merged over the defaults */
  options?: Partial<FloorElementOptions>;
  /** Replace any of the default property generators */
  generators?: Partial<PropertyGenerators>;
}

/**
 * Branch seeds of one floor
 */
export function deriveBranchSeeds(seed: number): { doors: number; windows: number; corners: number } {
  return {
    doors: deriveSeed(seed, SEED_BRANCHES.doors),
    windows: deriveSeed(seed, SEED_BRANCHES.windows),
    corners: deriveSeed(seed, SEED_BRANCHES.corners)
  };
}

/**
 * Generates doors, windows and corners for one floor.
 *
 * Pure function of (footprint, floor index, seed, options, generators):
 * identical inputs produce an identical bundle.
 *
 * @throws {ConfigurationError} If the options are invalid
 *
 * @example
 * ```typescript
 * const footprint = new Footprint(vertices);
 * const { doors, windows, corners } = generateFloorElements({
 *   footprint,
 *   floorIndex: 0,
 *   seed: 12345
 * });
 * ```
 */
export function generateFloorElements(request: FloorElementRequest): FloorElements {
  const { footprint, floorIndex, seed } = request;
  const options = resolveOptions(request.options);
  const generators: PropertyGenerators = {
    door: request.generators?.door ?? DEFAULT_PROPERTY_GENERATORS.door,
    window: request.generators?.window ?? DEFAULT_PROPERTY_GENERATORS.window,
    corner: request.generators?.corner ?? DEFAULT_PROPERTY_GENERATORS.corner
  };

  if (!Number.isInteger(floorIndex) || floorIndex < 0) {
    throw new RangeError(`floorIndex must be a non-negative integer (got ${floorIndex})`);
  }

  const branches = deriveBranchSeeds(seed);
  log.debug(
    `floor ${floorIndex}: seed ${seed} -> doors ${branches.doors}, windows ${branches.windows}, corners ${branches.corners}`
  );

  const doorResult = placeDoors({
    footprint,
    floorIndex,
    seed: branches.doors,
    options,
    properties: generators.door
  });

  const windowResult = placeWindows({
    footprint,
    floorIndex,
    seed: branches.windows,
    options,
    doorOccupancy: doorResult.occupancy,
    properties: generators.window
  });

  const corners = placeCorners({
    footprint,
    floorIndex,
    seed: branches.corners,
    options,
    properties: generators.corner
  });

  log.info(
    `floor ${floorIndex}: ${doorResult.doors.length}/${doorResult.targetCount} doors, ` +
    `${windowResult.windows.length}/${windowResult.targetCount} windows, ${corners.length} corners`
  );

  return {
    doors: doorResult.doors,
    windows: windowResult.windows,
    corners,
    report: {
      targetDoors: doorResult.targetCount,
      targetWindows: windowResult.targetCount,
      droppedDoors: doorResult.dropped,
      droppedWindows: windowResult.dropped
    }
  };
}
