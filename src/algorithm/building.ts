/**
 * Building Container
 *
 * Stack of floors with per-floor heights and cumulative Z bookkeeping.
 * Performs no placement itself; each floor generates its own elements
 * from the building seed.
 */

import { Point } from '../types/geometry';
import { FloorElementOptions, FloorElements } from './types';
import { DEFAULT_FLOOR_HEIGHT } from './constants';
import { Floor } from './floor';

/**
 * Error thrown when per-floor configuration does not match the floor list.
 */
export class BuildingConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BuildingConfigurationError';
  }
}

export interface BuildingOptions {
  /** One height per floor; only used when floors are given as vertex lists */
  floorHeights?: number[];
  defaultFloorHeight?: number;
  /** Building-level parameters (style, material, ...) */
  params?: Record<string, unknown>;
}

function isFloorList(floors: ReadonlyArray<Floor> | ReadonlyArray<ReadonlyArray<Point>>): floors is ReadonlyArray<Floor> {
  for (const f of floors) {
    if (!(f instanceof Floor)) return false;
  }
  return true;
}

/**
 * @example
 * ```typescript
 * const building = new Building(
 *   [square, square],
 *   12345,
 *   { floorHeights: [3.5, 3.0] }
 * );
 * building.totalHeight; // 6.5
 * building.getFloorElements(0).doors.length; // >= 1
 * ```
 */
export class Building {
  readonly floors: ReadonlyArray<Floor>;
  readonly seed: number;
  readonly params: Readonly<Record<string, unknown>>;
  private readonly cumulativeHeights: number[];

  /**
   * @param floors - Floor objects, or one raw vertex list per floor (bottom first)
   * @param seed - Base seed shared by every floor
   * @throws {BuildingConfigurationError} If heights and floors do not line up
   * @throws {InvalidGeometryError} If a vertex list is not a valid footprint
   */
  constructor(
    floors: ReadonlyArray<Floor> | ReadonlyArray<ReadonlyArray<Point>>,
    seed: number,
    options: BuildingOptions = {}
  ) {
    const { floorHeights, defaultFloorHeight = DEFAULT_FLOOR_HEIGHT } = options;

    if (floors.length === 0) {
      throw new BuildingConfigurationError('building needs at least one floor');
    }
    if (!Number.isSafeInteger(seed) || seed < 0) {
      throw new BuildingConfigurationError(`seed must be a non-negative integer (got ${seed})`);
    }

    if (isFloorList(floors)) {
      floors.forEach((floor, i) => {
        if (floor.floorIndex !== i) {
          throw new BuildingConfigurationError(
            `floor at position ${i} has floorIndex ${floor.floorIndex}`
          );
        }
      });
      this.floors = [...floors];
    } else {
      floors.forEach((vertices, i) => {
        if (!Array.isArray(vertices)) {
          throw new BuildingConfigurationError(`floor ${i} mixes Floor objects and vertex lists`);
        }
      });
      const heights = floorHeights ?? floors.map(() => defaultFloorHeight);
      if (heights.length !== floors.length) {
        throw new BuildingConfigurationError(
          `floorHeights length (${heights.length}) must match number of floors (${floors.length})`
        );
      }
      heights.forEach((h, i) => {
        if (!Number.isFinite(h) || h <= 0) {
          throw new BuildingConfigurationError(`floor ${i} height must be a finite number > 0 (got ${h})`);
        }
      });
      this.floors = floors.map((vertices, i) =>
        Floor.fromVertices(vertices, { height: heights[i], floorIndex: i, params: options.params })
      );
    }

    this.seed = seed;
    this.params = Object.freeze({ ...(options.params ?? {}) });

    this.cumulativeHeights = [0];
    for (const floor of this.floors) {
      this.cumulativeHeights.push(this.cumulativeHeights[this.cumulativeHeights.length - 1] + floor.height);
    }
  }

  get numFloors(): number {
    return this.floors.length;
  }

  get totalHeight(): number {
    return this.cumulativeHeights[this.cumulativeHeights.length - 1];
  }

  /**
   * @throws {RangeError} If the index is out of range
   */
  getFloor(floorIndex: number): Floor {
    const floor = this.floors[floorIndex];
    if (floor === undefined) {
      throw new RangeError(`floor index ${floorIndex} out of range (0..${this.floors.length - 1})`);
    }
    return floor;
  }

  getFloorZBase(floorIndex: number): number {
    return this.getFloor(floorIndex).getZBase(this.cumulativeHeights);
  }

  getFloorZTop(floorIndex: number): number {
    return this.getFloor(floorIndex).getZTop(this.cumulativeHeights);
  }

  getFloorElements(floorIndex: number, options?: Partial<FloorElementOptions>): FloorElements {
    return this.getFloor(floorIndex).getElements(this.seed, options);
  }

  invalidateAll(): void {
    this.floors.forEach(floor => floor.invalidate());
  }
}
