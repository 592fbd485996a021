/**
 * Floor Entity
 *
 * One building level: footprint, height, index, and a cached element bundle.
 */

import { Point } from '../types/geometry';
import {
  CornerPlacement,
  DoorPlacement,
  FloorElementOptions,
  FloorElements,
  PropertyGenerators,
  WindowPlacement
} from './types';
import { DEFAULT_FLOOR_HEIGHT, GROUND_FLOOR_INDEX } from './constants';
import { resolveOptions, sameOptions } from './config';
import { Footprint } from './footprint';
import { generateFloorElements } from './floor-elements';
import { Logger } from './utils/logger';

const log = Logger.scoped('floor');

export interface FloorOptions {
  /** Floor-to-floor height in meters */
  height?: number;
  /** 0 = ground floor */
  floorIndex?: number;
  /** Floor-level defaults for the property generators, overridden by per-call extras */
  params?: Record<string, unknown>;
  generators?: Partial<PropertyGenerators>;
}

/**
 * Cached generation state. There is no implicit recomputation:
 * a computed bundle stays until `invalidate()` is called.
 */
export type FloorCacheState =
  | { status: 'uncomputed' }
  | { status: 'computed'; seed: number; options: FloorElementOptions; elements: FloorElements };

export class Floor {
  readonly footprint: Footprint;
  readonly height: number;
  readonly floorIndex: number;
  readonly params: Readonly<Record<string, unknown>>;
  private readonly generators: Partial<PropertyGenerators>;
  private cache: FloorCacheState = { status: 'uncomputed' };

  constructor(footprint: Footprint, options: FloorOptions = {}) {
    const { height = DEFAULT_FLOOR_HEIGHT, floorIndex = GROUND_FLOOR_INDEX } = options;

    if (!Number.isFinite(height) || height <= 0) {
      throw new RangeError(`floor height must be a finite number > 0 (got ${height})`);
    }
    if (!Number.isInteger(floorIndex) || floorIndex < 0) {
      throw new RangeError(`floorIndex must be a non-negative integer (got ${floorIndex})`);
    }

    this.footprint = footprint;
    this.height = height;
    this.floorIndex = floorIndex;
    this.params = Object.freeze({ ...(options.params ?? {}) });
    this.generators = options.generators ?? {};
  }

  /**
   * Creates a floor from raw vertices.
   *
   * @throws {InvalidGeometryError} If the vertices are not a valid footprint
   */
  static fromVertices(vertices: ReadonlyArray<Point>, options: FloorOptions = {}): Floor {
    return new Floor(new Footprint(vertices), options);
  }

  get isGenerated(): boolean {
    return this.cache.status === 'computed';
  }

  get cacheState(): Readonly<FloorCacheState> {
    return this.cache;
  }

  /**
   * Returns the doors, windows and corners of this floor, generating them on
   * first access. Later calls return the cached bundle as is; call
   * `invalidate()` first to regenerate with different arguments.
   */
  getElements(seed: number, options: Partial<FloorElementOptions> = {}): FloorElements {
    const resolved = resolveOptions({
      ...options,
      extras: { ...this.params, ...(options.extras ?? {}) }
    });

    if (this.cache.status === 'computed') {
      if (this.cache.seed !== seed || !sameOptions(this.cache.options, resolved)) {
        log.warn(
          `floor ${this.floorIndex}: returning elements cached for different seed/options; call invalidate() to regenerate`
        );
      }
      return this.cache.elements;
    }

    const elements = generateFloorElements({
      footprint: this.footprint,
      floorIndex: this.floorIndex,
      seed,
      options: resolved,
      generators: this.generators
    });
    // Every later read hands out these same arrays
    Object.freeze(elements.doors);
    Object.freeze(elements.windows);
    Object.freeze(elements.corners);
    Object.freeze(elements);
    this.cache = { status: 'computed', seed, options: resolved, elements };
    return elements;
  }

  getDoors(seed: number, options?: Partial<FloorElementOptions>): DoorPlacement[] {
    return this.getElements(seed, options).doors;
  }

  getWindows(seed: number, options?: Partial<FloorElementOptions>): WindowPlacement[] {
    return this.getElements(seed, options).windows;
  }

  getCorners(seed: number, options?: Partial<FloorElementOptions>): CornerPlacement[] {
    return this.getElements(seed, options).corners;
  }

  /**
   * Drops the cached bundle; the next read regenerates from scratch
   */
  invalidate(): void {
    this.cache = { status: 'uncomputed' };
  }

  /**
   * Base Z of this floor given the building's cumulative heights
   */
  getZBase(cumulativeHeights: ReadonlyArray<number>): number {
    return this.floorIndex < cumulativeHeights.length ? cumulativeHeights[this.floorIndex] : 0;
  }

  getZTop(cumulativeHeights: ReadonlyArray<number>): number {
    return this.getZBase(cumulativeHeights) + this.height;
  }
}
