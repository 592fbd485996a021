/**
 * Floor Elements - Placement Engine
 *
 * Generic retry + local-search placement of N elements along footprint
 * edges. Door and window policies are thin parameterizations of this.
 */

import { GEOMETRY_EPSILON } from '../types/geometry';
import { pointOnLine } from '../geometry/line';
import { ElementPlacement, EnginePlacement, FootprintEdge } from './types';
import { DEFAULT_MAX_ATTEMPTS, LOCAL_SEARCH_STEP } from './constants';
import { EdgeSampler } from './edge-sampler';
import { OccupancyMap } from './occupancy-map';
import { createRng } from './seeding';
import { Logger } from './utils/logger';

const log = Logger.scoped('placement');

/**
 * Error thrown when a non-finite value would enter a placement.
 */
export class PlacementError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlacementError';
  }
}

export interface PlacementRequest {
  edges: ReadonlyArray<Pick<FootprintEdge, 'length'>>;
  seed: number;
  /** Number of elements to attempt */
  targetCount: number;
  /** Minimum distance from either edge endpoint */
  edgeSpacing: number;
  /** Minimum distance between element centers */
  elementSpacing: number;
  /** Length an edge must keep after both edge spacings */
  minUsableLength: number;
  /** Prior reservations (e.g. from doors); cloned, never mutated */
  occupancy?: OccupancyMap;
  /** Attempts per element before it is dropped */
  maxAttempts?: number;
  /** Step of the collision local search */
  searchStep?: number;
  /** Element name used in diagnostics */
  label?: string;
}

export interface PlacementResult {
  /** Successful placements in generation order */
  placements: EnginePlacement[];
  /** Input reservations plus one interval per placement */
  occupancy: OccupancyMap;
  /** Slots that exhausted their retry budget */
  dropped: number[];
}

/**
 * Whether an edge can host an element at all
 */
export function isEdgeUsable(length: number, edgeSpacing: number, minUsableLength: number): boolean {
  return length >= 2 * edgeSpacing + minUsableLength;
}

/**
 * Slides a colliding candidate along its edge to the nearest free offset.
 *
 * Scans offsets `k * step` for k = 1..floor(radius / step), trying the
 * forward direction first, and skips candidates outside
 * [edgeSpacing, edgeLength - edgeSpacing]. The first free candidate has the
 * smallest displacement.
 *
 * @returns The free offset, or null if none lies within `radius`
 */
export function findNearestFreeOffset(
  occupancy: OccupancyMap,
  edgeIndex: number,
  target: number,
  edgeLength: number,
  edgeSpacing: number,
  spacing: number,
  radius: number,
  step: number = LOCAL_SEARCH_STEP
): number | null {
  if (step <= 0) return null;

  const low = edgeSpacing;
  const high = edgeLength - edgeSpacing;
  // Small bias so 1.5 / 0.1 counts as 15 steps despite rounding
  const steps = Math.floor(radius / step + 1e-9);

  for (let k = 1; k <= steps; k++) {
    for (const direction of [1, -1]) {
      const candidate = target + direction * k * step;
      if (candidate < low || candidate > high) continue;
      if (!occupancy.collides(edgeIndex, candidate, spacing)) {
        return candidate;
      }
    }
  }

  return null;
}

/**
 * Places up to `targetCount` elements along the edges.
 *
 * **Per slot, up to `maxAttempts` times:**
 * 1. Sample an edge weighted by length; skip it if it is too short
 * 2. Draw a uniform offset in [edgeSpacing, length - edgeSpacing]
 * 3. On collision, search for the nearest free offset within `elementSpacing`
 * 4. On success, reserve the interval and record the placement
 *
 * A slot that runs out of attempts is dropped with a warning; generation
 * continues with the next slot. The same request always yields the same
 * result.
 *
 * @throws {PlacementError} If a computed offset is not finite
 */
export function placeAlongEdges(request: PlacementRequest): PlacementResult {
  const {
    edges,
    seed,
    targetCount,
    edgeSpacing,
    elementSpacing,
    minUsableLength,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    searchStep = LOCAL_SEARCH_STEP,
    label = 'element'
  } = request;

  const occupancy = request.occupancy ? request.occupancy.clone() : new OccupancyMap(edges.length);
  if (occupancy.edgeCount !== edges.length) {
    throw new RangeError(
      `occupancy map covers ${occupancy.edgeCount} edges but the footprint has ${edges.length}`
    );
  }

  const rng = createRng(seed);
  const sampler = new EdgeSampler(edges.map(e => e.length));
  const placements: EnginePlacement[] = [];
  const dropped: number[] = [];

  for (let slot = 0; slot < targetCount; slot++) {
    let placed: EnginePlacement | null = null;

    for (let attempt = 0; attempt < maxAttempts && placed === null; attempt++) {
      const edgeIndex = sampler.sample(rng);
      if (edgeIndex === null) break;

      const length = edges[edgeIndex].length;
      if (!isEdgeUsable(length, edgeSpacing, minUsableLength)) continue;

      let offset: number | null = rng.uniform(edgeSpacing, length - edgeSpacing);
      if (occupancy.collides(edgeIndex, offset, elementSpacing)) {
        offset = findNearestFreeOffset(
          occupancy, edgeIndex, offset, length, edgeSpacing, elementSpacing, elementSpacing, searchStep
        );
      }
      if (offset === null) continue;

      if (!Number.isFinite(offset) || length < GEOMETRY_EPSILON) {
        throw new PlacementError(`${label} ${slot}: invalid offset ${offset} on edge ${edgeIndex}`);
      }

      occupancy.reserve(edgeIndex, offset, elementSpacing);
      placed = { slot, edgeIndex, offset, position: offset / length };
      log.debug(`${label} ${slot}: edge ${edgeIndex} at ${offset.toFixed(3)}m (attempt ${attempt + 1})`);
    }

    if (placed === null) {
      dropped.push(slot);
      log.warn(`Could not place ${label} ${slot + 1} of ${targetCount} after ${maxAttempts} attempts, skipping`);
    } else {
      placements.push(placed);
    }
  }

  return { placements, occupancy, dropped };
}

/**
 * Attaches world geometry, floor ownership and properties to an engine placement
 */
export function toElementPlacement<TProps>(
  edge: Readonly<FootprintEdge>,
  placement: EnginePlacement,
  floorIndex: number,
  properties: Readonly<TProps>
): ElementPlacement<TProps> {
  return {
    edgeIndex: placement.edgeIndex,
    position: placement.position,
    offset: placement.offset,
    worldPosition: pointOnLine(edge, placement.position),
    facing: { x: edge.normal.x, y: edge.normal.y },
    floorIndex,
    slot: placement.slot,
    properties
  };
}
