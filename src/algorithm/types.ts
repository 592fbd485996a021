/**
 * Floor Elements - Algorithm Types
 * Types for perimeter element placement (doors, windows, corners)
 *
 * ## Layers
 *
 * - **Geometry**: `FootprintEdge` is derived once from a validated footprint
 * - **Engine**: `EnginePlacement` is a bare 1-D placement along an edge
 * - **Policies**: `ElementPlacement` / `CornerPlacement` add world geometry,
 *   floor ownership and an opaque property bundle
 */

import { Point } from '../types/geometry';

// ============================================================================
// FOOTPRINT GEOMETRY
// ============================================================================

/**
 * One edge of a footprint, from vertex `index` to vertex `index + 1` (wrapping)
 */
export interface FootprintEdge {
  index: number;
  start: Point;
  end: Point;
  /** Edge length in meters */
  length: number;
  /** Unit vector start → end, zero for degenerate edges */
  direction: Point;
  /** Outward unit normal (away from the interior), zero for degenerate edges */
  normal: Point;
}

// ============================================================================
// PLACEMENT ENGINE
// ============================================================================

/**
 * Reserved span along one edge, in meters from the edge start
 */
export interface OccupiedInterval {
  start: number;
  end: number;
}

/**
 * A successful 1-D placement produced by the engine
 */
export interface EnginePlacement {
  /** Generation slot (0..target-1); dropped slots leave gaps */
  slot: number;
  edgeIndex: number;
  /** Distance from the edge start in meters */
  offset: number;
  /** offset / edge length, in [0, 1] */
  position: number;
}

// ============================================================================
// PROPERTY BUNDLES
// Produced by property generators, opaque to the placement engine
// ============================================================================

export interface DoorProperties {
  seed: number;
  width: number;
  height: number;
  style: string;
  isMainEntrance: boolean;
}

export interface WindowProperties {
  seed: number;
  width: number;
  height: number;
  /** Height of the sill above the floor */
  sillHeight: number;
  style: string;
}

export interface CornerProperties {
  seed: number;
  width: number;
  style: string;
}

/**
 * Unrecognized options, forwarded untouched to property generators
 */
export type ExtraOptions = Readonly<Record<string, unknown>>;

export interface DoorContext {
  floorIndex: number;
  doorIndex: number;
  totalDoors: number;
  extras: ExtraOptions;
}

export interface WindowContext {
  floorIndex: number;
  windowIndex: number;
  totalWindows: number;
  extras: ExtraOptions;
}

export interface CornerContext {
  floorIndex: number;
  cornerIndex: number;
  cornerWidth: number;
  extras: ExtraOptions;
}

/**
 * Builds the attribute bundle of one element from its derived seed
 */
export interface PropertyGenerator<TContext, TProps> {
  generate(context: TContext, seed: number): TProps;
}

export interface PropertyGenerators {
  door: PropertyGenerator<DoorContext, DoorProperties>;
  window: PropertyGenerator<WindowContext, WindowProperties>;
  corner: PropertyGenerator<CornerContext, CornerProperties>;
}

// ============================================================================
// PLACED ELEMENTS
// ============================================================================

/**
 * A door or window on a footprint edge
 */
export interface ElementPlacement<TProps> {
  edgeIndex: number;
  /** Normalized position along the edge (0 = start, 1 = end) */
  position: number;
  /** Distance from the edge start in meters */
  offset: number;
  worldPosition: Point;
  /** Outward unit normal of the host edge */
  facing: Point;
  floorIndex: number;
  slot: number;
  properties: Readonly<TProps>;
}

export type DoorPlacement = ElementPlacement<DoorProperties>;
export type WindowPlacement = ElementPlacement<WindowProperties>;

/**
 * A corner detail at a footprint vertex.
 * Neighbour positions are kept for bevel geometry downstream.
 */
export interface CornerPlacement {
  vertexIndex: number;
  position: Point;
  previousPosition: Point;
  nextPosition: Point;
  floorIndex: number;
  properties: Readonly<CornerProperties>;
}

// ============================================================================
// CONFIGURATION & RESULTS
// ============================================================================

/**
 * Recognized generation options. All distances in meters,
 * densities in elements per meter of perimeter.
 */
export interface FloorElementOptions {
  doorDensity: number;
  windowDensity: number;
  edgeSpacing: number;
  doorSpacing: number;
  windowSpacing: number;
  cornerWidth: number;
  /** Retry budget per element */
  maxAttempts: number;
  extras: ExtraOptions;
}

export interface GenerationReport {
  targetDoors: number;
  targetWindows: number;
  droppedDoors: number[];
  droppedWindows: number[];
}

export interface FloorElements {
  doors: DoorPlacement[];
  windows: WindowPlacement[];
  corners: CornerPlacement[];
  report: GenerationReport;
}
