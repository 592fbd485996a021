/**
 * Floor Elements - Algorithm Module
 *
 * Exports all public APIs for perimeter element placement
 */

// Types - use 'export type' for type-only exports
export type {
  FootprintEdge,
  OccupiedInterval,
  EnginePlacement,
  DoorProperties,
  WindowProperties,
  CornerProperties,
  ExtraOptions,
  DoorContext,
  WindowContext,
  CornerContext,
  PropertyGenerator,
  PropertyGenerators,
  ElementPlacement,
  DoorPlacement,
  WindowPlacement,
  CornerPlacement,
  FloorElementOptions,
  GenerationReport,
  FloorElements
} from './types';

// Constants
export {
  DEFAULT_FLOOR_ELEMENT_OPTIONS,
  DEFAULT_DOOR_DENSITY,
  DEFAULT_WINDOW_DENSITY,
  DEFAULT_EDGE_SPACING,
  DEFAULT_DOOR_SPACING,
  DEFAULT_WINDOW_SPACING,
  DEFAULT_CORNER_WIDTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_FLOOR_HEIGHT,
  LOCAL_SEARCH_STEP,
  DOOR_MIN_USABLE_LENGTH,
  WINDOW_MIN_USABLE_LENGTH,
  SEED_BRANCHES
} from './constants';

// Configuration
export { ConfigurationError, resolveOptions, parseRawOptions, sameOptions, RAW_OPTION_KEYS } from './config';

// Seeding
export { SeedError, deriveSeed, splitSeed, createRng, SEED_MODULUS } from './seeding';
export type { Rng, SeedIdentifier } from './seeding';

// Footprint
export { Footprint, InvalidGeometryError } from './footprint';

// Engine
export { EdgeSampler } from './edge-sampler';
export { OccupancyMap } from './occupancy-map';
export {
  PlacementError,
  placeAlongEdges,
  findNearestFreeOffset,
  isEdgeUsable,
  toElementPlacement
} from './placement-engine';
export type { PlacementRequest, PlacementResult } from './placement-engine';

// Policies
export { placeDoors, targetDoorCount } from './door-policy';
export type { DoorPolicyInput, DoorPolicyResult } from './door-policy';
export { placeWindows, targetWindowCount } from './window-policy';
export type { WindowPolicyInput, WindowPolicyResult } from './window-policy';
export { placeCorners } from './corner-policy';
export type { CornerPolicyInput } from './corner-policy';
export {
  DEFAULT_PROPERTY_GENERATORS,
  defaultDoorProperties,
  defaultWindowProperties,
  defaultCornerProperties
} from './properties';

// Orchestration
export { generateFloorElements, deriveBranchSeeds } from './floor-elements';
export type { FloorElementRequest } from './floor-elements';
export { Floor } from './floor';
export type { FloorOptions, FloorCacheState } from './floor';
export { Building, BuildingConfigurationError } from './building';
export type { BuildingOptions } from './building';

// Logging
export { Logger, LogLevel, enableDebugLogging, disableLogging } from './utils/logger';
export type { ScopedLogger } from './utils/logger';
