/**
 * Floor Elements - Constants
 * Default values and configuration
 *
 * ALL VALUES ARE IN METERS
 */

import { FloorElementOptions } from './types';

// ============================================================================
// GENERATION DEFAULTS
// ============================================================================

export const DEFAULT_DOOR_DENSITY = 0.05;      // doors per meter of perimeter
export const DEFAULT_WINDOW_DENSITY = 0.3;     // windows per meter of perimeter
export const DEFAULT_EDGE_SPACING = 1.0;       // clearance from each edge endpoint
export const DEFAULT_DOOR_SPACING = 2.0;       // minimum door center distance
export const DEFAULT_WINDOW_SPACING = 1.5;     // minimum window center distance
export const DEFAULT_CORNER_WIDTH = 0.15;
export const DEFAULT_MAX_ATTEMPTS = 10;        // attempts per element before it is dropped

export const DEFAULT_FLOOR_ELEMENT_OPTIONS: FloorElementOptions = {
  doorDensity: DEFAULT_DOOR_DENSITY,
  windowDensity: DEFAULT_WINDOW_DENSITY,
  edgeSpacing: DEFAULT_EDGE_SPACING,
  doorSpacing: DEFAULT_DOOR_SPACING,
  windowSpacing: DEFAULT_WINDOW_SPACING,
  cornerWidth: DEFAULT_CORNER_WIDTH,
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  extras: {}
};

// ============================================================================
// PLACEMENT ENGINE
// ============================================================================

/** Step of the local search that slides a colliding candidate along its edge */
export const LOCAL_SEARCH_STEP = 0.1;

/** Usable length an edge must keep after both edge spacings */
export const DOOR_MIN_USABLE_LENGTH = 0.5;
export const WINDOW_MIN_USABLE_LENGTH = 0.3;

/** Identifiers of the independent seed branches of one floor */
export const SEED_BRANCHES = {
  doors: 'doors',
  windows: 'windows',
  corners: 'corners'
} as const;

// ============================================================================
// BUILDING
// ============================================================================

export const DEFAULT_FLOOR_HEIGHT = 3.0;
export const GROUND_FLOOR_INDEX = 0;

// ============================================================================
// DEFAULT PROPERTY BUNDLES
// ============================================================================

export const DOOR_DEFAULTS = {
  width: 1.0,
  height: 2.1,
  style: 'standard'
};

export const WINDOW_DEFAULTS = {
  width: 1.2,
  height: 1.5,
  sillHeight: 0.9,
  style: 'standard'
};

export const CORNER_DEFAULTS = {
  style: 'standard'
};
