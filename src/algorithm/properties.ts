/**
 * Floor Elements - Default Property Generators
 *
 * Attribute bundles for placed elements. The placement engine never looks
 * inside these; it only hands each element its derived seed and context.
 * Callers can replace any generator through `PropertyGenerators`.
 *
 * Recognized `extras` keys: `door_width`, `door_height`, `door_style`,
 * `window_width`, `window_height`, `window_sill_height`, `window_style`,
 * `corner_style`.
 */

import {
  CornerContext,
  CornerProperties,
  DoorContext,
  DoorProperties,
  ExtraOptions,
  PropertyGenerator,
  PropertyGenerators,
  WindowContext,
  WindowProperties
} from './types';
import { CORNER_DEFAULTS, DOOR_DEFAULTS, WINDOW_DEFAULTS } from './constants';

function numberExtra(extras: ExtraOptions, key: string, fallback: number): number {
  const value = extras[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function stringExtra(extras: ExtraOptions, key: string, fallback: string): string {
  const value = extras[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Doors: the first door slot is the main entrance.
 */
export const defaultDoorProperties: PropertyGenerator<DoorContext, DoorProperties> = {
  generate: (context, seed) => Object.freeze({
    seed,
    width: numberExtra(context.extras, 'door_width', DOOR_DEFAULTS.width),
    height: numberExtra(context.extras, 'door_height', DOOR_DEFAULTS.height),
    style: stringExtra(context.extras, 'door_style', DOOR_DEFAULTS.style),
    isMainEntrance: context.doorIndex === 0
  })
};

export const defaultWindowProperties: PropertyGenerator<WindowContext, WindowProperties> = {
  generate: (context, seed) => Object.freeze({
    seed,
    width: numberExtra(context.extras, 'window_width', WINDOW_DEFAULTS.width),
    height: numberExtra(context.extras, 'window_height', WINDOW_DEFAULTS.height),
    sillHeight: numberExtra(context.extras, 'window_sill_height', WINDOW_DEFAULTS.sillHeight),
    style: stringExtra(context.extras, 'window_style', WINDOW_DEFAULTS.style)
  })
};

export const defaultCornerProperties: PropertyGenerator<CornerContext, CornerProperties> = {
  generate: (context, seed) => Object.freeze({
    seed,
    width: context.cornerWidth,
    style: stringExtra(context.extras, 'corner_style', CORNER_DEFAULTS.style)
  })
};

export const DEFAULT_PROPERTY_GENERATORS: PropertyGenerators = {
  door: defaultDoorProperties,
  window: defaultWindowProperties,
  corner: defaultCornerProperties
};
