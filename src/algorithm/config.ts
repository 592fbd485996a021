/**
 * Floor Elements - Configuration
 *
 * Turns caller input into a validated `FloorElementOptions`.
 * Two entry points:
 * - `resolveOptions()` for typed partial options
 * - `parseRawOptions()` for loose key/value maps (snake_case keys)
 */

import { ExtraOptions, FloorElementOptions } from './types';
import { DEFAULT_FLOOR_ELEMENT_OPTIONS } from './constants';

/**
 * Error thrown when a generation option has an unusable value.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type NumericOption = Exclude<keyof FloorElementOptions, 'extras'>;

/**
 * Raw (snake_case) keys recognized by `parseRawOptions`
 */
export const RAW_OPTION_KEYS: Record<string, NumericOption> = {
  door_density: 'doorDensity',
  window_density: 'windowDensity',
  edge_spacing: 'edgeSpacing',
  door_spacing: 'doorSpacing',
  window_spacing: 'windowSpacing',
  corner_width: 'cornerWidth',
  max_attempts: 'maxAttempts'
};

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a finite number >= 0 (got ${value})`);
  }
}

function validateOptions(options: FloorElementOptions): void {
  requireNonNegative('doorDensity', options.doorDensity);
  requireNonNegative('windowDensity', options.windowDensity);
  requireNonNegative('edgeSpacing', options.edgeSpacing);
  requireNonNegative('doorSpacing', options.doorSpacing);
  requireNonNegative('windowSpacing', options.windowSpacing);

  if (!Number.isFinite(options.cornerWidth) || options.cornerWidth <= 0) {
    throw new ConfigurationError(`cornerWidth must be a finite number > 0 (got ${options.cornerWidth})`);
  }

  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new ConfigurationError(`maxAttempts must be a positive integer (got ${options.maxAttempts})`);
  }
}

/**
 * Merges partial options over the defaults and validates the result.
 *
 * @throws {ConfigurationError} If any value is out of range
 *
 * @example
 * ```typescript
 * const options = resolveOptions({ windowDensity: 0.5 });
 * options.doorDensity; // 0.05
 * ```
 */
export function resolveOptions(partial: Partial<FloorElementOptions> = {}): FloorElementOptions {
  const options: FloorElementOptions = {
    ...DEFAULT_FLOOR_ELEMENT_OPTIONS,
    ...partial,
    extras: Object.freeze({ ...(partial.extras ?? {}) })
  };
  validateOptions(options);
  return options;
}

/**
 * Maps a loose key/value record onto typed options.
 * Recognized snake_case keys become typed fields; every other key is kept
 * in `extras` for the property generators.
 *
 * @throws {ConfigurationError} If a recognized key holds a non-number
 */
export function parseRawOptions(raw: Record<string, unknown>): FloorElementOptions {
  const partial: Partial<Record<NumericOption, number>> = {};
  const extras: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(raw)) {
    const option = Object.prototype.hasOwnProperty.call(RAW_OPTION_KEYS, key)
      ? RAW_OPTION_KEYS[key]
      : undefined;
    if (option === undefined) {
      extras[key] = value;
      continue;
    }
    if (typeof value !== 'number') {
      throw new ConfigurationError(`${key} must be a number (got ${typeof value})`);
    }
    partial[option] = value;
  }

  return resolveOptions({ ...partial, extras });
}

/**
 * Whether two resolved option sets are the same. Extras are compared key by
 * key with `Object.is`, so any value (cyclic objects, bigints, functions) is
 * accepted and never inspected.
 */
export function sameOptions(a: FloorElementOptions, b: FloorElementOptions): boolean {
  const numeric: NumericOption[] = Object.values(RAW_OPTION_KEYS);
  if (numeric.some(key => !Object.is(a[key], b[key]))) {
    return false;
  }

  const aKeys = Object.keys(a.extras);
  const bExtras: ExtraOptions = b.extras;
  if (aKeys.length !== Object.keys(bExtras).length) {
    return false;
  }
  return aKeys.every(
    key => Object.prototype.hasOwnProperty.call(bExtras, key) && Object.is(a.extras[key], bExtras[key])
  );
}
