/**
 * Configuration Tests
 */

import { ConfigurationError, parseRawOptions, resolveOptions, sameOptions } from './config';
import { DEFAULT_FLOOR_ELEMENT_OPTIONS } from './constants';
import { FloorElementOptions } from './types';

describe('resolveOptions', () => {
  it('should return the defaults for no input', () => {
    expect(resolveOptions()).toEqual(DEFAULT_FLOOR_ELEMENT_OPTIONS);
  });

  it('should expose the documented defaults', () => {
    const options = resolveOptions();
    expect(options.doorDensity).toBe(0.05);
    expect(options.windowDensity).toBe(0.3);
    expect(options.edgeSpacing).toBe(1);
    expect(options.doorSpacing).toBe(2);
    expect(options.windowSpacing).toBe(1.5);
    expect(options.cornerWidth).toBe(0.15);
    expect(options.maxAttempts).toBe(10);
  });

  it('should merge partial overrides', () => {
    const options = resolveOptions({ windowDensity: 0.5, maxAttempts: 3 });
    expect(options.windowDensity).toBe(0.5);
    expect(options.maxAttempts).toBe(3);
    expect(options.doorDensity).toBe(0.05);
  });

  it('should accept zero densities and spacings', () => {
    expect(() => resolveOptions({ doorDensity: 0, windowDensity: 0, edgeSpacing: 0 })).not.toThrow();
  });

  it('should freeze a copy of the extras', () => {
    const extras = { facade: 'brick' };
    const options = resolveOptions({ extras });
    expect(Object.isFrozen(options.extras)).toBe(true);
    expect(options.extras).not.toBe(extras);
    expect(options.extras).toEqual({ facade: 'brick' });
  });

  it.each<[string, Partial<FloorElementOptions>]>([
    ['doorDensity', { doorDensity: -0.1 }],
    ['windowDensity', { windowDensity: NaN }],
    ['edgeSpacing', { edgeSpacing: Infinity }],
    ['doorSpacing', { doorSpacing: -1 }],
    ['windowSpacing', { windowSpacing: -1 }],
    ['cornerWidth', { cornerWidth: 0 }],
    ['maxAttempts', { maxAttempts: 0 }],
    ['maxAttempts', { maxAttempts: 2.5 }]
  ])('should reject an invalid %s', (name, partial) => {
    expect(() => resolveOptions(partial)).toThrow(ConfigurationError);
    expect(() => resolveOptions(partial)).toThrow(name);
  });
});

describe('parseRawOptions', () => {
  it('should map snake_case keys onto typed options', () => {
    const options = parseRawOptions({ door_density: 0.1, window_spacing: 2, max_attempts: 5 });
    expect(options.doorDensity).toBe(0.1);
    expect(options.windowSpacing).toBe(2);
    expect(options.maxAttempts).toBe(5);
  });

  it('should keep unknown keys as extras', () => {
    const options = parseRawOptions({ window_density: 0.2, door_style: 'arched', toString: 'x' });
    expect(options.windowDensity).toBe(0.2);
    expect(options.extras).toEqual({ door_style: 'arched', toString: 'x' });
  });

  it('should reject a recognized key with a non-number value', () => {
    expect(() => parseRawOptions({ door_density: '0.1' }))
      .toThrow('door_density must be a number (got string)');
  });

  it('should validate the parsed values', () => {
    expect(() => parseRawOptions({ corner_width: -1 })).toThrow(ConfigurationError);
  });
});

describe('sameOptions', () => {
  it('should match equal option sets', () => {
    expect(sameOptions(resolveOptions(), resolveOptions())).toBe(true);
  });

  it('should ignore extras key order', () => {
    const a = resolveOptions({ extras: { a: 1, b: 2 } });
    const b = resolveOptions({ extras: { b: 2, a: 1 } });
    expect(sameOptions(a, b)).toBe(true);
  });

  it('should notice any changed option', () => {
    const base = resolveOptions();
    expect(sameOptions(base, resolveOptions({ cornerWidth: 0.2 }))).toBe(false);
    expect(sameOptions(base, resolveOptions({ maxAttempts: 11 }))).toBe(false);
    expect(sameOptions(base, resolveOptions({ extras: { door_style: 'arched' } }))).toBe(false);
  });

  it('should tell apart extras with the same key count but different keys', () => {
    expect(sameOptions(resolveOptions({ extras: { a: 1 } }), resolveOptions({ extras: { b: 1 } }))).toBe(false);
  });

  it('should compare extras by identity without inspecting them', () => {
    interface Material { name: string; self?: Material }
    const material: Material = { name: 'brick' };
    material.self = material;

    const a = resolveOptions({ extras: { material, budget: BigInt(10) } });
    const b = resolveOptions({ extras: { material, budget: BigInt(10) } });
    const c = resolveOptions({ extras: { material: { name: 'brick' }, budget: BigInt(10) } });

    expect(sameOptions(a, b)).toBe(true);
    expect(sameOptions(a, c)).toBe(false);
  });
});
