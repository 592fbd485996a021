/**
 * Floor Elements - Seeding
 *
 * Deterministic seed derivation and seeded generators.
 *
 * Every independent consumer of randomness (a branch such as "doors", or a
 * single element slot) derives its own seed from its parent. Nothing shares
 * a generator instance, so a density change in one branch never shifts the
 * output of another.
 */

/** Exclusive upper bound of every derived seed (2^31) */
export const SEED_MODULUS = 0x80000000;

const FNV_OFFSET = 2166136261;
const FNV_PRIME = 16777619;

export type SeedIdentifier = string | number;

/**
 * Error thrown for seeds or identifiers that cannot be derived from.
 */
export class SeedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SeedError';
  }
}

/**
 * Explicit pseudorandom generator instance
 */
export interface Rng {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform float in [min, max) */
  uniform(min: number, max: number): number;
}

function hashString(value: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

function mixUint32(value: number): number {
  let x = value >>> 0;
  x ^= x >>> 16;
  x = Math.imul(x, 0x7feb352d);
  x ^= x >>> 15;
  x = Math.imul(x, 0x846ca68b);
  x ^= x >>> 16;
  return x >>> 0;
}

function assertSeed(seed: number): void {
  if (!Number.isSafeInteger(seed) || seed < 0) {
    throw new SeedError(`seed must be a non-negative safe integer (got ${seed})`);
  }
}

function encodeIdentifier(id: SeedIdentifier): string {
  if (typeof id === 'string') {
    return `|s:${id}`;
  }
  if (!Number.isSafeInteger(id)) {
    throw new SeedError(`numeric seed identifiers must be safe integers (got ${id})`);
  }
  return `|n:${id}`;
}

/**
 * Derives a child seed from a parent seed and an ordered identifier tuple.
 *
 * The tuple is encoded as `parent|s:<string>|n:<number>...`, hashed with
 * 32-bit FNV-1a, avalanched, and masked to 31 bits. Same inputs always give
 * the same seed; the result is in [0, 2^31).
 *
 * @throws {SeedError} If the parent seed or an identifier is invalid
 *
 * @example
 * ```typescript
 * const doorSeed = deriveSeed(12345, 'doors');
 * const firstDoor = deriveSeed(doorSeed, 'door', 0);
 * ```
 */
export function deriveSeed(parentSeed: number, ...identifiers: SeedIdentifier[]): number {
  assertSeed(parentSeed);
  let encoded = String(parentSeed);
  for (const id of identifiers) {
    encoded += encodeIdentifier(id);
  }
  return mixUint32(hashString(encoded)) & 0x7fffffff;
}

/**
 * Derives `count` sibling seeds: `deriveSeed(seed, 0)`, `deriveSeed(seed, 1)`, ...
 */
export function splitSeed(seed: number, count: number): number[] {
  const seeds: number[] = [];
  for (let i = 0; i < count; i++) {
    seeds.push(deriveSeed(seed, i));
  }
  return seeds;
}

/** Offset added to every seed to form the initial generator state */
const RNG_STATE_OFFSET = 0x9e3779b9;

/**
 * Creates a Mulberry32 generator seeded with `seed`.
 * The initial state is `seed + 0x9e3779b9` (mod 2^32), a bijection over
 * [0, 2^32), so no two derived seeds share a stream.
 */
export function createRng(seed: number): Rng {
  assertSeed(seed);
  let state = (seed + RNG_STATE_OFFSET) >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    uniform: (min, max) => min + (max - min) * next()
  };
}
