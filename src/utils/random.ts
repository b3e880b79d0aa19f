import seedrandom from 'seedrandom';

/**
 * Seedable pseudo-random number generation for the evolutionary engine.
 *
 * Every randomness-consuming function in this library takes a {@link RandomFn}
 * explicitly; nothing reads `Math.random`. A run is therefore reproducible
 * from its seed alone, which the regression tests rely on.
 *
 * Generators are ARC4-based `seedrandom` instances created with state
 * tracking enabled so they can be snapshotted and restored.
 *
 * @module utils/random
 */

/** Uniform generator returning numbers in `[0, 1)`. */
export type RandomFn = () => number;

/** Seeded generator that also exposes its internal state. */
export type SeededRandom = seedrandom.StatefulPRNG<seedrandom.State.Arc4>;

/** Opaque, JSON-serializable generator state. */
export type RandomState = seedrandom.State.Arc4;

/**
 * Create a deterministic generator for `seed`.
 *
 * @example
 * const rng = createRng(23);
 * const a = rng();
 * createRng(23)() === a; // true
 */
export function createRng(seed: number | string): SeededRandom {
  return seedrandom(String(seed), { state: true });
}

/**
 * Recreate a generator positioned exactly where `state` was captured.
 *
 * @example
 * const rng = createRng(1);
 * const snap = rng.state();
 * const next = rng();
 * restoreRng(snap)() === next; // true
 */
export function restoreRng(state: RandomState): SeededRandom {
  return seedrandom('', { state });
}

/** Bernoulli trial: `true` with probability `probability`. */
export function randomBool(rng: RandomFn, probability: number): boolean {
  return rng() < probability;
}

/**
 * Uniform integer in `[min, maxExclusive)`. Callers guarantee the range is
 * non-empty.
 */
export function randomInt(
  rng: RandomFn,
  min: number,
  maxExclusive: number
): number {
  return min + Math.floor(rng() * (maxExclusive - min));
}

/** Uniformly chosen element of a non-empty array. */
export function randomChoice<T>(rng: RandomFn, items: readonly T[]): T {
  return items[randomInt(rng, 0, items.length)];
}
