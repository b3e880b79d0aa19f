/**
 * Shared constants for the nonogram engine.
 *
 * Default hyperparameters and the sweep grids live here so tuning happens in
 * one place.
 */

import type { SearchOptions, SweepGrid } from './nonogram.types';
import { selection } from '../methods/selection';

/** Palette index of background cells. */
export const BACKGROUND = 0;

/** Probability that the sampler inserts a random gap before a segment. */
export const GAP_PROBABILITY = 0.5;

/** Seed used by `solveNonogram` when the caller supplies none. */
export const DEFAULT_SEED = 23;

/** Hyperparameters used by `solveNonogram`. */
export const DEFAULT_SEARCH_OPTIONS: Readonly<SearchOptions> = {
  populationSize: 500,
  crossProbability: 0.6,
  mutationProbability: 0.1,
  tournamentSize: selection.TOURNAMENT.size,
  slideTries: 3,
  maxIterations: 300,
};

/** Grids explored by the `anova` parameter sweep (270 combinations). */
export const DEFAULT_SWEEP_GRID: Readonly<SweepGrid> = {
  crossProbabilities: [0.3, 0.6, 0.9],
  mutationProbabilities: [0.1, 0.2, 0.3],
  slideTries: [3, 5, 7],
  seeds: [11, 13, 17, 19, 23, 29, 31, 37, 41, 43],
  populationSize: 500,
  tournamentSize: selection.TOURNAMENT.size,
  maxIterations: 300,
};
