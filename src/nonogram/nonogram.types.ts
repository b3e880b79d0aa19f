/**
 * Shared structural types for the nonogram evolutionary engine.
 *
 * These are kept plain (no classes) so that puzzles and solutions cross the
 * boundary to editors, persistence layers and plotters as ordinary data.
 *
 * Guidelines:
 * - Palette index `0` is always the background; segments never carry it.
 * - Grids are row-major: `grid[row][col]`.
 */

import type { RandomFn } from '../utils/random';

export type { RandomFn };

/**
 * One maximal run of a single color along a line.
 *
 * @example
 * const leaves: Segment = { color: 1, length: 3 };
 */
export interface Segment {
  /** Palette index, never the background. */
  color: number;
  /** Positive run length. */
  length: number;
}

/** Ordered constraint list of a single row or column. */
export type LineConstraints = Segment[];

/**
 * Puzzle definition: dimensions plus target constraints for every line.
 * Read-only to the engine.
 */
export interface Puzzle {
  rows: number;
  cols: number;
  /** One entry per row, top to bottom. */
  rowConstraints: LineConstraints[];
  /** One entry per column, left to right. */
  colConstraints: LineConstraints[];
}

/** Rectangular grid of palette indices (`0` = background). */
export type Grid = number[][];

/**
 * Candidate or final solution grid. Mutable working state: mutation edits the
 * grid in place.
 */
export interface Solution {
  grid: Grid;
}

/** Population entry; populations are kept ascending by `score`. */
export interface ScoredSolution {
  solution: Solution;
  /** Distance to the target column constraints; `0` is an exact match. */
  score: number;
}

/** Working population, ascending by score. */
export type Population = ScoredSolution[];

/**
 * Outcome of a search. `ok: true` means a zero score was reached (Won);
 * `ok: false` carries the best-effort solution of the final generation
 * (Exhausted). Neither is an error.
 */
export type SearchOutcome =
  | { ok: true; solution: Solution }
  | { ok: false; solution: Solution };

/**
 * Per-run score trajectories plus the outcome.
 *
 * `best`, `median` and `worst` hold one value per recorded generation, so
 * their length always equals `iterations`.
 */
export interface History {
  iterations: number;
  best: number[];
  /** May be fractional (mean of the two central scores for even sizes). */
  median: number[];
  worst: number[];
  winner: SearchOutcome;
}

/** Axis whose length bounds the two-point crossover's split points. */
export type TwoPointAxis = 'cols' | 'rows';

/** Snapshot of one recorded generation, handed to `onGeneration`. */
export interface GenerationEntry {
  /** Zero-based generation index. */
  generation: number;
  best: number;
  median: number;
  worst: number;
}

/**
 * Hyperparameters of one evolutionary search.
 */
export interface SearchOptions {
  populationSize: number;
  /** Row-keeping probability for uniform crossover; application probability for two-point. */
  crossProbability: number;
  /** Per-trial probability of attempting a slide. */
  mutationProbability: number;
  tournamentSize: number;
  /** Slide trials per row per offspring. */
  slideTries: number;
  maxIterations: number;
  /** Defaults to `'cols'`. */
  twoPointAxis?: TwoPointAxis;
  /** Crossover operators picked uniformly per offspring pair. Defaults to uniform + two-point. */
  crossover?: CrossoverName[];
  /** Checked once per generation; an aborted search ends as Exhausted. */
  signal?: AbortSignal;
  /** Invoked after each generation is recorded. */
  onGeneration?: (entry: GenerationEntry) => void;
}

/** Names of the available crossover operators. */
export type CrossoverName = 'UNIFORM' | 'TWO_POINT';

/** Value grids explored by the parameter sweep. */
export interface SweepGrid {
  crossProbabilities: number[];
  mutationProbabilities: number[];
  slideTries: number[];
  seeds: number[];
  populationSize: number;
  tournamentSize: number;
  maxIterations: number;
}

/** One fully specified sweep combination. */
export interface SweepParameters {
  populationSize: number;
  crossProbability: number;
  mutationProbability: number;
  tournamentSize: number;
  slideTries: number;
  maxIterations: number;
  seed: number;
}

/** Result of a single sweep trial. */
export interface SweepTrial {
  parameters: SweepParameters;
  /** Best score of the final recorded generation. */
  finalBest: number;
  iterations: number;
  solved: boolean;
}

/**
 * Sweep summary. `parameters` is `undefined` when no trial ran; a best score
 * above zero ("nothing converged") is a normal outcome.
 */
export interface SweepResult {
  bestScore: number;
  parameters?: SweepParameters;
  trials: SweepTrial[];
}
