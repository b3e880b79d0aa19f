import { DEFAULT_SEARCH_OPTIONS, DEFAULT_SEED } from './nonogram/nonogram.constants';
import { validatePuzzle } from './nonogram/nonogram.constraints';
import {
  evolve,
  initialPopulation,
  resolveSearchOptions,
} from './nonogram/nonogram.evolve';
import type {
  EvolutionState,
  ResolvedSearchOptions,
  SearchStatus,
} from './nonogram/nonogram.evolve';
import { createHistory } from './nonogram/nonogram.history';
import { medianScore } from './nonogram/nonogram.selection';
import {
  exportHistoryCSV,
  exportHistoryJSONL,
} from './nonogram/nonogram.telemetry.exports';
import type {
  History,
  Population,
  Puzzle,
  RandomFn,
  ScoredSolution,
  SearchOptions,
} from './nonogram/nonogram.types';
import {
  createRng,
  restoreRng,
  type RandomState,
  type SeededRandom,
} from './utils/random';

/**
 * Construction options for {@link NonogramEvolution}.
 *
 * Every search field is optional and falls back to the defaults used by
 * `solveNonogram`. Randomness comes from `rng` when given, otherwise from a
 * `seedrandom` generator seeded with `seed` (default 23); only the seeded form
 * supports RNG snapshots.
 *
 * Example:
 * const evolution = new NonogramEvolution(puzzle, { populationSize: 100, seed: 7 });
 */
export interface EvolutionOptions extends Partial<SearchOptions> {
  seed?: number;
  rng?: RandomFn;
}

/**
 * Stateful driver of one evolutionary search over a nonogram puzzle.
 *
 * The population is created (and scored) in the constructor; each
 * {@link evolve} call performs one loop iteration and {@link run} drives the
 * loop until the search is Won or Exhausted. Generation bookkeeping lives in
 * the `history`, the only part meant to outlive the run.
 *
 * Example:
 * const evolution = new NonogramEvolution(treePuzzle(), { seed: 23 });
 * const history = evolution.run();
 * if (history.winner.ok) console.log(formatSolution(history.winner.solution));
 */
export default class NonogramEvolution implements EvolutionState {
  readonly puzzle: Puzzle;
  readonly options: ResolvedSearchOptions;
  population: Population;
  history: History;
  status: SearchStatus = 'running';
  generation: number = 0;
  random: RandomFn;
  /** Seeded generator backing `random`, when the run owns one. */
  private _seeded?: SeededRandom;

  constructor(puzzle: Puzzle, options: EvolutionOptions = {}) {
    validatePuzzle(puzzle);
    const { seed, rng, ...search } = options;
    this.puzzle = puzzle;
    this.options = resolveSearchOptions({ ...DEFAULT_SEARCH_OPTIONS, ...search });
    if (rng) {
      this.random = rng;
    } else {
      this._seeded = createRng(seed ?? DEFAULT_SEED);
      this.random = this._seeded;
    }
    this.population = initialPopulation(
      puzzle,
      this.options.populationSize,
      this.random
    );
    this.history = createHistory(this.population[0].solution);
  }

  /**
   * Run one loop iteration (record, test for a winner, reproduce).
   * @returns the status after the step
   */
  evolve(): SearchStatus {
    return evolve.call(this);
  }

  /** Drive the loop to completion and return the history. */
  run(): History {
    let status = this.evolve();
    while (status === 'running') status = this.evolve();
    return this.history;
  }

  /** Best entry of the current population. */
  getFittest(): ScoredSolution {
    return this.population[0];
  }

  /** Median score of the current population. */
  getMedian(): number {
    return medianScore(this.population);
  }

  /** Recorded history (shared reference, updated in place). */
  getHistory(): History {
    return this.history;
  }

  /** Produce `count` samples from the run's generator (advances it). */
  sampleRandom(count: number): number[] {
    const samples: number[] = [];
    for (let i = 0; i < count; i++) samples.push(this.random());
    return samples;
  }

  /**
   * Capture the generator state for deterministic replay; `undefined` when
   * the run was given an external `rng`.
   */
  snapshotRNGState(): RandomState | undefined {
    return this._seeded?.state();
  }

  /**
   * Continue from a state captured by {@link snapshotRNGState}. Replaces any
   * external `rng` the run was built with.
   */
  restoreRNGState(state: RandomState): void {
    this._seeded = restoreRng(state);
    this.random = this._seeded;
  }

  /** Recorded generations as JSON Lines. */
  exportHistoryJSONL(): string {
    return exportHistoryJSONL(this.history);
  }

  /** Recorded generations as CSV. */
  exportHistoryCSV(): string {
    return exportHistoryCSV(this.history);
  }
}
