import { config } from '../config';
import NonogramEvolution from '../evolution';
import { DEFAULT_SEARCH_OPTIONS, DEFAULT_SEED } from './nonogram.constants';
import { score } from './nonogram.fitness';
import { formatSolution } from './nonogram.format';
import type { History, Puzzle, RandomFn, SearchOptions } from './nonogram.types';
import { createRng } from '../utils/random';

/**
 * Run one evolutionary search to completion.
 *
 * The population is sampled from `puzzle`'s row constraints, then the loop
 * records each generation and reproduces (tournament selection, uniform or
 * two-point crossover, slide mutation, elitist replacement) until a
 * zero-score individual appears or `maxIterations` generations have been
 * recorded. Both endings return normally; read `history.winner.ok`.
 *
 * All randomness is drawn from `rng`, so a fixed seed reproduces the run.
 *
 * @example
 * const history = evolutiveSearch(treePuzzle(), DEFAULT_SEARCH_OPTIONS, createRng(23));
 * history.winner.ok; // true when solved
 */
export function evolutiveSearch(
  puzzle: Puzzle,
  options: SearchOptions,
  rng: RandomFn
): History {
  return new NonogramEvolution(puzzle, { ...options, rng }).run();
}

/**
 * Solve with the default configuration (population 500, cross 0.6,
 * mutation 0.1, tournament 3, 3 slide tries, 300 iterations, seed 23).
 * `overrides` replaces individual settings. Logs the outcome when
 * `config.logProgress` is set.
 */
export function solveNonogram(
  puzzle: Puzzle,
  overrides: Partial<SearchOptions> & { seed?: number } = {}
): History {
  const { seed = DEFAULT_SEED, ...search } = overrides;
  const history = evolutiveSearch(
    puzzle,
    { ...DEFAULT_SEARCH_OPTIONS, ...search },
    createRng(seed)
  );
  if (config.logProgress) {
    const { winner } = history;
    if (winner.ok) {
      console.log(`Nonogram solution:\n${formatSolution(winner.solution)}`);
    } else {
      console.log(
        `Best score: ${score(puzzle, winner.solution)}\nBest solution:\n${formatSolution(winner.solution)}`
      );
    }
  }
  return history;
}
