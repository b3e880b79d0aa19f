import { InvalidOptionsError } from './nonogram.errors';
import { score } from './nonogram.fitness';
import type {
  Population,
  Puzzle,
  RandomFn,
  ScoredSolution,
  Solution,
} from './nonogram.types';
import { randomInt } from '../utils/random';

/**
 * Sort a population in place, ascending by score (best first).
 *
 * The sort is stable, so among equal scores earlier entries stay ahead.
 */
export function sortPopulation(population: Population): Population {
  return population.sort((a, b) => a.score - b.score);
}

/**
 * Tournament selection.
 *
 * Draws `tournamentSize` distinct entries uniformly without replacement and
 * returns the solution with the lowest score; on ties the entry drawn first
 * wins. The returned solution is the population's own object, not a copy.
 *
 * Example:
 * const parent = tournamentSelection(population, 3, rng);
 *
 * @throws InvalidOptionsError when the tournament is empty or larger than the population.
 */
export function tournamentSelection(
  population: Population,
  tournamentSize: number,
  rng: RandomFn
): Solution {
  if (tournamentSize < 1 || tournamentSize > population.length) {
    throw new InvalidOptionsError(
      `Tournament size must be between 1 and the population size (${population.length}), got ${tournamentSize}`
    );
  }

  /** Indices already drawn into this tournament. */
  const drawn = new Set<number>();
  let winner: ScoredSolution | undefined;
  while (drawn.size < tournamentSize) {
    const index = randomInt(rng, 0, population.length);
    if (drawn.has(index)) continue;
    drawn.add(index);
    const contender = population[index];
    if (winner === undefined || contender.score < winner.score) winner = contender;
  }
  if (winner === undefined) throw new Error('The tournament is empty');
  return winner.solution;
}

/**
 * Elitist (mu + lambda) replacement.
 *
 * Scores the offspring, merges them behind the current population, sorts
 * ascending and keeps the first `population.length` entries. The best
 * individual seen so far is therefore never replaced by a worse one, and on
 * equal scores current members outrank newcomers.
 */
export function preserveElitePopulation(
  puzzle: Puzzle,
  population: Population,
  offspring: Solution[]
): Population {
  const size = population.length;
  const combined: Population = population.concat(
    offspring.map((solution) => ({ solution, score: score(puzzle, solution) }))
  );
  sortPopulation(combined);
  combined.length = size;
  return combined;
}

/**
 * Median score of a sorted population: the mean of the two central scores
 * for even sizes, the central score otherwise.
 */
export function medianScore(population: Population): number {
  const size = population.length;
  if (size === 0) return Number.NaN;
  const mid = Math.floor(size / 2);
  if (size % 2 === 0) return (population[mid - 1].score + population[mid].score) / 2;
  return population[mid].score;
}
