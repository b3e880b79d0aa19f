import { ALL_CROSSOVERS, crossover } from '../methods/crossover';
import { newChromosomeSolution } from './nonogram.chromosome';
import { twoPointCross, uniformCross } from './nonogram.crossover';
import { InvalidOptionsError } from './nonogram.errors';
import { score } from './nonogram.fitness';
import { markExhausted, markWinner, recordGeneration } from './nonogram.history';
import { chromosomeMutation } from './nonogram.mutation';
import {
  preserveElitePopulation,
  sortPopulation,
  tournamentSelection,
} from './nonogram.selection';
import type {
  CrossoverName,
  History,
  Population,
  Puzzle,
  RandomFn,
  SearchOptions,
  Solution,
  TwoPointAxis,
} from './nonogram.types';
import { randomChoice } from '../utils/random';

/** Search options with every optional knob resolved to a value. */
export interface ResolvedSearchOptions extends SearchOptions {
  twoPointAxis: TwoPointAxis;
  crossover: CrossoverName[];
}

/** Lifecycle of a search: Running until it is Won or Exhausted. */
export type SearchStatus = 'running' | 'won' | 'exhausted';

/**
 * State a generation step reads and advances. Implemented by
 * `NonogramEvolution`; kept structural so the step can be tested on its own.
 */
export interface EvolutionState {
  readonly puzzle: Puzzle;
  readonly options: ResolvedSearchOptions;
  /** Current population, ascending by score. */
  population: Population;
  history: History;
  status: SearchStatus;
  /** Completed replacements. */
  generation: number;
  /** Generator shared by every operator of this run. */
  random: RandomFn;
}

const isProbability = (value: number) =>
  Number.isFinite(value) && value >= 0 && value <= 1;

const isCount = (value: number, min: number) =>
  Number.isInteger(value) && value >= min;

/**
 * Validate `options` and fill in defaults for the optional operator knobs.
 *
 * @throws InvalidOptionsError naming the first invalid field.
 */
export function resolveSearchOptions(options: SearchOptions): ResolvedSearchOptions {
  const fail = (field: string, value: unknown, rule: string): never => {
    throw new InvalidOptionsError(`${field} ${rule} (got ${String(value)})`);
  };
  if (!isCount(options.populationSize, 1))
    fail('populationSize', options.populationSize, 'must be a positive integer');
  if (!isProbability(options.crossProbability))
    fail('crossProbability', options.crossProbability, 'must be within [0, 1]');
  if (!isProbability(options.mutationProbability))
    fail('mutationProbability', options.mutationProbability, 'must be within [0, 1]');
  if (
    !isCount(options.tournamentSize, 1) ||
    options.tournamentSize > options.populationSize
  )
    fail(
      'tournamentSize',
      options.tournamentSize,
      `must be an integer between 1 and populationSize (${options.populationSize})`
    );
  if (!isCount(options.slideTries, 0))
    fail('slideTries', options.slideTries, 'must be a non-negative integer');
  if (!isCount(options.maxIterations, 0))
    fail('maxIterations', options.maxIterations, 'must be a non-negative integer');

  const names = options.crossover ?? ALL_CROSSOVERS;
  if (names.length === 0 || names.some((name) => !ALL_CROSSOVERS.includes(name)))
    fail('crossover', names.join(','), `must list some of ${ALL_CROSSOVERS.join(', ')}`);

  return {
    ...options,
    twoPointAxis: options.twoPointAxis ?? crossover.TWO_POINT.axis,
    crossover: names.slice(),
  };
}

/**
 * Sample `size` chromosomes, score them, and return them sorted best first.
 */
export function initialPopulation(
  puzzle: Puzzle,
  size: number,
  rng: RandomFn
): Population {
  const population: Population = [];
  for (let i = 0; i < size; i++) {
    const solution = newChromosomeSolution(puzzle, rng);
    population.push({ solution, score: score(puzzle, solution) });
  }
  return sortPopulation(population);
}

/**
 * Produce at least `population.length` offspring.
 *
 * Pairs are built by two tournaments followed by one crossover picked
 * uniformly from `options.crossover`; both children are kept, so an odd
 * population size yields one extra child.
 */
export function recombinatePopulation(
  puzzle: Puzzle,
  population: Population,
  options: ResolvedSearchOptions,
  rng: RandomFn
): Solution[] {
  const offspring: Solution[] = [];
  const names = options.crossover;
  while (offspring.length < population.length) {
    const ancestor1 = tournamentSelection(population, options.tournamentSize, rng);
    const ancestor2 = tournamentSelection(population, options.tournamentSize, rng);
    const method = names.length === 1 ? names[0] : randomChoice(rng, names);
    const children =
      method === crossover.UNIFORM.name
        ? uniformCross(puzzle, ancestor1, ancestor2, options.crossProbability, rng)
        : twoPointCross(
            puzzle,
            ancestor1,
            ancestor2,
            options.crossProbability,
            rng,
            options.twoPointAxis
          );
    offspring.push(...children);
  }
  return offspring;
}

/** Apply slide mutation to every offspring in place. */
export function mutatePopulation(
  puzzle: Puzzle,
  offspring: Solution[],
  mutationProbability: number,
  slideTries: number,
  rng: RandomFn
): void {
  for (const descendant of offspring) {
    chromosomeMutation(puzzle, descendant, mutationProbability, slideTries, rng);
  }
}

/**
 * Advance the search by one loop iteration.
 *
 * 1. Stop as Exhausted when the iteration budget is spent or `signal` is
 *    aborted; the outcome carries the population's best entry.
 * 2. Record best / median / worst (this counts the iteration) and notify
 *    `onGeneration`.
 * 3. Stop as Won when the best score is 0.
 * 4. Otherwise recombine, mutate and replace the population elitistically.
 *
 * Calling it on a finished search is a no-op that returns the final status.
 *
 * @this EvolutionState - the run being advanced
 * @returns the status after this step
 */
export function evolve(this: EvolutionState): SearchStatus {
  if (this.status !== 'running') return this.status;
  const { puzzle, options, history } = this;

  if (options.signal?.aborted || history.iterations >= options.maxIterations) {
    markExhausted(history, this.population);
    this.status = 'exhausted';
    return this.status;
  }

  const entry = recordGeneration(history, this.population);
  options.onGeneration?.(entry);
  if (markWinner(history, this.population)) {
    this.status = 'won';
    return this.status;
  }

  const offspring = recombinatePopulation(puzzle, this.population, options, this.random);
  mutatePopulation(
    puzzle,
    offspring,
    options.mutationProbability,
    options.slideTries,
    this.random
  );
  this.population = preserveElitePopulation(puzzle, this.population, offspring);
  this.generation++;
  return this.status;
}
