import { config } from '../config';
import { DEFAULT_SWEEP_GRID } from './nonogram.constants';
import { validatePuzzle } from './nonogram.constraints';
import { evolutiveSearch } from './nonogram.search';
import type {
  Puzzle,
  SweepGrid,
  SweepParameters,
  SweepResult,
  SweepTrial,
} from './nonogram.types';
import { createRng } from '../utils/random';

/**
 * Exhaustive hyperparameter sweep.
 *
 * Runs one search for every combination of cross probability, mutation
 * probability, slide tries and seed in `grid` (in that nesting order, seeds
 * innermost), each with a fresh generator seeded from the combination's seed
 * and the grid's fixed population, tournament and iteration settings.
 *
 * The winning combination is the first one whose final best score is
 * strictly lower than every earlier one. A best score above zero simply means
 * no combination converged; it is reported, not thrown.
 *
 * Diagnostic only: nothing here changes how `solveNonogram` behaves.
 *
 * @param grid - Overrides for the default grids (3 x 3 x 3 x 10 combinations at population 500).
 * @example
 * const result = anova(treePuzzle(), { seeds: [1, 2], populationSize: 50 });
 * console.log(result.bestScore, result.parameters);
 */
export function anova(puzzle: Puzzle, grid: Partial<SweepGrid> = {}): SweepResult {
  validatePuzzle(puzzle);
  const sweep: SweepGrid = { ...DEFAULT_SWEEP_GRID, ...grid };
  const trials: SweepTrial[] = [];
  let bestScore = Number.POSITIVE_INFINITY;
  let best: SweepParameters | undefined;

  for (const crossProbability of sweep.crossProbabilities) {
    for (const mutationProbability of sweep.mutationProbabilities) {
      for (const slideTries of sweep.slideTries) {
        for (const seed of sweep.seeds) {
          const parameters: SweepParameters = {
            populationSize: sweep.populationSize,
            crossProbability,
            mutationProbability,
            tournamentSize: sweep.tournamentSize,
            slideTries,
            maxIterations: sweep.maxIterations,
            seed,
          };
          if (config.logProgress)
            console.log(
              `Testing parameters: cross_prob = ${crossProbability}, mut_prob = ${mutationProbability}, slide_tries = ${slideTries}, seed = ${seed}...`
            );

          const history = evolutiveSearch(puzzle, parameters, createRng(seed));
          const finalBest = history.best.length
            ? history.best[history.best.length - 1]
            : Number.POSITIVE_INFINITY;
          trials.push({
            parameters,
            finalBest,
            iterations: history.iterations,
            solved: history.winner.ok,
          });
          if (config.logProgress) console.log(`Obtained a score of: ${finalBest}`);

          if (finalBest < bestScore) {
            bestScore = finalBest;
            best = parameters;
          }
        }
      }
    }
  }

  if (config.logProgress) {
    if (best)
      console.log(
        `The best score was ${bestScore} with the parameters: ${JSON.stringify(best)}`
      );
    else console.log("A valid combination wasn't found");
  }
  return { bestScore, parameters: best, trials };
}
