export { config } from './config';
export type { NonogramConfig } from './config';
export { default as NonogramEvolution } from './evolution';
export type { EvolutionOptions } from './evolution';
export { crossover, ALL_CROSSOVERS } from './methods/crossover';
export { selection } from './methods/selection';

export * from './nonogram/nonogram.types';
export {
  BACKGROUND,
  DEFAULT_SEARCH_OPTIONS,
  DEFAULT_SEED,
  DEFAULT_SWEEP_GRID,
} from './nonogram/nonogram.constants';
export * from './nonogram/nonogram.errors';
export * from './nonogram/nonogram.constraints';
export { newChromosomeSolution } from './nonogram/nonogram.chromosome';
export { score, lengthScore, alignSegments } from './nonogram/nonogram.fitness';
export { getSlidables } from './nonogram/nonogram.slidables';
export type { SlidePair } from './nonogram/nonogram.slidables';
export { uniformCross, twoPointCross } from './nonogram/nonogram.crossover';
export type { Offspring } from './nonogram/nonogram.crossover';
export { chromosomeMutation } from './nonogram/nonogram.mutation';
export {
  tournamentSelection,
  preserveElitePopulation,
  sortPopulation,
  medianScore,
} from './nonogram/nonogram.selection';
export type { SearchStatus } from './nonogram/nonogram.evolve';
export { evolutiveSearch, solveNonogram } from './nonogram/nonogram.search';
export { anova } from './nonogram/nonogram.sweep';
export {
  exportHistoryJSONL,
  exportHistoryCSV,
  exportSweepCSV,
} from './nonogram/nonogram.telemetry.exports';
export { formatSolution, formatConstraints } from './nonogram/nonogram.format';
export {
  treePuzzle,
  treeSolution,
  emptyTreeSolution,
  LEAVES,
  WOOD,
} from './nonogram/nonogram.puzzles';
export { createRng, restoreRng } from './utils/random';
export type { RandomState, SeededRandom } from './utils/random';
