import type { CrossoverName, TwoPointAxis } from '../nonogram/nonogram.types';

/** Split-point axis used when a search does not choose one. */
const DEFAULT_TWO_POINT_AXIS: TwoPointAxis = 'cols';

/** Descriptor shape shared by every crossover entry. */
export interface CrossoverDescriptor {
  name: CrossoverName;
  /** Dimension the split points are drawn from, for operators that split. */
  axis?: TwoPointAxis;
}

/**
 * Row-preserving crossover methods.
 *
 * Both recombine whole rows and never split one, which is what keeps every
 * child row-valid without a repair step. The search loop picks among the
 * configured names uniformly for each offspring pair; with both enabled that
 * is a fair coin flip.
 *
 * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)}
 */
export const crossover = {
  /**
   * Uniform crossover.
   * Each row independently stays with its ancestor (probability
   * `crossProbability`) or is exchanged.
   *
   * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)#Uniform_crossover}
   */
  UNIFORM: {
    name: 'UNIFORM',
  },

  /**
   * Two-point crossover.
   * A contiguous block of rows between two split points is exchanged, applied
   * with probability `crossProbability`.
   *
   * @property axis - Dimension the split points are drawn from. Defaults to `'cols'`.
   * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)#Two-point_and_k-point_crossover}
   */
  TWO_POINT: {
    name: 'TWO_POINT',
    axis: DEFAULT_TWO_POINT_AXIS,
  },
} satisfies Record<CrossoverName, CrossoverDescriptor>;

/** Every crossover name, in declaration order. */
export const ALL_CROSSOVERS: CrossoverName[] = [
  crossover.UNIFORM.name,
  crossover.TWO_POINT.name,
];
