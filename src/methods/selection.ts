/**
 * Parent selection methods.
 *
 * Scores are distances (lower is better), so every method here favours the
 * smallest score.
 *
 * @see {@link https://en.wikipedia.org/wiki/Selection_(genetic_algorithm)|Selection (genetic algorithm) - Wikipedia}
 */
export const selection = {
  /**
   * Tournament Selection.
   *
   * Draws `size` distinct individuals uniformly without replacement and
   * returns the one with the lowest score; on ties the first drawn wins.
   * Larger tournaments raise selection pressure.
   *
   * @property {number} size - Individuals per tournament. Must not exceed the population size. Defaults to 3.
   */
  TOURNAMENT: {
    size: 3,
  },
};
