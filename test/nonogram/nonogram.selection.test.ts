import { InvalidOptionsError } from '../../src/nonogram/nonogram.errors';
import {
  emptyTreeSolution,
  treePuzzle,
  treeSolution,
} from '../../src/nonogram/nonogram.puzzles';
import {
  medianScore,
  preserveElitePopulation,
  sortPopulation,
  tournamentSelection,
} from '../../src/nonogram/nonogram.selection';
import type { Population } from '../../src/nonogram/nonogram.types';
import { scriptedRng } from '../utils/test-helpers';

/** Population with the given scores; each solution is tagged by its index. */
function scored(scores: number[]): Population {
  return scores.map((score, index) => ({ solution: { grid: [[index]] }, score }));
}

describe('Selection and replacement', () => {
  describe('tournamentSelection', () => {
    it('returns the lowest-scoring contender', () => {
      // Arrange: draws floor(0.5 * 4) = 2 (score 9) and floor(0.8 * 4) = 3 (score 2)
      const population = scored([5, 2, 9, 2]);
      // Act
      const winner = tournamentSelection(population, 2, scriptedRng([0.5, 0.8]));
      // Assert
      expect(winner).toBe(population[3].solution);
    });

    it('keeps the first-drawn contender on ties', () => {
      const population = scored([5, 2, 9, 2]);
      const winner = tournamentSelection(population, 2, scriptedRng([0.8, 0.3]));
      expect(winner).toBe(population[3].solution);
    });

    it('redraws an index already in the tournament', () => {
      // Arrange: 0.3 -> index 1 twice, then 0.0 -> index 0
      const population = scored([5, 2, 9, 2]);
      const rng = scriptedRng([0.3, 0.3, 0.0]);
      // Act
      const winner = tournamentSelection(population, 2, rng);
      // Assert
      expect(winner).toBe(population[1].solution);
      expect(rng.used()).toBe(3);
    });

    it('lets a full-size tournament pick the best entry', () => {
      const population = scored([4, 1, 7]);
      const winner = tournamentSelection(population, 3, scriptedRng([0.9, 0.0, 0.5]));
      expect(winner).toBe(population[1].solution);
    });

    it('rejects empty or oversized tournaments', () => {
      const population = scored([1, 2]);
      expect(() => tournamentSelection(population, 0, scriptedRng([]))).toThrow(
        InvalidOptionsError
      );
      expect(() => tournamentSelection(population, 3, scriptedRng([]))).toThrow(
        'Tournament size must be between 1 and the population size (2), got 3'
      );
    });
  });

  describe('sortPopulation', () => {
    it('orders ascending and keeps equal scores in their original order', () => {
      const population = scored([3, 1, 3, 0]);
      sortPopulation(population);
      expect(population.map((entry) => entry.solution.grid[0][0])).toEqual([3, 1, 0, 2]);
    });
  });

  describe('preserveElitePopulation', () => {
    it('keeps the best of parents and scored offspring at the same size', () => {
      // Arrange: offspring score 0 (solved) and 15 (empty grid)
      const population = scored([1, 3]);
      // Act
      const next = preserveElitePopulation(treePuzzle(), population, [
        emptyTreeSolution(),
        treeSolution(),
      ]);
      // Assert
      expect(next.map((entry) => entry.score)).toEqual([0, 1]);
      expect(next[1]).toBe(population[0]);
    });

    it('prefers a current member over an equally scored newcomer', () => {
      const population = scored([0]);
      const next = preserveElitePopulation(treePuzzle(), population, [treeSolution()]);
      expect(next).toHaveLength(1);
      expect(next[0]).toBe(population[0]);
    });

    it('never lets the best score get worse', () => {
      const population = scored([2, 5, 8]);
      const next = preserveElitePopulation(treePuzzle(), population, [
        emptyTreeSolution(),
        emptyTreeSolution(),
        emptyTreeSolution(),
      ]);
      expect(next.map((entry) => entry.score)).toEqual([2, 5, 8]);
    });
  });

  describe('medianScore', () => {
    it('averages the two central scores of an even population', () => {
      expect(medianScore(scored([1, 2, 3, 4]))).toBe(2.5);
    });

    it('takes the central score of an odd population', () => {
      expect(medianScore(scored([1, 5, 9]))).toBe(5);
    });

    it('is NaN for an empty population', () => {
      expect(medianScore([])).toBeNaN();
    });
  });
});
