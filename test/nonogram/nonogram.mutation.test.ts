import { newChromosomeSolution } from '../../src/nonogram/nonogram.chromosome';
import { rowConstraints } from '../../src/nonogram/nonogram.constraints';
import { twoPointCross, uniformCross } from '../../src/nonogram/nonogram.crossover';
import { chromosomeMutation } from '../../src/nonogram/nonogram.mutation';
import { treePuzzle } from '../../src/nonogram/nonogram.puzzles';
import type { Puzzle } from '../../src/nonogram/nonogram.types';
import { createRng } from '../../src/utils/random';
import { randomPuzzle, scriptedRng } from '../utils/test-helpers';

const oneRow: Puzzle = {
  rows: 1,
  cols: 4,
  rowConstraints: [[{ color: 1, length: 2 }]],
  colConstraints: [[], [], [], []],
};

describe('Slide mutation', () => {
  it('swaps the chosen slidable pair in place', () => {
    // Arrange: trial fires (0 < 1), then picks pair 1 of [[0, 2], [1, 3]]
    const candidate = { grid: [[0, 1, 1, 0]] };
    const rng = scriptedRng([0, 0.75]);
    // Act
    chromosomeMutation(oneRow, candidate, 1, 1, rng);
    // Assert: the run slid right
    expect(candidate.grid).toEqual([[0, 0, 1, 1]]);
    expect(rng.used()).toBe(2);
  });

  it('recomputes slides between trials of the same row', () => {
    // Arrange: both trials fire and take the first pair
    const candidate = { grid: [[0, 1, 1, 0]] };
    const rng = scriptedRng([0, 0, 0, 0]);
    // Act
    chromosomeMutation(oneRow, candidate, 1, 2, rng);
    // Assert: slid left to [1, 1, 0, 0], then back by that row's only pair [0, 2]
    expect(rng.used()).toBe(4);
    expect(candidate.grid).toEqual([[0, 1, 1, 0]]);
  });

  it('leaves the row unchanged when no trial fires', () => {
    const candidate = { grid: [[0, 1, 1, 0]] };
    chromosomeMutation(oneRow, candidate, 0, 5, createRng(1));
    expect(candidate.grid).toEqual([[0, 1, 1, 0]]);
  });

  it('skips rows without slidable pairs', () => {
    // Arrange: a full row has nothing to slide, so only the trial coins are drawn
    const candidate = { grid: [[1, 1, 1]] };
    const rng = scriptedRng([0, 0]);
    // Act
    chromosomeMutation(oneRow, candidate, 1, 2, rng);
    // Assert
    expect(candidate.grid).toEqual([[1, 1, 1]]);
    expect(rng.used()).toBe(2);
  });

  it('keeps row constraints across repeated heavy mutation', () => {
    const source = createRng('mutation');
    const puzzles = [treePuzzle(), randomPuzzle(6, 9, 3, source), randomPuzzle(4, 12, 2, source)];
    for (const puzzle of puzzles) {
      const rng = createRng(17);
      const candidate = newChromosomeSolution(puzzle, rng);
      for (let round = 0; round < 50; round++) {
        chromosomeMutation(puzzle, candidate, 0.8, 7, rng);
        expect(rowConstraints(candidate)).toEqual(puzzle.rowConstraints);
      }
    }
  });

  it('keeps row constraints when mutation and crossover are composed', () => {
    const source = createRng('composed');
    const puzzles = [treePuzzle(), randomPuzzle(7, 8, 3, source)];
    for (const puzzle of puzzles) {
      const rng = createRng(29);
      for (let round = 0; round < 20; round++) {
        // Arrange: mutate one ancestor before crossing
        const a1 = newChromosomeSolution(puzzle, rng);
        const a2 = newChromosomeSolution(puzzle, rng);
        chromosomeMutation(puzzle, a1, 0.7, 5, rng);
        // Act: cross both ways, then mutate the children
        const children = [
          ...uniformCross(puzzle, a1, a2, 0.5, rng),
          ...twoPointCross(puzzle, a1, a2, 0.6, rng),
          ...twoPointCross(puzzle, a2, a1, 0.6, rng, 'rows'),
        ];
        children.forEach((child) => chromosomeMutation(puzzle, child, 0.7, 5, rng));
        // Assert
        for (const child of children) {
          expect(rowConstraints(child)).toEqual(puzzle.rowConstraints);
        }
      }
    }
  });
});
