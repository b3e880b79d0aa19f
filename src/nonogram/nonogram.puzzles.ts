/**
 * Built-in puzzles.
 */
import { createSolution } from './nonogram.constraints';
import type { Puzzle, Solution } from './nonogram.types';

/** Palette index of the tree's leaves. */
export const LEAVES = 1;
/** Palette index of the tree's trunk. */
export const WOOD = 2;

const TREE_ROWS = 5;
const TREE_COLS = 5;

/**
 * 5x5 two-color tree: a leafy crown over a one-cell trunk.
 *
 * ```
 * . 1 1 1 .
 * 1 1 1 1 1
 * 1 1 2 1 1
 * . . 2 . .
 * . . 2 . .
 * ```
 */
export function treePuzzle(): Puzzle {
  return {
    rows: TREE_ROWS,
    cols: TREE_COLS,
    rowConstraints: [
      [{ color: LEAVES, length: 3 }],
      [{ color: LEAVES, length: 5 }],
      [
        { color: LEAVES, length: 2 },
        { color: WOOD, length: 1 },
        { color: LEAVES, length: 2 },
      ],
      [{ color: WOOD, length: 1 }],
      [{ color: WOOD, length: 1 }],
    ],
    colConstraints: [
      [{ color: LEAVES, length: 2 }],
      [{ color: LEAVES, length: 3 }],
      [
        { color: LEAVES, length: 2 },
        { color: WOOD, length: 3 },
      ],
      [{ color: LEAVES, length: 3 }],
      [{ color: LEAVES, length: 2 }],
    ],
  };
}

/** The grid realising {@link treePuzzle}. */
export function treeSolution(): Solution {
  return {
    grid: [
      [0, 1, 1, 1, 0],
      [1, 1, 1, 1, 1],
      [1, 1, 2, 1, 1],
      [0, 0, 2, 0, 0],
      [0, 0, 2, 0, 0],
    ],
  };
}

/** Blank canvas with the tree's dimensions. */
export function emptyTreeSolution(): Solution {
  return createSolution(TREE_ROWS, TREE_COLS);
}
