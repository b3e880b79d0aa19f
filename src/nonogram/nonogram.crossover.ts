import { MismatchedDimensionsError } from './nonogram.errors';
import type {
  Puzzle,
  RandomFn,
  Solution,
  TwoPointAxis,
} from './nonogram.types';
import { randomBool, randomInt } from '../utils/random';
import { onceWarn } from '../utils/warnings';

/** Ordered pair of offspring. */
export type Offspring = [Solution, Solution];

/**
 * Ensure both ancestors carry exactly `puzzle.rows` rows.
 *
 * @throws MismatchedDimensionsError naming the offending ancestor.
 */
function assertAncestorRows(
  puzzle: Puzzle,
  ancestor1: Solution,
  ancestor2: Solution
): void {
  [ancestor1, ancestor2].forEach((ancestor, index) => {
    if (ancestor.grid.length !== puzzle.rows)
      throw new MismatchedDimensionsError(
        `Ancestor ${index + 1} has ${ancestor.grid.length} rows, expected ${puzzle.rows}`,
        puzzle.rows,
        ancestor.grid.length
      );
  });
}

/**
 * Uniform row crossover.
 *
 * For every row index, with probability `crossProbability` the first child
 * copies the first ancestor's row and the second child the second's;
 * otherwise the rows are exchanged. Rows are copied whole, so both children
 * keep every row constraint.
 *
 * @example
 * const [c1, c2] = uniformCross(puzzle, a1, a2, 0.5, rng);
 */
export function uniformCross(
  puzzle: Puzzle,
  ancestor1: Solution,
  ancestor2: Solution,
  crossProbability: number,
  rng: RandomFn
): Offspring {
  assertAncestorRows(puzzle, ancestor1, ancestor2);
  const child1: number[][] = [];
  const child2: number[][] = [];
  for (let i = 0; i < puzzle.rows; i++) {
    const row1 = ancestor1.grid[i].slice();
    const row2 = ancestor2.grid[i].slice();
    if (randomBool(rng, crossProbability)) {
      child1.push(row1);
      child2.push(row2);
    } else {
      child1.push(row2);
      child2.push(row1);
    }
  }
  return [{ grid: child1 }, { grid: child2 }];
}

/**
 * Two-point row crossover.
 *
 * With probability `1 - crossProbability` both children are plain clones.
 * Otherwise two split points are drawn uniformly from `[1, span - 1)` and
 * ordered so `point1 <= point2`; rows with index in `[point1, point2]` are
 * exchanged between the children, the rest stay with their own ancestor.
 *
 * `span` is the puzzle's column count by default (`axis = 'cols'`), which is
 * the historical behaviour of this operator even though the points index
 * rows; pass `'rows'` to draw them from the row count instead. When the span
 * leaves no interior point (fewer than 3 cells) the children are clones.
 *
 * @example
 * const [c1, c2] = twoPointCross(puzzle, a1, a2, 0.6, rng, 'rows');
 */
export function twoPointCross(
  puzzle: Puzzle,
  ancestor1: Solution,
  ancestor2: Solution,
  crossProbability: number,
  rng: RandomFn,
  axis: TwoPointAxis = 'cols'
): Offspring {
  assertAncestorRows(puzzle, ancestor1, ancestor2);
  const clones = (): Offspring => [
    { grid: ancestor1.grid.map((row) => row.slice()) },
    { grid: ancestor2.grid.map((row) => row.slice()) },
  ];
  if (!randomBool(rng, crossProbability)) return clones();

  const span = axis === 'rows' ? puzzle.rows : puzzle.cols;
  if (span < 3) {
    onceWarn(
      `two-point-span-${axis}`,
      `Two-point crossover needs at least 3 ${axis}; ${span} leaves no interior split point, children are clones`
    );
    return clones();
  }

  let point1 = randomInt(rng, 1, span - 1);
  let point2 = randomInt(rng, 1, span - 1);
  if (point1 > point2) [point1, point2] = [point2, point1];

  const child1: number[][] = [];
  const child2: number[][] = [];
  for (let i = 0; i < puzzle.rows; i++) {
    const row1 = ancestor1.grid[i].slice();
    const row2 = ancestor2.grid[i].slice();
    if (i < point1 || i > point2) {
      child1.push(row1);
      child2.push(row2);
    } else {
      child1.push(row2);
      child2.push(row1);
    }
  }
  return [{ grid: child1 }, { grid: child2 }];
}
