import { BACKGROUND } from './nonogram.constants';
import { EmptyGridError, InvalidPuzzleError } from './nonogram.errors';
import type {
  Grid,
  LineConstraints,
  Puzzle,
  Solution,
} from './nonogram.types';

/**
 * Run-length encode a single line into its constraint list.
 *
 * Consecutive cells of the same nonzero color form one segment; background
 * cells close the current run without producing a segment. Two adjacent runs
 * of different colors produce two segments with no gap between them.
 *
 * @example
 * encodeLine([0, 1, 1, 2, 0, 1]);
 * // [{ color: 1, length: 2 }, { color: 2, length: 1 }, { color: 1, length: 1 }]
 */
export function encodeLine(line: readonly number[]): LineConstraints {
  const segments: LineConstraints = [];
  let runColor = BACKGROUND;
  let runLength = 0;
  for (const color of line) {
    if (color === runColor) {
      runLength++;
      continue;
    }
    if (runColor !== BACKGROUND && runLength > 0)
      segments.push({ color: runColor, length: runLength });
    runColor = color;
    runLength = 1;
  }
  if (runColor !== BACKGROUND && runLength > 0)
    segments.push({ color: runColor, length: runLength });
  return segments;
}

/** Number of rows in the grid. */
export function solutionRows(solution: Solution): number {
  return solution.grid.length;
}

/**
 * Number of columns, read from the first row.
 *
 * @throws EmptyGridError when the grid has no rows.
 */
export function solutionCols(solution: Solution): number {
  if (solution.grid.length === 0) throw new EmptyGridError();
  return solution.grid[0].length;
}

/** Row constraints derived from the grid, top to bottom. */
export function rowConstraints(solution: Solution): LineConstraints[] {
  return solution.grid.map((row) => encodeLine(row));
}

/**
 * Column constraints derived from the grid, left to right, each column
 * scanned top to bottom.
 *
 * @throws EmptyGridError when the grid has no rows.
 */
export function colConstraints(solution: Solution): LineConstraints[] {
  const cols = solutionCols(solution);
  const constraints: LineConstraints[] = [];
  for (let col = 0; col < cols; col++) {
    constraints.push(encodeLine(solution.grid.map((row) => row[col])));
  }
  return constraints;
}

/**
 * Build a puzzle whose constraints are exactly those realised by `solution`
 * (used to turn an edited grid into something to solve).
 */
export function puzzleFromSolution(solution: Solution): Puzzle {
  return {
    rows: solutionRows(solution),
    cols: solutionCols(solution),
    rowConstraints: rowConstraints(solution),
    colConstraints: colConstraints(solution),
  };
}

/**
 * Minimum cells a line needs for its constraints: the total segment length
 * plus one separator for every adjacent pair of equal-colored segments.
 */
export function minimumLineWidth(segments: LineConstraints): number {
  let width = 0;
  segments.forEach((segment, i) => {
    width += segment.length;
    if (i > 0 && segments[i - 1].color === segment.color) width++;
  });
  return width;
}

/** All-background solution of the given size. */
export function createSolution(rows: number, cols: number): Solution {
  const grid: Grid = [];
  for (let r = 0; r < rows; r++) grid.push(new Array<number>(cols).fill(BACKGROUND));
  return { grid };
}

/** Deep copy of a solution's grid. */
export function cloneSolution(solution: Solution): Solution {
  return { grid: solution.grid.map((row) => row.slice()) };
}

/** Structural equality of two constraint lists. */
export function sameConstraints(
  a: readonly LineConstraints[],
  b: readonly LineConstraints[]
): boolean {
  if (a.length !== b.length) return false;
  return a.every(
    (line, i) =>
      line.length === b[i].length &&
      line.every(
        (segment, j) =>
          segment.color === b[i][j].color && segment.length === b[i][j].length
      )
  );
}

/**
 * Reject puzzles no grid can realise.
 *
 * Checks positive integer dimensions, one constraint list per row and per
 * column, nonzero colors and positive integer lengths, and that every line's
 * {@link minimumLineWidth} fits the line.
 *
 * @throws InvalidPuzzleError naming the first offending line.
 */
export function validatePuzzle(puzzle: Puzzle): void {
  const { rows, cols } = puzzle;
  if (!Number.isInteger(rows) || rows <= 0)
    throw new InvalidPuzzleError(`Row count must be a positive integer (got ${rows})`);
  if (!Number.isInteger(cols) || cols <= 0)
    throw new InvalidPuzzleError(`Column count must be a positive integer (got ${cols})`);
  if (puzzle.rowConstraints.length !== rows)
    throw new InvalidPuzzleError(
      `Expected ${rows} row constraint lists, got ${puzzle.rowConstraints.length}`
    );
  if (puzzle.colConstraints.length !== cols)
    throw new InvalidPuzzleError(
      `Expected ${cols} column constraint lists, got ${puzzle.colConstraints.length}`
    );
  checkLines('row', puzzle.rowConstraints, cols);
  checkLines('column', puzzle.colConstraints, rows);
}

function checkLines(
  kind: 'row' | 'column',
  lines: readonly LineConstraints[],
  size: number
): void {
  lines.forEach((segments, index) => {
    for (const segment of segments) {
      if (!Number.isInteger(segment.color) || segment.color <= BACKGROUND)
        throw new InvalidPuzzleError(
          `${kind} ${index + 1} has a segment with invalid color ${segment.color}`
        );
      if (!Number.isInteger(segment.length) || segment.length <= 0)
        throw new InvalidPuzzleError(
          `${kind} ${index + 1} has a segment with invalid length ${segment.length}`
        );
    }
    const width = minimumLineWidth(segments);
    if (width > size)
      throw new InvalidPuzzleError(
        `${kind} ${index + 1} needs ${width} cells but only ${size} are available`
      );
  });
}
