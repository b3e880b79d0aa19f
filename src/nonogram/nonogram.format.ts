import { BACKGROUND } from './nonogram.constants';
import type { LineConstraints, Solution } from './nonogram.types';

/**
 * Plain-text rendering of a grid: one line per row, cells separated by a
 * space, background shown as `.` and colors as their palette index.
 *
 * @example
 * formatSolution({ grid: [[0, 1], [2, 0]] }); // ". 1\n2 ."
 */
export function formatSolution(solution: Solution): string {
  return solution.grid
    .map((row) =>
      row.map((cell) => (cell === BACKGROUND ? '.' : String(cell))).join(' ')
    )
    .join('\n');
}

/**
 * Compact rendering of a constraint list as `length:color` pairs.
 *
 * @example
 * formatConstraints([{ color: 1, length: 2 }, { color: 2, length: 1 }]); // "2:1 1:2"
 */
export function formatConstraints(segments: LineConstraints): string {
  return segments.map((segment) => `${segment.length}:${segment.color}`).join(' ');
}
