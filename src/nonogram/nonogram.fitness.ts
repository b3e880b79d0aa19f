import { BACKGROUND } from './nonogram.constants';
import { colConstraints } from './nonogram.constraints';
import type { LineConstraints, Puzzle, Segment, Solution } from './nonogram.types';

/** Zero-length, zero-color placeholder used when aligning constraint lists. */
const PLACEHOLDER: Readonly<Segment> = { color: BACKGROUND, length: 0 };

/**
 * Left-pad `segments` with placeholders up to `length` entries so two lists
 * of different sizes line up from their last segment.
 *
 * @example
 * alignSegments([{ color: 1, length: 2 }], 3);
 * // [{ color: 0, length: 0 }, { color: 0, length: 0 }, { color: 1, length: 2 }]
 */
export function alignSegments(
  segments: LineConstraints,
  length: number
): Segment[] {
  const padding = Math.max(0, length - segments.length);
  const aligned: Segment[] = [];
  for (let i = 0; i < padding; i++) aligned.push({ ...PLACEHOLDER });
  for (const segment of segments) aligned.push({ ...segment });
  return aligned;
}

/**
 * Distance between one derived column and its target.
 *
 * Pairs of aligned segments cost `|a - b|` when their colors agree and
 * `a + b` when they do not, so a wrong color always costs more than a wrong
 * length of the same magnitude.
 */
export function lineDistance(
  current: LineConstraints,
  expected: LineConstraints
): number {
  const size = Math.max(current.length, expected.length);
  const a = alignSegments(current, size);
  const b = alignSegments(expected, size);
  let distance = 0;
  for (let i = 0; i < size; i++) {
    distance +=
      a[i].color === b[i].color
        ? Math.abs(a[i].length - b[i].length)
        : a[i].length + b[i].length;
  }
  return distance;
}

/**
 * Fitness of a candidate: summed {@link lineDistance} between its derived
 * column constraints and the puzzle's. Lower is better and `0` means every
 * column matches; since chromosomes are row-exact by construction, a zero
 * score is a full solution.
 */
export function score(puzzle: Puzzle, candidate: Solution): number {
  const derived = colConstraints(candidate);
  let total = 0;
  derived.forEach((column, i) => {
    total += lineDistance(column, puzzle.colConstraints[i] ?? []);
  });
  return total;
}

/**
 * Coarse diagnostic: per column, the absolute difference between painted
 * cell counts. Ignores colors and run boundaries, so it can be `0` for a
 * wrong grid. Not used by the search.
 */
export function lengthScore(puzzle: Puzzle, candidate: Solution): number {
  const painted = (segments: LineConstraints) =>
    segments.reduce((sum, segment) => sum + segment.length, 0);
  const derived = colConstraints(candidate);
  let total = 0;
  derived.forEach((column, i) => {
    total += Math.abs(painted(column) - painted(puzzle.colConstraints[i] ?? []));
  });
  return total;
}
