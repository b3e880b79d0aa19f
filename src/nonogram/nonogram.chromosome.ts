import { BACKGROUND, GAP_PROBABILITY } from './nonogram.constants';
import { minimumLineWidth } from './nonogram.constraints';
import type { LineConstraints, Puzzle, RandomFn, Solution } from './nonogram.types';
import { randomBool, randomInt } from '../utils/random';

/**
 * Sample one row-valid chromosome for the puzzle.
 *
 * Each row is laid out independently from its constraint list:
 *
 * 1. `slack = cols - minimumLineWidth(row)` free background cells remain to
 *    distribute.
 * 2. Before every segment, with probability 0.5, a gap of uniform size in
 *    `[0, slack]` is emitted and charged to the slack.
 * 3. The segment's run follows; when the next segment has the same color a
 *    single mandatory separator is emitted (already counted in the minimum
 *    width, so not charged to the slack).
 * 4. Whatever slack is left trails the last segment.
 *
 * The result satisfies every row constraint exactly. Column constraints are
 * whatever falls out; the scorer measures how far they are from the target.
 *
 * @example
 * const rng = createRng(0);
 * const candidate = newChromosomeSolution(treePuzzle(), rng);
 * sameConstraints(rowConstraints(candidate), treePuzzle().rowConstraints); // true
 */
export function newChromosomeSolution(puzzle: Puzzle, rng: RandomFn): Solution {
  return {
    grid: puzzle.rowConstraints.map((segments) =>
      sampleRow(segments, puzzle.cols, rng)
    ),
  };
}

/** Lay out one row; see {@link newChromosomeSolution}. */
export function sampleRow(
  segments: LineConstraints,
  width: number,
  rng: RandomFn
): number[] {
  const row: number[] = [];
  let slack = width - minimumLineWidth(segments);

  segments.forEach((segment, i) => {
    if (randomBool(rng, GAP_PROBABILITY)) {
      const gap = randomInt(rng, 0, slack + 1);
      slack -= gap;
      for (let k = 0; k < gap; k++) row.push(BACKGROUND);
    }
    for (let k = 0; k < segment.length; k++) row.push(segment.color);
    const next = segments[i + 1];
    if (next !== undefined && next.color === segment.color) row.push(BACKGROUND);
  });

  for (let k = 0; k < slack; k++) row.push(BACKGROUND);
  return row;
}
