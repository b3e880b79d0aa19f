import { BACKGROUND } from './nonogram.constants';

/** Pair of cell indices whose swap slides one run by one cell. */
export type SlidePair = [number, number];

/**
 * Enumerate every single-cell slide available in a row.
 *
 * Each pair is `(background cell next to one end of a run, cell at the run's
 * opposite end)`; swapping the two shifts the run by one cell while keeping
 * its color, its length and the order of runs, so the row's constraints are
 * unchanged.
 *
 * The scan walks the row once, left to right, and tracks:
 * - `runStart`: first index of the run currently being read;
 * - `backgroundEnd`: last index of the background gap just before that run,
 *   when the run may slide left into it;
 * - `closedColor`: color of the most recently closed run.
 *
 * Transitions at index `i` (`prev` = color at `i - 1`, `cur` = color at `i`):
 *
 * | prev → cur             | effect                                                         |
 * |------------------------|----------------------------------------------------------------|
 * | background → color     | start run; keep the gap end unless `cur === closedColor`       |
 * | color → background     | emit left slide if pending; emit right slide unless `row[i+1] === prev` |
 * | color → other color    | emit pending left slide of the closing run; start new run       |
 * | same → same            | nothing                                                         |
 *
 * A slide is suppressed whenever it would make two equal-colored runs touch
 * (they would merge). A left slide is also suppressed whenever the previous
 * closed run has the same color, even across a wider gap. Runs that touch a
 * differently colored run are never slid into it.
 *
 * @example
 * getSlidables([0, 1, 1, 0]); // [[0, 2], [1, 3]]
 * getSlidables([0, 1, 2, 1, 0]); // [[0, 1], [3, 4]]
 * getSlidables([1, 0, 1, 0, 1]); // []
 */
export function getSlidables(row: readonly number[]): SlidePair[] {
  const slides: SlidePair[] = [];
  if (row.length === 0) return slides;

  let prev = row[0];
  let closedColor: number | undefined;
  let backgroundEnd: number | undefined;
  let runStart: number | undefined = prev !== BACKGROUND ? 0 : undefined;

  for (let i = 1; i < row.length; i++) {
    const cur = row[i];
    if (prev === BACKGROUND && cur !== BACKGROUND) {
      // run opens after a gap
      backgroundEnd = closedColor === cur ? undefined : i - 1;
      runStart = i;
    } else if (prev !== BACKGROUND && cur === BACKGROUND) {
      // run closes into a gap
      closedColor = prev;
      if (backgroundEnd !== undefined) {
        slides.push([backgroundEnd, i - 1]);
        backgroundEnd = undefined;
      }
      if (i + 1 >= row.length || row[i + 1] !== closedColor) {
        if (runStart === undefined)
          throw new Error(`Run closing at index ${i - 1} has no recorded start`);
        slides.push([runStart, i]);
      }
      runStart = undefined;
    } else if (prev !== cur) {
      // run touches a differently colored run
      if (backgroundEnd !== undefined) {
        slides.push([backgroundEnd, i - 1]);
        backgroundEnd = undefined;
      }
      runStart = i;
    }
    prev = cur;
  }

  if (backgroundEnd !== undefined) slides.push([backgroundEnd, row.length - 1]);
  return slides;
}
