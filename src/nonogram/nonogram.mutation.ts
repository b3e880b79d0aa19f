import { getSlidables } from './nonogram.slidables';
import type { Puzzle, RandomFn, Solution } from './nonogram.types';
import { randomBool, randomChoice } from '../utils/random';

/**
 * Segment-slide mutation, applied in place.
 *
 * Every row gets `slideTries` independent trials. A trial fires with
 * probability `mutationProbability`; it then recomputes the row's slidable
 * pairs (the previous trial may have moved a run) and swaps one uniformly
 * chosen pair. Rows without any slidable pair are left untouched.
 *
 * Slides keep each run's color and length and the run order, so the row
 * constraints never change.
 *
 * @param puzzle - Puzzle the candidate belongs to; unused by the slide itself.
 */
export function chromosomeMutation(
  puzzle: Puzzle,
  candidate: Solution,
  mutationProbability: number,
  slideTries: number,
  rng: RandomFn
): void {
  for (const row of candidate.grid) {
    for (let trial = 0; trial < slideTries; trial++) {
      if (!randomBool(rng, mutationProbability)) continue;
      const slides = getSlidables(row);
      if (slides.length === 0) continue;
      const [a, b] = randomChoice(rng, slides);
      [row[a], row[b]] = [row[b], row[a]];
    }
  }
}
