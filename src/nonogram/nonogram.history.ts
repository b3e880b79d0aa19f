import { cloneSolution } from './nonogram.constraints';
import { medianScore } from './nonogram.selection';
import type {
  GenerationEntry,
  History,
  Population,
  Solution,
} from './nonogram.types';

/**
 * Fresh history for a run. The provisional outcome is Exhausted with a copy
 * of `placeholder`, replaced by {@link markWinner} or {@link markExhausted}.
 */
export function createHistory(placeholder: Solution): History {
  return {
    iterations: 0,
    best: [],
    median: [],
    worst: [],
    winner: { ok: false, solution: cloneSolution(placeholder) },
  };
}

/**
 * Append best / median / worst of a sorted population and count the
 * generation. Returns the recorded entry.
 */
export function recordGeneration(
  history: History,
  population: Population
): GenerationEntry {
  const entry: GenerationEntry = {
    generation: history.iterations,
    best: population[0].score,
    median: medianScore(population),
    worst: population[population.length - 1].score,
  };
  history.iterations++;
  history.best.push(entry.best);
  history.median.push(entry.median);
  history.worst.push(entry.worst);
  return entry;
}

/**
 * Set the outcome to Won when the population's best entry scores 0.
 * Returns whether it did.
 */
export function markWinner(history: History, population: Population): boolean {
  if (population[0].score !== 0) return false;
  history.winner = { ok: true, solution: cloneSolution(population[0].solution) };
  return true;
}

/**
 * Set the outcome to Exhausted with the population's best entry, unless the
 * run was already won.
 */
export function markExhausted(history: History, population: Population): void {
  if (history.winner.ok) return;
  history.winner = { ok: false, solution: cloneSolution(population[0].solution) };
}

/** Recorded generations as entries, oldest first. */
export function historyEntries(history: History): GenerationEntry[] {
  return history.best.map((best, generation) => ({
    generation,
    best,
    median: history.median[generation],
    worst: history.worst[generation],
  }));
}
