/**
 * Telemetry export helpers.
 *
 * Serialize a run's {@link History} (and a parameter sweep's trials) into
 * common data-export formats, JSON Lines and CSV, for plotting tools and log
 * processors. Solutions are not included; only the score trajectories.
 */
import { historyEntries } from './nonogram.history';
import type { History, SweepResult } from './nonogram.types';

/** CSV header for per-generation history rows. */
const HISTORY_HEADERS = ['generation', 'best', 'median', 'worst'] as const;

/** CSV header for sweep trial rows. */
const SWEEP_HEADERS = [
  'crossProbability',
  'mutationProbability',
  'slideTries',
  'seed',
  'populationSize',
  'tournamentSize',
  'maxIterations',
  'finalBest',
  'iterations',
  'solved',
] as const;

/**
 * Serialize the history to JSON Lines, one
 * `{"generation":…,"best":…,"median":…,"worst":…}` object per recorded
 * generation. Empty string when nothing was recorded.
 *
 * Example:
 * ```ts
 * const jsonl = exportHistoryJSONL(history);
 * const rows = jsonl.split('\n').map((line) => JSON.parse(line));
 * ```
 */
export function exportHistoryJSONL(history: History): string {
  return historyEntries(history)
    .map((entry) => JSON.stringify(entry))
    .join('\n');
}

/**
 * Serialize the history to CSV: a `generation,best,median,worst` header then
 * one row per recorded generation. A header-only string when nothing was
 * recorded.
 */
export function exportHistoryCSV(history: History): string {
  const lines: string[] = [HISTORY_HEADERS.join(',')];
  for (const entry of historyEntries(history)) {
    lines.push(HISTORY_HEADERS.map((key) => String(entry[key])).join(','));
  }
  return lines.join('\n');
}

/**
 * Serialize every sweep trial to CSV, one row per tried combination in the
 * order they ran.
 */
export function exportSweepCSV(result: SweepResult): string {
  const lines: string[] = [SWEEP_HEADERS.join(',')];
  for (const trial of result.trials) {
    const p = trial.parameters;
    lines.push(
      [
        p.crossProbability,
        p.mutationProbability,
        p.slideTries,
        p.seed,
        p.populationSize,
        p.tournamentSize,
        p.maxIterations,
        trial.finalBest,
        trial.iterations,
        trial.solved,
      ]
        .map(String)
        .join(',')
    );
  }
  return lines.join('\n');
}
