import { config } from '../config';

/** Keys already reported by {@link onceWarn}. */
const reported = new Set<string>();

/**
 * Emit `message` through `console.warn` the first time `key` is seen.
 * Silent unless `config.warnings` is enabled; a suppressed call does not
 * consume the key.
 */
export function onceWarn(key: string, message: string): void {
  if (!config.warnings || reported.has(key)) return;
  // eslint-disable-next-line no-console
  console.warn(`[nonogram-evolve] ${message}`);
  reported.add(key);
}

/** Forget every reported key so the next warning for it is emitted again. */
export function resetWarnings(): void {
  reported.clear();
}
