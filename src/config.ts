/**
 * Global nonogram-evolve configuration contract & default instance.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'nonogram-evolve';
 *   config.warnings = true;     // surface operator guidance on stderr
 *   config.logProgress = true;  // print solve / sweep progress lines
 *
 * Adjust BEFORE starting a search; the engine reads these flags while it runs.
 *
 * DESIGN NOTES
 * ------------
 * - A plain serializable object, no setters or proxies.
 * - Both flags are off by default so library use stays silent.
 */
export interface NonogramConfig {
  /**
   * Emit operator and validation warnings through `console.warn`.
   * Default: false
   */
  warnings: boolean;

  /**
   * Emit progress lines (`console.log`) from `solveNonogram` and the
   * parameter sweep: one line per tried combination and a final summary.
   * Default: false
   */
  logProgress: boolean;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: NonogramConfig = {
  warnings: false, // operator guidance
  logProgress: false, // solve / sweep progress output
};
