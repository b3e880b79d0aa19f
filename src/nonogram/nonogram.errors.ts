/**
 * Errors thrown on caller-invariant violations.
 *
 * Running out of iterations is not among them: an unsolved search is reported
 * through `History.winner`.
 */

/** Two grids that must share a row count do not. */
export class MismatchedDimensionsError extends Error {
  constructor(
    message: string,
    readonly expectedRows: number,
    readonly actualRows: number
  ) {
    super(message);
    this.name = 'MismatchedDimensionsError';
  }
}

/** A grid operation needs at least one row. */
export class EmptyGridError extends Error {
  constructor(message = 'The nonogram solution has zero rows') {
    super(message);
    this.name = 'EmptyGridError';
  }
}

/** A puzzle's dimensions or constraints cannot describe any grid. */
export class InvalidPuzzleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPuzzleError';
  }
}

/** Search or sweep hyperparameters are out of range. */
export class InvalidOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptionsError';
  }
}
