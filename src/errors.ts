/**
 * Error types raised by the simulation and reporting stages.
 *
 * Every class sets `name` so callers (and log lines) can tell failures apart
 * without `instanceof` across realms.
 */

/**
 * A uniform draw could not be resolved against a shift table.
 *
 * Raised when no threshold exceeds the drawn value, i.e. the table does not
 * cover the sampling domain. Aborts the whole run.
 */
export class LookupFailure extends Error {
  /** The value that failed to resolve. */
  readonly x: number;
  /** Largest threshold of the table at the time of the lookup. */
  readonly coverage: number;

  constructor(x: number, coverage: number) {
    super(
      `No shift threshold exceeds x=${x} (table covers up to ${coverage})`
    );
    this.name = 'LookupFailure';
    this.x = x;
    this.coverage = coverage;
  }
}

/**
 * A histogram (or density) with zero total mass reached a stage that divides
 * by that total.
 */
export class EmptyHistogramError extends Error {
  constructor(message = 'Cannot normalize a histogram with zero total count') {
    super(message);
    this.name = 'EmptyHistogramError';
  }
}

/** Shift table entries failed validation at construction or load time. */
export class InvalidShiftTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidShiftTableError';
  }
}
