/**
 * Shared numerical / default constants for the simulator and reporter.
 */

/** Tolerance used when checking that normalized values sum to one. */
export const EPSILON = 1e-9;

/** Default number of simulated units. */
export const DEFAULT_UNIT_NUMBER = 100;

/** Default number of trials (steps) per unit. */
export const DEFAULT_TRIAL_COUNT = 100;

/** Neighbours either side of a key averaged by the smoothing pass. */
export const DEFAULT_SMOOTHING_RADIUS = 3;

/** Default telemetry cadence (record every N-th trial). */
export const DEFAULT_TELEMETRY_LOG_EVERY = 1;

/** Default number of recent telemetry entries exported as CSV. */
export const DEFAULT_TELEMETRY_EXPORT_ENTRIES = 500;
