/**
 * Global shiftwalk configuration contract & default instance.
 *
 * WHY THIS EXISTS
 * --------------
 * Library-wide flags that are not tied to a single simulation run live here,
 * so users (and tests) can flip them without threading extra options through
 * every constructor. Per-run parameters (unit count, trial count, shift table,
 * random source) belong on `SimulatorOptions` instead.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'shiftwalk';
 *   config.warnings = true;             // surface coverage-gap warnings
 *   config.telemetryBufferLimit = 1000; // cap retained telemetry entries
 *
 * Adjust BEFORE constructing shift tables or simulators so that the values are
 * observed when tables are validated and telemetry buffers are filled.
 */
export interface ShiftwalkConfig {
  /**
   * Emit guidance warnings (e.g. a shift table whose thresholds stop short of
   * 1) through `console.warn`.
   * Default: false
   */
  warnings: boolean;

  /**
   * Hard cap on telemetry entries retained per simulator. Oldest entries are
   * dropped first. `undefined` keeps everything.
   */
  telemetryBufferLimit?: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: ShiftwalkConfig = {
  warnings: false, // emit runtime guidance
  // telemetryBufferLimit: 1000, // example memory cap override
};
