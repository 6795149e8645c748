import type { ShiftTable } from './shift/shiftTable';
import { midpoint } from './shift/shiftTable';
import { coinTable } from './shift/presets';
import type {
  Histogram,
  RandomSource,
  ResolvedSimulatorOptions,
  SimulationResult,
  SimulatorOptions,
  TelemetryEntry,
} from './simulator/simulator.types';
import {
  DEFAULT_TELEMETRY_LOG_EVERY,
  DEFAULT_TRIAL_COUNT,
  DEFAULT_UNIT_NUMBER,
} from './simulator/simulator.constants';
import { assertCount, runPopulation } from './simulator/simulator.run';
import {
  createSeededGenerator,
  restoreSeededGenerator,
  type RNGState,
  type SeededGenerator,
} from './simulator/simulator.rng';
import { recordTelemetry, shouldRecord } from './simulator/simulator.telemetry';
import {
  exportTelemetryCSV,
  exportTelemetryJSONL,
} from './simulator/simulator.telemetry.exports';

/**
 * Hydrate caller options into a fresh, frozen options object. Defaults (the
 * coin table included) are constructed per call, never shared.
 */
function resolveOptions(options: SimulatorOptions): ResolvedSimulatorOptions {
  const unitNumber = options.unitNumber ?? DEFAULT_UNIT_NUMBER;
  const trialCount = options.trialCount ?? DEFAULT_TRIAL_COUNT;
  assertCount('unitNumber', unitNumber);
  assertCount('trialCount', trialCount);

  const logEvery = options.telemetry?.logEvery ?? DEFAULT_TELEMETRY_LOG_EVERY;
  if (!Number.isSafeInteger(logEvery) || logEvery < 1)
    throw new RangeError(
      `telemetry.logEvery must be a positive integer (got ${logEvery})`
    );

  return Object.freeze({
    unitNumber,
    trialCount,
    shiftTable: options.shiftTable ?? coinTable(),
    rng: options.rng,
    seed: options.seed,
    telemetry: Object.freeze({
      enabled: options.telemetry?.enabled ?? false,
      logEvery,
      onEntry: options.telemetry?.onEntry,
    }),
  });
}

/**
 * Population random-walk simulator.
 *
 * Each of `unitNumber` units starts at the table's midpoint and takes
 * `trialCount` steps whose sizes are drawn through the {@link ShiftTable}.
 * The result is the histogram of final positions.
 *
 * @example
 * // 10k units, 50 trials, six-faced die steps, reproducible
 * const sim = new Simulator({
 *   unitNumber: 10000,
 *   trialCount: 50,
 *   shiftTable: dieTable(),
 *   seed: 7,
 * });
 * const { histogram } = sim.simulate();
 *
 * @example
 * // Stub the random source for an exact outcome
 * const sim = new Simulator({ unitNumber: 1000, trialCount: 1, rng: () => 0.3 });
 * sim.simulate().histogram; // Map { -1 => 1000 }
 */
export default class Simulator {
  readonly options: ResolvedSimulatorOptions;
  /** @internal Telemetry buffer, oldest first. */
  _telemetry: TelemetryEntry[] = [];
  /** Internal seeded generator; absent when the caller injected `options.rng`. */
  private _generator?: SeededGenerator;
  /** Cached random source resolved by {@link Simulator._getRNG}. */
  private _rng?: RandomSource;

  constructor(options: SimulatorOptions = {}) {
    this.options = resolveOptions(options);
  }

  // Lazily resolve the random source: injected rng → seeded → autoseeded
  private _getRNG(): RandomSource {
    if (this._rng) return this._rng;
    if (this.options.rng) {
      this._rng = this.options.rng;
      return this._rng;
    }
    const generator =
      this._generator ?? createSeededGenerator(this.options.seed);
    this._generator = generator;
    this._rng = () => generator();
    return this._rng;
  }

  /**
   * Run a population walk and return the final position histogram.
   *
   * Arguments default to the instance options. Telemetry (when enabled) is
   * recorded for this run as well.
   *
   * @throws LookupFailure when a draw is not covered by the table; no partial result is kept.
   * @throws RangeError when a count is negative or not an integer.
   */
  run(
    unitNumber: number = this.options.unitNumber,
    trialCount: number = this.options.trialCount,
    table: ShiftTable = this.options.shiftTable
  ): Histogram {
    return runPopulation(
      unitNumber,
      trialCount,
      table,
      this._getRNG(),
      (trial, population) => {
        if (shouldRecord.call(this, trial, trialCount))
          recordTelemetry.call(this, trial, population);
      }
    );
  }

  /**
   * Run with the instance options and wrap the histogram with its run
   * parameters and timing.
   */
  simulate(): SimulationResult {
    const { unitNumber, trialCount, shiftTable } = this.options;
    const startedAt = performance.now();
    const histogram = this.run(unitNumber, trialCount, shiftTable);
    const result: SimulationResult = {
      histogram,
      unitNumber,
      trialCount,
      start: midpoint(trialCount, shiftTable),
      durationMs: performance.now() - startedAt,
    };
    if (shiftTable.name !== undefined) result.tableName = shiftTable.name;
    return result;
  }

  // RNG snapshot / restore helpers used for replay
  /**
   * Capture the internal generator state so a later run can be replayed.
   *
   * @returns Opaque state, or `undefined` when the caller injected `options.rng`.
   */
  snapshotRNGState(): RNGState | undefined {
    if (this.options.rng) return undefined;
    this._getRNG();
    return this._generator?.state();
  }

  /**
   * Restore a state produced by {@link Simulator.snapshotRNGState}; subsequent
   * draws repeat the ones that followed the snapshot.
   *
   * @throws Error when the simulator uses an injected `options.rng`.
   */
  restoreRNGState(state: RNGState): void {
    if (this.options.rng)
      throw new Error('Cannot restore RNG state over an injected rng option');
    this._generator = restoreSeededGenerator(state);
    this._rng = undefined;
  }

  /** Recorded telemetry entries, oldest first (copy). */
  getTelemetry(): TelemetryEntry[] {
    return this._telemetry.slice();
  }

  /** Drop every recorded telemetry entry. */
  clearTelemetry(): void {
    this._telemetry = [];
  }

  /** Telemetry as JSON Lines. */
  exportTelemetryJSONL(): string {
    return exportTelemetryJSONL.call(this);
  }

  /** Telemetry as CSV with a header row; empty string when nothing was recorded. */
  exportTelemetryCSV(maxEntries?: number): string {
    return exportTelemetryCSV.call(this, maxEntries);
  }
}
