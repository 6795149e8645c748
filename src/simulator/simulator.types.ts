/**
 * Shared structural types for the simulator helpers.
 *
 * Helpers in `src/simulator/` are plain functions bound to a simulator via
 * `.call(this, ...)`; they depend on {@link SimulatorLike} rather than the
 * concrete class so they can be exercised on their own in tests.
 */
import type { ShiftTable } from '../shift/shiftTable';

/** Uniform random source returning values in [0, 1). */
export type RandomSource = () => number;

/** Final position → number of units at that position, ascending by position. */
export type Histogram = Map<number, number>;

/** Position → real value (normalized or smoothed histogram). */
export type Density = Map<number, number>;

/**
 * One telemetry snapshot of the population, taken after a trial completed.
 *
 * @example
 * { trial: 10, mean: 49.8, min: 42, max: 58 }
 */
export interface TelemetryEntry {
  /** 1-based index of the trial just applied. */
  trial: number;
  /** Mean unit position. */
  mean: number;
  /** Lowest unit position. */
  min: number;
  /** Highest unit position. */
  max: number;
}

/** Per-trial population telemetry controls. */
export interface TelemetryOptions {
  /** Record entries at all. Default: false. */
  enabled?: boolean;
  /** Record every N-th trial (the final trial is always recorded). Default: 1. */
  logEvery?: number;
  /** Streaming callback invoked with each entry as it is recorded. */
  onEntry?: (entry: TelemetryEntry) => void;
}

/**
 * Configuration for a {@link Simulator}. Every field is optional; defaults are
 * built fresh for each simulator so no two instances share a table.
 *
 * Randomness resolution order: `rng` (caller-owned) → `seed`
 * (`seedrandom`-seeded) → an autoseeded `seedrandom` generator.
 */
export interface SimulatorOptions {
  /** Number of units. Default: 100. */
  unitNumber?: number;
  /** Number of trials each unit walks. Default: 100. */
  trialCount?: number;
  /** Step distribution. Default: `coinTable()`. */
  shiftTable?: ShiftTable;
  /** Injected uniform source, e.g. a stub for deterministic tests. */
  rng?: RandomSource;
  /** Seed for the internal generator when no `rng` is injected. */
  seed?: string | number;
  telemetry?: TelemetryOptions;
}

/** Options after default hydration. */
export interface ResolvedSimulatorOptions {
  readonly unitNumber: number;
  readonly trialCount: number;
  readonly shiftTable: ShiftTable;
  readonly rng?: RandomSource;
  readonly seed?: string | number;
  readonly telemetry: Readonly<Required<Omit<TelemetryOptions, 'onEntry'>>> &
    Pick<TelemetryOptions, 'onEntry'>;
}

/** Outcome of {@link Simulator.simulate}. */
export interface SimulationResult {
  histogram: Histogram;
  unitNumber: number;
  trialCount: number;
  /** Position every unit started from. */
  start: number;
  /** Name of the shift table, when it has one. */
  tableName?: string;
  /** Wall-clock duration of the run in milliseconds. */
  durationMs: number;
}

/**
 * Minimal surface the telemetry helpers expect from a simulator instance.
 */
export interface SimulatorLike {
  readonly options: ResolvedSimulatorOptions;
  /** @internal Telemetry buffer, oldest first. */
  _telemetry: TelemetryEntry[];
}
