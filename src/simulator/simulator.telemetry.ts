// Telemetry recording helpers

import { config } from '../config';
import type { SimulatorLike, TelemetryEntry } from './simulator.types';

/**
 * Summarize the population after a trial into a {@link TelemetryEntry}.
 *
 * @example
 * summarizePopulation(3, [1, 2, 6]); // { trial: 3, mean: 3, min: 1, max: 6 }
 */
export function summarizePopulation(
  trial: number,
  population: ArrayLike<number>
): TelemetryEntry {
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < population.length; i++) {
    const position = population[i];
    sum += position;
    if (position < min) min = position;
    if (position > max) max = position;
  }
  return {
    trial,
    mean: population.length ? sum / population.length : 0,
    min: population.length ? min : 0,
    max: population.length ? max : 0,
  };
}

/**
 * Decide whether `trial` falls on the configured cadence. The final trial is
 * always recorded so the last population shape is never missing.
 */
export function shouldRecord(
  this: SimulatorLike,
  trial: number,
  trialCount: number
): boolean {
  const { enabled, logEvery } = this.options.telemetry;
  if (!enabled) return false;
  return trial % logEvery === 0 || trial === trialCount;
}

/**
 * Record a population snapshot: push it to the instance buffer (trimmed to
 * `config.telemetryBufferLimit`) and hand it to the `onEntry` stream.
 *
 * @returns The recorded entry.
 */
export function recordTelemetry(
  this: SimulatorLike,
  trial: number,
  population: ArrayLike<number>
): TelemetryEntry {
  const entry = summarizePopulation(trial, population);
  this._telemetry.push(entry);

  const limit = config.telemetryBufferLimit;
  if (limit !== undefined && this._telemetry.length > limit)
    this._telemetry.splice(0, this._telemetry.length - Math.max(0, limit));

  this.options.telemetry.onEntry?.(entry);
  return entry;
}
