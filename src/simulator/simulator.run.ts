import { midpoint, type ShiftTable } from '../shift/shiftTable';
import { tallyPositions } from './simulator.histogram';
import type { Histogram, RandomSource } from './simulator.types';

/**
 * Core population walk.
 *
 * Process:
 *  1. Every unit starts at {@link midpoint}(trialCount, table).
 *  2. Each trial draws `unitNumber` fresh uniforms (one per unit) and only
 *     then applies the looked-up steps, so a trial never reuses the previous
 *     trial's draws.
 *  3. Final positions are tallied into an ascending {@link Histogram}.
 *
 * A {@link LookupFailure} from any unit aborts the run; the population never
 * escapes this function, so no partial histogram can be observed.
 */

/**
 * Observer invoked after each trial with the 1-based trial index and the live
 * population. It must not mutate `population`.
 */
export type TrialObserver = (
  trial: number,
  population: ArrayLike<number>
) => void;

/**
 * Throw a `RangeError` unless `value` is a non-negative safe integer.
 * @internal
 */
export function assertCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0)
    throw new RangeError(`${name} must be a non-negative integer (got ${value})`);
}

/**
 * Run `unitNumber` independent walks of `trialCount` steps each.
 *
 * @param unitNumber Number of units.
 * @param trialCount Number of trials (steps per unit).
 * @param table Step distribution.
 * @param rng Uniform source in [0, 1).
 * @param observe Optional per-trial observer (telemetry).
 * @returns Final position histogram; counts sum to `unitNumber`.
 * @throws LookupFailure when a draw is not covered by `table`.
 * @throws RangeError when a count is negative or not an integer.
 * @example
 * runPopulation(1000, 1, coinTable(), () => 0.3); // Map { -1 => 1000 }
 */
export function runPopulation(
  unitNumber: number,
  trialCount: number,
  table: ShiftTable,
  rng: RandomSource,
  observe?: TrialObserver
): Histogram {
  assertCount('unitNumber', unitNumber);
  assertCount('trialCount', trialCount);

  const population = new Float64Array(unitNumber).fill(
    midpoint(trialCount, table)
  );

  for (let trial = 1; trial <= trialCount; trial++) {
    // Fresh draws for this trial, one per unit
    const draws = new Float64Array(unitNumber);
    for (let i = 0; i < unitNumber; i++) draws[i] = rng();

    for (let i = 0; i < unitNumber; i++) population[i] += table.lookup(draws[i]);

    observe?.(trial, population);
  }

  return tallyPositions(population);
}
