import { DEFAULT_SMOOTHING_RADIUS } from '../simulator/simulator.constants';
import type { Density } from '../simulator/simulator.types';

/**
 * Neighbour-average smoothing.
 *
 * Each key `k` becomes the mean of the source values at `k - radius … k + radius`
 * that are present in the map. Absent neighbours are skipped rather than
 * treated as zero, so windows shrink near the edges of the observed range
 * instead of dragging edge values down.
 *
 * Averages always read the untouched source (never already-smoothed values),
 * and the result is a new map with the same keys in the same order.
 *
 * @param density Source mapping (usually the output of `normalize`).
 * @param radius Neighbours either side; 0 returns a copy.
 * @throws RangeError when `radius` is negative or not an integer.
 * @example
 * smooth(new Map([[0, 0.2], [1, 0.6], [5, 0.2]]), 1);
 * // Map { 0 => 0.4, 1 => 0.4, 5 => 0.2 }
 */
export function smooth(
  density: ReadonlyMap<number, number>,
  radius: number = DEFAULT_SMOOTHING_RADIUS
): Density {
  if (!Number.isSafeInteger(radius) || radius < 0)
    throw new RangeError(`radius must be a non-negative integer (got ${radius})`);

  const source = new Map(density);
  const smoothed: Density = new Map();
  if (!source.size) return smoothed;
  const keys = [...source.keys()];
  const minKey = Math.min(...keys);
  const maxKey = Math.max(...keys);
  for (const key of keys) {
    let sum = 0;
    let neighbours = 0;
    // Offsets past the observed range can never hit a key
    const from = Math.max(-radius, Math.ceil(minKey - key));
    const to = Math.min(radius, Math.floor(maxKey - key));
    for (let offset = from; offset <= to; offset++) {
      const value = source.get(key + offset);
      if (value === undefined) continue;
      sum += value;
      neighbours++;
    }
    smoothed.set(key, sum / neighbours);
  }
  return smoothed;
}
