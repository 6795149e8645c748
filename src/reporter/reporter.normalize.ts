import { EmptyHistogramError } from '../errors';
import { totalCount } from '../simulator/simulator.histogram';
import type { Density } from '../simulator/simulator.types';

/**
 * Convert counts into a density: every count divided by the total count.
 *
 * The returned map is new and keeps the input's key order; values sum to 1
 * within floating-point tolerance.
 *
 * @throws EmptyHistogramError when the histogram is empty or all counts are zero.
 * @example
 * normalize(new Map([[49, 1], [51, 3]])); // Map { 49 => 0.25, 51 => 0.75 }
 */
export function normalize(histogram: ReadonlyMap<number, number>): Density {
  const total = totalCount(histogram);
  if (total === 0) throw new EmptyHistogramError();

  const density: Density = new Map();
  for (const [position, count] of histogram) density.set(position, count / total);
  return density;
}
