import { EmptyHistogramError } from '../errors';
import { totalCount } from '../simulator/simulator.histogram';

/** Summary statistics of a position histogram. */
export interface HistogramStats {
  /** Total number of units. */
  total: number;
  /** Mean final position. */
  mean: number;
  /** Population variance of final positions. */
  variance: number;
  /** Standard deviation of final positions. */
  std: number;
  /** Most populated position (lowest wins ties). */
  mode: number;
  /** Lowest occupied position. */
  min: number;
  /** Highest occupied position. */
  max: number;
}

/**
 * Weighted statistics of a position → count histogram.
 *
 * @throws EmptyHistogramError when the total count is zero.
 * @example
 * histogramStats(new Map([[1, 1], [3, 3]]));
 * // { total: 4, mean: 2.5, variance: 0.75, std: ~0.866, mode: 3, min: 1, max: 3 }
 */
export function histogramStats(
  histogram: ReadonlyMap<number, number>
): HistogramStats {
  const total = totalCount(histogram);
  if (total === 0)
    throw new EmptyHistogramError('Cannot summarize a histogram with zero total count');

  let weighted = 0;
  let mode = 0;
  let modeCount = -1;
  let min = Infinity;
  let max = -Infinity;
  for (const [position, count] of histogram) {
    if (count === 0) continue;
    weighted += position * count;
    if (count > modeCount || (count === modeCount && position < mode)) {
      mode = position;
      modeCount = count;
    }
    if (position < min) min = position;
    if (position > max) max = position;
  }
  const mean = weighted / total;

  let squared = 0;
  for (const [position, count] of histogram)
    squared += count * (position - mean) ** 2;
  const variance = squared / total;

  return { total, mean, variance, std: Math.sqrt(variance), mode, min, max };
}

/**
 * Population variance of a mapping's values (keys ignored). Used to compare
 * how flat a density is before and after smoothing.
 *
 * @returns 0 for fewer than two entries.
 */
export function valueVariance(mapping: ReadonlyMap<number, number>): number {
  if (mapping.size < 2) return 0;
  let sum = 0;
  for (const value of mapping.values()) sum += value;
  const mean = sum / mapping.size;
  let squared = 0;
  for (const value of mapping.values()) squared += (value - mean) ** 2;
  return squared / mapping.size;
}
