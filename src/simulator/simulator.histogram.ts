import type { Histogram } from './simulator.types';

/**
 * Tally unit positions into a {@link Histogram}.
 *
 * Positions are sorted first so the resulting map iterates in ascending
 * position order; counting itself is order-independent.
 *
 * @example
 * tallyPositions(Float64Array.of(3, 1, 3)); // Map { 1 => 1, 3 => 2 }
 */
export function tallyPositions(positions: ArrayLike<number>): Histogram {
  const sorted = Float64Array.from(positions).sort();
  const histogram: Histogram = new Map();
  for (const position of sorted) {
    histogram.set(position, (histogram.get(position) ?? 0) + 1);
  }
  return histogram;
}

/** Sum of all counts in a histogram. */
export function totalCount(histogram: ReadonlyMap<number, number>): number {
  let total = 0;
  for (const count of histogram.values()) total += count;
  return total;
}
