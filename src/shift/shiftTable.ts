import { InvalidShiftTableError, LookupFailure } from '../errors';
import { warnOnce } from '../utils/warnings';
import { roundHalfEven } from '../utils/rounding';

/** One slice of a shift table: draws below `threshold` (and at or above the previous one) move by `step`. */
export interface ShiftEntry {
  readonly threshold: number;
  readonly step: number;
}

/** Tuple form accepted by {@link ShiftTable.fromEntries} and used by the JSON format. */
export type ShiftPair = readonly [threshold: number, step: number];

/** JSON shape produced by {@link ShiftTable.toJSON}. */
export interface ShiftTableJSON {
  name?: string;
  entries: ShiftPair[];
}

/**
 * Piecewise step distribution used to drive every unit's random walk.
 *
 * A shift table partitions the unit interval into consecutive slices
 * `[t[i-1], t[i])`; a uniform draw falling into slice `i` moves the unit by
 * `step[i]`. The width of a slice is therefore the probability of its step.
 *
 * Ordering is structural: entries are sorted by ascending threshold when the
 * table is built, so the scan in {@link ShiftTable.lookup} never depends on
 * the order the caller listed them in. Tables are frozen after construction.
 *
 * @example
 * // Fair coin: step -1 below 0.5, +1 above.
 * const coin = ShiftTable.fromRecord({ '0.5': -1, '1': 1 });
 * coin.lookup(0.3); // -1
 * coin.lookup(0.7); // 1
 */
export class ShiftTable {
  /** Entries in ascending threshold order. */
  readonly entries: readonly ShiftEntry[];
  /** Optional label used by reports. */
  readonly name?: string;

  constructor(entries: readonly ShiftEntry[], name?: string) {
    if (!entries.length)
      throw new InvalidShiftTableError('A shift table needs at least one entry');
    for (const { threshold, step } of entries) {
      if (!Number.isFinite(threshold) || threshold <= 0 || threshold > 1)
        throw new InvalidShiftTableError(
          `Threshold ${threshold} is outside the interval (0, 1]`
        );
      if (!Number.isSafeInteger(step))
        throw new InvalidShiftTableError(
          `Step ${step} at threshold ${threshold} is not an integer`
        );
    }
    const sorted = entries
      .map(({ threshold, step }) => Object.freeze({ threshold, step }))
      .sort((a, b) => a.threshold - b.threshold);
    for (let i = 1; i < sorted.length; i++) {
      if (sorted[i].threshold === sorted[i - 1].threshold)
        throw new InvalidShiftTableError(
          `Duplicate threshold ${sorted[i].threshold}`
        );
    }
    this.entries = Object.freeze(sorted);
    if (name !== undefined) this.name = name;
    Object.freeze(this);

    if (this.coverage < 1)
      warnOnce(
        `shift-coverage:${JSON.stringify(this.toJSON())}`,
        `Shift table${name ? ` "${name}"` : ''} only covers draws below ${
          this.coverage
        }; larger draws will fail to resolve.`
      );
  }

  /** Build a table from `[threshold, step]` pairs in any order. */
  static fromEntries(pairs: readonly ShiftPair[], name?: string): ShiftTable {
    return new ShiftTable(
      pairs.map(([threshold, step]) => ({ threshold, step })),
      name
    );
  }

  /**
   * Build a table from a record keyed by threshold, e.g. `{ '0.5': -1, '1': 1 }`.
   * Keys are parsed with `Number`; anything that does not parse is rejected.
   */
  static fromRecord(
    record: Readonly<Record<string, number>>,
    name?: string
  ): ShiftTable {
    const entries = Object.entries(record).map(([key, step]) => {
      const threshold = key.trim() === '' ? Number.NaN : Number(key);
      if (Number.isNaN(threshold))
        throw new InvalidShiftTableError(`Threshold key "${key}" is not a number`);
      return { threshold, step };
    });
    return new ShiftTable(entries, name);
  }

  /**
   * Equal-probability table over `steps`: step `i` owns the slice
   * `[i/n, (i+1)/n)`, the final threshold being exactly 1.
   */
  static uniform(steps: readonly number[], name?: string): ShiftTable {
    if (!steps.length)
      throw new InvalidShiftTableError('A uniform table needs at least one step');
    const n = steps.length;
    return new ShiftTable(
      steps.map((step, i) => ({
        threshold: i === n - 1 ? 1 : (i + 1) / n,
        step,
      })),
      name
    );
  }

  /** Number of slices. */
  get size(): number {
    return this.entries.length;
  }

  /** Largest threshold; draws at or above it cannot resolve (except exactly 1 on a full table). */
  get coverage(): number {
    return this.entries[this.entries.length - 1].threshold;
  }

  /** Largest step in the table. */
  get maxStep(): number {
    return Math.max(...this.entries.map((e) => e.step));
  }

  /** Smallest step in the table. */
  get minStep(): number {
    return Math.min(...this.entries.map((e) => e.step));
  }

  /** True when every draw in [0, 1] resolves. */
  covers(): boolean {
    return this.coverage >= 1;
  }

  /**
   * Return the step of the first threshold strictly greater than `x`.
   *
   * The last threshold of a table that reaches 1 also accepts `x === 1`, the
   * closed end of the unit interval.
   *
   * @throws LookupFailure when `x` is negative, not a number, or not below any threshold.
   */
  lookup(x: number): number {
    if (x >= 0) {
      for (const entry of this.entries) {
        if (x < entry.threshold) return entry.step;
      }
      if (x === 1 && this.covers()) return this.entries[this.size - 1].step;
    }
    throw new LookupFailure(x, this.coverage);
  }

  /** Probability mass the table assigns to `step` (sum of its slice widths). */
  probabilityOf(step: number): number {
    let mass = 0;
    let previous = 0;
    for (const entry of this.entries) {
      if (entry.step === step) mass += entry.threshold - previous;
      previous = entry.threshold;
    }
    return mass;
  }

  /** Mean step, conditioned on the draw resolving (i.e. over `[0, coverage)`). */
  expectedStep(): number {
    let sum = 0;
    let previous = 0;
    for (const entry of this.entries) {
      sum += (entry.threshold - previous) * entry.step;
      previous = entry.threshold;
    }
    return sum / this.coverage;
  }

  toJSON(): ShiftTableJSON {
    const json: ShiftTableJSON = {
      entries: this.entries.map((e) => [e.threshold, e.step] as const),
    };
    if (this.name !== undefined) json.name = this.name;
    return json;
  }
}

/**
 * Starting position shared by every unit: `round(trialCount / 2 × maxStep)`,
 * halves rounding to even.
 *
 * Centres the population so that walks of `trialCount` steps are unlikely to
 * go negative. It is a heuristic; positions are never clamped.
 *
 * @example
 * midpoint(100, coinTable()); // 50
 * midpoint(5, coinTable());   // 2 (2.5 rounds to even)
 */
export function midpoint(trialCount: number, table: ShiftTable): number {
  return roundHalfEven((trialCount / 2) * table.maxStep);
}
