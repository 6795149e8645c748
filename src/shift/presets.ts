import { ShiftTable } from './shiftTable';

/**
 * Built-in shift tables. Each export is a factory returning a fresh table so
 * no caller ever shares a default instance with another.
 */

/** Fair coin: -1 or +1 with equal probability. The simulator default. */
export function coinTable(): ShiftTable {
  return ShiftTable.fromEntries(
    [
      [0.5, -1],
      [1, 1],
    ],
    'coin'
  );
}

/** Six-faced die without a zero face: -3, -2, -1, 1, 2, 3 each with probability 1/6. */
export function dieTable(): ShiftTable {
  return ShiftTable.uniform([-3, -2, -1, 1, 2, 3], 'die');
}
