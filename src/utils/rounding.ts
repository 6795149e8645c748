/**
 * Round to the nearest integer, sending exact halves to the even neighbour
 * ("banker's rounding"). `Math.round` always rounds halves up, which would
 * shift midpoints for odd trial counts.
 *
 * @example
 * roundHalfEven(2.5);  // 2
 * roundHalfEven(3.5);  // 4
 * roundHalfEven(-2.5); // -2
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction < 0.5) return floor;
  if (fraction > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}
