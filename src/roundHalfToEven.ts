/**
 * Round to the nearest integer, ties going to the even neighbour
 * (2.5 -> 2, 3.5 -> 4, -2.5 -> -2).
 * @param value - The number to round.
 * @returns The rounded integer.
 */
export function roundHalfToEven(value: number): number {
  const rounded = Math.round(value);
  if (Math.abs(value % 1) === 0.5 && rounded % 2 !== 0) {
    return rounded - 1;
  }
  return rounded;
}
