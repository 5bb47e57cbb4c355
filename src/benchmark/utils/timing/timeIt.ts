/** Result returned by {@link timeIt}. */
export interface Timing<T> {
  /** Value returned by the last call. */
  result: T;
  /** Mean duration of one call in milliseconds. */
  meanMs: number;
}

/**
 * Call a function repeatedly and measure its mean duration.
 * @param fn - The function to time.
 * @param iterations - Number of calls, at least 1.
 * @returns The last result and the mean duration.
 */
export function timeIt<T>(fn: () => T, iterations = 100): Timing<T> {
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new RangeError(`iterations must be a positive integer, got ${iterations}`);
  }
  const start = performance.now();
  let result = fn();
  for (let i = 1; i < iterations; i++) {
    result = fn();
  }
  return { result, meanMs: (performance.now() - start) / iterations };
}
