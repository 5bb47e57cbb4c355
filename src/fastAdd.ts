import { DEFAULT_PRUNE_LEVEL } from './constants.ts';
import { DegenerateConvolutionError } from './errors.ts';
import type { IsotopePattern } from './types.ts';

export interface ConvolutionResult {
  monoOffset: number;
  peakCount: number;
  intensities: Float64Array;
}

/**
 * Throws a `RangeError` unless `peakCount` is an integer between 1 and the
 * length of `intensities` and `monoOffset` is finite.
 * @param pattern - The pattern to check.
 */
export function checkPattern(pattern: IsotopePattern): void {
  const { monoOffset, peakCount, intensities } = pattern;
  if (
    !Number.isInteger(peakCount) ||
    peakCount < 1 ||
    peakCount > intensities.length
  ) {
    throw new RangeError(
      `peakCount must be an integer between 1 and ${intensities.length}, got ${peakCount}`,
    );
  }
  if (!Number.isFinite(monoOffset)) {
    throw new RangeError(`monoOffset must be finite, got ${monoOffset}`);
  }
}

/**
 * Convolute two isotope distributions.
 *
 * The result is normalized so that its highest peak is 1 and trailing peaks
 * below `pruneLevel` are excluded from `peakCount` (they stay in
 * `intensities`). The returned array never aliases an input.
 * @param first - First isotope distribution.
 * @param second - Second isotope distribution, may be the same object as `first`.
 * @param pruneLevel - Relative intensity below which trailing peaks are discarded.
 * @returns The combined isotope distribution.
 */
export function fastAdd(
  first: IsotopePattern,
  second: IsotopePattern,
  pruneLevel = DEFAULT_PRUNE_LEVEL,
): ConvolutionResult {
  checkPattern(first);
  checkPattern(second);

  const { peakCount: count0, intensities: int0 } = first;
  const { peakCount: count1, intensities: int1 } = second;

  const intensities = new Float64Array(count0 + count1 - 1);
  for (let i = 0; i < count0; i++) {
    for (let j = 0; j < count1; j++) {
      intensities[i + j] += int0[i] * int1[j];
    }
  }

  let max = 0;
  for (const value of intensities) {
    max = Math.max(max, value);
  }
  if (!Number.isFinite(max) || max <= 0) {
    throw new DegenerateConvolutionError(
      `Convolution has no positive maximum (max: ${max})`,
    );
  }
  for (let i = 0; i < intensities.length; i++) {
    intensities[i] /= max;
  }

  let peakCount = intensities.length;
  while (peakCount > 0 && intensities[peakCount - 1] < pruneLevel) {
    peakCount--;
  }
  if (peakCount === 0) {
    throw new DegenerateConvolutionError(
      `Every peak is below the prune level ${pruneLevel}`,
    );
  }

  return {
    monoOffset: first.monoOffset + second.monoOffset,
    peakCount,
    intensities,
  };
}
