import { InvalidExponentError } from './errors.ts';
import { checkPattern, fastAdd } from './fastAdd.ts';
import type { ConvolutionOptions, IsotopePattern } from './types.ts';

/**
 * Discretized isotope envelope: the monoisotopic mass, the number of
 * significant isotope peaks and their relative intensities, one per
 * nominal mass unit.
 */
export class IsotopeDistribution implements IsotopePattern {
  monoOffset: number;
  peakCount: number;
  intensities: Float64Array;

  /** Creates the identity envelope, which represents zero atoms. */
  constructor() {
    this.monoOffset = 0;
    this.peakCount = 1;
    this.intensities = Float64Array.of(1);
  }

  static identity(): IsotopeDistribution {
    return new IsotopeDistribution();
  }

  /**
   * Copy any isotope pattern (for example an entry of an element table) into
   * a new distribution. The intensities are taken as they are, without
   * normalization.
   * @param pattern - The pattern to copy.
   * @returns A distribution owning its own intensities.
   */
  static from(pattern: IsotopePattern): IsotopeDistribution {
    checkPattern(pattern);
    const { monoOffset, peakCount, intensities } = pattern;
    const distribution = new IsotopeDistribution();
    distribution.monoOffset = monoOffset;
    distribution.peakCount = peakCount;
    distribution.intensities = Float64Array.from(intensities);
    return distribution;
  }

  /**
   * Convolute this distribution in place with another one.
   * @param other - The distribution to combine with, may be `this`.
   * @param options - Convolution options.
   */
  add(other: IsotopePattern, options: ConvolutionOptions = {}): void {
    const { monoOffset, peakCount, intensities } = fastAdd(
      this,
      other,
      options.pruneLevel,
    );
    this.monoOffset = monoOffset;
    this.peakCount = peakCount;
    this.intensities = intensities;
  }

  /**
   * Convolute this distribution in place with a packed array
   * `[monoOffset, peakCount, ...intensities]`.
   * @param packed - Packed distribution, see {@link toPacked}.
   * @param options - Convolution options.
   */
  addPacked(packed: ArrayLike<number>, options: ConvolutionOptions = {}): void {
    if (packed.length < 3) {
      throw new RangeError(
        `A packed distribution needs at least 3 values, got ${packed.length}`,
      );
    }
    const values = Array.from(packed);
    this.add(
      IsotopeDistribution.from({
        monoOffset: values[0],
        peakCount: values[1],
        intensities: values.slice(2),
      }),
      options,
    );
  }

  /** Packs the significant peaks as `[monoOffset, peakCount, ...intensities]`. */
  toPacked(): Float64Array {
    const packed = new Float64Array(this.peakCount + 2);
    packed[0] = this.monoOffset;
    packed[1] = this.peakCount;
    packed.set(this.intensities.subarray(0, this.peakCount), 2);
    return packed;
  }

  copy(): IsotopeDistribution {
    return IsotopeDistribution.from(this);
  }

  /**
   * Convolute this distribution with itself `n` times, using binary
   * exponentiation so that only O(log n) convolutions are needed.
   * @param n - Number of copies, a positive integer.
   * @param options - Convolution options.
   * @returns A new distribution, `this` is left untouched.
   */
  mult(n: number, options: ConvolutionOptions = {}): IsotopeDistribution {
    if (!Number.isSafeInteger(n) || n < 1) {
      throw new InvalidExponentError(
        `Exponent must be a positive integer, got ${n}`,
      );
    }
    if (n === 1) return this.copy();

    const result = new IsotopeDistribution();
    const multiples = this.copy();
    for (let remaining = n; remaining > 0; remaining = Math.floor(remaining / 2)) {
      if (remaining % 2 === 1) {
        result.add(multiples, options);
      }
      // the last squaring would never be used
      if (remaining > 1) {
        multiples.add(multiples, options);
      }
    }
    return result;
  }
}
