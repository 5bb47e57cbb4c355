/**
 * Read-only view of an isotope envelope.
 *
 * Only the first `peakCount` entries of `intensities` are significant, the
 * storage may be longer.
 */
export interface IsotopePattern {
  /** Mass of the monoisotopic (lightest) peak. */
  readonly monoOffset: number;
  /** Number of significant isotope peaks, at least 1. */
  readonly peakCount: number;
  /** Relative abundance of the isotopologue `i` mass units above `monoOffset`. */
  readonly intensities: ArrayLike<number>;
}

/** Natural isotope pattern of every element, by element symbol. */
export type ElementIsotopes = Readonly<Record<string, IsotopePattern>>;

/** Average number of atoms of each element per averagine unit. */
export type AveragineRatios = Readonly<Record<string, number>>;

/** Number of atoms by element symbol. */
export type ElementalComposition = Record<string, number>;

/** Masses (`x`) paired with their relative intensities (`y`). */
export interface DistributionXY {
  x: number[];
  y: number[];
}

export interface ConvolutionOptions {
  /**
   * Trailing peaks whose relative intensity is strictly below this value are
   * discarded after each convolution.
   * @default 1e-6
   */
  pruneLevel?: number;
}
