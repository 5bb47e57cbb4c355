import type { AveragineRatios, ElementIsotopes } from './types.ts';

export const DEFAULT_PRUNE_LEVEL = 1e-6;

/** Mass of a proton in Da. */
export const PROTON_MASS = 1.00727646687;

/** Average mass of one averagine unit in Da. */
export const AVERAGINE_MASS = 111.1254;

// Senko et al., J. Am. Soc. Mass Spectrom. 1995
export const AVERAGINE_RATIOS: AveragineRatios = Object.freeze({
  C: 4.9384,
  H: 7.7583,
  N: 1.3577,
  O: 1.4773,
  S: 0.0417,
});

function element(monoOffset: number, abundances: number[]) {
  return Object.freeze({
    monoOffset,
    peakCount: abundances.length,
    intensities: Object.freeze(abundances),
  });
}

/**
 * Monoisotopic mass and natural abundances (one entry per nominal mass unit)
 * of the elements of the averagine model.
 */
export const ELEMENT_ISOTOPES: ElementIsotopes = Object.freeze({
  H: element(1.007825032, [0.999885, 0.000115]),
  C: element(12, [0.9893, 0.0107]),
  N: element(14.003074004, [0.99636, 0.00364]),
  O: element(15.99491462, [0.99757, 0.00038, 0.00205]),
  S: element(31.972071, [0.9499, 0.0075, 0.0425, 0, 0.0001]),
});
