/**
 * Similarity between a theoretical isotope distribution and an observed
 * spectrum.
 *
 * Wraps {@link MSComparator} from `ms-spectrum`.
 */

import { MSComparator } from 'ms-spectrum';

import type { DistributionXY } from './types.ts';

/** Parameters for the similarity comparator. */
export interface ScoringOptions {
  /**
   * Weight given to mass in the cosine similarity vector.
   * @default 3
   */
  massPower?: number;
  /**
   * Weight given to intensity in the cosine similarity vector.
   * @default 0.6
   */
  intensityPower?: number;
  /**
   * Mass tolerance in ppm for peak alignment.
   * @default 20
   */
  precision?: number;
}

/** Result returned by {@link scoreDistribution}. */
export interface ScoringResult {
  cosine: number;
  tanimoto: number;
  nbCommonPeaks: number;
  nbPeaks1: number;
  nbPeaks2: number;
}

/**
 * Create a reusable comparator instance from the given options.
 * @param options - Scoring options.
 * @returns An `MSComparator` instance.
 */
export function createComparator(options: ScoringOptions = {}): MSComparator {
  const { massPower = 3, intensityPower = 0.6, precision = 20 } = options;
  return new MSComparator({
    delta: (mass: number) => mass * 1e-6 * precision,
    massPower,
    intensityPower,
  });
}

/**
 * Score a theoretical isotope distribution against an observed spectrum.
 * @param comparator - An `MSComparator` instance.
 * @param observed - Observed peaks, sorted by mass.
 * @param theoretical - Theoretical distribution, see `massToDistribution`.
 * @returns Similarity metrics.
 */
export function scoreDistribution(
  comparator: MSComparator,
  observed: DistributionXY,
  theoretical: DistributionXY,
): ScoringResult {
  return comparator.getSimilarity(observed, theoretical) as ScoringResult;
}
