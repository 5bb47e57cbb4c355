import type { DictToDistributionOptions } from './dictToDistribution.ts';
import { dictToDistribution } from './dictToDistribution.ts';
import type { AveragineOptions } from './getAverageFormula.ts';
import { getAverageFormula } from './getAverageFormula.ts';
import type { DistributionXY } from './types.ts';

export type MassToDistributionOptions = AveragineOptions &
  DictToDistributionOptions;

/**
 * Calculate the isotope distribution of a peptide from its mass using the
 * averagine model.
 * @param moleculeMass - Monoisotopic mass of the molecule.
 * @param options - Averagine model, isotope table and convolution options.
 * @returns The mass (`x`) and relative intensity (`y`) of every significant peak.
 */
export function massToDistribution(
  moleculeMass: number,
  options: MassToDistributionOptions = {},
): DistributionXY {
  const composition = getAverageFormula(moleculeMass, options);
  const distribution = dictToDistribution(composition, options);

  const x: number[] = [];
  const y: number[] = [];
  for (let i = 0; i < distribution.peakCount; i++) {
    x.push(distribution.monoOffset + i);
    y.push(distribution.intensities[i]);
  }
  return { x, y };
}
