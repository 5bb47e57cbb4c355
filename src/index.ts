export * from './constants.ts';
export * from './errors.ts';
export type * from './types.ts';

export { fastAdd } from './fastAdd.ts';
export type { ConvolutionResult } from './fastAdd.ts';
export { IsotopeDistribution } from './IsotopeDistribution.ts';

export { dictToDistribution } from './dictToDistribution.ts';
export type { DictToDistributionOptions } from './dictToDistribution.ts';
export { getAverageFormula } from './getAverageFormula.ts';
export type { AveragineOptions } from './getAverageFormula.ts';
export { massToDistribution } from './massToDistribution.ts';
export type { MassToDistributionOptions } from './massToDistribution.ts';
export { massFromMz, mzFromMass } from './massFromMz.ts';
export type { ChargeOptions } from './massFromMz.ts';

export {
  getMoleculeComposition,
  moleculeToDistribution,
} from './moleculeToDistribution.ts';
export { createComparator, scoreDistribution } from './scoreDistribution.ts';
export type { ScoringOptions, ScoringResult } from './scoreDistribution.ts';
