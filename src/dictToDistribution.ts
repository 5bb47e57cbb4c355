import { ELEMENT_ISOTOPES } from './constants.ts';
import { NegativeAtomCountError } from './errors.ts';
import { getIsotopes } from './getIsotopes.ts';
import { IsotopeDistribution } from './IsotopeDistribution.ts';
import type {
  ConvolutionOptions,
  ElementalComposition,
  ElementIsotopes,
} from './types.ts';

export interface DictToDistributionOptions extends ConvolutionOptions {
  /**
   * Natural isotope pattern of each element.
   * @default ELEMENT_ISOTOPES
   */
  isotopes?: ElementIsotopes;
}

/**
 * Convert an elemental composition to the isotope distribution of the whole
 * molecule.
 * @param composition - Number of atoms by element symbol.
 * @param options - Isotope table and convolution options.
 * @returns The combined isotope distribution.
 */
export function dictToDistribution(
  composition: ElementalComposition,
  options: DictToDistributionOptions = {},
): IsotopeDistribution {
  const { isotopes = ELEMENT_ISOTOPES, ...convolutionOptions } = options;

  const distribution = new IsotopeDistribution();
  for (const [element, count] of Object.entries(composition)) {
    if (count < 0) {
      throw new NegativeAtomCountError(
        `Negative number of ${element} atoms: ${count}`,
      );
    }
    if (count === 0) continue;

    const atom = new IsotopeDistribution();
    atom.add(getIsotopes(isotopes, element), convolutionOptions);
    distribution.add(atom.mult(count, convolutionOptions), convolutionOptions);
  }

  return distribution;
}
