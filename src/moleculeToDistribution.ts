import { Molecule } from 'openchemlib';

import type { DictToDistributionOptions } from './dictToDistribution.ts';
import { dictToDistribution } from './dictToDistribution.ts';
import type { IsotopeDistribution } from './IsotopeDistribution.ts';
import type { ElementalComposition } from './types.ts';

/**
 * Count the atoms of a molecule by element, implicit hydrogens included.
 * @param molecule - An OpenChemLib molecule.
 * @returns Number of atoms by element symbol.
 */
export function getMoleculeComposition(
  molecule: Molecule,
): ElementalComposition {
  molecule.ensureHelperArrays(Molecule.cHelperNeighbours);

  const composition: ElementalComposition = {};
  for (let atom = 0; atom < molecule.getAllAtoms(); atom++) {
    const label = molecule.getAtomLabel(atom);
    composition[label] = (composition[label] ?? 0) + 1;

    const implicitHydrogens = molecule.getImplicitHydrogens(atom);
    if (implicitHydrogens > 0) {
      composition.H = (composition.H ?? 0) + implicitHydrogens;
    }
  }
  return composition;
}

/**
 * Exact isotope distribution of a molecule, from its structure rather than
 * from the averagine model.
 * @param molecule - An OpenChemLib molecule.
 * @param options - Isotope table and convolution options.
 * @returns The isotope distribution of the molecule.
 */
export function moleculeToDistribution(
  molecule: Molecule,
  options: DictToDistributionOptions = {},
): IsotopeDistribution {
  return dictToDistribution(getMoleculeComposition(molecule), options);
}
