import {
  AVERAGINE_MASS,
  AVERAGINE_RATIOS,
  ELEMENT_ISOTOPES,
} from './constants.ts';
import { NegativeAtomCountError, UnsupportedModeError } from './errors.ts';
import { getIsotopes } from './getIsotopes.ts';
import { roundHalfToEven } from './roundHalfToEven.ts';
import type {
  AveragineRatios,
  ElementalComposition,
  ElementIsotopes,
} from './types.ts';

export interface AveragineOptions {
  /**
   * Atoms of each element per averagine unit.
   * @default AVERAGINE_RATIOS
   */
  averagine?: AveragineRatios;
  /**
   * Isotope table, used for the monoisotopic mass of each element.
   * @default ELEMENT_ISOTOPES
   */
  isotopes?: ElementIsotopes;
  /**
   * Mass of one averagine unit.
   * @default AVERAGINE_MASS
   */
  averageMass?: number;
  /**
   * Whether the averagine model includes sulfur. The sulfur-free model is not
   * implemented.
   * @default true
   */
  sulfur?: boolean;
}

/**
 * Estimate the elemental composition of a peptide from its mass using the
 * averagine model.
 *
 * Each element count is rounded independently, then the remaining mass
 * difference is compensated with hydrogen atoms.
 * @param moleculeMass - Monoisotopic mass of the molecule.
 * @param options - Averagine model and isotope table.
 * @returns Number of atoms by element symbol.
 */
export function getAverageFormula(
  moleculeMass: number,
  options: AveragineOptions = {},
): ElementalComposition {
  const {
    averagine = AVERAGINE_RATIOS,
    isotopes = ELEMENT_ISOTOPES,
    averageMass = AVERAGINE_MASS,
    sulfur = true,
  } = options;

  if (!sulfur) {
    throw new UnsupportedModeError('Mode without sulfur is not implemented');
  }
  if (!Number.isFinite(moleculeMass)) {
    throw new RangeError(`Molecule mass must be finite, got ${moleculeMass}`);
  }

  const averagineUnits = moleculeMass / averageMass;

  const composition: ElementalComposition = {};
  let finalMass = 0;
  for (const [element, ratio] of Object.entries(averagine)) {
    const count = roundHalfToEven(averagineUnits * ratio);
    composition[element] = count;
    finalMass += count * getIsotopes(isotopes, element).monoOffset;
  }

  const hydrogenMass = getIsotopes(isotopes, 'H').monoOffset;
  const hCorrection = roundHalfToEven((moleculeMass - finalMass) / hydrogenMass);
  composition.H = (composition.H ?? 0) + hCorrection;

  for (const [element, count] of Object.entries(composition)) {
    if (!Number.isFinite(count)) {
      throw new RangeError(
        `Mass ${moleculeMass} gives a non-finite number of ${element} atoms: ${count}`,
      );
    }
    if (count < 0) {
      throw new NegativeAtomCountError(
        `Mass ${moleculeMass} gives ${count} ${element} atoms, outside of the averagine model`,
      );
    }
  }

  return composition;
}
