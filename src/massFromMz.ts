import { PROTON_MASS } from './constants.ts';
import { InvalidChargeError } from './errors.ts';

export interface ChargeOptions {
  /** @default PROTON_MASS */
  protonMass?: number;
}

function checkCharge(charge: number): void {
  if (!Number.isInteger(charge) || charge === 0) {
    throw new InvalidChargeError(
      `Charge must be a non-zero integer, got ${charge}`,
    );
  }
}

/**
 * Calculate the neutral precursor mass from its monoisotopic m/z and charge.
 * Negative charges are negative ion mode.
 * @param monoMz - Monoisotopic m/z.
 * @param charge - Non-zero integer charge.
 * @param options - Proton mass.
 * @returns The neutral mass.
 */
export function massFromMz(
  monoMz: number,
  charge: number,
  options: ChargeOptions = {},
): number {
  const { protonMass = PROTON_MASS } = options;
  checkCharge(charge);
  return monoMz * Math.abs(charge) - charge * protonMass;
}

/** Inverse of {@link massFromMz}. */
export function mzFromMass(
  mass: number,
  charge: number,
  options: ChargeOptions = {},
): number {
  const { protonMass = PROTON_MASS } = options;
  checkCharge(charge);
  return (mass + charge * protonMass) / Math.abs(charge);
}
