import { describe, expect, test } from 'vitest';

import { PROTON_MASS } from '../constants.ts';
import { InvalidChargeError } from '../errors.ts';
import { massFromMz, mzFromMass } from '../massFromMz.ts';

describe('massFromMz', () => {
  test('500, charge 2', () => {
    expect(massFromMz(500, 2)).toBeCloseTo(997.98544706626, 9);
  });

  test('500, charge -1', () => {
    expect(massFromMz(500, -1)).toBeCloseTo(501.00727646687, 9);
  });

  test.each([1, 2, 3, -1])('round trip with charge %i', (charge) => {
    const mass = 1234.5678;
    const mz = mzFromMass(mass, charge);

    expect(massFromMz(mz, charge)).toBeCloseTo(mass, 9);
  });

  test('mzFromMass, charge 1', () => {
    expect(mzFromMass(1000, 1)).toBeCloseTo(1000 + PROTON_MASS, 9);
  });

  test('custom proton mass', () => {
    expect(massFromMz(500, 2, { protonMass: 1 })).toBe(998);
  });

  test.each([0, 1.5, Number.NaN])('charge %d', (charge) => {
    expect(() => massFromMz(500, charge)).toThrow(InvalidChargeError);
    expect(() => mzFromMass(500, charge)).toThrow(InvalidChargeError);
  });
});
