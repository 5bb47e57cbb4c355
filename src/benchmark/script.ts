/**
 * Benchmark of the averagine isotope distribution engine.
 *
 * For a range of peptide masses, estimates the averagine composition,
 * computes its isotope distribution and compares the time of the binary
 * exponentiation (`mult`) with a naive sequence of convolutions, printed as
 * a bordered text table.
 *
 * Usage:
 *   npm run benchmark
 */

import { ELEMENT_ISOTOPES } from '../constants.ts';
import { getAverageFormula } from '../getAverageFormula.ts';
import { getIsotopes } from '../getIsotopes.ts';
import { IsotopeDistribution } from '../IsotopeDistribution.ts';
import { massToDistribution } from '../massToDistribution.ts';

import { formatFormula, formatTable, timeIt } from './utils/index.ts';

/* eslint-disable no-console */

const masses = [500, 1000, 2000, 5000, 10000, 20000];
const iterations = 20;

function naiveMult(atom: IsotopeDistribution, n: number): IsotopeDistribution {
  const result = atom.copy();
  for (let i = 1; i < n; i++) {
    result.add(atom);
  }
  return result;
}

const carbon = new IsotopeDistribution();
carbon.add(getIsotopes(ELEMENT_ISOTOPES, 'C'));

const headers = [
  'mass',
  'formula',
  'peakCount',
  'mostAbundant',
  'C mult (ms)',
  'C naive (ms)',
];
const rows: string[][] = [];

for (const mass of masses) {
  const composition = getAverageFormula(mass);
  const { x, y } = massToDistribution(mass);
  const mostAbundant = x[y.indexOf(Math.max(...y))] ?? Number.NaN;

  const carbons = composition.C ?? 1;
  const fast = timeIt(() => carbon.mult(carbons), iterations);
  const naive = timeIt(() => naiveMult(carbon, carbons), iterations);

  rows.push([
    String(mass),
    formatFormula(composition),
    String(x.length),
    mostAbundant.toFixed(4),
    fast.meanMs.toFixed(4),
    naive.meanMs.toFixed(4),
  ]);
}

console.log(
  formatTable(headers, rows, [
    'right',
    'left',
    'right',
    'right',
    'right',
    'right',
  ]),
);
