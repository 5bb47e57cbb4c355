import { describe, expect, test } from 'vitest';

import { ELEMENT_ISOTOPES } from '../constants.ts';
import { InvalidExponentError } from '../errors.ts';
import { getIsotopes } from '../getIsotopes.ts';
import { IsotopeDistribution } from '../IsotopeDistribution.ts';

function carbon(): IsotopeDistribution {
  const atom = new IsotopeDistribution();
  atom.add(getIsotopes(ELEMENT_ISOTOPES, 'C'));
  return atom;
}

function naiveMult(atom: IsotopeDistribution, n: number): IsotopeDistribution {
  const result = atom.copy();
  for (let i = 1; i < n; i++) {
    result.add(atom);
  }
  return result;
}

function expectSameDistribution(
  actual: IsotopeDistribution,
  expected: IsotopeDistribution,
): void {
  expect(actual.monoOffset).toBeCloseTo(expected.monoOffset, 9);
  expect(actual.peakCount).toBe(expected.peakCount);
  for (let i = 0; i < expected.peakCount; i++) {
    expect(actual.intensities[i]).toBeCloseTo(expected.intensities[i] ?? 0, 12);
  }
}

describe('IsotopeDistribution', () => {
  test('identity', () => {
    const identity = IsotopeDistribution.identity();

    expect(identity.monoOffset).toBe(0);
    expect(identity.peakCount).toBe(1);
    expect(Array.from(identity.intensities)).toStrictEqual([1]);
  });

  test('adding the identity leaves a distribution unchanged', () => {
    const distribution = IsotopeDistribution.from({
      monoOffset: 100.5,
      peakCount: 3,
      intensities: [1, 0.5, 0.1],
    });
    distribution.add(IsotopeDistribution.identity());

    expect(distribution.monoOffset).toBe(100.5);
    expect(distribution.peakCount).toBe(3);
    expect(Array.from(distribution.intensities)).toStrictEqual([1, 0.5, 0.1]);
  });

  test('add is commutative', () => {
    const a = IsotopeDistribution.from({
      monoOffset: 10,
      peakCount: 2,
      intensities: [1, 0.5],
    });
    const b = IsotopeDistribution.from({
      monoOffset: 5,
      peakCount: 3,
      intensities: [0.2, 1, 0.3],
    });
    const ab = a.copy();
    ab.add(b);
    const ba = b.copy();
    ba.add(a);

    expectSameDistribution(ab, ba);
    expect(ab.monoOffset).toBe(a.monoOffset + b.monoOffset);
  });

  test('add normalizes the highest peak to 1', () => {
    const distribution = IsotopeDistribution.from({
      monoOffset: 0,
      peakCount: 3,
      intensities: [0.2, 0.4, 0.3],
    });
    distribution.add(distribution);

    const significant = distribution.intensities.subarray(
      0,
      distribution.peakCount,
    );
    expect(Math.max(...significant)).toBe(1);
  });

  test('adding itself', () => {
    const distribution = IsotopeDistribution.from({
      monoOffset: 1,
      peakCount: 2,
      intensities: [1, 1],
    });
    distribution.add(distribution);

    expect(distribution.monoOffset).toBe(2);
    expect(Array.from(distribution.intensities)).toStrictEqual([0.5, 1, 0.5]);
  });

  test('copy does not share storage', () => {
    const original = carbon();
    const copy = original.copy();
    copy.intensities[1] = 0.5;
    copy.add(copy);

    expect(original.monoOffset).toBe(12);
    expect(original.peakCount).toBe(2);
    expect(original.intensities[1]).toBeCloseTo(0.0107 / 0.9893, 12);
  });

  test('from rejects a peakCount longer than the intensities', () => {
    expect(() =>
      IsotopeDistribution.from({
        monoOffset: 0,
        peakCount: 3,
        intensities: [1, 0.5],
      }),
    ).toThrow(RangeError);
  });

  test.each([1, 2, 3, 4, 5, 6, 7, 8])('C mult(%i)', (n) => {
    const atom = carbon();

    expectSameDistribution(atom.mult(n), naiveMult(atom, n));
    expect(atom.mult(n).monoOffset).toBe(12 * n);
  });

  test('identity mult(6)', () => {
    const result = IsotopeDistribution.identity().mult(6);

    expect(result.monoOffset).toBe(0);
    expect(result.peakCount).toBe(1);
    expect(result.intensities[0]).toBe(1);
  });

  test('mult leaves the receiver untouched', () => {
    const atom = carbon();
    atom.mult(5);

    expect(atom.monoOffset).toBe(12);
    expect(atom.peakCount).toBe(2);
  });

  test('mult(1) is a copy', () => {
    const atom = carbon();
    const copy = atom.mult(1);

    expect(copy).not.toBe(atom);
    expect(copy.intensities).not.toBe(atom.intensities);
    expectSameDistribution(copy, atom);
  });

  test.each([0, -2, 1.5, Number.NaN])('mult(%d)', (n) => {
    expect(() => carbon().mult(n)).toThrow(InvalidExponentError);
  });

  test('mult passes the prune level on', () => {
    const atom = IsotopeDistribution.from({
      monoOffset: 0,
      peakCount: 2,
      intensities: [1, 2e-3],
    });

    // the third peak of the square is 4e-6
    expect(atom.mult(2).peakCount).toBe(3);
    expect(atom.mult(2, { pruneLevel: 1e-5 }).peakCount).toBe(2);
  });

  test('toPacked and addPacked', () => {
    const distribution = IsotopeDistribution.from({
      monoOffset: 10,
      peakCount: 2,
      intensities: [1, 0.5, 0.01],
    });

    expect(Array.from(distribution.toPacked())).toStrictEqual([10, 2, 1, 0.5]);

    const result = IsotopeDistribution.identity();
    result.addPacked(distribution.toPacked());
    expect(result.monoOffset).toBe(10);
    expect(result.peakCount).toBe(2);
    expect(Array.from(result.intensities)).toStrictEqual([1, 0.5]);
  });

  test('addPacked with too few values', () => {
    expect(() => IsotopeDistribution.identity().addPacked([0, 1])).toThrow(
      RangeError,
    );
  });
});
