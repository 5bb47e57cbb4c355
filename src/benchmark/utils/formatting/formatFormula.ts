import type { ElementalComposition } from '../../../types.ts';

/**
 * Write a composition in Hill order: C, then H, then the other elements
 * alphabetically. Elements with no atom are left out and counts of 1 are
 * implicit.
 * @param composition - Number of atoms by element symbol.
 * @returns The molecular formula, for example `C44H95N12O13`.
 */
export function formatFormula(composition: ElementalComposition): string {
  const elements = Object.keys(composition).sort((a, b) => {
    const rank = (element: string) =>
      element === 'C' ? 0 : element === 'H' ? 1 : 2;
    return rank(a) - rank(b) || a.localeCompare(b);
  });

  let formula = '';
  for (const element of elements) {
    const count = composition[element] ?? 0;
    if (count === 0) continue;
    formula += count === 1 ? element : `${element}${count}`;
  }
  return formula;
}
