import { UnknownElementError } from './errors.ts';
import type { ElementIsotopes, IsotopePattern } from './types.ts';

export function getIsotopes(
  isotopes: ElementIsotopes,
  element: string,
): IsotopePattern {
  // inherited members such as `constructor` are not elements
  if (!Object.hasOwn(isotopes, element)) {
    throw new UnknownElementError(`Unknown element: ${element}`);
  }
  return isotopes[element];
}
