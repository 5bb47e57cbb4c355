/**
 * Base class of every failure raised by the isotope distribution engine.
 *
 * All of them are precondition or domain violations: the same input fails
 * the same way every time.
 */
export class IsotopeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Averagine estimation without sulfur was requested. */
export class UnsupportedModeError extends IsotopeError {}

/** A convolution produced no positive maximum or had every peak pruned. */
export class DegenerateConvolutionError extends IsotopeError {}

/** `mult` was called with a count that is not a positive integer. */
export class InvalidExponentError extends IsotopeError {}

/** A charge of zero, or a non-integer charge. */
export class InvalidChargeError extends IsotopeError {}

/** An elemental composition contains a negative atom count. */
export class NegativeAtomCountError extends IsotopeError {}

export class UnknownElementError extends IsotopeError {}
