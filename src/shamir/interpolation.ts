/**
 * Lagrange interpolation over GF(2^8)
 */

import { add, div, mult } from '../gf256/index.js';
import { ShamirValidationError } from './types.js';

/**
 * Evaluate, at x, the unique polynomial passing through the given samples.
 *
 * f(x) = Σ y_i * L_i(x)
 * where L_i(x) = Π (x - x_j) / (x_i - x_j) for j ≠ i
 *
 * Subtraction is addition in this field. Reconstruction always calls this
 * with x = 0 to recover the intercept.
 *
 * @throws ShamirInvariantError when two samples share an x-coordinate
 */
export function interpolatePolynomial(
  xSamples: Uint8Array,
  ySamples: Uint8Array,
  x: number
): number {
  if (xSamples.length !== ySamples.length) {
    throw new ShamirValidationError(
      `Sample count mismatch: ${xSamples.length} x-coordinates, ${ySamples.length} values`
    );
  }

  const limit = xSamples.length;
  let result = 0;

  for (let i = 0; i < limit; i++) {
    let basis = 1;

    for (let j = 0; j < limit; j++) {
      if (i === j) continue;

      const numerator = add(x, xSamples[j]);
      const denominator = add(xSamples[i], xSamples[j]);
      basis = mult(basis, div(numerator, denominator));
    }

    result = add(result, mult(ySamples[i], basis));
  }

  return result;
}
