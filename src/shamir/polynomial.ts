/**
 * Random polynomials over GF(2^8)
 *
 * One polynomial carries one byte of the secret as its intercept, since a
 * field of 256 elements can only represent a single byte.
 */

import { add, mult } from '../gf256/index.js';
import { defaultRandomSource, type RandomSource } from '../utils/random.js';
import { ShamirError, ShamirErrorCode, ShamirValidationError } from './types.js';

/**
 * Generate a random polynomial with the given intercept.
 *
 * f(x) = c_0 + c_1*x + ... + c_d*x^d where c_0 = intercept and
 * c_1, ..., c_d are uniform random bytes.
 *
 * @param intercept - Constant term (one secret byte)
 * @param degree - Polynomial degree (threshold - 1)
 * @returns Coefficients [c_0, c_1, ..., c_d]
 */
export function makePolynomial(
  intercept: number,
  degree: number,
  random: RandomSource = defaultRandomSource
): Uint8Array {
  if (!Number.isInteger(degree) || degree < 0) {
    throw new ShamirValidationError('Polynomial degree must be non-negative');
  }

  if (!Number.isInteger(intercept) || intercept < 0 || intercept > 255) {
    throw new ShamirValidationError(
      `Intercept must be in range [0, 255], got ${intercept}`,
      ShamirErrorCode.INVALID_BYTE
    );
  }

  const coefficients = new Uint8Array(degree + 1);
  coefficients[0] = intercept;

  try {
    for (let i = 1; i <= degree; i++) {
      coefficients[i] = random.randomByte();
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ShamirError(
      `Failed to generate polynomial: ${reason}`,
      ShamirErrorCode.RANDOM_SOURCE_FAILURE,
      { cause: err }
    );
  }

  return coefficients;
}

/**
 * Evaluate a polynomial at x using Horner's method.
 *
 * f(x) = c_0 + x(c_1 + x(c_2 + ... + x(c_d)))
 */
export function evaluatePolynomial(coefficients: Uint8Array, x: number): number {
  if (coefficients.length === 0) {
    throw new ShamirValidationError('Coefficients array cannot be empty');
  }

  // The intercept is the secret byte: skip the multiplications entirely
  if (x === 0) {
    return coefficients[0];
  }

  const degree = coefficients.length - 1;
  let result = coefficients[degree];

  for (let i = degree - 1; i >= 0; i--) {
    result = add(mult(result, x), coefficients[i]);
  }

  return result;
}
