/**
 * Arithmetic in GF(2^8)
 *
 * Operands may be secret-derived (polynomial coefficients, secret bytes), so
 * the zero special cases are resolved with constant-time selects instead of
 * branches.
 */

import { constantTimeByteEq, constantTimeSelect } from '../utils/constant-time.js';
import { ShamirErrorCode, ShamirInvariantError } from '../shamir/types.js';
import { EXP_TABLE, LOG_TABLE } from './tables.js';

export { EXP_TABLE, LOG_TABLE, FIELD_POLYNOMIAL, GENERATOR } from './tables.js';

/**
 * Adds two field elements. Also subtraction, since every element is its own
 * additive inverse.
 */
export function add(a: number, b: number): number {
  return a ^ b;
}

/**
 * Multiplies two field elements
 */
export function mult(a: number, b: number): number {
  const sum = (LOG_TABLE[a] + LOG_TABLE[b]) % 255;
  let ret = EXP_TABLE[sum];

  ret = constantTimeSelect(constantTimeByteEq(a, 0), 0, ret);
  return constantTimeSelect(constantTimeByteEq(b, 0), 0, ret);
}

/**
 * Divides a by b.
 *
 * @throws ShamirInvariantError if b is zero. Callers guarantee distinct
 *         x-coordinates, so this only fires on a bug. The check leaks timing,
 *         which does not matter for an aborted operation.
 */
export function div(a: number, b: number): number {
  if (b === 0) {
    throw new ShamirInvariantError('Divide by zero', ShamirErrorCode.DIVISION_BY_ZERO);
  }

  const diff = (LOG_TABLE[a] - LOG_TABLE[b] + 255) % 255;
  const ret = EXP_TABLE[diff];

  return constantTimeSelect(constantTimeByteEq(a, 0), 0, ret);
}
