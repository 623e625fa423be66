/**
 * Constant-time helpers for secret-dependent byte values.
 *
 * These avoid data-dependent branches so that selecting between values does
 * not reveal, through timing, which value was chosen.
 */

import {
  ShamirErrorCode,
  ShamirInvariantError,
  ShamirValidationError,
} from '../shamir/types.js';

/**
 * Returns 1 if x === y and 0 otherwise.
 *
 * The range check may branch: it only looks at whether the inputs are bytes,
 * never at their values relative to each other.
 */
export function constantTimeByteEq(x: number, y: number): number {
  if (!Number.isInteger(x) || !Number.isInteger(y) || ((~0xff & x) | (~0xff & y)) !== 0) {
    throw new ShamirValidationError('Not uint8 values passed', ShamirErrorCode.INVALID_BYTE);
  }

  // (z - 1) is negative only when z is zero
  const z = x ^ y;
  return ((z - 1) >>> 31) & 1;
}

/**
 * Returns x if v === 1 and y if v === 0.
 *
 * Any other selector is a caller bug.
 */
export function constantTimeSelect(v: number, x: number, y: number): number {
  if (v !== 0 && v !== 1) {
    throw new ShamirInvariantError('Undefined behavior', ShamirErrorCode.UNDEFINED_SELECTOR);
  }

  return (~(v - 1) & x) | ((v - 1) & y);
}
