/**
 * Secure randomness for polynomial coefficients and share tags
 */

import { randomBytes } from '@noble/hashes/utils';
import { ShamirErrorCode, ShamirValidationError } from '../shamir/types.js';

/**
 * Source of unbiased randomness. Must be cryptographically secure:
 * predictable output breaks the secrecy of every share.
 */
export interface RandomSource {
  /** Uniform byte in [0, 255] */
  randomByte(): number;
  /** Uniform integer in [0, max], max in [0, 255] */
  randomInt(max: number): number;
}

/**
 * Uniform integer in [0, max] from single CSPRNG bytes.
 *
 * Bytes at or above the largest multiple of (max + 1) are rejected so the
 * modulo does not favour small values.
 */
export function randomIntFromBytes(max: number, nextByte: () => number): number {
  if (!Number.isInteger(max) || max < 0 || max > 255) {
    throw new ShamirValidationError(
      `Random bound must be an integer in [0, 255], got ${max}`,
      ShamirErrorCode.INVALID_ARGUMENT
    );
  }

  const range = max + 1;
  const limit = 256 - (256 % range);

  for (;;) {
    const byte = nextByte();
    if (byte < limit) {
      return byte % range;
    }
  }
}

/**
 * Random source backed by the platform CSPRNG (crypto.getRandomValues)
 */
export const defaultRandomSource: RandomSource = {
  randomByte(): number {
    return randomBytes(1)[0];
  },

  randomInt(max: number): number {
    return randomIntFromBytes(max, () => randomBytes(1)[0]);
  },
};
