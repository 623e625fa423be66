/**
 * shamir-gf256
 * Shamir's Secret Sharing over GF(2^8)
 *
 * Splits a byte secret into N shares such that:
 * - Any K of them (the threshold) reconstruct the secret exactly
 * - K - 1 or fewer reveal nothing about it
 *
 * Shares are raw bytes: [y_0, ..., y_{n-1}, x]. Encoding them for transport
 * (hex, base64) is left to the caller.
 */

// =============================================================================
// Main API
// =============================================================================

export {
  ShamirSecretSharing,
  split,
  reconstruct,
  MAX_PARTS,
} from './shamir/index.js';

export type {
  Share,
  ShamirConfig,
  ShamirSecretSharingOptions,
  SplitParams,
} from './shamir/types.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ShamirError,
  ShamirValidationError,
  ShamirInvariantError,
  ShamirErrorCode,
  SplitParamsSchema,
} from './shamir/types.js';

// =============================================================================
// Primitives
// =============================================================================

export {
  makePolynomial,
  evaluatePolynomial,
  interpolatePolynomial,
  perm,
} from './shamir/index.js';

export { add, mult, div, EXP_TABLE, LOG_TABLE } from './gf256/index.js';

export { constantTimeByteEq, constantTimeSelect } from './utils/constant-time.js';

export { defaultRandomSource, randomIntFromBytes } from './utils/random.js';
export type { RandomSource } from './utils/random.js';
