/**
 * Shamir Secret Sharing over GF(2^8)
 *
 * Implements (t, n) threshold secret sharing of byte strings where:
 * - A secret is split into n shares
 * - Any t shares can reconstruct the secret
 * - Fewer than t shares reveal no information about the secret
 *
 * Every secret byte gets its own random polynomial of degree t - 1. A share
 * holds that polynomial family evaluated at one x-coordinate, with the
 * x-coordinate appended as the final byte.
 */

import { utf8ToBytes } from '@noble/hashes/utils';
import { defaultRandomSource, type RandomSource } from '../utils/random.js';
import { interpolatePolynomial } from './interpolation.js';
import { perm } from './permutation.js';
import { evaluatePolynomial, makePolynomial } from './polynomial.js';
import {
  ShamirErrorCode,
  ShamirInvariantError,
  ShamirValidationError,
  SplitParamsSchema,
} from './types.js';
import type { ShamirConfig, ShamirSecretSharingOptions, Share } from './types.js';

export { makePolynomial, evaluatePolynomial } from './polynomial.js';
export { interpolatePolynomial } from './interpolation.js';
export { perm } from './permutation.js';

/** Largest share count and threshold a single-byte tag can address */
export const MAX_PARTS = 255;

function validateSplitParams(parts: number, threshold: number): void {
  const result = SplitParamsSchema.safeParse({ threshold, parts });
  if (result.success) {
    return;
  }

  const issue = result.error.issues[0];
  const code =
    issue.path[0] === 'threshold'
      ? ShamirErrorCode.INVALID_THRESHOLD
      : ShamirErrorCode.INVALID_PARTS;

  throw new ShamirValidationError(issue.message, code);
}

/**
 * Split a secret into shares.
 *
 * @param secret - Bytes to split; strings are UTF-8 encoded
 * @param parts - Number of shares to generate (threshold..255)
 * @param threshold - Shares needed to reconstruct (2..255)
 * @param random - Secure random source (default: platform CSPRNG)
 * @returns `parts` shares, each one byte longer than the secret
 */
export function split(
  secret: Uint8Array | string,
  parts: number,
  threshold: number,
  random: RandomSource = defaultRandomSource
): Share[] {
  validateSplitParams(parts, threshold);

  const secretBytes = typeof secret === 'string' ? utf8ToBytes(secret) : secret;
  const secretLength = secretBytes.length;

  if (secretLength === 0) {
    throw new ShamirValidationError('Cannot split an empty secret', ShamirErrorCode.EMPTY_SECRET);
  }

  // perm(255) yields 0..254, so value + 1 always lands in 1..255
  const xCoordinates = perm(MAX_PARTS, random)
    .slice(0, parts)
    .map((value) => value + 1);

  const shares: Share[] = xCoordinates.map((x) => {
    const share = new Uint8Array(secretLength + 1);
    share[secretLength] = x;
    return share;
  });

  for (let idx = 0; idx < secretLength; idx++) {
    const polynomial = makePolynomial(secretBytes[idx], threshold - 1, random);

    for (let i = 0; i < parts; i++) {
      shares[i][idx] = evaluatePolynomial(polynomial, xCoordinates[i]);
    }
  }

  return shares;
}

/**
 * Reconstruct a secret from shares using Lagrange interpolation at x = 0.
 *
 * Any `threshold` or more shares from one split work, in any order. Fewer
 * shares produce garbage rather than an error: nothing in a share records
 * the threshold.
 *
 * @param parts - Shares produced by {@link split}
 * @returns The reconstructed secret
 */
export function reconstruct(parts: ReadonlyArray<Uint8Array>): Uint8Array {
  if (parts.length < 2) {
    throw new ShamirValidationError(
      'Less than two parts cannot be used to reconstruct the secret',
      ShamirErrorCode.INSUFFICIENT_PARTS
    );
  }

  const partLength = parts[0].length;
  if (partLength < 2) {
    throw new ShamirValidationError(
      'Parts must be at least two bytes',
      ShamirErrorCode.INVALID_PART_LENGTH
    );
  }

  for (const part of parts) {
    if (part.length !== partLength) {
      throw new ShamirValidationError(
        'All parts must be the same length',
        ShamirErrorCode.PART_LENGTH_MISMATCH
      );
    }
  }

  // Distinct tags keep div() away from a zero denominator
  const xSamples = new Uint8Array(parts.length);
  const seen = new Set<number>();

  parts.forEach((part, i) => {
    const tag = part[partLength - 1];

    if (tag === 0) {
      throw new ShamirValidationError(
        'Part has an invalid x-coordinate',
        ShamirErrorCode.INVALID_TAG
      );
    }

    if (seen.has(tag)) {
      throw new ShamirInvariantError('Duplicate part detected', ShamirErrorCode.DUPLICATE_PART);
    }

    seen.add(tag);
    xSamples[i] = tag;
  });

  const secret = new Uint8Array(partLength - 1);
  const ySamples = new Uint8Array(parts.length);

  for (let idx = 0; idx < secret.length; idx++) {
    parts.forEach((part, i) => {
      ySamples[i] = part[idx];
    });

    secret[idx] = interpolatePolynomial(xSamples, ySamples, 0);
  }

  return secret;
}

/**
 * Shamir Secret Sharing class with convenient API
 */
export class ShamirSecretSharing {
  private readonly random: RandomSource;

  constructor(options?: ShamirSecretSharingOptions) {
    this.random = options?.random ?? defaultRandomSource;
  }

  /**
   * Split a secret into shares
   */
  split(secret: Uint8Array | string, config: ShamirConfig): Share[] {
    return split(secret, config.parts, config.threshold, this.random);
  }

  /**
   * Combine shares to reconstruct the secret
   */
  reconstruct(parts: ReadonlyArray<Uint8Array>): Uint8Array {
    return reconstruct(parts);
  }
}
