/**
 * Types for Shamir Secret Sharing over GF(2^8)
 */

import { z } from 'zod';
import type { RandomSource } from '../utils/random.js';

/**
 * A single share: the evaluations of every per-byte polynomial followed by
 * the share's x-coordinate tag.
 *
 * Layout: [y_0, y_1, ..., y_{n-1}, x] with x in 1..255
 */
export type Share = Uint8Array;

/**
 * Configuration for splitting a secret
 */
export interface ShamirConfig {
  /** Minimum number of shares required for reconstruction (2..255) */
  threshold: number;
  /** Total number of shares to generate (threshold..255) */
  parts: number;
}

/**
 * Options for the ShamirSecretSharing class
 */
export interface ShamirSecretSharingOptions {
  /** Secure random source (default: platform CSPRNG) */
  random?: RandomSource;
}

/**
 * Split parameters as checked before any randomness is drawn.
 * Issues are reported in key order, so threshold problems win over parts problems.
 */
export const SplitParamsSchema = z
  .object({
    threshold: z
      .number()
      .int('Threshold must be an integer')
      .min(2, 'Threshold must be at least 2')
      .max(255, 'Threshold cannot exceed 255'),
    parts: z
      .number()
      .int('Parts must be an integer')
      .max(255, 'Parts cannot exceed 255'),
  })
  .refine((params) => params.parts >= params.threshold, {
    message: 'Parts cannot be less than threshold',
    path: ['parts'],
  });

export type SplitParams = z.infer<typeof SplitParamsSchema>;

/**
 * Shamir Error Codes
 */
export enum ShamirErrorCode {
  INVALID_THRESHOLD = 'INVALID_THRESHOLD',
  INVALID_PARTS = 'INVALID_PARTS',
  EMPTY_SECRET = 'EMPTY_SECRET',
  INSUFFICIENT_PARTS = 'INSUFFICIENT_PARTS',
  INVALID_PART_LENGTH = 'INVALID_PART_LENGTH',
  PART_LENGTH_MISMATCH = 'PART_LENGTH_MISMATCH',
  INVALID_TAG = 'INVALID_TAG',
  INVALID_BYTE = 'INVALID_BYTE',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  RANDOM_SOURCE_FAILURE = 'RANDOM_SOURCE_FAILURE',
  DUPLICATE_PART = 'DUPLICATE_PART',
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',
  UNDEFINED_SELECTOR = 'UNDEFINED_SELECTOR',
}

/**
 * Base error for everything thrown by this library
 */
export class ShamirError extends Error {
  constructor(
    message: string,
    public readonly code: ShamirErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ShamirError';
  }
}

/**
 * The caller passed arguments that break the input contract
 */
export class ShamirValidationError extends ShamirError {
  constructor(message: string, code: ShamirErrorCode = ShamirErrorCode.INVALID_ARGUMENT) {
    super(message, code);
    this.name = 'ShamirValidationError';
  }
}

/**
 * An internal invariant was violated. The operation is aborted because
 * continuing would produce a corrupted secret byte.
 */
export class ShamirInvariantError extends ShamirError {
  constructor(message: string, code: ShamirErrorCode) {
    super(message, code);
    this.name = 'ShamirInvariantError';
  }
}
