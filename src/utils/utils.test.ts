/**
 * Tests for constant-time helpers and the random source
 */

import { describe, it, expect } from 'vitest';
import { constantTimeByteEq, constantTimeSelect } from './constant-time.js';
import { defaultRandomSource, randomIntFromBytes } from './random.js';
import {
  ShamirErrorCode,
  ShamirInvariantError,
  ShamirValidationError,
} from '../shamir/types.js';

describe('constant-time helpers', () => {
  describe('constantTimeSelect', () => {
    it('should pick x for a selector of 1 and y for 0', () => {
      expect(constantTimeSelect(0, 1, 2)).toBe(2);
      expect(constantTimeSelect(1, 1, 2)).toBe(1);
    });

    it('should select across the whole byte range', () => {
      for (let x = 0; x < 256; x += 3) {
        for (let y = 0; y < 256; y += 5) {
          expect(constantTimeSelect(1, x, y)).toBe(x);
          expect(constantTimeSelect(0, x, y)).toBe(y);
        }
      }
    });

    it('should reject any other selector', () => {
      expect(() => constantTimeSelect(2, 1, 2)).toThrow('Undefined behavior');
      expect(() => constantTimeSelect(-1, 1, 2)).toThrow(ShamirInvariantError);
    });

    it('should tag selector errors with UNDEFINED_SELECTOR', () => {
      try {
        constantTimeSelect(2, 1, 2);
        expect.unreachable('selector 2 should throw');
      } catch (err) {
        expect(err).toBeInstanceOf(ShamirInvariantError);
        if (err instanceof ShamirInvariantError) {
          expect(err.code).toBe(ShamirErrorCode.UNDEFINED_SELECTOR);
          expect(err.name).toBe('ShamirInvariantError');
        }
      }
    });
  });

  describe('constantTimeByteEq', () => {
    it('should return 1 for equal bytes', () => {
      expect(constantTimeByteEq(4, 4)).toBe(1);
      expect(constantTimeByteEq(255, 255)).toBe(1);

      for (let a = 0; a < 256; a++) {
        expect(constantTimeByteEq(a, a)).toBe(1);
      }
    });

    it('should return 0 for different bytes', () => {
      expect(constantTimeByteEq(1, 2)).toBe(0);
      expect(constantTimeByteEq(255, 0)).toBe(0);
      expect(constantTimeByteEq(0, 128)).toBe(0);
    });

    it('should reject values outside the byte range', () => {
      expect(() => constantTimeByteEq(256, 0)).toThrow('Not uint8 values passed');
      expect(() => constantTimeByteEq(0, 256)).toThrow('Not uint8 values passed');
      expect(() => constantTimeByteEq(-1, 0)).toThrow(ShamirValidationError);
      expect(() => constantTimeByteEq(1.5, 1)).toThrow(ShamirValidationError);
    });
  });
});

describe('random source', () => {
  describe('randomIntFromBytes', () => {
    it('should reject bytes that would bias the result', () => {
      // range 3: bytes >= 255 are rejected
      const bytes = [255, 7];
      let calls = 0;
      const value = randomIntFromBytes(2, () => bytes[calls++]);

      expect(value).toBe(1);
      expect(calls).toBe(2);
    });

    it('should pass bytes through for a full byte range', () => {
      expect(randomIntFromBytes(255, () => 200)).toBe(200);
    });

    it('should always return 0 for a bound of 0', () => {
      expect(randomIntFromBytes(0, () => 173)).toBe(0);
    });

    it('should reject bounds outside a byte', () => {
      expect(() => randomIntFromBytes(256, () => 0)).toThrow('Random bound must be an integer');
      expect(() => randomIntFromBytes(-1, () => 0)).toThrow(ShamirValidationError);
    });
  });

  describe('defaultRandomSource', () => {
    it('should draw bytes in range', () => {
      for (let i = 0; i < 200; i++) {
        const byte = defaultRandomSource.randomByte();
        expect(byte).toBeGreaterThanOrEqual(0);
        expect(byte).toBeLessThanOrEqual(255);
      }
    });

    it('should draw bounded integers in range', () => {
      for (let i = 0; i < 200; i++) {
        const value = defaultRandomSource.randomInt(9);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(9);
      }
    });
  });
});
