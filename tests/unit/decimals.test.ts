import { describe, it, expect } from 'vitest';

import { bigintRatio, safeDivide, scaleDown, toBigIntSafe, toNumberSafe } from '../../src/utils/decimals.js';

describe('decimals', () => {
  describe('scaleDown', () => {
    it('should divide by 10^decimals', () => {
      expect(scaleDown(1_500_000n, 6)).toBe(1.5);
      expect(scaleDown(10n ** 18n, 18)).toBe(1);
    });

    it('should multiply for negative decimals', () => {
      expect(scaleDown(15n, -2)).toBe(1500);
    });

    it('should reject fractional decimals', () => {
      expect(() => scaleDown(1n, 18.5)).toThrow(RangeError);
    });
  });

  describe('toBigIntSafe', () => {
    it('should parse integer strings beyond double precision', () => {
      expect(toBigIntSafe('123456789012345678901234567890')).toBe(123456789012345678901234567890n);
    });

    it('should truncate fractional values', () => {
      expect(toBigIntSafe(12.9)).toBe(12n);
      expect(toBigIntSafe('1e3')).toBe(1000n);
    });

    it('should return the fallback for garbage', () => {
      expect(toBigIntSafe('abc')).toBe(0n);
      expect(toBigIntSafe(null, -1n)).toBe(-1n);
      expect(toBigIntSafe(Number.NaN)).toBe(0n);
    });
  });

  describe('toNumberSafe', () => {
    it('should parse numeric strings and reject non-finite values', () => {
      expect(toNumberSafe('0.25', 0)).toBe(0.25);
      expect(toNumberSafe(Number.POSITIVE_INFINITY, null)).toBeNull();
      expect(toNumberSafe('', 3)).toBe(3);
    });
  });

  describe('bigintRatio', () => {
    it('should return 0 for a zero denominator', () => {
      expect(bigintRatio(5n, 0n)).toBe(0);
    });

    it('should compute ratios of large raw amounts', () => {
      expect(bigintRatio(200n * 10n ** 18n, 1000n * 10n ** 18n)).toBe(0.2);
    });
  });

  describe('safeDivide', () => {
    it('should return null for a zero denominator', () => {
      expect(safeDivide(1, 0)).toBeNull();
      expect(safeDivide(3, 4)).toBe(0.75);
    });
  });
});
