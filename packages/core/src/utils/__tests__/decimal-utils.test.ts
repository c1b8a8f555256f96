import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  averageOf,
  formatDecimal,
  parseCurrencyAmount,
  sumDecimals,
  tryParseDecimal,
} from '../decimal-utils.ts';

describe('Decimal Utilities', () => {
  describe('tryParseDecimal', () => {
    it('should parse valid string to Decimal', () => {
      const out = { value: new Decimal(0) };
      const result = tryParseDecimal('123.456', out);

      expect(result).toBe(true);
      expect(out.value.toString()).toBe('123.456');
    });

    it('should handle empty string as zero', () => {
      const out = { value: new Decimal(1) };
      const result = tryParseDecimal('', out);

      expect(result).toBe(true);
      expect(out.value.isZero()).toBe(true);
    });

    it('should reject non-numeric text', () => {
      expect(tryParseDecimal('abc')).toBe(false);
    });
  });

  describe('parseCurrencyAmount', () => {
    it('should strip a leading dollar sign', () => {
      expect(parseCurrencyAmount('$12.50')?.toString()).toBe('12.5');
    });

    it('should parse plain amounts', () => {
      expect(parseCurrencyAmount(' 2000.01 ')?.toString()).toBe('2000.01');
    });

    it('should keep the sign of negative amounts', () => {
      expect(parseCurrencyAmount('$-77.00')?.toString()).toBe('-77');
    });

    it('should return undefined for empty or non-numeric text', () => {
      expect(parseCurrencyAmount('')).toBeUndefined();
      expect(parseCurrencyAmount('$')).toBeUndefined();
      expect(parseCurrencyAmount('twelve')).toBeUndefined();
      expect(parseCurrencyAmount('1,000')).toBeUndefined();
    });

    it('should reject infinities', () => {
      expect(parseCurrencyAmount('Infinity')).toBeUndefined();
    });

    it('should reject hexadecimal, binary and octal literals', () => {
      expect(parseCurrencyAmount('$0x1F')).toBeUndefined();
      expect(parseCurrencyAmount('0b101')).toBeUndefined();
      expect(parseCurrencyAmount('0o7')).toBeUndefined();
    });

    it('should accept exponent notation and bare fractions', () => {
      expect(parseCurrencyAmount('1.5e2')?.toString()).toBe('150');
      expect(parseCurrencyAmount('$.75')?.toString()).toBe('0.75');
      expect(parseCurrencyAmount('+3.')?.toString()).toBe('3');
    });
  });

  describe('sumDecimals', () => {
    it('should add without binary rounding error', () => {
      expect(sumDecimals([new Decimal('0.1'), new Decimal('0.2')]).toString()).toBe('0.3');
    });

    it('should return zero for no values', () => {
      expect(sumDecimals([]).isZero()).toBe(true);
    });
  });

  describe('averageOf', () => {
    it('should divide total by count', () => {
      expect(averageOf(new Decimal(300), 2).toString()).toBe('150');
    });

    it('should return zero when count is zero', () => {
      expect(averageOf(new Decimal(300), 0).isZero()).toBe(true);
    });
  });

  describe('formatDecimal', () => {
    it('should drop an all-zero fraction', () => {
      expect(formatDecimal(new Decimal('100'))).toBe('100');
    });

    it('should keep two decimal places otherwise', () => {
      expect(formatDecimal(new Decimal('150.5'))).toBe('150.50');
    });

    it('should round half up', () => {
      expect(formatDecimal(new Decimal('0.005'))).toBe('0.01');
    });
  });
});
