import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { formatFixed, parseAmount } from './decimal-utils.js';

describe('Decimal Utilities', () => {
  describe('parseAmount', () => {
    it('should parse fixed-point amounts up to four fractional digits', () => {
      const result = parseAmount('1.2345');

      expect(result.isOk()).toBe(true);
      expect(result._unsafeUnwrap().toString()).toBe('1.2345');
    });

    it('should trim surrounding whitespace', () => {
      expect(parseAmount('  25.5 ')._unsafeUnwrap().toString()).toBe('25.5');
    });

    it('should accept leading zeros and bare fractions', () => {
      expect(parseAmount('00100.0000')._unsafeUnwrap().toString()).toBe('100');
      expect(parseAmount('.5')._unsafeUnwrap().toString()).toBe('0.5');
      expect(parseAmount('7.')._unsafeUnwrap().toString()).toBe('7');
    });

    it('should keep the sign of negative amounts', () => {
      const result = parseAmount('-100.0');

      expect(result._unsafeUnwrap().isNegative()).toBe(true);
    });

    it('should reject empty input', () => {
      const result = parseAmount('   ');

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().message).toBe('Amount is empty');
    });

    it('should reject non-numeric and exponent notation', () => {
      expect(parseAmount('not_a_number')._unsafeUnwrapErr().message).toBe(
        "Invalid amount 'not_a_number': expected a fixed-point decimal number"
      );
      expect(parseAmount('1e5').isErr()).toBe(true);
      expect(parseAmount('NaN').isErr()).toBe(true);
      expect(parseAmount('Infinity').isErr()).toBe(true);
    });

    it('should reject more than four fractional digits', () => {
      expect(parseAmount('0.00001')._unsafeUnwrapErr().message).toBe(
        "Invalid amount '0.00001': more than 4 fractional digits"
      );
    });

    it('should accept up to 24 integer digits without rounding', () => {
      const largest = `${'9'.repeat(24)}.9999`;

      expect(parseAmount(largest)._unsafeUnwrap().toFixed(4)).toBe(largest);
      expect(parseAmount(`000${'1'.repeat(24)}`).isOk()).toBe(true);
    });

    it('should reject amounts with more than 24 integer digits', () => {
      const tooLarge = `1${'0'.repeat(24)}`;

      expect(parseAmount(tooLarge)._unsafeUnwrapErr().message).toBe(
        `Invalid amount '${tooLarge}': more than 24 integer digits`
      );
      expect(parseAmount(`-${tooLarge}.5`).isErr()).toBe(true);
    });
  });

  describe('formatFixed', () => {
    it('should render exactly four fractional digits', () => {
      expect(formatFixed(new Decimal('100'))).toBe('100.0000');
      expect(formatFixed(new Decimal('74.5'))).toBe('74.5000');
      expect(formatFixed(new Decimal('1.2345'))).toBe('1.2345');
    });

    it('should never use exponent notation', () => {
      expect(formatFixed(new Decimal('1000000000000'))).toBe('1000000000000.0000');
      expect(formatFixed(new Decimal('0.0001'))).toBe('0.0001');
    });

    it('should not render negative zero', () => {
      expect(formatFixed(new Decimal('-0'))).toBe('0.0000');
    });
  });
});
