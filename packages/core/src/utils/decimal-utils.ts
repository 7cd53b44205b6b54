import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

/** Number of fractional digits an input amount may carry and every output amount is rendered with. */
export const AMOUNT_SCALE = 4;

/** Significant digits every Decimal operation keeps */
export const AMOUNT_PRECISION = 28;

/** Integer digits an input amount may carry; anything longer would be rounded */
export const MAX_AMOUNT_INTEGER_DIGITS = AMOUNT_PRECISION - AMOUNT_SCALE;

Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: AMOUNT_PRECISION,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

const FIXED_POINT_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Strict fixed-point parser for transaction amounts.
 *
 * Accepts an optional sign, at most {@link MAX_AMOUNT_INTEGER_DIGITS} significant
 * integer digits and at most {@link AMOUNT_SCALE} fractional digits.
 * Exponent notation, NaN and Infinity are rejected. The sign is kept: negative
 * amounts are a business rule violation, not a format one.
 */
export function parseAmount(raw: string, scale = AMOUNT_SCALE): Result<Decimal, Error> {
  const value = raw.trim();

  if (value === '') {
    return err(new Error('Amount is empty'));
  }

  if (!FIXED_POINT_PATTERN.test(value)) {
    return err(new Error(`Invalid amount '${value}': expected a fixed-point decimal number`));
  }

  const [integer = '', fraction = ''] = value.replace(/^[+-]/, '').split('.');
  if (fraction.length > scale) {
    return err(new Error(`Invalid amount '${value}': more than ${scale} fractional digits`));
  }
  if (integer.replace(/^0+/, '').length > MAX_AMOUNT_INTEGER_DIGITS) {
    return err(new Error(`Invalid amount '${value}': more than ${MAX_AMOUNT_INTEGER_DIGITS} integer digits`));
  }

  return ok(new Decimal(value));
}

/**
 * Render a Decimal in fixed notation with exactly `places` fractional digits.
 */
export function formatFixed(decimal: Decimal, places = AMOUNT_SCALE): string {
  // toFixed keeps the sign of negative zero ("-0.0000")
  const normalized = decimal.isZero() ? new Decimal(0) : decimal;
  return normalized.toFixed(places);
}
