import Decimal from 'decimal.js';
import { ValidationError } from './errors';

/**
 * Decimal constructor used for every quantity, rate and amount.
 * Inputs are bounded by AMOUNT_LIMITS and TAX_RATE_LIMITS, so a product carries at most
 * 28 significant digits and a tax amount at most 35 plus the digits of the item count.
 * 64 digits keeps every sum and product exact, and toString() never switches to
 * exponential notation.
 */
export const ExactDecimal = Decimal.clone({
  precision: 64,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -64,
  toExpPos: 64,
});

export type DecimalInput = string | number | Decimal;

export const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Digit budget of a stored decimal column.
 */
export interface DecimalLimits {
  integerDigits: number;
  fractionDigits: number;
}

/** quantity and unit_rate, NUMERIC(14,4) */
export const AMOUNT_LIMITS: DecimalLimits = { integerDigits: 10, fractionDigits: 4 };

/** tax_rate, NUMERIC(7,4) */
export const TAX_RATE_LIMITS: DecimalLimits = { integerDigits: 3, fractionDigits: 4 };

// Display only: exact halves go to the even neighbour
const DISPLAY_ROUNDING = Decimal.ROUND_HALF_EVEN;

export const CURRENCY_SYMBOL = '$';

/**
 * Parses a decimal string (or number, or Decimal) into an exact decimal within the given digit budget.
 *
 * @throws {ValidationError} If the value is not a finite base-10 number or exceeds the limits
 *
 * @example
 * parseDecimal('150.00', 'unit_rate'); // Decimal 150
 * parseDecimal('8.12345', 'tax_rate', TAX_RATE_LIMITS); // throws: at most 4 decimal places
 */
export function parseDecimal(value: DecimalInput, field: string, limits: DecimalLimits = AMOUNT_LIMITS): Decimal {
  let parsed: Decimal;
  if (Decimal.isDecimal(value)) {
    parsed = new ExactDecimal(value);
  } else {
    const text = typeof value === 'number' ? String(value) : value.trim();
    if (!DECIMAL_PATTERN.test(text)) {
      throw new ValidationError(`${field} must be a decimal number`);
    }
    parsed = new ExactDecimal(text);
  }

  assertWithinLimits(parsed, field, limits);
  return parsed;
}

function assertWithinLimits(value: Decimal, field: string, limits: DecimalLimits): void {
  if (value.decimalPlaces() > limits.fractionDigits) {
    throw new ValidationError(`${field} must have at most ${limits.fractionDigits} decimal places`);
  }
  const integerPart = value.abs().truncated();
  const integerDigits = integerPart.isZero() ? 0 : integerPart.toFixed(0).length;
  if (integerDigits > limits.integerDigits) {
    throw new ValidationError(`${field} must have at most ${limits.integerDigits} integer digits`);
  }
}

/**
 * Renders an amount for display: currency symbol and exactly two decimals, halves to even.
 *
 * @example
 * formatMoney(new ExactDecimal('8680')); // '$8680.00'
 * formatMoney(new ExactDecimal('0.125')); // '$0.12'
 */
export function formatMoney(amount: Decimal): string {
  return `${CURRENCY_SYMBOL}${formatFixed2(amount)}`;
}

export function formatFixed2(value: Decimal): string {
  return value.toFixed(2, DISPLAY_ROUNDING);
}

export function sumDecimals(values: Decimal[]): Decimal {
  return values.reduce((total, value) => total.plus(value), new ExactDecimal(0));
}
