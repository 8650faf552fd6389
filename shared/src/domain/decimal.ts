/**
 * Decimal helpers
 *
 * All catalog money and material quantities are decimal.js values. Binary
 * floats never enter a sum; rounding happens only when a value is presented.
 */

import { Decimal } from 'decimal.js';

export { Decimal };

export const ZERO = new Decimal(0);

/** Currency precision used at the presentation boundary */
export const CURRENCY_DECIMALS = 2;

/** Quantity precision of the persisted NUMERIC(12,4) columns */
export const QUANTITY_DECIMALS = 4;

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * Round a currency amount half-up to 2 places.
 *
 * @example
 * roundCurrency(new Decimal('10.005')).toFixed(2) // "10.01"
 */
export function roundCurrency(amount: Decimal): Decimal {
  return amount.toDecimalPlaces(CURRENCY_DECIMALS, Decimal.ROUND_HALF_UP);
}

export function formatCurrencyAmount(amount: Decimal): string {
  return roundCurrency(amount).toFixed(CURRENCY_DECIMALS);
}

/**
 * Round a material quantity half-up to the stored scale
 */
export function roundQuantity(quantity: Decimal): Decimal {
  return quantity.toDecimalPlaces(QUANTITY_DECIMALS, Decimal.ROUND_HALF_UP);
}

/**
 * Render a material quantity without trailing zeros ("3.9", "1", "0.5").
 */
export function formatQuantity(quantity: Decimal): string {
  return roundQuantity(quantity).toString();
}
