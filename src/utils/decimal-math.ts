/**
 * Quantity and price arithmetic in decimal, so splits and grid levels
 * add back up to the inputs exactly.
 */

import Decimal from "decimal.js";

/** Truncate toward zero at `precision` decimal places */
export function roundDown(value: number, precision: number): number {
  return new Decimal(value).toDecimalPlaces(precision, Decimal.ROUND_DOWN).toNumber();
}

/**
 * Split `total` into `parts` slices rounded down to `precision`;
 * the last slice takes whatever rounding left over.
 */
export function splitQuantity(total: number, parts: number, precision: number): number[] {
  const slice = new Decimal(total).div(parts).toDecimalPlaces(precision, Decimal.ROUND_DOWN);
  const last = new Decimal(total).minus(slice.times(parts - 1));

  const slices: number[] = [];
  for (let i = 0; i < parts - 1; i++) {
    slices.push(slice.toNumber());
  }
  slices.push(last.toNumber());
  return slices;
}

/**
 * `count + 1` evenly spaced prices from lower to upper, both ends exact
 */
export function gridPrices(lower: number, upper: number, count: number): number[] {
  const lo = new Decimal(lower);
  const hi = new Decimal(upper);
  const step = hi.minus(lo).div(count);

  const prices: number[] = [];
  for (let i = 0; i < count; i++) {
    prices.push(lo.plus(step.times(i)).toNumber());
  }
  prices.push(hi.toNumber());
  return prices;
}

export function gridStep(lower: number, upper: number, count: number): number {
  return new Decimal(upper).minus(lower).div(count).toNumber();
}

/** Exact decimal sum, returned as a number */
export function decimalSum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc.plus(v), new Decimal(0)).toNumber();
}

/** (exit - entry) * qty, computed in decimal */
export function pnl(entry: number, exit: number, quantity: number): number {
  return new Decimal(exit).minus(entry).times(quantity).toNumber();
}

export function addDecimal(a: number, b: number): number {
  return new Decimal(a).plus(b).toNumber();
}

export function subtractDecimal(a: number, b: number): number {
  return new Decimal(a).minus(b).toNumber();
}
