import Decimal from "decimal.js";

export type MoneyInput = Decimal | string | number | null | undefined;

export const ZERO = new Decimal(0);

/**
 * Decimal values read from numeric columns arrive as strings; NULL counts as zero.
 */
export function toDecimal(value: MoneyInput): Decimal {
  if (value === null || value === undefined || value === "") return ZERO;
  return new Decimal(value);
}

/** Currency rounding: 2 places, half away from zero. */
export function roundCurrency(value: MoneyInput): Decimal {
  return toDecimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/** Column form for decimal(…, 2). */
export function toCurrencyString(value: MoneyInput): string {
  return roundCurrency(value).toFixed(2);
}

export function toFixedString(value: MoneyInput, places: number): string {
  return toDecimal(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toFixed(places);
}

export function sumDecimals(values: MoneyInput[]): Decimal {
  return values.reduce<Decimal>((sum, v) => sum.plus(toDecimal(v)), ZERO);
}

export function formatUsd(value: MoneyInput): string {
  const rounded = roundCurrency(value);
  return rounded.isNegative()
    ? `-$${rounded.abs().toFixed(2)}`
    : `$${rounded.toFixed(2)}`;
}

export { Decimal };
