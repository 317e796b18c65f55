import { formatUnits, parseUnits } from "viem";

/** Decimals of every USD value and of the debt token. */
export const USD_DECIMALS = 18;

/** 1.0 in 18-decimal fixed point. */
export const WAD = 10n ** 18n;

/** Percentages are expressed over this denominator. */
export const PERCENT = 100n;

export function pow10(decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new RangeError(`Invalid decimals: ${decimals}`);
  }
  return 10n ** BigInt(decimals);
}

/**
 * floor(a * b / denominator). bigint has no width limit, so the product is
 * taken in full before dividing.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError("mulDiv: division by zero");
  }
  return (a * b) / denominator;
}

/**
 * Apply a whole-number percentage, rounding down.
 */
export function percentOf(value: bigint, pct: bigint): bigint {
  return mulDiv(value, pct, PERCENT);
}

/**
 * Parse a human decimal string ("1.5") into fixed point.
 */
export function toFixed(value: string, decimals: number = USD_DECIMALS): bigint {
  return parseUnits(value, decimals);
}

/**
 * Format a fixed-point value as a decimal string.
 */
export function fromFixed(value: bigint, decimals: number = USD_DECIMALS): string {
  return formatUnits(value, decimals);
}
