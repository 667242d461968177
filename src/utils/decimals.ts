/**
 * Decimal conversion helpers for on-chain integer amounts.
 */

import { formatUnits } from 'ethers';

/**
 * Convert a raw integer amount to a float given its decimals.
 * Negative decimals multiply instead of divide (oracle scales can go below zero).
 * @example scaleDown(1_500_000n, 6) // 1.5
 */
export function scaleDown(raw: bigint, decimals: number): number {
  if (!Number.isInteger(decimals)) {
    throw new RangeError(`decimals must be an integer, got ${decimals}`);
  }
  if (decimals >= 0) {
    return Number(formatUnits(raw, decimals));
  }
  return Number(raw * 10n ** BigInt(-decimals));
}

/**
 * Parse an integer-valued API field (string, number or bigint) to bigint.
 * Fractional numbers are truncated; anything unparseable yields the fallback.
 * @example toBigIntSafe('1000000') // 1000000n
 */
export function toBigIntSafe(value: unknown, fallback: bigint = 0n): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? BigInt(Math.trunc(value)) : fallback;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (/^-?\d+$/.test(trimmed)) return BigInt(trimmed);
    const asNumber = Number(trimmed);
    if (trimmed !== '' && Number.isFinite(asNumber)) return BigInt(Math.trunc(asNumber));
  }
  return fallback;
}

/**
 * Parse a float-valued API field; unparseable or non-finite values yield the fallback.
 */
export function toNumberSafe(value: unknown, fallback: number): number;
export function toNumberSafe(value: unknown, fallback: null): number | null;
export function toNumberSafe(value: unknown, fallback: number | null): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : fallback;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

/**
 * Ratio of two raw amounts as a float, 0 when the denominator is 0.
 */
export function bigintRatio(numerator: bigint, denominator: bigint): number {
  if (denominator === 0n) return 0;
  const PRECISION = 10n ** 18n;
  return scaleDown((numerator * PRECISION) / denominator, 18);
}

/** Divide, returning null on a zero or non-finite result. */
export function safeDivide(numerator: number, denominator: number): number | null {
  if (denominator === 0) return null;
  const result = numerator / denominator;
  return Number.isFinite(result) ? result : null;
}
