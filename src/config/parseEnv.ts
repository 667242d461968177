/**
 * Environment variable parsing utilities for numeric, list and timestamp values.
 * Unlike the zod schema, these helpers take the raw string and a fallback.
 */

/**
 * Parse integer environment variable
 * @param value - Environment variable value
 * @param defaultValue - Default value if undefined/empty/invalid
 * @param min - Optional minimum value
 * @param max - Optional maximum value
 * @returns Parsed integer
 */
export function parseIntEnv(
  value: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    return defaultValue;
  }

  let result = parsed;

  if (min !== undefined && result < min) {
    result = min;
  }

  if (max !== undefined && result > max) {
    result = max;
  }

  return result;
}

/**
 * Parse float environment variable
 * @param value - Environment variable value
 * @param defaultValue - Default value if undefined/empty/invalid
 * @param min - Optional minimum value
 */
export function parseFloatEnv(value: string | undefined, defaultValue: number, min?: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return defaultValue;
  }

  return min !== undefined && parsed < min ? min : parsed;
}

/**
 * Parse a comma-separated list, trimming entries and dropping empties.
 * @example parseListEnv(' xUSD, deUSD ,', []) // ['xUSD', 'deUSD']
 */
export function parseListEnv(value: string | undefined, defaultValue: string[]): string[] {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Parse a timestamp given either as unix seconds or as an ISO-8601 date.
 * Date-only strings are read as UTC midnight.
 * @throws Error when the value is neither
 * @example parseTimestampEnv('2025-11-04', 0) // 1762214400
 */
export function parseTimestampEnv(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  const isoDate = /^\d{4}-\d{2}-\d{2}$/.test(trimmed) ? `${trimmed}T00:00:00Z` : trimmed;
  const millis = Date.parse(isoDate);
  if (isNaN(millis)) {
    throw new Error(`Invalid timestamp "${value}": expected unix seconds or an ISO-8601 date`);
  }
  return Math.floor(millis / 1000);
}

export interface ChainEntry {
  name: string;
  chainId: number;
}

/**
 * Parse a `name:chainId` list such as `ethereum:1,base:8453`.
 * @throws Error on a malformed entry or duplicate chain id
 */
export function parseChainMapEnv(value: string | undefined, defaultValue: ChainEntry[]): ChainEntry[] {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const chains: ChainEntry[] = [];
  const seen = new Set<number>();
  for (const entry of parseListEnv(value, [])) {
    const match = /^([A-Za-z0-9_-]+):(\d+)$/.exec(entry);
    if (!match) {
      throw new Error(`Invalid chain entry "${entry}": expected name:chainId`);
    }
    const chainId = parseInt(match[2], 10);
    if (seen.has(chainId)) {
      throw new Error(`Duplicate chain id ${chainId} in chain list`);
    }
    seen.add(chainId);
    chains.push({ name: match[1].toLowerCase(), chainId });
  }
  return chains;
}
