/**
 * Canonical identity for vaults and markets.
 *
 * The API reports the same vault or market with inconsistent casing across
 * endpoints, so every raw address or unique key is turned into a key here and
 * only keys are compared downstream.
 */

import { isAddress, isHexString, ZeroAddress } from 'ethers';

declare const vaultKeyBrand: unique symbol;
declare const marketKeyBrand: unique symbol;

/** `<chainId>:<lower-cased vault address>` */
export type VaultKey = string & { readonly [vaultKeyBrand]: true };
/** `<chainId>:<lower-cased market unique key>` */
export type MarketKey = string & { readonly [marketKeyBrand]: true };

const ZERO_HEX = /^0x0*$/;

/**
 * Lower-case and trim an address. Empty input stays empty.
 */
export function normalizeAddress(address: string): string {
  if (!address) return address;
  return address.trim().toLowerCase();
}

/**
 * True for null, empty and all-zero hex values (unset oracle feeds and vaults).
 */
export function isZeroAddress(address: string | null | undefined): boolean {
  if (!address) return true;
  const normalized = normalizeAddress(address);
  return normalized === ZeroAddress || ZERO_HEX.test(normalized);
}

export function isValidChainId(chainId: number): boolean {
  return Number.isInteger(chainId) && chainId > 0;
}

/**
 * Build the canonical vault key.
 * @throws Error when the address is not a 20-byte hex address or the chain id is invalid
 */
export function toVaultKey(address: string, chainId: number): VaultKey {
  const normalized = normalizeAddress(address);
  if (!isAddress(normalized)) {
    throw new Error(`Invalid vault address "${address}"`);
  }
  if (!isValidChainId(chainId)) {
    throw new Error(`Invalid chain id ${chainId} for vault ${normalized}`);
  }
  const key = `${chainId}:${normalized}`;
  if (!isVaultKey(key)) {
    throw new Error(`Invalid vault key "${key}"`);
  }
  return key;
}

/**
 * Build the canonical market key from a market unique key (32-byte id).
 * @throws Error when the unique key is not hex or the chain id is invalid
 */
export function toMarketKey(uniqueKey: string, chainId: number): MarketKey {
  const normalized = normalizeAddress(uniqueKey);
  if (!isHexString(normalized, 32)) {
    throw new Error(`Invalid market unique key "${uniqueKey}"`);
  }
  if (!isValidChainId(chainId)) {
    throw new Error(`Invalid chain id ${chainId} for market ${normalized}`);
  }
  const key = `${chainId}:${normalized}`;
  if (!isMarketKey(key)) {
    throw new Error(`Invalid market key "${key}"`);
  }
  return key;
}

/** Split a key back into chain id and identifier. */
export function parseKey(key: VaultKey | MarketKey): { chainId: number; id: string } {
  const separator = key.indexOf(':');
  return { chainId: Number(key.slice(0, separator)), id: key.slice(separator + 1) };
}

const VAULT_KEY_FORMAT = /^[1-9]\d*:0x[0-9a-f]{40}$/;
const MARKET_KEY_FORMAT = /^[1-9]\d*:0x[0-9a-f]{64}$/;

export function isVaultKey(value: string): value is VaultKey {
  return VAULT_KEY_FORMAT.test(value);
}

export function isMarketKey(value: string): value is MarketKey {
  return MARKET_KEY_FORMAT.test(value);
}
