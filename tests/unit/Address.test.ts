import { describe, it, expect } from 'vitest';

import {
  isMarketKey,
  isVaultKey,
  isZeroAddress,
  normalizeAddress,
  parseKey,
  toMarketKey,
  toVaultKey
} from '../../src/utils/Address.js';

const MIXED_CASE_VAULT = '0xBEEF01735c132Ada46AA9aA4c54623cAA92A64CB';
const UNIQUE_KEY = '0x' + 'Ab'.repeat(32);

describe('Address normalization', () => {
  it('should lower-case and trim addresses', () => {
    expect(normalizeAddress('  0xABCdef  ')).toBe('0xabcdef');
    expect(normalizeAddress('')).toBe('');
  });

  it('should treat null, empty and all-zero values as zero addresses', () => {
    expect(isZeroAddress(null)).toBe(true);
    expect(isZeroAddress('')).toBe(true);
    expect(isZeroAddress('0x0000000000000000000000000000000000000000')).toBe(true);
    expect(isZeroAddress('0x00')).toBe(true);
    expect(isZeroAddress(MIXED_CASE_VAULT)).toBe(false);
  });
});

describe('toVaultKey', () => {
  it('should build one key regardless of casing', () => {
    const key = toVaultKey(MIXED_CASE_VAULT, 1);
    expect(key).toBe('1:0xbeef01735c132ada46aa9aa4c54623caa92a64cb');
    expect(toVaultKey(MIXED_CASE_VAULT.toLowerCase(), 1)).toBe(key);
  });

  it('should keep the same address on different chains apart', () => {
    expect(toVaultKey(MIXED_CASE_VAULT, 1)).not.toBe(toVaultKey(MIXED_CASE_VAULT, 8453));
  });

  it('should reject invalid addresses and chain ids', () => {
    expect(() => toVaultKey('0x1234', 1)).toThrow('Invalid vault address "0x1234"');
    expect(() => toVaultKey(MIXED_CASE_VAULT, 0)).toThrow('Invalid chain id 0');
  });
});

describe('toMarketKey', () => {
  it('should lower-case the 32-byte unique key', () => {
    expect(toMarketKey(UNIQUE_KEY, 8453)).toBe(`8453:0x${'ab'.repeat(32)}`);
  });

  it('should reject keys that are not 32 bytes', () => {
    expect(() => toMarketKey(MIXED_CASE_VAULT, 1)).toThrow(`Invalid market unique key "${MIXED_CASE_VAULT}"`);
  });

  it('should round-trip through parseKey', () => {
    expect(parseKey(toMarketKey(UNIQUE_KEY, 42161))).toEqual({ chainId: 42161, id: `0x${'ab'.repeat(32)}` });
  });
});

describe('key guards', () => {
  it('should tell vault keys from market keys', () => {
    const vaultKey = `1:${MIXED_CASE_VAULT.toLowerCase()}`;
    const marketKey = `1:0x${'ab'.repeat(32)}`;
    expect(isVaultKey(vaultKey)).toBe(true);
    expect(isMarketKey(vaultKey)).toBe(false);
    expect(isMarketKey(marketKey)).toBe(true);
    expect(isVaultKey(`1:${MIXED_CASE_VAULT}`)).toBe(false);
  });
});
