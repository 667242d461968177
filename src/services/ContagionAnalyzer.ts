// ContagionAnalyzer: how much of each exposed vault sits next to its toxic
// positions. Markets are isolated, vaults are not: a vault that supplies toxic
// and clean markets spreads a toxic loss over every depositor.

import type { Vault, VaultAllocation, VaultKey } from '../types/index.js';
import { safeDivide } from '../utils/decimals.js';

/**
 * BRIDGE: toxic and clean supply in one vault.
 * MULTI_TOXIC: several toxic markets and nothing else.
 * SINGLE_TOXIC: one toxic market and nothing else.
 */
export type ContagionPath = 'BRIDGE' | 'MULTI_TOXIC' | 'SINGLE_TOXIC';

export interface VaultContagionProfile {
  vaultKey: VaultKey;
  vaultName: string;
  curatorName: string | null;
  chainId: number;
  chainName: string;
  totalAssetsUsd: number;
  toxicMarkets: number;
  cleanMarkets: number;
  toxicSupplyUsd: number;
  cleanSupplyUsd: number;
  /** Toxic share of the vault's supplied positions. */
  toxicShareOfSupply: number | null;
  /** Toxic share of the vault's reported TVL. */
  toxicShareOfTvl: number | null;
  contagionPath: ContagionPath;
}

/**
 * Toxic/clean split of every vault still supplying a toxic market. Only
 * allocations holding assets count; empty positions spread no loss.
 */
export function analyzeContagion(
  vaults: readonly Vault[],
  isToxic: (allocation: VaultAllocation) => boolean
): VaultContagionProfile[] {
  const profiles: VaultContagionProfile[] = [];

  for (const vault of vaults) {
    let toxicMarkets = 0;
    let cleanMarkets = 0;
    let toxicSupplyUsd = 0;
    let cleanSupplyUsd = 0;
    for (const allocation of vault.allocations) {
      if (allocation.supplyAssets <= 0n) continue;
      if (isToxic(allocation)) {
        toxicMarkets++;
        toxicSupplyUsd += allocation.supplyAssetsUsd;
      } else {
        cleanMarkets++;
        cleanSupplyUsd += allocation.supplyAssetsUsd;
      }
    }
    if (toxicMarkets === 0) continue;

    let contagionPath: ContagionPath = 'SINGLE_TOXIC';
    if (cleanMarkets > 0) contagionPath = 'BRIDGE';
    else if (toxicMarkets > 1) contagionPath = 'MULTI_TOXIC';

    profiles.push({
      vaultKey: vault.key,
      vaultName: vault.name,
      curatorName: vault.curatorName,
      chainId: vault.chainId,
      chainName: vault.chainName,
      totalAssetsUsd: vault.totalAssetsUsd,
      toxicMarkets,
      cleanMarkets,
      toxicSupplyUsd,
      cleanSupplyUsd,
      toxicShareOfSupply: safeDivide(toxicSupplyUsd, toxicSupplyUsd + cleanSupplyUsd),
      toxicShareOfTvl: safeDivide(toxicSupplyUsd, vault.totalAssetsUsd),
      contagionPath
    });
  }

  return profiles.sort((a, b) => {
    const bySupply = b.toxicSupplyUsd + b.cleanSupplyUsd - (a.toxicSupplyUsd + a.cleanSupplyUsd);
    if (bySupply !== 0) return bySupply;
    return a.vaultKey < b.vaultKey ? -1 : a.vaultKey > b.vaultKey ? 1 : 0;
  });
}
