// EntityNormalizer: turns validated API records into canonical domain entities.
// This is the only place raw addresses and market ids become VaultKey / MarketKey.

import { chainName } from '../config/chains.js';
import type { ChainEntry } from '../config/parseEnv.js';
import type {
  AdminEvent,
  AllocationPoint,
  Asset,
  Market,
  MarketHistory,
  MarketReallocation,
  OracleDescriptor,
  TimeseriesPoint,
  Vault,
  VaultAllocation,
  VaultReallocation,
  VaultShareHistory
} from '../types/index.js';
import {
  isZeroAddress,
  normalizeAddress,
  toMarketKey,
  toVaultKey,
  type MarketKey,
  type VaultKey
} from '../utils/Address.js';
import { scaleDown } from '../utils/decimals.js';
import type {
  RawAdminEvent,
  RawAllocationHistory,
  RawMarket,
  RawMarketHistory,
  RawReallocation,
  RawVault,
  RawVaultShareHistory
} from './apiSchemas.js';

export interface EntityNormalizerOptions {
  chains: readonly ChainEntry[];
  toxicSymbols: readonly string[];
  falsePositiveSymbols: readonly string[];
}

const EMPTY_ORACLE: OracleDescriptor = {
  address: null,
  type: null,
  hasFeedData: false,
  baseFeedOne: null,
  baseFeedTwo: null,
  quoteFeedOne: null,
  quoteFeedTwo: null,
  baseVault: null,
  quoteVault: null,
  scaleFactor: null
};

function nullIfZero(address: string | null | undefined): string | null {
  return address && !isZeroAddress(address) ? normalizeAddress(address) : null;
}

export class EntityNormalizer {
  private readonly chains: readonly ChainEntry[];
  private readonly toxic: Set<string>;
  private readonly excluded: Set<string>;

  constructor(options: EntityNormalizerOptions) {
    this.chains = options.chains;
    this.toxic = new Set(options.toxicSymbols.map((s) => s.trim().toLowerCase()));
    this.excluded = new Set(options.falsePositiveSymbols.map((s) => s.trim().toLowerCase()));
  }

  /**
   * Case-insensitive membership in the toxic set; the exclusion list wins.
   */
  isToxicSymbol(symbol: string | null | undefined): boolean {
    if (!symbol) return false;
    const normalized = symbol.trim().toLowerCase();
    return this.toxic.has(normalized) && !this.excluded.has(normalized);
  }

  isToxicMarket(market: Market): boolean {
    return this.isToxicSymbol(market.collateralAsset?.symbol);
  }

  chainName(chainId: number): string {
    return chainName(this.chains, chainId);
  }

  normalizeMarket(raw: RawMarket): Market {
    const chainId = raw.morphoBlue.chain.id;
    const key = toMarketKey(raw.uniqueKey, chainId);
    const state = raw.state;
    const oracle = raw.oracle;
    const data = oracle?.data;
    const warningBadDebt = raw.warnings.find(
      (w) => w.metadata?.badDebtUsd !== undefined && w.metadata?.badDebtUsd !== null
    );

    return {
      key,
      uniqueKey: normalizeAddress(raw.uniqueKey),
      chainId,
      chainName: this.chainName(chainId),
      listed: raw.listed ?? false,
      collateralAsset: raw.collateralAsset ? this.toAsset(raw.collateralAsset, chainId) : null,
      loanAsset: this.toAsset(raw.loanAsset, chainId),
      lltv: scaleDown(raw.lltv, 18),
      oracle: oracle
        ? {
            address: nullIfZero(oracle.address),
            type: oracle.type,
            hasFeedData: data !== null && data !== undefined,
            baseFeedOne: nullIfZero(data?.baseFeedOne),
            baseFeedTwo: nullIfZero(data?.baseFeedTwo),
            quoteFeedOne: nullIfZero(data?.quoteFeedOne),
            quoteFeedTwo: nullIfZero(data?.quoteFeedTwo),
            baseVault: nullIfZero(data?.baseOracleVault),
            quoteVault: nullIfZero(data?.quoteOracleVault),
            scaleFactor: data?.scaleFactor ?? null
          }
        : EMPTY_ORACLE,
      state: {
        timestamp: state?.timestamp ?? 0,
        supplyAssets: state?.supplyAssets ?? 0n,
        borrowAssets: state?.borrowAssets ?? 0n,
        collateralAssets: state?.collateralAssets ?? 0n,
        liquidityAssets: state?.liquidityAssets ?? 0n,
        supplyAssetsUsd: state?.supplyAssetsUsd ?? 0,
        borrowAssetsUsd: state?.borrowAssetsUsd ?? 0,
        collateralAssetsUsd: state?.collateralAssetsUsd ?? 0,
        liquidityAssetsUsd: state?.liquidityAssetsUsd ?? 0,
        utilization: state?.utilization ?? 0,
        oraclePrice: state?.price ?? 0n
      },
      badDebtUnderlying: raw.badDebt.underlying,
      badDebtUsd: raw.badDebt.usd,
      realizedBadDebtUnderlying: raw.realizedBadDebt.underlying,
      realizedBadDebtUsd: raw.realizedBadDebt.usd,
      warningBadDebtUsd: warningBadDebt?.metadata?.badDebtUsd ?? null,
      warnings: raw.warnings.map((w) => (w.level ? `${w.level}:${w.type}` : w.type)),
      supplyingVaultCount: raw.supplyingVaults?.length ?? 0
    };
  }

  normalizeVault(raw: RawVault): Vault {
    const chainId = raw.chain.id;
    const state = raw.state;
    const curatorAddress = nullIfZero(state?.curator);
    const curatorName = state?.curators?.find((c) => c.name)?.name ?? curatorAddress;

    const allocations: VaultAllocation[] = [];
    for (const allocation of state?.allocation ?? []) {
      const marketKey = this.tryMarketKey(allocation.market.uniqueKey, chainId);
      if (!marketKey) continue;
      allocations.push({
        marketKey,
        uniqueKey: normalizeAddress(allocation.market.uniqueKey),
        collateralSymbol: allocation.market.collateralAsset?.symbol ?? null,
        loanSymbol: allocation.market.loanAsset?.symbol ?? null,
        supplyAssets: allocation.supplyAssets,
        supplyAssetsUsd: allocation.supplyAssetsUsd,
        supplyCap: allocation.supplyCap,
        supplyCapUsd: allocation.supplyCapUsd,
        removableAt: allocation.removableAt !== null && allocation.removableAt > 0 ? allocation.removableAt : null,
        enabled: allocation.enabled ?? false,
        pendingSupplyCap: allocation.pendingSupplyCap,
        pendingSupplyCapValidAt: allocation.pendingSupplyCapValidAt
      });
    }

    return {
      key: toVaultKey(raw.address, chainId),
      address: normalizeAddress(raw.address),
      chainId,
      chainName: this.chainName(chainId),
      name: raw.name ?? '',
      symbol: raw.symbol ?? '',
      listed: raw.listed ?? false,
      curatorName,
      curatorAddress,
      ownerAddress: nullIfZero(state?.owner),
      guardianAddress: nullIfZero(state?.guardian),
      totalAssetsUsd: state?.totalAssetsUsd ?? 0,
      sharePrice: state?.sharePrice ?? null,
      sharePriceUsd: state?.sharePriceUsd ?? null,
      timelockSeconds: state?.timelock ?? 0,
      hasPublicAllocator: raw.publicAllocatorConfig !== null && raw.publicAllocatorConfig !== undefined,
      allocations
    };
  }

  /**
   * Reallocation seen from the market side. Null when the vault address is
   * missing or invalid; a missing market key keeps the vault with no market.
   */
  normalizeMarketReallocation(raw: RawReallocation, chainId: number): MarketReallocation | null {
    const vaultKey = this.tryVaultKey(raw.vault?.address, chainId);
    if (!vaultKey) return null;
    return {
      vaultKey,
      marketKey: this.tryMarketKey(raw.market?.uniqueKey, chainId),
      type: raw.type,
      timestamp: raw.timestamp,
      assets: raw.assets
    };
  }

  /** Reallocation seen from the vault side. Null unless both keys resolve. */
  normalizeVaultReallocation(raw: RawReallocation, chainId: number): VaultReallocation | null {
    const vaultKey = this.tryVaultKey(raw.vault?.address, chainId);
    const marketKey = this.tryMarketKey(raw.market?.uniqueKey, chainId);
    if (!vaultKey || !marketKey) return null;
    return {
      timestamp: raw.timestamp,
      txHash: raw.hash ?? '',
      type: raw.type,
      vaultKey,
      marketKey,
      assets: raw.assets
    };
  }

  /** Flatten per-market series into points; cap values are matched by timestamp. */
  normalizeAllocationHistory(raws: RawAllocationHistory[], chainId: number): AllocationPoint[] {
    const points: AllocationPoint[] = [];
    for (const raw of raws) {
      const marketKey = this.tryMarketKey(raw.market.uniqueKey, chainId);
      if (!marketKey) continue;
      const caps = new Map<number, number | null>();
      for (const cap of raw.supplyCap) caps.set(cap.x, cap.y);
      for (const point of raw.supplyAssetsUsd) {
        const cap = caps.get(point.x);
        points.push({
          timestamp: point.x,
          marketKey,
          supplyAssetsUsd: point.y ?? 0,
          supplyCap: cap === undefined || cap === null ? null : BigInt(Math.trunc(cap))
        });
      }
    }
    return points.sort((a, b) => a.timestamp - b.timestamp || a.marketKey.localeCompare(b.marketKey));
  }

  normalizeAdminEvents(raws: RawAdminEvent[], chainId: number, toxicKeys: ReadonlySet<MarketKey>): AdminEvent[] {
    return raws
      .map((raw) => {
        const queue = raw.data?.withdrawQueue;
        let queueHasToxic: boolean | null = null;
        if (raw.type === 'SetWithdrawQueue' && queue) {
          queueHasToxic = queue.some((entry) => {
            const key = this.tryMarketKey(entry.uniqueKey, chainId);
            return key !== null && toxicKeys.has(key);
          });
        }
        return {
          timestamp: raw.timestamp,
          txHash: raw.hash ?? '',
          type: raw.type,
          marketKey: this.tryMarketKey(raw.data?.market?.uniqueKey, chainId),
          cap: raw.data?.cap ?? null,
          queueHasToxic
        };
      })
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  normalizeMarketHistory(raw: RawMarketHistory, marketKey: MarketKey): MarketHistory {
    const sorted = (points: TimeseriesPoint[]): TimeseriesPoint[] => [...points].sort((a, b) => a.x - b.x);
    return {
      marketKey,
      utilization: sorted(raw.utilization),
      supplyAssetsUsd: sorted(raw.supplyAssetsUsd),
      borrowAssetsUsd: sorted(raw.borrowAssetsUsd),
      liquidityAssetsUsd: sorted(raw.liquidityAssetsUsd)
    };
  }

  normalizeVaultShareHistory(raw: RawVaultShareHistory, vaultKey: VaultKey): VaultShareHistory {
    return {
      vaultKey,
      sharePrice: [...raw.sharePriceNumber].sort((a, b) => a.x - b.x),
      totalAssetsUsd: [...raw.totalAssetsUsd].sort((a, b) => a.x - b.x)
    };
  }

  private toAsset(raw: RawMarket['loanAsset'], chainId: number): Asset {
    return {
      chainId,
      address: normalizeAddress(raw.address),
      symbol: raw.symbol ?? '',
      decimals: raw.decimals,
      spotPriceUsd: raw.priceUsd
    };
  }

  private tryVaultKey(address: string | null | undefined, chainId: number): VaultKey | null {
    if (!address) return null;
    try {
      return toVaultKey(address, chainId);
    } catch {
      return null;
    }
  }

  private tryMarketKey(uniqueKey: string | null | undefined, chainId: number): MarketKey | null {
    if (!uniqueKey) return null;
    try {
      return toMarketKey(uniqueKey, chainId);
    } catch {
      return null;
    }
  }
}
