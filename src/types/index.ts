import type { MarketKey, VaultKey } from '../utils/Address.js';

export type { MarketKey, VaultKey } from '../utils/Address.js';

export interface Asset {
  chainId: number;
  address: string;
  symbol: string;
  decimals: number;
  spotPriceUsd: number | null;
}

export interface OracleDescriptor {
  address: string | null;
  type: string | null;
  /** False when feed data was not fetched, so the feeds below are unknown. */
  hasFeedData: boolean;
  baseFeedOne: string | null;
  baseFeedTwo: string | null;
  quoteFeedOne: string | null;
  quoteFeedTwo: string | null;
  baseVault: string | null;
  quoteVault: string | null;
  scaleFactor: bigint | null;
}

export interface MarketState {
  timestamp: number;
  supplyAssets: bigint;
  borrowAssets: bigint;
  collateralAssets: bigint;
  liquidityAssets: bigint;
  supplyAssetsUsd: number;
  borrowAssetsUsd: number;
  collateralAssetsUsd: number;
  liquidityAssetsUsd: number;
  utilization: number;
  /** Oracle price of one collateral unit in loan units, 36-decimal fixed point. */
  oraclePrice: bigint;
}

export interface Market {
  key: MarketKey;
  uniqueKey: string;
  chainId: number;
  chainName: string;
  listed: boolean;
  collateralAsset: Asset | null;
  loanAsset: Asset;
  /** Liquidation LTV as a fraction. */
  lltv: number;
  oracle: OracleDescriptor;
  state: MarketState;
  badDebtUnderlying: bigint;
  badDebtUsd: number;
  realizedBadDebtUnderlying: bigint;
  realizedBadDebtUsd: number;
  warningBadDebtUsd: number | null;
  warnings: string[];
  supplyingVaultCount: number;
}

export interface VaultAllocation {
  marketKey: MarketKey;
  uniqueKey: string;
  collateralSymbol: string | null;
  loanSymbol: string | null;
  supplyAssets: bigint;
  supplyAssetsUsd: number;
  supplyCap: bigint;
  supplyCapUsd: number;
  removableAt: number | null;
  enabled: boolean;
  pendingSupplyCap: bigint | null;
  pendingSupplyCapValidAt: number | null;
}

export interface Vault {
  key: VaultKey;
  address: string;
  chainId: number;
  chainName: string;
  name: string;
  symbol: string;
  listed: boolean;
  curatorName: string | null;
  curatorAddress: string | null;
  ownerAddress: string | null;
  guardianAddress: string | null;
  totalAssetsUsd: number;
  sharePrice: number | null;
  sharePriceUsd: number | null;
  timelockSeconds: number;
  hasPublicAllocator: boolean;
  allocations: VaultAllocation[];
}

export type DiscoveryMethod = 'current_allocation' | 'individual_backfill' | 'historical_reallocation';

export type ExposureStatus =
  | 'ACTIVE_EXPOSURE'
  | 'WITHDREW_DURING_CRISIS'
  | 'WITHDREW_PRE_CRISIS'
  | 'STOPPED_SUPPLYING'
  | 'FULLY_EXITED'
  | 'HISTORICALLY_EXPOSED';

export type Attribution = 'confirmed' | 'low_confidence_fallback';

export interface Exposure {
  vaultKey: VaultKey;
  marketKey: MarketKey;
  vaultAddress: string;
  chainId: number;
  chainName: string;
  vaultName: string;
  curatorName: string | null;
  marketUniqueKey: string;
  collateralSymbol: string | null;
  loanSymbol: string | null;
  /** Null for historical rows: no live allocation to report. */
  supplyAssets: bigint | null;
  supplyAssetsUsd: number;
  supplyCap: bigint | null;
  supplyCapUsd: number | null;
  removableAt: number | null;
  vaultTotalAssetsUsd: number;
  /** Share of vault TVL in this market, 0..1. */
  exposurePct: number;
  timelockSeconds: number | null;
  discoveryMethod: DiscoveryMethod;
  exposureStatus: ExposureStatus;
  attribution: Attribution;
}

/** Reallocation found while scanning toxic markets (discovery Phase 2). */
export interface MarketReallocation {
  vaultKey: VaultKey;
  /** Null when the event carried no usable market key. */
  marketKey: MarketKey | null;
  type: string;
  timestamp: number;
  assets: bigint;
}

// Curator history streams

export interface AllocationPoint {
  timestamp: number;
  marketKey: MarketKey;
  supplyAssetsUsd: number;
  supplyCap: bigint | null;
}

export interface AdminEvent {
  timestamp: number;
  txHash: string;
  type: string;
  marketKey: MarketKey | null;
  cap: bigint | null;
  /** For queue events: whether the new queue still lists a toxic market, null when unknown. */
  queueHasToxic: boolean | null;
}

export interface VaultReallocation {
  timestamp: number;
  txHash: string;
  type: string;
  vaultKey: VaultKey;
  marketKey: MarketKey;
  assets: bigint;
}

/**
 * The three event streams for one vault. An undefined stream was not fetched
 * (or the fetch failed); an empty one was fetched and held nothing.
 */
export interface CuratorHistory {
  allocations?: AllocationPoint[];
  adminEvents?: AdminEvent[];
  reallocations?: VaultReallocation[];
}

export interface TimeseriesPoint {
  x: number;
  y: number | null;
}

export interface VaultShareHistory {
  vaultKey: VaultKey;
  sharePrice: TimeseriesPoint[];
  totalAssetsUsd: TimeseriesPoint[];
}

export interface MarketHistory {
  marketKey: MarketKey;
  utilization: TimeseriesPoint[];
  supplyAssetsUsd: TimeseriesPoint[];
  borrowAssetsUsd: TimeseriesPoint[];
  liquidityAssetsUsd: TimeseriesPoint[];
}
