// Shared builders for API-shaped records and an in-process API stand-in.

import {
  AdminEventSchema,
  AllocationHistorySchema,
  MarketHistorySchema,
  MarketSchema,
  ReallocationSchema,
  VaultSchema,
  VaultShareHistorySchema,
  type RawAdminEvent,
  type RawAllocationHistory,
  type RawMarket,
  type RawMarketHistory,
  type RawReallocation,
  type RawVault,
  type RawVaultShareHistory
} from '../../src/services/apiSchemas.js';
import type { AdminEventsResult, PageResult, TimeWindow } from '../../src/services/MorphoApiService.js';
import type { AnalysisSource } from '../../src/pipeline/AnalysisPipeline.js';

export const CRISIS = 1762214400; // 2025-11-04
export const PRE_CRISIS = 1761609600; // 2025-10-28
export const DAY = 86400;

export const TEST_CHAINS = [
  { name: 'ethereum', chainId: 1 },
  { name: 'base', chainId: 8453 }
];

/** 32-byte market unique key. */
export function marketId(n: number): string {
  return '0x' + n.toString(16).padStart(64, '0');
}

/** 20-byte address. */
export function address(n: number): string {
  return '0x' + n.toString(16).padStart(40, '0');
}

export interface MarketSpec {
  id: number;
  chainId?: number;
  collateralSymbol?: string | null;
  collateralDecimals?: number;
  collateralPriceUsd?: number | null;
  loanSymbol?: string;
  loanDecimals?: number;
  loanPriceUsd?: number | null;
  lltv?: string;
  state?: Record<string, unknown>;
  oracle?: Record<string, unknown> | null;
  badDebt?: { underlying: string; usd: number } | null;
  realizedBadDebt?: { underlying: string; usd: number } | null;
  warnings?: unknown[];
}

/** Market as the API returns it. */
export function apiMarket(spec: MarketSpec): Record<string, unknown> {
  const chainId = spec.chainId ?? 1;
  return {
    uniqueKey: marketId(spec.id),
    listed: true,
    lltv: spec.lltv ?? '860000000000000000',
    loanAsset: {
      address: address(0xf000 + spec.id),
      symbol: spec.loanSymbol ?? 'USDC',
      decimals: spec.loanDecimals ?? 6,
      priceUsd: spec.loanPriceUsd === undefined ? 1 : spec.loanPriceUsd
    },
    collateralAsset:
      spec.collateralSymbol === null
        ? null
        : {
            address: address(0xe000 + spec.id),
            symbol: spec.collateralSymbol ?? 'xUSD',
            decimals: spec.collateralDecimals ?? 18,
            priceUsd: spec.collateralPriceUsd === undefined ? 1 : spec.collateralPriceUsd
          },
    oracle: spec.oracle === undefined ? { address: address(0xd000 + spec.id), type: 'ChainlinkOracleV2' } : spec.oracle,
    morphoBlue: { chain: { id: chainId, network: chainId === 1 ? 'ethereum' : 'base' } },
    state: {
      timestamp: CRISIS,
      supplyAssets: '1000000000',
      borrowAssets: '500000000',
      collateralAssets: '0',
      liquidityAssets: '500000000',
      supplyAssetsUsd: 1000,
      borrowAssetsUsd: 500,
      collateralAssetsUsd: 0,
      liquidityAssetsUsd: 500,
      utilization: 0.5,
      price: '0',
      ...spec.state
    },
    badDebt: spec.badDebt === undefined ? { underlying: '0', usd: 0 } : spec.badDebt,
    realizedBadDebt: spec.realizedBadDebt === undefined ? { underlying: '0', usd: 0 } : spec.realizedBadDebt,
    warnings: spec.warnings ?? [],
    supplyingVaults: []
  };
}

export function rawMarket(spec: MarketSpec): RawMarket {
  return MarketSchema.parse(apiMarket(spec));
}

export interface AllocationSpec {
  market: number;
  collateralSymbol?: string;
  supplyAssets?: string;
  supplyAssetsUsd?: number;
  supplyCap?: string;
  removableAt?: number | null;
}

export interface VaultSpec {
  id: number;
  chainId?: number;
  name?: string;
  curator?: string | null;
  totalAssetsUsd?: number;
  allocations?: AllocationSpec[];
}

export function apiVault(spec: VaultSpec): Record<string, unknown> {
  const chainId = spec.chainId ?? 1;
  return {
    address: address(spec.id),
    name: spec.name ?? `Vault ${spec.id}`,
    symbol: `V${spec.id}`,
    listed: true,
    chain: { id: chainId, network: null },
    publicAllocatorConfig: null,
    state: {
      totalAssetsUsd: spec.totalAssetsUsd ?? 0,
      sharePrice: 1,
      sharePriceUsd: 1,
      timelock: 86400,
      curator: address(0xc000 + spec.id),
      owner: address(0xb000 + spec.id),
      guardian: null,
      curators: spec.curator === null ? [] : [{ name: spec.curator ?? `Curator ${spec.id}` }],
      allocation: (spec.allocations ?? []).map((a) => ({
        market: {
          uniqueKey: marketId(a.market),
          collateralAsset: { symbol: a.collateralSymbol ?? 'xUSD' },
          loanAsset: { symbol: 'USDC' }
        },
        supplyAssets: a.supplyAssets ?? '0',
        supplyAssetsUsd: a.supplyAssetsUsd ?? 0,
        supplyCap: a.supplyCap ?? '1000000000000',
        supplyCapUsd: 1_000_000,
        enabled: true,
        removableAt: a.removableAt ?? 0,
        pendingSupplyCap: null,
        pendingSupplyCapValidAt: null
      }))
    }
  };
}

export function rawVault(spec: VaultSpec): RawVault {
  return VaultSchema.parse(apiVault(spec));
}

export interface ReallocationSpec {
  vault: number | null;
  market: number | null;
  timestamp?: number;
  type?: 'ReallocateWithdraw' | 'ReallocateSupply';
  assets?: string;
  hash?: string;
}

export function apiReallocation(spec: ReallocationSpec): Record<string, unknown> {
  return {
    hash: spec.hash ?? `0x${(spec.timestamp ?? 0).toString(16)}`,
    timestamp: spec.timestamp ?? CRISIS - 10 * DAY,
    type: spec.type ?? 'ReallocateWithdraw',
    assets: spec.assets ?? '1000000',
    vault: spec.vault === null ? null : { address: address(spec.vault) },
    market: spec.market === null ? null : { uniqueKey: marketId(spec.market) }
  };
}

export function rawReallocation(spec: ReallocationSpec): RawReallocation {
  return ReallocationSchema.parse(apiReallocation(spec));
}

export function rawAllocationHistory(
  market: number,
  supply: Array<[number, number | null]>,
  caps: Array<[number, number | null]> = []
): RawAllocationHistory {
  return AllocationHistorySchema.parse({
    market: { uniqueKey: marketId(market) },
    supplyAssetsUsd: supply.map(([x, y]) => ({ x, y })),
    supplyCap: caps.map(([x, y]) => ({ x, y }))
  });
}

export function rawAdminEvent(event: {
  type: string;
  timestamp: number;
  hash?: string;
  cap?: string | null;
  market?: number | null;
  withdrawQueue?: number[];
}): RawAdminEvent {
  return AdminEventSchema.parse({
    hash: event.hash ?? `0x${event.timestamp.toString(16)}`,
    timestamp: event.timestamp,
    type: event.type,
    data: {
      cap: event.cap ?? null,
      market: event.market === undefined || event.market === null ? null : { uniqueKey: marketId(event.market) },
      withdrawQueue: event.withdrawQueue?.map((id) => ({ uniqueKey: marketId(id) }))
    }
  });
}

export function rawMarketHistory(series: {
  utilization?: Array<[number, number | null]>;
  liquidityAssetsUsd?: Array<[number, number | null]>;
}): RawMarketHistory {
  const points = (s: Array<[number, number | null]> | undefined) => (s ?? []).map(([x, y]) => ({ x, y }));
  return MarketHistorySchema.parse({
    utilization: points(series.utilization),
    supplyAssetsUsd: [],
    borrowAssetsUsd: [],
    liquidityAssetsUsd: points(series.liquidityAssetsUsd)
  });
}

export function rawShareHistory(series: {
  sharePrice?: Array<[number, number | null]>;
  totalAssetsUsd?: Array<[number, number | null]>;
}): RawVaultShareHistory {
  const points = (s: Array<[number, number | null]> | undefined) => (s ?? []).map(([x, y]) => ({ x, y }));
  return VaultShareHistorySchema.parse({
    sharePriceNumber: points(series.sharePrice),
    totalAssetsUsd: points(series.totalAssetsUsd)
  });
}

function page<T>(items: T[]): PageResult<T> {
  return { items, complete: true, countTotal: items.length };
}

/**
 * In-process API stand-in. Vaults listed in `hiddenFromListing` are left out
 * of the market-side vault listing but still answer `getVault`.
 */
export class FakeAnalysisSource implements AnalysisSource {
  markets: RawMarket[] = [];
  vaults: RawVault[] = [];
  hiddenFromListing = new Set<string>();
  reallocations: Array<{ chainId: number; raw: RawReallocation }> = [];
  marketDetails = new Map<string, RawMarket>();
  marketHistories = new Map<string, RawMarketHistory>();
  shareHistories = new Map<string, RawVaultShareHistory>();
  allocationHistories = new Map<string, RawAllocationHistory[]>();
  adminEvents = new Map<string, AdminEventsResult>();
  failingChains = new Set<number>();
  failingOperations = new Set<string>();

  readonly getVaultCalls: string[] = [];

  private check(op: string, chainId: number): void {
    if (this.failingChains.has(chainId) || this.failingOperations.has(op)) {
      throw new Error(`${op} unavailable on chain ${chainId}`);
    }
  }

  async listMarkets(chainId: number): Promise<PageResult<RawMarket>> {
    this.check('listMarkets', chainId);
    return page(this.markets.filter((m) => m.morphoBlue.chain.id === chainId));
  }

  async listVaultsByMarkets(chainId: number, uniqueKeys: string[]): Promise<PageResult<RawVault>> {
    this.check('listVaultsByMarkets', chainId);
    const keys = new Set(uniqueKeys);
    return page(
      this.vaults.filter(
        (v) =>
          v.chain.id === chainId &&
          !this.hiddenFromListing.has(v.address) &&
          (v.state?.allocation ?? []).some((a) => keys.has(a.market.uniqueKey))
      )
    );
  }

  async listReallocationsByMarkets(chainId: number): Promise<PageResult<RawReallocation>> {
    this.check('listReallocationsByMarkets', chainId);
    return page(this.reallocations.filter((r) => r.chainId === chainId).map((r) => r.raw));
  }

  async getVault(vaultAddress: string, chainId: number): Promise<RawVault | null> {
    this.check('getVault', chainId);
    this.getVaultCalls.push(`${chainId}:${vaultAddress}`);
    return this.vaults.find((v) => v.chain.id === chainId && v.address === vaultAddress) ?? null;
  }

  async getMarket(uniqueKey: string, chainId: number): Promise<RawMarket | null> {
    this.check('getMarket', chainId);
    return this.marketDetails.get(uniqueKey) ?? null;
  }

  async getMarketHistory(uniqueKey: string, chainId: number, _window: TimeWindow): Promise<RawMarketHistory | null> {
    this.check('getMarketHistory', chainId);
    return this.marketHistories.get(uniqueKey) ?? null;
  }

  async getVaultShareHistory(
    vaultAddress: string,
    chainId: number,
    _window: TimeWindow
  ): Promise<RawVaultShareHistory | null> {
    this.check('getVaultShareHistory', chainId);
    return this.shareHistories.get(vaultAddress) ?? null;
  }

  async getVaultAllocationHistory(
    vaultAddress: string,
    chainId: number,
    _window: TimeWindow
  ): Promise<RawAllocationHistory[] | null> {
    this.check('getVaultAllocationHistory', chainId);
    return this.allocationHistories.get(vaultAddress) ?? [];
  }

  async listVaultAdminEvents(vaultAddress: string, chainId: number): Promise<AdminEventsResult> {
    this.check('listVaultAdminEvents', chainId);
    return this.adminEvents.get(vaultAddress) ?? { events: [], enriched: true };
  }

  async listReallocationsByVaults(
    chainId: number,
    addresses: string[],
    _window: TimeWindow
  ): Promise<PageResult<RawReallocation>> {
    this.check('listReallocationsByVaults', chainId);
    const wanted = new Set(addresses);
    return page(
      this.reallocations
        .filter((r) => r.chainId === chainId && r.raw.vault?.address && wanted.has(r.raw.vault.address))
        .map((r) => r.raw)
    );
  }
}
