// DiscoveryEngine: finds every vault that held toxic collateral markets by
// reconciling the live allocation snapshot, the historical reallocation log and
// individual vault lookups into one deduplicated exposure set.

import type { ChainEntry } from '../config/parseEnv.js';
import { createScopedLogger, errorMessage, type Logger } from '../logging/logger.js';
import { itemsSkippedTotal } from '../metrics/index.js';
import type { DiscoveryMethod, Exposure, Market, Vault, VaultAllocation } from '../types/index.js';
import { parseKey, type MarketKey, type VaultKey } from '../utils/Address.js';
import type { RawMarket, RawReallocation, RawVault } from './apiSchemas.js';
import type { EntityNormalizer } from './EntityNormalizer.js';
import { deriveExposureStatus, type CrisisWindow } from './exposureStatus.js';
import type { PageResult } from './MorphoApiService.js';
import { InMemoryVaultRecordStore, type VaultRecord, type VaultRecordStore } from './VaultRecordStore.js';

/** The slice of the API client discovery needs. */
export interface DiscoverySource {
  listMarkets(chainId: number): Promise<PageResult<RawMarket>>;
  listVaultsByMarkets(chainId: number, uniqueKeys: string[]): Promise<PageResult<RawVault>>;
  listReallocationsByMarkets(chainId: number, uniqueKeys: string[]): Promise<PageResult<RawReallocation>>;
  getVault(address: string, chainId: number): Promise<RawVault | null>;
}

export interface DiscoveryEngineOptions {
  source: DiscoverySource;
  normalizer: EntityNormalizer;
  chains: readonly ChainEntry[];
  window: CrisisWindow;
  logger?: Logger;
}

export interface DiscoveryStats {
  chainsScanned: number;
  marketsScanned: number;
  toxicMarkets: number;
  phase1Vaults: number;
  phase2Vaults: number;
  backfillRequested: number;
  backfillFound: number;
  backfillMissing: number;
  backfillFailed: number;
  exposures: number;
  historicalRows: number;
  lowConfidenceRows: number;
  /** Listings that stopped early, as `operation@chainId`. */
  incompleteListings: string[];
}

export interface DiscoveryResult {
  toxicMarkets: Market[];
  vaults: Vault[];
  exposures: Exposure[];
  /** Toxic markets each vault touched according to the reallocation log. */
  phase2Markets: Map<VaultKey, MarketKey[]>;
  backfillList: VaultKey[];
  stats: DiscoveryStats;
}

const METHOD_RANK: Record<DiscoveryMethod, number> = {
  current_allocation: 0,
  individual_backfill: 1,
  historical_reallocation: 2
};

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Total order: largest positions first, then by keys. */
export function compareExposures(a: Exposure, b: Exposure): number {
  return (
    b.supplyAssetsUsd - a.supplyAssetsUsd ||
    b.vaultTotalAssetsUsd - a.vaultTotalAssetsUsd ||
    compareStrings(a.vaultKey, b.vaultKey) ||
    compareStrings(a.marketKey, b.marketKey)
  );
}

/**
 * Vaults seen in the reallocation log that have no live record yet.
 */
export function computeBackfillList(
  phase2Markets: ReadonlyMap<VaultKey, readonly MarketKey[]>,
  store: Pick<VaultRecordStore, 'has'>
): VaultKey[] {
  return [...phase2Markets.keys()].filter((key) => !store.has(key)).sort(compareStrings);
}

export interface ReconcileInput {
  store: VaultRecordStore;
  phase2Markets: ReadonlyMap<VaultKey, readonly MarketKey[]>;
  toxicMarkets: readonly Market[];
  isToxicSymbol: (symbol: string | null) => boolean;
  window: CrisisWindow;
  logger: Logger;
}

/**
 * Merge live records and the reallocation log into one row per (vault, market).
 * Historical rows are emitted only for vaults without any live toxic row.
 */
export function reconcileExposures(input: ReconcileInput): Exposure[] {
  const { store, phase2Markets, toxicMarkets, isToxicSymbol, window, logger } = input;
  const toxicByKey = new Map(toxicMarkets.map((market) => [market.key, market]));
  const rows = new Map<string, Exposure>();

  const upsert = (row: Exposure): void => {
    const pairKey = `${row.vaultKey}|${row.marketKey}`;
    const existing = rows.get(pairKey);
    if (!existing || METHOD_RANK[row.discoveryMethod] < METHOD_RANK[existing.discoveryMethod]) {
      rows.set(pairKey, row);
    }
  };
  const hasRows = (vaultKey: VaultKey): boolean =>
    [...rows.values()].some((row) => row.vaultKey === vaultKey);

  for (const record of store.values()) {
    for (const allocation of record.vault.allocations) {
      if (!toxicByKey.has(allocation.marketKey) && !isToxicSymbol(allocation.collateralSymbol)) continue;
      upsert(liveRow(record, allocation, toxicByKey.get(allocation.marketKey), window));
    }
  }

  for (const vaultKey of [...phase2Markets.keys()].sort(compareStrings)) {
    if (hasRows(vaultKey)) continue;

    const vault = store.get(vaultKey)?.vault ?? null;
    const touched = (phase2Markets.get(vaultKey) ?? []).filter((key) => toxicByKey.has(key));

    if (touched.length > 0) {
      for (const marketKey of touched) {
        const market = toxicByKey.get(marketKey);
        if (market) upsert(historicalRow(vaultKey, vault, market, 'confirmed'));
      }
      continue;
    }

    const { chainId } = parseKey(vaultKey);
    const fallback = toxicMarkets
      .filter((market) => market.chainId === chainId)
      .sort((a, b) => compareStrings(a.uniqueKey, b.uniqueKey))[0];
    if (!fallback) {
      logger.warn('Vault from reallocation log has no toxic market to attribute', { vaultKey });
      itemsSkippedTotal.inc({ stage: 'reconcile', reason: 'no_attributable_market' });
      continue;
    }
    logger.warn('Low-confidence exposure attribution: no market key recorded for vault, using first toxic market on chain', {
      vaultKey,
      marketKey: fallback.key
    });
    upsert(historicalRow(vaultKey, vault, fallback, 'low_confidence_fallback'));
  }

  return [...rows.values()].sort(compareExposures);
}

function liveRow(
  record: VaultRecord,
  allocation: VaultAllocation,
  market: Market | undefined,
  window: CrisisWindow
): Exposure {
  const { vault } = record;
  return {
    vaultKey: vault.key,
    marketKey: allocation.marketKey,
    vaultAddress: vault.address,
    chainId: vault.chainId,
    chainName: vault.chainName,
    vaultName: vault.name,
    curatorName: vault.curatorName,
    marketUniqueKey: allocation.uniqueKey,
    collateralSymbol: allocation.collateralSymbol ?? market?.collateralAsset?.symbol ?? null,
    loanSymbol: allocation.loanSymbol ?? market?.loanAsset.symbol ?? null,
    supplyAssets: allocation.supplyAssets,
    supplyAssetsUsd: allocation.supplyAssetsUsd,
    supplyCap: allocation.supplyCap,
    supplyCapUsd: allocation.supplyCapUsd,
    removableAt: allocation.removableAt,
    vaultTotalAssetsUsd: vault.totalAssetsUsd,
    exposurePct: vault.totalAssetsUsd > 0 ? allocation.supplyAssetsUsd / vault.totalAssetsUsd : 0,
    timelockSeconds: vault.timelockSeconds,
    discoveryMethod: record.source,
    exposureStatus: deriveExposureStatus(allocation, window),
    attribution: 'confirmed'
  };
}

function historicalRow(
  vaultKey: VaultKey,
  vault: Vault | null,
  market: Market,
  attribution: Exposure['attribution']
): Exposure {
  const { chainId, id } = parseKey(vaultKey);
  return {
    vaultKey,
    marketKey: market.key,
    vaultAddress: id,
    chainId,
    chainName: market.chainName,
    vaultName: vault?.name ?? '',
    curatorName: vault?.curatorName ?? null,
    marketUniqueKey: market.uniqueKey,
    collateralSymbol: market.collateralAsset?.symbol ?? null,
    loanSymbol: market.loanAsset.symbol,
    supplyAssets: null,
    supplyAssetsUsd: 0,
    supplyCap: null,
    supplyCapUsd: null,
    removableAt: null,
    vaultTotalAssetsUsd: vault?.totalAssetsUsd ?? 0,
    exposurePct: 0,
    timelockSeconds: vault?.timelockSeconds ?? null,
    discoveryMethod: 'historical_reallocation',
    exposureStatus: 'HISTORICALLY_EXPOSED',
    attribution
  };
}

function emptyStats(): DiscoveryStats {
  return {
    chainsScanned: 0,
    marketsScanned: 0,
    toxicMarkets: 0,
    phase1Vaults: 0,
    phase2Vaults: 0,
    backfillRequested: 0,
    backfillFound: 0,
    backfillMissing: 0,
    backfillFailed: 0,
    exposures: 0,
    historicalRows: 0,
    lowConfidenceRows: 0,
    incompleteListings: []
  };
}

export class DiscoveryEngine {
  private readonly source: DiscoverySource;
  private readonly normalizer: EntityNormalizer;
  private readonly chains: readonly ChainEntry[];
  private readonly window: CrisisWindow;
  private readonly logger: Logger;

  constructor(options: DiscoveryEngineOptions) {
    this.source = options.source;
    this.normalizer = options.normalizer;
    this.chains = options.chains;
    this.window = options.window;
    this.logger = options.logger ?? createScopedLogger('discovery');
  }

  /**
   * Full discovery. Each call starts from the given (by default empty) store,
   * so repeated runs over the same data give the same result.
   */
  async run(store: VaultRecordStore = new InMemoryVaultRecordStore()): Promise<DiscoveryResult> {
    const stats = emptyStats();

    const toxicMarkets = await this.findToxicMarkets(stats);
    await this.scanCurrentAllocations(toxicMarkets, store, stats);
    const phase2Markets = await this.scanReallocationLog(toxicMarkets, stats);
    const backfillList = computeBackfillList(phase2Markets, store);
    await this.backfillVaults(backfillList, store, stats);

    const exposures = reconcileExposures({
      store,
      phase2Markets,
      toxicMarkets,
      isToxicSymbol: (symbol) => this.normalizer.isToxicSymbol(symbol),
      window: this.window,
      logger: this.logger
    });

    stats.exposures = exposures.length;
    stats.historicalRows = exposures.filter((e) => e.discoveryMethod === 'historical_reallocation').length;
    stats.lowConfidenceRows = exposures.filter((e) => e.attribution === 'low_confidence_fallback').length;

    this.logger.info('Discovery complete', { ...stats });

    return {
      toxicMarkets,
      vaults: store.values().map((record) => record.vault),
      exposures,
      phase2Markets,
      backfillList,
      stats
    };
  }

  /** Markets whose collateral is in the toxic set, across all configured chains. */
  async findToxicMarkets(stats: DiscoveryStats = emptyStats()): Promise<Market[]> {
    const byKey = new Map<MarketKey, Market>();

    for (const chain of this.chains) {
      stats.chainsScanned++;
      try {
        const page = await this.source.listMarkets(chain.chainId);
        this.noteIncomplete(page, 'listMarkets', chain.chainId, stats);
        stats.marketsScanned += page.items.length;

        for (const raw of page.items) {
          const market = this.tryNormalize('market', raw.uniqueKey, () => this.normalizer.normalizeMarket(raw));
          if (market && this.normalizer.isToxicMarket(market)) {
            byKey.set(market.key, market);
          }
        }
      } catch (err) {
        this.logger.error('Market scan failed for chain', { chain: chain.name, error: errorMessage(err) });
      }
    }

    const markets = [...byKey.values()].sort((a, b) => compareStrings(a.key, b.key));
    stats.toxicMarkets = markets.length;
    this.logger.info('Toxic markets found', { count: markets.length });
    return markets;
  }

  private async scanCurrentAllocations(
    toxicMarkets: readonly Market[],
    store: VaultRecordStore,
    stats: DiscoveryStats
  ): Promise<void> {
    for (const [chainId, uniqueKeys] of groupByChain(toxicMarkets)) {
      try {
        const page = await this.source.listVaultsByMarkets(chainId, uniqueKeys);
        this.noteIncomplete(page, 'listVaultsByMarkets', chainId, stats);
        for (const raw of page.items) {
          const vault = this.tryNormalize('vault', raw.address, () => this.normalizer.normalizeVault(raw));
          if (!vault) continue;
          if (!store.has(vault.key)) stats.phase1Vaults++;
          store.put({ vault, source: 'current_allocation' });
        }
      } catch (err) {
        this.logger.error('Current allocation scan failed for chain', { chainId, error: errorMessage(err) });
      }
    }
  }

  private async scanReallocationLog(
    toxicMarkets: readonly Market[],
    stats: DiscoveryStats
  ): Promise<Map<VaultKey, MarketKey[]>> {
    const toxicKeys = new Set(toxicMarkets.map((m) => m.key));
    const touched = new Map<VaultKey, Set<MarketKey>>();

    for (const [chainId, uniqueKeys] of groupByChain(toxicMarkets)) {
      try {
        const page = await this.source.listReallocationsByMarkets(chainId, uniqueKeys);
        this.noteIncomplete(page, 'listReallocationsByMarkets', chainId, stats);

        for (const raw of page.items) {
          const event = this.normalizer.normalizeMarketReallocation(raw, chainId);
          if (!event) {
            itemsSkippedTotal.inc({ stage: 'phase2', reason: 'missing_vault' });
            this.logger.warn('Reallocation without a usable vault address', { chainId, hash: raw.hash });
            continue;
          }
          if (event.marketKey !== null && !toxicKeys.has(event.marketKey)) {
            itemsSkippedTotal.inc({ stage: 'phase2', reason: 'non_toxic_market' });
            this.logger.warn('Reallocation references a market outside the toxic set', {
              chainId,
              marketKey: event.marketKey
            });
            continue;
          }
          const markets = touched.get(event.vaultKey) ?? new Set<MarketKey>();
          if (event.marketKey !== null) markets.add(event.marketKey);
          touched.set(event.vaultKey, markets);
        }
      } catch (err) {
        this.logger.error('Reallocation scan failed for chain', { chainId, error: errorMessage(err) });
      }
    }

    stats.phase2Vaults = touched.size;
    const result = new Map<VaultKey, MarketKey[]>();
    for (const key of [...touched.keys()].sort(compareStrings)) {
      result.set(key, [...(touched.get(key) ?? [])].sort(compareStrings));
    }
    return result;
  }

  private async backfillVaults(list: readonly VaultKey[], store: VaultRecordStore, stats: DiscoveryStats): Promise<void> {
    stats.backfillRequested = list.length;

    for (const vaultKey of list) {
      const { chainId, id } = parseKey(vaultKey);
      try {
        const raw = await this.source.getVault(id, chainId);
        if (!raw) {
          stats.backfillMissing++;
          itemsSkippedTotal.inc({ stage: 'phase3', reason: 'vault_not_found' });
          this.logger.info('Backfill skipped: vault not found', { vaultKey });
          continue;
        }
        const vault = this.tryNormalize('vault', id, () => this.normalizer.normalizeVault(raw));
        if (!vault) {
          stats.backfillFailed++;
          continue;
        }
        store.put({ vault, source: 'individual_backfill' });
        stats.backfillFound++;
      } catch (err) {
        stats.backfillFailed++;
        this.logger.error('Backfill failed', { vaultKey, error: errorMessage(err) });
      }
    }
  }

  private tryNormalize<T>(kind: string, id: string, fn: () => T): T | null {
    try {
      return fn();
    } catch (err) {
      itemsSkippedTotal.inc({ stage: 'normalize', reason: `invalid_${kind}` });
      this.logger.warn(`Skipping invalid ${kind}`, { id, error: errorMessage(err) });
      return null;
    }
  }

  private noteIncomplete(page: PageResult<unknown>, op: string, chainId: number, stats: DiscoveryStats): void {
    if (!page.complete) {
      stats.incompleteListings.push(`${op}@${chainId}`);
    }
  }
}

function groupByChain(markets: readonly Market[]): Map<number, string[]> {
  const byChain = new Map<number, string[]>();
  for (const market of markets) {
    const keys = byChain.get(market.chainId) ?? [];
    keys.push(market.uniqueKey);
    byChain.set(market.chainId, keys);
  }
  return byChain;
}
