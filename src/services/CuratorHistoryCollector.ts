// CuratorHistoryCollector: fetches the allocation, admin and reallocation
// streams for each exposed vault. A stream that cannot be fetched is left
// undefined for that vault; the other streams are still collected.

import { createScopedLogger, errorMessage, type Logger } from '../logging/logger.js';
import { itemsSkippedTotal } from '../metrics/index.js';
import type { CuratorHistory, MarketKey, VaultKey, VaultReallocation } from '../types/index.js';
import type { RawAllocationHistory, RawReallocation } from './apiSchemas.js';
import type { EntityNormalizer } from './EntityNormalizer.js';
import type { AdminEventsResult, PageResult, TimeWindow } from './MorphoApiService.js';

export interface CuratorHistorySource {
  getVaultAllocationHistory(address: string, chainId: number, window: TimeWindow): Promise<RawAllocationHistory[] | null>;
  listVaultAdminEvents(address: string, chainId: number): Promise<AdminEventsResult>;
  listReallocationsByVaults(chainId: number, addresses: string[], window: TimeWindow): Promise<PageResult<RawReallocation>>;
}

export interface HistorySubject {
  vaultKey: VaultKey;
  address: string;
  chainId: number;
}

export interface CuratorHistoryCollectorOptions {
  source: CuratorHistorySource;
  normalizer: EntityNormalizer;
  window: TimeWindow;
  toxicMarketKeys: ReadonlySet<MarketKey>;
  logger?: Logger;
}

export class CuratorHistoryCollector {
  private readonly source: CuratorHistorySource;
  private readonly normalizer: EntityNormalizer;
  private readonly window: TimeWindow;
  private readonly toxicMarketKeys: ReadonlySet<MarketKey>;
  private readonly logger: Logger;

  constructor(options: CuratorHistoryCollectorOptions) {
    this.source = options.source;
    this.normalizer = options.normalizer;
    this.window = options.window;
    this.toxicMarketKeys = options.toxicMarketKeys;
    this.logger = options.logger ?? createScopedLogger('curator-history');
  }

  async collect(subjects: readonly HistorySubject[]): Promise<Map<VaultKey, CuratorHistory>> {
    const histories = new Map<VaultKey, CuratorHistory>();
    const reallocations = await this.collectReallocations(subjects);

    for (const subject of subjects) {
      const history: CuratorHistory = {
        allocations: await this.collectAllocations(subject),
        adminEvents: await this.collectAdminEvents(subject),
        reallocations: reallocations.get(subject.vaultKey)
      };
      histories.set(subject.vaultKey, history);
    }

    return histories;
  }

  private async collectAllocations(subject: HistorySubject): Promise<CuratorHistory['allocations']> {
    try {
      const raw = await this.source.getVaultAllocationHistory(subject.address, subject.chainId, this.window);
      if (raw === null) {
        this.logger.warn('Allocation history unavailable: vault not found', { vaultKey: subject.vaultKey });
        return undefined;
      }
      return this.normalizer.normalizeAllocationHistory(raw, subject.chainId);
    } catch (err) {
      itemsSkippedTotal.inc({ stage: 'curator_history', reason: 'allocation_history_failed' });
      this.logger.error('Allocation history fetch failed', { vaultKey: subject.vaultKey, error: errorMessage(err) });
      return undefined;
    }
  }

  private async collectAdminEvents(subject: HistorySubject): Promise<CuratorHistory['adminEvents']> {
    try {
      const result = await this.source.listVaultAdminEvents(subject.address, subject.chainId);
      if (!result.enriched) {
        this.logger.warn('Admin events without cap data; cap-zero actions cannot be detected', {
          vaultKey: subject.vaultKey
        });
      }
      return this.normalizer.normalizeAdminEvents(result.events, subject.chainId, this.toxicMarketKeys);
    } catch (err) {
      itemsSkippedTotal.inc({ stage: 'curator_history', reason: 'admin_events_failed' });
      this.logger.error('Admin event fetch failed', { vaultKey: subject.vaultKey, error: errorMessage(err) });
      return undefined;
    }
  }

  /** One paginated listing per chain covering every subject on it. */
  private async collectReallocations(subjects: readonly HistorySubject[]): Promise<Map<VaultKey, VaultReallocation[]>> {
    const byChain = new Map<number, HistorySubject[]>();
    for (const subject of subjects) {
      const list = byChain.get(subject.chainId) ?? [];
      list.push(subject);
      byChain.set(subject.chainId, list);
    }

    const result = new Map<VaultKey, VaultReallocation[]>();
    for (const [chainId, chainSubjects] of byChain) {
      try {
        const page = await this.source.listReallocationsByVaults(
          chainId,
          chainSubjects.map((s) => s.address),
          this.window
        );
        if (!page.complete) {
          this.logger.warn('Reallocation history incomplete for chain', { chainId, collected: page.items.length });
        }
        for (const subject of chainSubjects) {
          result.set(subject.vaultKey, []);
        }
        for (const raw of page.items) {
          const event = this.normalizer.normalizeVaultReallocation(raw, chainId);
          if (!event) {
            itemsSkippedTotal.inc({ stage: 'curator_history', reason: 'unresolvable_reallocation' });
            continue;
          }
          result.get(event.vaultKey)?.push(event);
        }
      } catch (err) {
        this.logger.error('Reallocation history fetch failed for chain', { chainId, error: errorMessage(err) });
      }
    }

    for (const events of result.values()) {
      events.sort((a, b) => a.timestamp - b.timestamp);
    }
    return result;
  }
}
