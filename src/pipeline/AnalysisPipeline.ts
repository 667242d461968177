// AnalysisPipeline: discovery -> bad debt -> curator response -> market stress
// -> share price impact -> contagion -> sink.
// Every stage catches per-item failures so one chain, vault or market never
// aborts the run.

import type { AnalysisEnv } from '../config/envSchema.js';
import { createScopedLogger, errorMessage, type Logger } from '../logging/logger.js';
import { itemsSkippedTotal, metricsRegistry } from '../metrics/index.js';
import type { RawMarket, RawMarketHistory, RawVaultShareHistory } from '../services/apiSchemas.js';
import { BadDebtClassifier, type BadDebtAssessment } from '../services/BadDebtClassifier.js';
import {
  CuratorHistoryCollector,
  type CuratorHistorySource,
  type HistorySubject
} from '../services/CuratorHistoryCollector.js';
import {
  reconstructResponse,
  type CuratorResponseProfile,
  type ResponseSubject
} from '../services/CuratorResponseReconstructor.js';
import { analyzeContagion, type VaultContagionProfile } from '../services/ContagionAnalyzer.js';
import { DiscoveryEngine, type DiscoveryResult, type DiscoverySource } from '../services/DiscoveryEngine.js';
import { EntityNormalizer } from '../services/EntityNormalizer.js';
import { aggregateExposureStatus } from '../services/exposureStatus.js';
import { analyzeMarketStress, type MarketStressProfile } from '../services/MarketStressAnalyzer.js';
import type { TimeWindow } from '../services/MorphoApiService.js';
import { analyzeShareImpact, type ShareImpactProfile } from '../services/ShareImpactAnalyzer.js';
import { InMemoryVaultRecordStore, type VaultRecordStore } from '../services/VaultRecordStore.js';
import {
  adminEventsTable,
  allocationTimeseriesTable,
  badDebtTable,
  contagionTable,
  curatorResponsesTable,
  exposuresTable,
  marketStressTable,
  reallocationsTable,
  shareImpactTable,
  toxicMarketsTable,
  type VaultScoped
} from '../sink/tables.js';
import type { TabularSink } from '../sink/TabularSink.js';
import type {
  AdminEvent,
  AllocationPoint,
  CuratorHistory,
  Exposure,
  Market,
  MarketHistory,
  VaultKey,
  VaultReallocation,
  VaultShareHistory
} from '../types/index.js';

/** Everything the pipeline reads from the API. */
export interface AnalysisSource extends DiscoverySource, CuratorHistorySource {
  getMarket(uniqueKey: string, chainId: number): Promise<RawMarket | null>;
  getMarketHistory(uniqueKey: string, chainId: number, window: TimeWindow): Promise<RawMarketHistory | null>;
  getVaultShareHistory(address: string, chainId: number, window: TimeWindow): Promise<RawVaultShareHistory | null>;
}

export type AnalysisSettings = Pick<
  AnalysisEnv,
  | 'chains'
  | 'toxicSymbols'
  | 'falsePositiveSymbols'
  | 'crisisTimestamp'
  | 'preCrisisTimestamp'
  | 'historyStart'
  | 'historyEnd'
  | 'zeroAllocationThresholdUsd'
>;

export interface AnalysisPipelineOptions {
  source: AnalysisSource;
  settings: AnalysisSettings;
  /** Output target; results are only returned when omitted. */
  sink?: TabularSink;
  createStore?: () => VaultRecordStore;
  logger?: Logger;
}

export interface AnalysisResult {
  discovery: DiscoveryResult;
  assessments: BadDebtAssessment[];
  histories: Map<VaultKey, CuratorHistory>;
  profiles: CuratorResponseProfile[];
  stress: MarketStressProfile[];
  shareImpact: ShareImpactProfile[];
  contagion: VaultContagionProfile[];
  summary: RunSummary;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  crisisTimestamp: number;
  chains: string[];
  toxicMarkets: number;
  exposures: number;
  exposedVaults: number;
  byDiscoveryMethod: Record<string, number>;
  byExposureStatus: Record<string, number>;
  byBadDebtStatus: Record<string, number>;
  byResponseClass: Record<string, number>;
  oracleMaskingMarkets: number;
  totalBestEstimateUsd: number;
  socializedVaults: number;
  estimatedShareLossUsd: number;
  contagionBridges: number;
  discovery: DiscoveryResult['stats'];
}

function countBy<T>(items: readonly T[], key: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const k = key(item);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export class AnalysisPipeline {
  private readonly source: AnalysisSource;
  private readonly settings: AnalysisSettings;
  private readonly sink: TabularSink | undefined;
  private readonly createStore: () => VaultRecordStore;
  private readonly logger: Logger;
  private readonly normalizer: EntityNormalizer;
  private readonly classifier = new BadDebtClassifier();

  constructor(options: AnalysisPipelineOptions) {
    this.source = options.source;
    this.settings = options.settings;
    this.sink = options.sink;
    this.createStore = options.createStore ?? (() => new InMemoryVaultRecordStore());
    this.logger = options.logger ?? createScopedLogger('pipeline');
    this.normalizer = new EntityNormalizer({
      chains: this.settings.chains,
      toxicSymbols: this.settings.toxicSymbols,
      falsePositiveSymbols: this.settings.falsePositiveSymbols
    });
  }

  async run(): Promise<AnalysisResult> {
    const startedAt = new Date().toISOString();
    const window: TimeWindow = { start: this.settings.historyStart, end: this.settings.historyEnd };

    const discovery = await new DiscoveryEngine({
      source: this.source,
      normalizer: this.normalizer,
      chains: this.settings.chains,
      window: {
        crisisTimestamp: this.settings.crisisTimestamp,
        preCrisisTimestamp: this.settings.preCrisisTimestamp
      },
      logger: this.logger.child({ stage: 'discovery' })
    }).run(this.createStore());

    const assessments = await this.assessBadDebt(discovery.toxicMarkets);

    const toxicMarketKeys = new Set(discovery.toxicMarkets.map((m) => m.key));
    const subjects = responseSubjects(discovery.exposures);
    const histories = await new CuratorHistoryCollector({
      source: this.source,
      normalizer: this.normalizer,
      window,
      toxicMarketKeys,
      logger: this.logger.child({ stage: 'curator_history' })
    }).collect(subjects.map((s): HistorySubject => ({ vaultKey: s.vaultKey, address: s.vaultAddress, chainId: s.chainId })));

    const profiles = subjects.map((subject) =>
      reconstructResponse(subject, histories.get(subject.vaultKey) ?? {}, {
        crisisTimestamp: this.settings.crisisTimestamp,
        preCrisisTimestamp: this.settings.preCrisisTimestamp,
        toxicMarketKeys,
        zeroThresholdUsd: this.settings.zeroAllocationThresholdUsd
      })
    );

    const stress = await this.analyzeStress(discovery.toxicMarkets, window);
    const shareImpact = await this.analyzeShareImpact(subjects, window);
    const contagion = analyzeContagion(
      discovery.vaults,
      (allocation) =>
        toxicMarketKeys.has(allocation.marketKey) || this.normalizer.isToxicSymbol(allocation.collateralSymbol)
    );

    const summary: RunSummary = {
      startedAt,
      finishedAt: new Date().toISOString(),
      crisisTimestamp: this.settings.crisisTimestamp,
      chains: this.settings.chains.map((c) => c.name),
      toxicMarkets: discovery.toxicMarkets.length,
      exposures: discovery.exposures.length,
      exposedVaults: subjects.length,
      byDiscoveryMethod: countBy(discovery.exposures, (e) => e.discoveryMethod),
      byExposureStatus: countBy(discovery.exposures, (e) => e.exposureStatus),
      byBadDebtStatus: countBy(assessments, (a) => a.status),
      byResponseClass: countBy(profiles, (p) => p.responseClass),
      oracleMaskingMarkets: assessments.filter((a) => a.oracleMasking).length,
      totalBestEstimateUsd: assessments.reduce((sum, a) => sum + a.bestEstimateUsd, 0),
      socializedVaults: shareImpact.filter((s) => s.socialized).length,
      estimatedShareLossUsd: shareImpact.reduce((sum, s) => sum + (s.estimatedLossUsd ?? 0), 0),
      contagionBridges: contagion.filter((c) => c.contagionPath === 'BRIDGE').length,
      discovery: discovery.stats
    };

    const result: AnalysisResult = {
      discovery,
      assessments,
      histories,
      profiles,
      stress,
      shareImpact,
      contagion,
      summary
    };
    if (this.sink) {
      await this.write(this.sink, result);
    }
    this.logger.info('Analysis complete', {
      toxicMarkets: summary.toxicMarkets,
      exposures: summary.exposures,
      exposedVaults: summary.exposedVaults
    });
    return result;
  }

  /**
   * Assess each toxic market from its detailed snapshot (with oracle feeds),
   * falling back to the listing snapshot when the lookup fails.
   */
  private async assessBadDebt(markets: readonly Market[]): Promise<BadDebtAssessment[]> {
    const assessments: BadDebtAssessment[] = [];
    for (const listed of markets) {
      let market = listed;
      try {
        const raw = await this.source.getMarket(listed.uniqueKey, listed.chainId);
        if (raw) market = this.normalizer.normalizeMarket(raw);
      } catch (err) {
        this.logger.warn('Market detail unavailable, assessing listing snapshot', {
          marketKey: listed.key,
          error: errorMessage(err)
        });
      }
      try {
        assessments.push(this.classifier.assess(market));
      } catch (err) {
        this.logger.error('Bad debt assessment failed, skipping market', {
          marketKey: market.key,
          error: errorMessage(err)
        });
        itemsSkippedTotal.inc({ stage: 'bad_debt', reason: 'assessment_failed' });
      }
    }
    return assessments;
  }

  private async analyzeStress(markets: readonly Market[], window: TimeWindow): Promise<MarketStressProfile[]> {
    const profiles: MarketStressProfile[] = [];
    for (const market of markets) {
      let history: MarketHistory | null = null;
      try {
        const raw = await this.source.getMarketHistory(market.uniqueKey, market.chainId, window);
        history = raw ? this.normalizer.normalizeMarketHistory(raw, market.key) : null;
      } catch (err) {
        this.logger.warn('Market history unavailable', { marketKey: market.key, error: errorMessage(err) });
      }
      profiles.push(analyzeMarketStress(market.key, history, { crisisTimestamp: this.settings.crisisTimestamp }));
    }
    return profiles;
  }

  private async analyzeShareImpact(
    subjects: readonly ResponseSubject[],
    window: TimeWindow
  ): Promise<ShareImpactProfile[]> {
    const profiles: ShareImpactProfile[] = [];
    for (const subject of subjects) {
      let history: VaultShareHistory | null = null;
      try {
        const raw = await this.source.getVaultShareHistory(subject.vaultAddress, subject.chainId, window);
        history = raw ? this.normalizer.normalizeVaultShareHistory(raw, subject.vaultKey) : null;
      } catch (err) {
        this.logger.warn('Share price history unavailable', { vaultKey: subject.vaultKey, error: errorMessage(err) });
      }
      profiles.push(analyzeShareImpact(subject.vaultKey, history, { crisisTimestamp: this.settings.crisisTimestamp }));
    }
    return profiles;
  }

  private async write(sink: TabularSink, result: AnalysisResult): Promise<void> {
    const allocations: VaultScoped<AllocationPoint>[] = [];
    const adminEvents: VaultScoped<AdminEvent>[] = [];
    const reallocations: VaultReallocation[] = [];
    for (const [vaultKey, history] of result.histories) {
      for (const item of history.allocations ?? []) allocations.push({ vaultKey, item });
      for (const item of history.adminEvents ?? []) adminEvents.push({ vaultKey, item });
      reallocations.push(...(history.reallocations ?? []));
    }

    await sink.writeTable(toxicMarketsTable, result.discovery.toxicMarkets);
    await sink.writeTable(exposuresTable, result.discovery.exposures);
    await sink.writeTable(badDebtTable, result.assessments);
    await sink.writeTable(curatorResponsesTable, result.profiles);
    await sink.writeTable(marketStressTable, result.stress);
    await sink.writeTable(shareImpactTable, result.shareImpact);
    await sink.writeTable(contagionTable, result.contagion);
    await sink.writeTable(allocationTimeseriesTable, allocations);
    await sink.writeTable(adminEventsTable, adminEvents);
    await sink.writeTable(reallocationsTable, reallocations);
    await sink.writeJson('run_summary', result.summary);
    await sink.writeText('metrics.prom', await metricsRegistry.metrics());
  }
}

/**
 * One subject per exposed vault, in exposure order, with its rows' statuses
 * folded into one.
 */
export function responseSubjects(exposures: readonly Exposure[]): ResponseSubject[] {
  const byVault = new Map<VaultKey, Exposure[]>();
  for (const exposure of exposures) {
    const rows = byVault.get(exposure.vaultKey) ?? [];
    rows.push(exposure);
    byVault.set(exposure.vaultKey, rows);
  }

  const subjects: ResponseSubject[] = [];
  for (const [vaultKey, rows] of byVault) {
    const first = rows[0];
    subjects.push({
      vaultKey,
      vaultAddress: first.vaultAddress,
      chainId: first.chainId,
      chainName: first.chainName,
      vaultName: first.vaultName,
      curatorName: first.curatorName,
      exposureStatus: aggregateExposureStatus(rows.map((r) => r.exposureStatus))
    });
  }
  return subjects;
}
