import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { itemsSkippedTotal } from '../../src/metrics/index.js';
import { AnalysisPipeline, responseSubjects, type AnalysisSettings } from '../../src/pipeline/AnalysisPipeline.js';
import { TabularSink } from '../../src/sink/TabularSink.js';
import { toMarketKey, toVaultKey } from '../../src/utils/Address.js';
import {
  CRISIS,
  DAY,
  FakeAnalysisSource,
  PRE_CRISIS,
  TEST_CHAINS,
  address,
  marketId,
  rawMarket,
  rawMarketHistory,
  rawReallocation,
  rawShareHistory,
  rawVault
} from './fixtures.js';

const settings: AnalysisSettings = {
  chains: TEST_CHAINS,
  toxicSymbols: ['xUSD'],
  falsePositiveSymbols: [],
  crisisTimestamp: CRISIS,
  preCrisisTimestamp: PRE_CRISIS,
  historyStart: CRISIS - 60 * DAY,
  historyEnd: CRISIS + 30 * DAY,
  zeroAllocationThresholdUsd: 1
};

const M1 = toMarketKey(marketId(1), 1);
const V1 = toVaultKey(address(0xa1), 1);
const V2 = toVaultKey(address(0xa2), 1);
const WITHDRAWAL_TS = CRISIS - 10 * DAY;

/**
 * One toxic market. V1 still supplies it; V2 is missing from the market-side
 * listing, withdrew ten days before the crisis and has a zero cap.
 */
function scenario(): FakeAnalysisSource {
  const source = new FakeAnalysisSource();
  source.markets.push(rawMarket({ id: 1 }), rawMarket({ id: 2, collateralSymbol: 'WETH' }));
  source.vaults.push(
    rawVault({
      id: 0xa1,
      totalAssetsUsd: 100,
      allocations: [
        { market: 1, supplyAssets: '5000000', supplyAssetsUsd: 5 },
        { market: 2, collateralSymbol: 'WETH', supplyAssets: '9000000', supplyAssetsUsd: 9 }
      ]
    }),
    rawVault({ id: 0xa2, allocations: [{ market: 1, supplyAssets: '0', supplyCap: '0' }] })
  );
  source.hiddenFromListing.add(address(0xa2));
  source.reallocations.push({ chainId: 1, raw: rawReallocation({ vault: 0xa2, market: 1, timestamp: WITHDRAWAL_TS }) });
  source.marketHistories.set(marketId(1), rawMarketHistory({ utilization: [[CRISIS, 1]] }));
  return source;
}

describe('AnalysisPipeline', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'analysis-pipeline-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should run every stage and summarise the results', async () => {
    const result = await new AnalysisPipeline({ source: scenario(), settings }).run();

    expect(result.discovery.exposures.map((e) => [e.vaultKey, e.discoveryMethod, e.exposureStatus])).toEqual([
      [V1, 'current_allocation', 'ACTIVE_EXPOSURE'],
      [V2, 'individual_backfill', 'STOPPED_SUPPLYING']
    ]);
    expect(result.profiles.map((p) => [p.vaultKey, p.responseClass])).toEqual([
      [V1, 'STAYED_EXPOSED'],
      [V2, 'PROACTIVE']
    ]);
    expect(result.profiles[1].firstToxicWithdrawalTs).toBe(WITHDRAWAL_TS);
    expect(result.stress).toHaveLength(1);
    expect(result.stress[0].peakUtilization).toBe(1);

    expect(result.summary).toMatchObject({
      crisisTimestamp: CRISIS,
      chains: ['ethereum', 'base'],
      toxicMarkets: 1,
      exposures: 2,
      exposedVaults: 2,
      byDiscoveryMethod: { current_allocation: 1, individual_backfill: 1 },
      byExposureStatus: { ACTIVE_EXPOSURE: 1, STOPPED_SUPPLYING: 1 },
      byBadDebtStatus: { HEALTHY: 1 },
      byResponseClass: { STAYED_EXPOSED: 1, PROACTIVE: 1 },
      oracleMaskingMarkets: 0,
      totalBestEstimateUsd: 0,
      socializedVaults: 0,
      estimatedShareLossUsd: 0,
      contagionBridges: 1
    });
    expect(result.summary.discovery.backfillFound).toBe(1);
    expect(result.shareImpact.map((s) => [s.vaultKey, s.points])).toEqual([
      [V1, 0],
      [V2, 0]
    ]);
    expect(result.contagion.map((c) => [c.vaultKey, c.toxicSupplyUsd, c.cleanSupplyUsd, c.contagionPath])).toEqual([
      [V1, 5, 9, 'BRIDGE']
    ]);
    expect(result.contagion[0].toxicShareOfTvl).toBe(0.05);
  });

  it('should write every table and the run summary to the sink', async () => {
    const result = await new AnalysisPipeline({ source: scenario(), settings, sink: new TabularSink(dir) }).run();

    expect(fs.readdirSync(dir).sort()).toEqual([
      'admin_events.csv',
      'allocation_timeseries.csv',
      'bad_debt_assessments.csv',
      'curator_responses.csv',
      'market_stress.csv',
      'metrics.prom',
      'reallocations.csv',
      'run_summary.json',
      'share_price_impact.csv',
      'toxic_markets.csv',
      'vault_contagion.csv',
      'vault_exposures.csv'
    ]);

    const read = (name: string): string => fs.readFileSync(path.join(dir, name), 'utf-8');
    expect(read('vault_exposures.csv').split('\n')).toHaveLength(4);
    expect(read('reallocations.csv').split('\n')).toEqual([
      'vault_key,market_key,timestamp,date,type,assets,tx_hash',
      `${V2},${M1},${WITHDRAWAL_TS},2025-10-25,ReallocateWithdraw,1000000,0x${WITHDRAWAL_TS.toString(16)}`,
      ''
    ]);
    expect(read('admin_events.csv')).toBe('vault_key,timestamp,date,type,tx_hash,market_key,cap,queue_has_toxic\n');
    expect(read('share_price_impact.csv').split('\n')).toHaveLength(4);
    expect(read('vault_contagion.csv').split('\n')[0]).toBe(
      'vault_key,vault_name,curator,chain_id,chain,total_assets_usd,toxic_markets,clean_markets,toxic_supply_usd,clean_supply_usd,toxic_share_of_supply,toxic_share_of_tvl,contagion_path'
    );
    expect(read('vault_contagion.csv').split('\n')).toHaveLength(3);

    const summary: unknown = JSON.parse(read('run_summary.json'));
    expect(summary).toMatchObject({ toxicMarkets: 1, exposedVaults: 2 });
    expect(result.summary.exposures).toBe(2);
  });

  it('should assess the detailed market snapshot when available', async () => {
    const source = scenario();
    source.marketDetails.set(
      marketId(1),
      rawMarket({
        id: 1,
        badDebt: { underlying: '500000000', usd: 500 },
        state: { supplyAssets: '1000000000', borrowAssets: '1200000000', supplyAssetsUsd: 1000, borrowAssetsUsd: 1200 }
      })
    );

    const result = await new AnalysisPipeline({ source, settings }).run();

    expect(result.assessments.map((a) => a.status)).toEqual(['BAD_DEBT_CONFIRMED']);
    expect(result.summary.totalBestEstimateUsd).toBe(500);
  });

  it('should fall back to the listing snapshot and an empty stress profile on lookup failures', async () => {
    const source = scenario();
    source.failingOperations.add('getMarket');
    source.failingOperations.add('getMarketHistory');

    const result = await new AnalysisPipeline({ source, settings }).run();

    expect(result.assessments.map((a) => a.status)).toEqual(['HEALTHY']);
    expect(result.stress.map((s) => [s.marketKey, s.points, s.peakUtilization])).toEqual([[M1, 0, null]]);
    expect(result.profiles).toHaveLength(2);
  });

  it('should skip a market whose assessment fails and assess the rest', async () => {
    const failedAssessments = async (): Promise<number> =>
      (await itemsSkippedTotal.get()).values.find(
        (v) => v.labels.stage === 'bad_debt' && v.labels.reason === 'assessment_failed'
      )?.value ?? 0;
    const source = scenario();
    const listed = rawMarket({ id: 3 });
    const { collateralAsset } = listed;
    if (!collateralAsset) throw new Error('fixture market has no collateral');
    source.markets.push({ ...listed, collateralAsset: { ...collateralAsset, decimals: 18.5 } });
    const before = await failedAssessments();

    const result = await new AnalysisPipeline({ source, settings }).run();

    expect(result.discovery.toxicMarkets.map((m) => m.key)).toEqual([M1, toMarketKey(marketId(3), 1)]);
    expect(result.assessments.map((a) => a.marketKey)).toEqual([M1]);
    expect(result.summary.exposures).toBe(2);
    expect(await failedAssessments()).toBe(before + 1);
  });

  it('should count share price losses of exposed vaults', async () => {
    const source = scenario();
    source.shareHistories.set(
      address(0xa2),
      rawShareHistory({
        sharePrice: [
          [CRISIS - DAY, 1.25],
          [CRISIS + DAY, 1]
        ],
        totalAssetsUsd: [[CRISIS - DAY, 1000]]
      })
    );

    const result = await new AnalysisPipeline({ source, settings }).run();

    expect(result.shareImpact[1]).toMatchObject({ vaultKey: V2, maxDrawdownPct: 0.2, socialized: true });
    expect(result.summary.socializedVaults).toBe(1);
    expect(result.summary.estimatedShareLossUsd).toBeCloseTo(200, 9);
  });

  it('should leave the share price profile empty when its history lookup fails', async () => {
    const source = scenario();
    source.failingOperations.add('getVaultShareHistory');

    const result = await new AnalysisPipeline({ source, settings }).run();

    expect(result.shareImpact.map((s) => s.points)).toEqual([0, 0]);
    expect(result.summary.exposures).toBe(2);
  });

  it('should keep going when a chain is unavailable', async () => {
    const source = scenario();
    source.failingChains.add(8453);

    const result = await new AnalysisPipeline({ source, settings }).run();

    expect(result.summary.exposures).toBe(2);
    expect(result.summary.discovery.chainsScanned).toBe(2);
  });
});

describe('responseSubjects', () => {
  it('should fold each vault into one subject in first-seen order', async () => {
    const { discovery } = await new AnalysisPipeline({ source: scenario(), settings }).run();
    const [first, second] = discovery.exposures;

    const subjects = responseSubjects([
      { ...second, exposureStatus: 'FULLY_EXITED' },
      first,
      { ...second, marketKey: toMarketKey(marketId(9), 1), exposureStatus: 'WITHDREW_DURING_CRISIS' }
    ]);

    expect(subjects.map((s) => [s.vaultKey, s.exposureStatus])).toEqual([
      [V2, 'WITHDREW_DURING_CRISIS'],
      [V1, 'ACTIVE_EXPOSURE']
    ]);
    expect(subjects[1].vaultAddress).toBe(address(0xa1));
  });

  it('should return nothing for no exposures', () => {
    expect(responseSubjects([])).toEqual([]);
  });
});
