import { describe, it, expect } from 'vitest';

import { EntityNormalizer } from '../../src/services/EntityNormalizer.js';
import { analyzeMarketStress } from '../../src/services/MarketStressAnalyzer.js';
import { toMarketKey } from '../../src/utils/Address.js';
import { CRISIS, DAY, TEST_CHAINS, marketId, rawMarketHistory } from './fixtures.js';

const normalizer = new EntityNormalizer({ chains: TEST_CHAINS, toxicSymbols: ['xUSD'], falsePositiveSymbols: [] });
const KEY = toMarketKey(marketId(1), 1);

describe('analyzeMarketStress', () => {
  it('should summarise utilization and post-crisis liquidity', () => {
    const history = normalizer.normalizeMarketHistory(
      rawMarketHistory({
        utilization: [
          [CRISIS - 2 * DAY, 0.8],
          [CRISIS - DAY, 0.995],
          [CRISIS, 1],
          [CRISIS + DAY, 1],
          [CRISIS + 2 * DAY, null]
        ],
        liquidityAssetsUsd: [
          [CRISIS - DAY, 10],
          [CRISIS, 5000],
          [CRISIS + DAY, 20],
          [CRISIS + 2 * DAY, 40]
        ]
      }),
      KEY
    );

    expect(analyzeMarketStress(KEY, history, { crisisTimestamp: CRISIS })).toEqual({
      marketKey: KEY,
      peakUtilization: 1,
      peakUtilizationTs: CRISIS,
      firstFullUtilizationTs: CRISIS - DAY,
      fullUtilizationPoints: 3,
      utilizationAtCrisis: 1,
      minLiquidityUsdAfterCrisis: 20,
      minLiquidityTs: CRISIS + DAY,
      points: 4
    });
  });

  it('should return an empty profile without history', () => {
    expect(analyzeMarketStress(KEY, null, { crisisTimestamp: CRISIS })).toEqual({
      marketKey: KEY,
      peakUtilization: null,
      peakUtilizationTs: null,
      firstFullUtilizationTs: null,
      fullUtilizationPoints: 0,
      utilizationAtCrisis: null,
      minLiquidityUsdAfterCrisis: null,
      minLiquidityTs: null,
      points: 0
    });
  });
});
