import type { MarketHistory, MarketKey, TimeseriesPoint } from '../types/index.js';

export interface MarketStressProfile {
  marketKey: MarketKey;
  peakUtilization: number | null;
  peakUtilizationTs: number | null;
  firstFullUtilizationTs: number | null;
  fullUtilizationPoints: number;
  utilizationAtCrisis: number | null;
  minLiquidityUsdAfterCrisis: number | null;
  minLiquidityTs: number | null;
  points: number;
}

export interface MarketStressOptions {
  crisisTimestamp: number;
  fullUtilizationThreshold?: number;
}

const SECONDS_PER_DAY = 86400;

/** Points with a value, in time order. */
export function definedPoints(points: readonly TimeseriesPoint[]): Array<{ x: number; y: number }> {
  const result: Array<{ x: number; y: number }> = [];
  for (const point of points) {
    if (point.y !== null) result.push({ x: point.x, y: point.y });
  }
  return result.sort((a, b) => a.x - b.x);
}

/**
 * Liquidity stress of one market over the history window. A market without
 * history gets a profile with every measurement null.
 */
export function analyzeMarketStress(
  marketKey: MarketKey,
  history: MarketHistory | null,
  options: MarketStressOptions
): MarketStressProfile {
  const threshold = options.fullUtilizationThreshold ?? 0.99;
  const utilization = history ? definedPoints(history.utilization) : [];
  const liquidity = history ? definedPoints(history.liquidityAssetsUsd) : [];

  let peak: { x: number; y: number } | null = null;
  for (const point of utilization) {
    if (!peak || point.y > peak.y) peak = point;
  }

  const full = utilization.filter((p) => p.y >= threshold);
  const atCrisis = utilization.find(
    (p) => p.x >= options.crisisTimestamp && p.x < options.crisisTimestamp + SECONDS_PER_DAY
  );

  let minLiquidity: { x: number; y: number } | null = null;
  for (const point of liquidity) {
    if (point.x < options.crisisTimestamp) continue;
    if (!minLiquidity || point.y < minLiquidity.y) minLiquidity = point;
  }

  return {
    marketKey,
    peakUtilization: peak ? peak.y : null,
    peakUtilizationTs: peak ? peak.x : null,
    firstFullUtilizationTs: full.length > 0 ? full[0].x : null,
    fullUtilizationPoints: full.length,
    utilizationAtCrisis: atCrisis ? atCrisis.y : null,
    minLiquidityUsdAfterCrisis: minLiquidity ? minLiquidity.y : null,
    minLiquidityTs: minLiquidity ? minLiquidity.x : null,
    points: utilization.length
  };
}
