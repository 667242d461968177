// ShareImpactAnalyzer: share price drawdown of an exposed vault around the crisis.
// Realized bad debt lowers totalAssets while totalSupply stays put, so a drop in
// share price is the loss being socialized across depositors.

import type { VaultKey, VaultShareHistory } from '../types/index.js';
import { definedPoints } from './MarketStressAnalyzer.js';

export interface ShareImpactProfile {
  vaultKey: VaultKey;
  /** Highest share price before the crisis. */
  peakSharePrice: number | null;
  peakTs: number | null;
  /** Lowest share price from the crisis on. */
  troughSharePrice: number | null;
  troughTs: number | null;
  latestSharePrice: number | null;
  latestTs: number | null;
  /** `(peak - trough) / peak`, floored at 0. */
  maxDrawdownPct: number | null;
  /** Share of the drop won back by the latest point; null without a drop. */
  recoveryPct: number | null;
  /** Vault TVL on the last day before the crisis. */
  tvlAtStakeUsd: number | null;
  estimatedLossUsd: number | null;
  socialized: boolean;
  points: number;
}

export interface ShareImpactOptions {
  crisisTimestamp: number;
  /** Drawdowns at or below this are treated as noise. */
  socializationThreshold?: number;
}

const SECONDS_PER_DAY = 86400;

function emptyProfile(vaultKey: VaultKey, points: number): ShareImpactProfile {
  return {
    vaultKey,
    peakSharePrice: null,
    peakTs: null,
    troughSharePrice: null,
    troughTs: null,
    latestSharePrice: null,
    latestTs: null,
    maxDrawdownPct: null,
    recoveryPct: null,
    tvlAtStakeUsd: null,
    estimatedLossUsd: null,
    socialized: false,
    points
  };
}

/**
 * Peak before the crisis against trough after it. A vault with fewer than two
 * share price points gets a profile with every measurement null.
 */
export function analyzeShareImpact(
  vaultKey: VaultKey,
  history: VaultShareHistory | null,
  options: ShareImpactOptions
): ShareImpactProfile {
  const threshold = options.socializationThreshold ?? 0.001;
  const prices = history ? definedPoints(history.sharePrice) : [];
  if (prices.length < 2) return emptyProfile(vaultKey, prices.length);

  const before = prices.filter((p) => p.x < options.crisisTimestamp);
  const after = prices.filter((p) => p.x >= options.crisisTimestamp);

  // Ties: the latest peak and the earliest trough.
  let peak = before.length > 0 ? before[0] : prices[0];
  for (const point of before) {
    if (point.y >= peak.y) peak = point;
  }
  const troughCandidates = after.length > 0 ? after : prices;
  let trough = troughCandidates[0];
  for (const point of troughCandidates) {
    if (point.y < trough.y) trough = point;
  }
  const latest = prices[prices.length - 1];

  const drop = peak.y - trough.y;
  const maxDrawdownPct = peak.y > 0 ? Math.max(0, drop / peak.y) : 0;

  const tvl = history ? definedPoints(history.totalAssetsUsd) : [];
  const stakeCutoff = options.crisisTimestamp - SECONDS_PER_DAY;
  const beforeCutoff = tvl.filter((p) => p.x <= stakeCutoff);
  const atStake = beforeCutoff.length > 0 ? beforeCutoff[beforeCutoff.length - 1] : tvl[0];
  const tvlAtStakeUsd = atStake ? atStake.y : null;

  const socialized = maxDrawdownPct > threshold;

  return {
    vaultKey,
    peakSharePrice: peak.y,
    peakTs: peak.x,
    troughSharePrice: trough.y,
    troughTs: trough.x,
    latestSharePrice: latest.y,
    latestTs: latest.x,
    maxDrawdownPct,
    recoveryPct: drop > 0 ? (latest.y - trough.y) / drop : null,
    tvlAtStakeUsd,
    estimatedLossUsd: socialized && tvlAtStakeUsd !== null && tvlAtStakeUsd > 0 ? tvlAtStakeUsd * maxDrawdownPct : null,
    socialized,
    points: prices.length
  };
}
