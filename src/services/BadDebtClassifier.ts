/**
 * BadDebtClassifier: three-layer bad debt assessment for a market snapshot
 *
 * - Layer 1: raw supply/borrow gap. A negative gap is uncollateralized debt no
 *   matter what the oracle or the protocol's own accounting says.
 * - Layer 2: protocol-reported unrealized + realized bad debt, at face value.
 * - Layer 3: oracle-implied collateral price against the spot price.
 *
 * The layers describe the same loss from different angles, so the best
 * estimate is their maximum, never their sum.
 */

import type { Market, MarketKey } from '../types/index.js';
import { bigintRatio, safeDivide, scaleDown } from '../utils/decimals.js';
import { isZeroAddress } from '../utils/Address.js';

export type BadDebtStatus =
  | 'BAD_DEBT_CONFIRMED'
  | 'AT_RISK_FULL_UTILIZATION'
  | 'ORACLE_MISPRICING'
  | 'BAD_DEBT_NATIVE_REPORTED'
  | 'HEALTHY';

export type Severity = 'critical' | 'high' | 'medium' | 'none';

export type OracleMechanism = 'VAULT_ONLY' | 'VAULT_PLUS_FEED' | 'FEED_ONLY' | 'NO_FEEDS' | 'UNKNOWN';

export interface SupplyBorrowGap {
  /** supplyAssets - borrowAssets in loan token base units. */
  gapRaw: bigint;
  hasBadDebt: boolean;
  badDebtRaw: bigint;
  badDebtUsd: number;
  /** Bad debt as a share of supplied assets, 0 when nothing is supplied. */
  badDebtPct: number;
  /** Reported liquidity minus the gap; null when the gap is negative. */
  liquidityDiscrepancyRaw: bigint | null;
}

export interface ReportedBadDebt {
  unrealizedUsd: number;
  realizedUsd: number;
  totalUsd: number;
  warningBadDebtUsd: number | null;
}

export interface OracleSpotGap {
  oracleImpliedPriceUsd: number | null;
  collateralSpotPriceUsd: number | null;
  /** (implied - spot) / implied; null when either price is unusable. */
  deviationPct: number | null;
  mispriced: boolean;
  /** Collateral amount times the per-unit overvaluation. */
  exposureUsd: number | null;
}

export interface OracleConfiguration {
  mechanism: OracleMechanism;
  vaultBased: boolean;
  hardcoded: boolean;
}

export interface BadDebtAssessment {
  marketKey: MarketKey;
  uniqueKey: string;
  chainId: number;
  chainName: string;
  collateralSymbol: string | null;
  loanSymbol: string;
  utilization: number;
  supplyAssetsUsd: number;
  borrowAssetsUsd: number;
  layer1: SupplyBorrowGap;
  layer2: ReportedBadDebt;
  layer3: OracleSpotGap;
  oracle: OracleConfiguration;
  trueLtv: number | null;
  displayedLtv: number | null;
  status: BadDebtStatus;
  severity: Severity;
  oracleMasking: boolean;
  bestEstimateUsd: number;
}

export interface BadDebtClassifierConfig {
  /** Utilization at or above which supplied capital is locked. */
  fullUtilizationThreshold: number;
  /** Absolute oracle/spot deviation above which the oracle is mispriced. */
  mispricingThreshold: number;
}

export const DEFAULT_BAD_DEBT_CONFIG: BadDebtClassifierConfig = {
  fullUtilizationThreshold: 0.99,
  mispricingThreshold: 0.1
};

const SEVERITY: Record<BadDebtStatus, Severity> = {
  BAD_DEBT_CONFIRMED: 'critical',
  AT_RISK_FULL_UTILIZATION: 'high',
  ORACLE_MISPRICING: 'high',
  BAD_DEBT_NATIVE_REPORTED: 'medium',
  HEALTHY: 'none'
};

/** Morpho oracle prices are scaled by 1e36 adjusted for the decimal difference. */
const ORACLE_PRICE_SCALE = 36;

export class BadDebtClassifier {
  private readonly config: BadDebtClassifierConfig;

  constructor(config: Partial<BadDebtClassifierConfig> = {}) {
    this.config = { ...DEFAULT_BAD_DEBT_CONFIG, ...config };
  }

  assess(market: Market): BadDebtAssessment {
    const layer1 = this.supplyBorrowGap(market);
    const layer2 = this.reportedBadDebt(market);
    const layer3 = this.oracleSpotGap(market);
    const status = this.classify(market, layer1, layer2, layer3);

    const collateral = market.collateralAsset;
    const collateralSpotUsd =
      collateral && collateral.spotPriceUsd !== null
        ? scaleDown(market.state.collateralAssets, collateral.decimals) * collateral.spotPriceUsd
        : 0;

    return {
      marketKey: market.key,
      uniqueKey: market.uniqueKey,
      chainId: market.chainId,
      chainName: market.chainName,
      collateralSymbol: collateral?.symbol ?? null,
      loanSymbol: market.loanAsset.symbol,
      utilization: market.state.utilization,
      supplyAssetsUsd: market.state.supplyAssetsUsd,
      borrowAssetsUsd: market.state.borrowAssetsUsd,
      layer1,
      layer2,
      layer3,
      oracle: describeOracle(market),
      trueLtv: safeDivide(market.state.borrowAssetsUsd, collateralSpotUsd),
      displayedLtv: safeDivide(market.state.borrowAssetsUsd, market.state.collateralAssetsUsd),
      status,
      severity: SEVERITY[status],
      oracleMasking: layer1.gapRaw < 0n && layer2.totalUsd === 0,
      bestEstimateUsd: Math.max(layer1.badDebtUsd, layer2.totalUsd, Math.max(0, layer3.exposureUsd ?? 0))
    };
  }

  private classify(
    market: Market,
    layer1: SupplyBorrowGap,
    layer2: ReportedBadDebt,
    layer3: OracleSpotGap
  ): BadDebtStatus {
    if (layer1.hasBadDebt) return 'BAD_DEBT_CONFIRMED';
    if (market.state.utilization >= this.config.fullUtilizationThreshold) return 'AT_RISK_FULL_UTILIZATION';
    if (layer3.mispriced) return 'ORACLE_MISPRICING';
    if (layer2.totalUsd > 0) return 'BAD_DEBT_NATIVE_REPORTED';
    return 'HEALTHY';
  }

  private supplyBorrowGap(market: Market): SupplyBorrowGap {
    const { supplyAssets, borrowAssets, liquidityAssets, supplyAssetsUsd, borrowAssetsUsd } = market.state;
    const gapRaw = supplyAssets - borrowAssets;
    const badDebtRaw = gapRaw < 0n ? -gapRaw : 0n;

    let badDebtUsd = Math.max(0, borrowAssetsUsd - supplyAssetsUsd);
    const loanSpot = market.loanAsset.spotPriceUsd;
    if (badDebtRaw > 0n && badDebtUsd === 0 && loanSpot !== null && loanSpot > 0) {
      badDebtUsd = scaleDown(badDebtRaw, market.loanAsset.decimals) * loanSpot;
    }

    return {
      gapRaw,
      hasBadDebt: gapRaw < 0n,
      badDebtRaw,
      badDebtUsd,
      badDebtPct: bigintRatio(badDebtRaw, supplyAssets),
      liquidityDiscrepancyRaw: gapRaw >= 0n ? liquidityAssets - gapRaw : null
    };
  }

  private reportedBadDebt(market: Market): ReportedBadDebt {
    const unrealizedUsd = Math.max(0, market.badDebtUsd);
    const realizedUsd = Math.max(0, market.realizedBadDebtUsd);
    return {
      unrealizedUsd,
      realizedUsd,
      totalUsd: unrealizedUsd + realizedUsd,
      warningBadDebtUsd: market.warningBadDebtUsd
    };
  }

  private oracleSpotGap(market: Market): OracleSpotGap {
    const collateral = market.collateralAsset;
    const loanSpot = market.loanAsset.spotPriceUsd;
    const collateralSpot = collateral?.spotPriceUsd ?? null;
    const undefinedGap: OracleSpotGap = {
      oracleImpliedPriceUsd: null,
      collateralSpotPriceUsd: collateralSpot,
      deviationPct: null,
      mispriced: false,
      exposureUsd: null
    };

    if (!collateral || collateralSpot === null || collateralSpot <= 0) return undefinedGap;
    if (loanSpot === null || loanSpot <= 0) return undefinedGap;
    if (market.state.oraclePrice <= 0n) return undefinedGap;

    const scale = ORACLE_PRICE_SCALE + market.loanAsset.decimals - collateral.decimals;
    const implied = scaleDown(market.state.oraclePrice, scale) * loanSpot;
    if (!(implied > 0) || !Number.isFinite(implied)) return undefinedGap;

    const deviationPct = (implied - collateralSpot) / implied;
    const collateralAmount = scaleDown(market.state.collateralAssets, collateral.decimals);

    return {
      oracleImpliedPriceUsd: implied,
      collateralSpotPriceUsd: collateralSpot,
      deviationPct,
      mispriced: Math.abs(deviationPct) > this.config.mispricingThreshold,
      exposureUsd: collateralAmount * (implied - collateralSpot)
    };
  }
}

/**
 * Oracle feed layout. Without any non-zero feed or vault the oracle cannot
 * follow the market and is treated as a hardcoded price.
 */
export function describeOracle(market: Market): OracleConfiguration {
  const oracle = market.oracle;
  if (!oracle.hasFeedData) {
    return {
      mechanism: 'UNKNOWN',
      vaultBased: false,
      hardcoded: oracle.type === 'Unknown'
    };
  }

  const hasFeed = [oracle.baseFeedOne, oracle.baseFeedTwo, oracle.quoteFeedOne, oracle.quoteFeedTwo].some(
    (feed) => !isZeroAddress(feed)
  );
  const vaultBased = !isZeroAddress(oracle.baseVault) || !isZeroAddress(oracle.quoteVault);

  let mechanism: OracleMechanism;
  if (vaultBased && !hasFeed) mechanism = 'VAULT_ONLY';
  else if (vaultBased) mechanism = 'VAULT_PLUS_FEED';
  else if (hasFeed) mechanism = 'FEED_ONLY';
  else mechanism = 'NO_FEEDS';

  return { mechanism, vaultBased, hardcoded: !hasFeed && !vaultBased };
}
