// Column layouts of every output table. Column order is part of the output
// contract: append new columns at the end.

import type { BadDebtAssessment } from '../services/BadDebtClassifier.js';
import type { VaultContagionProfile } from '../services/ContagionAnalyzer.js';
import type { CuratorResponseProfile } from '../services/CuratorResponseReconstructor.js';
import type { MarketStressProfile } from '../services/MarketStressAnalyzer.js';
import type { ShareImpactProfile } from '../services/ShareImpactAnalyzer.js';
import type {
  AdminEvent,
  AllocationPoint,
  Exposure,
  Market,
  VaultKey,
  VaultReallocation
} from '../types/index.js';
import type { TableDefinition } from './TabularSink.js';

/** `YYYY-MM-DD` in UTC, empty for missing timestamps. */
export function isoDate(timestamp: number | null | undefined): string {
  if (timestamp === null || timestamp === undefined || !Number.isFinite(timestamp)) return '';
  return new Date(timestamp * 1000).toISOString().slice(0, 10);
}

export const toxicMarketsTable: TableDefinition<Market> = {
  name: 'toxic_markets',
  columns: [
    { header: 'market_key', value: (m) => m.key },
    { header: 'unique_key', value: (m) => m.uniqueKey },
    { header: 'chain_id', value: (m) => m.chainId },
    { header: 'chain', value: (m) => m.chainName },
    { header: 'collateral_symbol', value: (m) => m.collateralAsset?.symbol },
    { header: 'collateral_address', value: (m) => m.collateralAsset?.address },
    { header: 'loan_symbol', value: (m) => m.loanAsset.symbol },
    { header: 'loan_address', value: (m) => m.loanAsset.address },
    { header: 'lltv', value: (m) => m.lltv },
    { header: 'listed', value: (m) => m.listed },
    { header: 'supply_assets', value: (m) => m.state.supplyAssets },
    { header: 'borrow_assets', value: (m) => m.state.borrowAssets },
    { header: 'collateral_assets', value: (m) => m.state.collateralAssets },
    { header: 'liquidity_assets', value: (m) => m.state.liquidityAssets },
    { header: 'supply_usd', value: (m) => m.state.supplyAssetsUsd },
    { header: 'borrow_usd', value: (m) => m.state.borrowAssetsUsd },
    { header: 'collateral_usd', value: (m) => m.state.collateralAssetsUsd },
    { header: 'liquidity_usd', value: (m) => m.state.liquidityAssetsUsd },
    { header: 'utilization', value: (m) => m.state.utilization },
    { header: 'oracle_address', value: (m) => m.oracle.address },
    { header: 'oracle_type', value: (m) => m.oracle.type },
    { header: 'supplying_vaults', value: (m) => m.supplyingVaultCount },
    { header: 'warnings', value: (m) => m.warnings.join('; ') },
    { header: 'snapshot_date', value: (m) => isoDate(m.state.timestamp) }
  ]
};

export const exposuresTable: TableDefinition<Exposure> = {
  name: 'vault_exposures',
  columns: [
    { header: 'vault_key', value: (e) => e.vaultKey },
    { header: 'vault_address', value: (e) => e.vaultAddress },
    { header: 'vault_name', value: (e) => e.vaultName },
    { header: 'curator', value: (e) => e.curatorName },
    { header: 'chain_id', value: (e) => e.chainId },
    { header: 'chain', value: (e) => e.chainName },
    { header: 'market_key', value: (e) => e.marketKey },
    { header: 'market_unique_key', value: (e) => e.marketUniqueKey },
    { header: 'collateral_symbol', value: (e) => e.collateralSymbol },
    { header: 'loan_symbol', value: (e) => e.loanSymbol },
    { header: 'supply_assets', value: (e) => e.supplyAssets },
    { header: 'supply_usd', value: (e) => e.supplyAssetsUsd },
    { header: 'supply_cap', value: (e) => e.supplyCap },
    { header: 'supply_cap_usd', value: (e) => e.supplyCapUsd },
    { header: 'removable_at', value: (e) => e.removableAt },
    { header: 'vault_total_assets_usd', value: (e) => e.vaultTotalAssetsUsd },
    { header: 'exposure_pct', value: (e) => e.exposurePct },
    { header: 'timelock_seconds', value: (e) => e.timelockSeconds },
    { header: 'discovery_method', value: (e) => e.discoveryMethod },
    { header: 'exposure_status', value: (e) => e.exposureStatus },
    { header: 'attribution', value: (e) => e.attribution }
  ]
};

export const badDebtTable: TableDefinition<BadDebtAssessment> = {
  name: 'bad_debt_assessments',
  columns: [
    { header: 'market_key', value: (a) => a.marketKey },
    { header: 'chain', value: (a) => a.chainName },
    { header: 'collateral_symbol', value: (a) => a.collateralSymbol },
    { header: 'loan_symbol', value: (a) => a.loanSymbol },
    { header: 'status', value: (a) => a.status },
    { header: 'severity', value: (a) => a.severity },
    { header: 'oracle_masking', value: (a) => a.oracleMasking },
    { header: 'best_estimate_usd', value: (a) => a.bestEstimateUsd },
    { header: 'supply_usd', value: (a) => a.supplyAssetsUsd },
    { header: 'borrow_usd', value: (a) => a.borrowAssetsUsd },
    { header: 'utilization', value: (a) => a.utilization },
    { header: 'l1_gap_raw', value: (a) => a.layer1.gapRaw },
    { header: 'l1_bad_debt_raw', value: (a) => a.layer1.badDebtRaw },
    { header: 'l1_bad_debt_usd', value: (a) => a.layer1.badDebtUsd },
    { header: 'l1_bad_debt_pct', value: (a) => a.layer1.badDebtPct },
    { header: 'l1_liquidity_discrepancy_raw', value: (a) => a.layer1.liquidityDiscrepancyRaw },
    { header: 'l2_unrealized_usd', value: (a) => a.layer2.unrealizedUsd },
    { header: 'l2_realized_usd', value: (a) => a.layer2.realizedUsd },
    { header: 'l2_total_usd', value: (a) => a.layer2.totalUsd },
    { header: 'l2_warning_bad_debt_usd', value: (a) => a.layer2.warningBadDebtUsd },
    { header: 'l3_oracle_price_usd', value: (a) => a.layer3.oracleImpliedPriceUsd },
    { header: 'l3_spot_price_usd', value: (a) => a.layer3.collateralSpotPriceUsd },
    { header: 'l3_deviation_pct', value: (a) => a.layer3.deviationPct },
    { header: 'l3_mispriced', value: (a) => a.layer3.mispriced },
    { header: 'l3_exposure_usd', value: (a) => a.layer3.exposureUsd },
    { header: 'oracle_mechanism', value: (a) => a.oracle.mechanism },
    { header: 'oracle_hardcoded', value: (a) => a.oracle.hardcoded },
    { header: 'true_ltv', value: (a) => a.trueLtv },
    { header: 'displayed_ltv', value: (a) => a.displayedLtv }
  ]
};

export const curatorResponsesTable: TableDefinition<CuratorResponseProfile> = {
  name: 'curator_responses',
  columns: [
    { header: 'vault_key', value: (p) => p.vaultKey },
    { header: 'vault_address', value: (p) => p.vaultAddress },
    { header: 'vault_name', value: (p) => p.vaultName },
    { header: 'curator', value: (p) => p.curatorName },
    { header: 'chain', value: (p) => p.chainName },
    { header: 'exposure_status', value: (p) => p.exposureStatus },
    { header: 'response_class', value: (p) => p.responseClass },
    { header: 'days_before_crisis', value: (p) => p.daysBeforeCrisis },
    { header: 'earliest_action_ts', value: (p) => p.earliestActionTs },
    { header: 'earliest_action_date', value: (p) => isoDate(p.earliestActionTs) },
    { header: 'earliest_action_source', value: (p) => p.earliestActionSource },
    { header: 'peak_toxic_supply_usd', value: (p) => p.peakToxicSupplyUsd },
    { header: 'peak_date', value: (p) => isoDate(p.peakTimestamp) },
    { header: 'first_zero_allocation_ts', value: (p) => p.firstZeroAllocationTs },
    { header: 'first_cap_zero_ts', value: (p) => p.firstCapZeroTs },
    { header: 'first_toxic_withdrawal_ts', value: (p) => p.firstToxicWithdrawalTs },
    { header: 'last_toxic_withdrawal_ts', value: (p) => p.lastToxicWithdrawalTs },
    { header: 'toxic_withdrawal_count', value: (p) => p.toxicWithdrawalCount },
    { header: 'toxic_supply_count', value: (p) => p.toxicSupplyCount },
    { header: 'queue_removal_ts', value: (p) => p.queueRemovalTs },
    { header: 'allocation_at_crisis_usd', value: (p) => p.allocationAtCrisisUsd },
    { header: 'allocation_pre_crisis_usd', value: (p) => p.allocationAtPreCrisisUsd },
    { header: 'admin_event_count', value: (p) => p.adminEventCount },
    { header: 'missing_streams', value: (p) => p.missingStreams.join(';') }
  ]
};

export const marketStressTable: TableDefinition<MarketStressProfile> = {
  name: 'market_stress',
  columns: [
    { header: 'market_key', value: (s) => s.marketKey },
    { header: 'peak_utilization', value: (s) => s.peakUtilization },
    { header: 'peak_utilization_date', value: (s) => isoDate(s.peakUtilizationTs) },
    { header: 'first_full_utilization_date', value: (s) => isoDate(s.firstFullUtilizationTs) },
    { header: 'full_utilization_days', value: (s) => s.fullUtilizationPoints },
    { header: 'utilization_at_crisis', value: (s) => s.utilizationAtCrisis },
    { header: 'min_liquidity_usd_after_crisis', value: (s) => s.minLiquidityUsdAfterCrisis },
    { header: 'min_liquidity_date', value: (s) => isoDate(s.minLiquidityTs) },
    { header: 'points', value: (s) => s.points }
  ]
};

export const shareImpactTable: TableDefinition<ShareImpactProfile> = {
  name: 'share_price_impact',
  columns: [
    { header: 'vault_key', value: (s) => s.vaultKey },
    { header: 'peak_share_price', value: (s) => s.peakSharePrice },
    { header: 'peak_date', value: (s) => isoDate(s.peakTs) },
    { header: 'trough_share_price', value: (s) => s.troughSharePrice },
    { header: 'trough_date', value: (s) => isoDate(s.troughTs) },
    { header: 'latest_share_price', value: (s) => s.latestSharePrice },
    { header: 'latest_date', value: (s) => isoDate(s.latestTs) },
    { header: 'max_drawdown_pct', value: (s) => s.maxDrawdownPct },
    { header: 'recovery_pct', value: (s) => s.recoveryPct },
    { header: 'tvl_at_stake_usd', value: (s) => s.tvlAtStakeUsd },
    { header: 'estimated_loss_usd', value: (s) => s.estimatedLossUsd },
    { header: 'socialized', value: (s) => s.socialized },
    { header: 'points', value: (s) => s.points }
  ]
};

export const contagionTable: TableDefinition<VaultContagionProfile> = {
  name: 'vault_contagion',
  columns: [
    { header: 'vault_key', value: (c) => c.vaultKey },
    { header: 'vault_name', value: (c) => c.vaultName },
    { header: 'curator', value: (c) => c.curatorName },
    { header: 'chain_id', value: (c) => c.chainId },
    { header: 'chain', value: (c) => c.chainName },
    { header: 'total_assets_usd', value: (c) => c.totalAssetsUsd },
    { header: 'toxic_markets', value: (c) => c.toxicMarkets },
    { header: 'clean_markets', value: (c) => c.cleanMarkets },
    { header: 'toxic_supply_usd', value: (c) => c.toxicSupplyUsd },
    { header: 'clean_supply_usd', value: (c) => c.cleanSupplyUsd },
    { header: 'toxic_share_of_supply', value: (c) => c.toxicShareOfSupply },
    { header: 'toxic_share_of_tvl', value: (c) => c.toxicShareOfTvl },
    { header: 'contagion_path', value: (c) => c.contagionPath }
  ]
};

export interface VaultScoped<T> {
  vaultKey: VaultKey;
  item: T;
}

export const allocationTimeseriesTable: TableDefinition<VaultScoped<AllocationPoint>> = {
  name: 'allocation_timeseries',
  columns: [
    { header: 'vault_key', value: (r) => r.vaultKey },
    { header: 'market_key', value: (r) => r.item.marketKey },
    { header: 'timestamp', value: (r) => r.item.timestamp },
    { header: 'date', value: (r) => isoDate(r.item.timestamp) },
    { header: 'supply_usd', value: (r) => r.item.supplyAssetsUsd },
    { header: 'supply_cap', value: (r) => r.item.supplyCap }
  ]
};

export const adminEventsTable: TableDefinition<VaultScoped<AdminEvent>> = {
  name: 'admin_events',
  columns: [
    { header: 'vault_key', value: (r) => r.vaultKey },
    { header: 'timestamp', value: (r) => r.item.timestamp },
    { header: 'date', value: (r) => isoDate(r.item.timestamp) },
    { header: 'type', value: (r) => r.item.type },
    { header: 'tx_hash', value: (r) => r.item.txHash },
    { header: 'market_key', value: (r) => r.item.marketKey },
    { header: 'cap', value: (r) => r.item.cap },
    { header: 'queue_has_toxic', value: (r) => r.item.queueHasToxic }
  ]
};

export const reallocationsTable: TableDefinition<VaultReallocation> = {
  name: 'reallocations',
  columns: [
    { header: 'vault_key', value: (r) => r.vaultKey },
    { header: 'market_key', value: (r) => r.marketKey },
    { header: 'timestamp', value: (r) => r.timestamp },
    { header: 'date', value: (r) => isoDate(r.timestamp) },
    { header: 'type', value: (r) => r.type },
    { header: 'assets', value: (r) => r.assets },
    { header: 'tx_hash', value: (r) => r.txHash }
  ]
};
