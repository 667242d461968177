/**
 * CuratorResponseReconstructor: earliest decisive risk-reducing action per vault
 *
 * Candidates, taken from whichever streams are present:
 * - allocation to toxic markets falling below the zero threshold after its peak
 * - a cap on a toxic market set to exactly zero
 * - a reallocation withdrawing from a toxic market
 *
 * The earliest candidate is bucketed by days before the crisis. A vault with no
 * candidate falls back to its exposure status.
 */

import type {
  AdminEvent,
  AllocationPoint,
  CuratorHistory,
  ExposureStatus,
  MarketKey,
  VaultKey,
  VaultReallocation
} from '../types/index.js';

export type ResponseClass =
  | 'PROACTIVE'
  | 'EARLY_REACTOR'
  | 'LAST_MINUTE'
  | 'DURING_CRISIS'
  | 'SLOW_REACTOR'
  | 'VERY_LATE'
  | 'STAYED_EXPOSED'
  | 'EXITED_TIMING_UNKNOWN'
  | 'UNKNOWN';

export type ActionSource = 'allocation_zero' | 'cap_zero' | 'toxic_withdrawal';

export interface ResponseSubject {
  vaultKey: VaultKey;
  vaultAddress: string;
  chainId: number;
  chainName: string;
  vaultName: string;
  curatorName: string | null;
  /** Aggregated exposure status; null when the vault has no known status. */
  exposureStatus: ExposureStatus | null;
}

export interface ResponseOptions {
  crisisTimestamp: number;
  preCrisisTimestamp: number;
  toxicMarketKeys: ReadonlySet<MarketKey>;
  /** Allocation below this many USD counts as fully exited. */
  zeroThresholdUsd?: number;
}

export interface CuratorResponseProfile extends ResponseSubject {
  peakToxicSupplyUsd: number | null;
  peakTimestamp: number | null;
  firstZeroAllocationTs: number | null;
  firstCapZeroTs: number | null;
  firstToxicWithdrawalTs: number | null;
  lastToxicWithdrawalTs: number | null;
  toxicWithdrawalCount: number;
  toxicSupplyCount: number;
  queueRemovalTs: number | null;
  allocationAtCrisisUsd: number | null;
  allocationAtPreCrisisUsd: number | null;
  adminEventCount: number;
  earliestActionTs: number | null;
  earliestActionSource: ActionSource | null;
  daysBeforeCrisis: number | null;
  responseClass: ResponseClass;
  /** Streams that were not available for this vault. */
  missingStreams: Array<keyof CuratorHistory>;
}

const SECONDS_PER_DAY = 86400;
const CAP_EVENT_TYPES = new Set(['SetCap', 'SubmitCap']);

/**
 * Bucket by days before the crisis. Each boundary value belongs to the slower
 * bucket: exactly 7 days is EARLY_REACTOR, exactly 0 is DURING_CRISIS.
 */
export function classifyResponseSpeed(daysBeforeCrisis: number): ResponseClass {
  if (daysBeforeCrisis > 7) return 'PROACTIVE';
  if (daysBeforeCrisis > 1) return 'EARLY_REACTOR';
  if (daysBeforeCrisis > 0) return 'LAST_MINUTE';
  if (daysBeforeCrisis > -3) return 'DURING_CRISIS';
  if (daysBeforeCrisis > -14) return 'SLOW_REACTOR';
  return 'VERY_LATE';
}

export function fallbackResponseClass(status: ExposureStatus | null): ResponseClass {
  if (status === null) return 'UNKNOWN';
  return status === 'ACTIVE_EXPOSURE' ? 'STAYED_EXPOSED' : 'EXITED_TIMING_UNKNOWN';
}

interface LevelPoint {
  timestamp: number;
  usd: number;
}

/** Total toxic allocation per timestamp, ascending. */
export function toxicAllocationLevels(
  points: readonly AllocationPoint[],
  toxicKeys: ReadonlySet<MarketKey>
): LevelPoint[] {
  const byTimestamp = new Map<number, number>();
  for (const point of points) {
    if (!toxicKeys.has(point.marketKey)) continue;
    byTimestamp.set(point.timestamp, (byTimestamp.get(point.timestamp) ?? 0) + point.supplyAssetsUsd);
  }
  return [...byTimestamp.entries()]
    .map(([timestamp, usd]) => ({ timestamp, usd }))
    .sort((a, b) => a.timestamp - b.timestamp);
}

function levelOnDay(levels: readonly LevelPoint[], dayStart: number): number | null {
  const point = levels.find((l) => l.timestamp >= dayStart && l.timestamp < dayStart + SECONDS_PER_DAY);
  return point ? point.usd : null;
}

function minTimestamp<T extends { timestamp: number }>(items: readonly T[]): number | null {
  return items.length === 0 ? null : Math.min(...items.map((i) => i.timestamp));
}

function maxTimestamp<T extends { timestamp: number }>(items: readonly T[]): number | null {
  return items.length === 0 ? null : Math.max(...items.map((i) => i.timestamp));
}

export function reconstructResponse(
  subject: ResponseSubject,
  history: CuratorHistory,
  options: ResponseOptions
): CuratorResponseProfile {
  const zeroThreshold = options.zeroThresholdUsd ?? 1;
  const toxicKeys = options.toxicMarketKeys;
  const missingStreams: Array<keyof CuratorHistory> = [];
  if (history.allocations === undefined) missingStreams.push('allocations');
  if (history.adminEvents === undefined) missingStreams.push('adminEvents');
  if (history.reallocations === undefined) missingStreams.push('reallocations');

  // Allocation stream
  const levels = toxicAllocationLevels(history.allocations ?? [], toxicKeys);
  let peak: LevelPoint | null = null;
  for (const level of levels) {
    if (!peak || level.usd > peak.usd) peak = level;
  }
  let firstZeroAllocationTs: number | null = null;
  if (peak && peak.usd >= zeroThreshold) {
    const peakTs = peak.timestamp;
    firstZeroAllocationTs = levels.find((l) => l.timestamp >= peakTs && l.usd < zeroThreshold)?.timestamp ?? null;
  }

  // Admin stream
  const adminEvents: readonly AdminEvent[] = history.adminEvents ?? [];
  const capZeroEvents = adminEvents.filter(
    (e) => CAP_EVENT_TYPES.has(e.type) && e.cap === 0n && e.marketKey !== null && toxicKeys.has(e.marketKey)
  );
  const queueRemovals = adminEvents.filter((e) => e.type === 'SetWithdrawQueue' && e.queueHasToxic === false);

  // Reallocation stream
  const toxicReallocations: readonly VaultReallocation[] = (history.reallocations ?? []).filter((r) =>
    toxicKeys.has(r.marketKey)
  );
  const withdrawals = toxicReallocations.filter((r) => r.type === 'ReallocateWithdraw');
  const supplies = toxicReallocations.filter((r) => r.type === 'ReallocateSupply');

  const firstCapZeroTs = minTimestamp(capZeroEvents);
  const firstToxicWithdrawalTs = minTimestamp(withdrawals);

  const candidates: Array<{ source: ActionSource; timestamp: number }> = [];
  if (firstZeroAllocationTs !== null) candidates.push({ source: 'allocation_zero', timestamp: firstZeroAllocationTs });
  if (firstCapZeroTs !== null) candidates.push({ source: 'cap_zero', timestamp: firstCapZeroTs });
  if (firstToxicWithdrawalTs !== null) candidates.push({ source: 'toxic_withdrawal', timestamp: firstToxicWithdrawalTs });

  let earliest: { source: ActionSource; timestamp: number } | null = null;
  for (const candidate of candidates) {
    if (!earliest || candidate.timestamp < earliest.timestamp) earliest = candidate;
  }

  const daysBeforeCrisis = earliest ? (options.crisisTimestamp - earliest.timestamp) / SECONDS_PER_DAY : null;
  const responseClass =
    daysBeforeCrisis !== null ? classifyResponseSpeed(daysBeforeCrisis) : fallbackResponseClass(subject.exposureStatus);

  return {
    ...subject,
    peakToxicSupplyUsd: peak ? peak.usd : null,
    peakTimestamp: peak ? peak.timestamp : null,
    firstZeroAllocationTs,
    firstCapZeroTs,
    firstToxicWithdrawalTs,
    lastToxicWithdrawalTs: maxTimestamp(withdrawals),
    toxicWithdrawalCount: withdrawals.length,
    toxicSupplyCount: supplies.length,
    queueRemovalTs: minTimestamp(queueRemovals),
    allocationAtCrisisUsd: levelOnDay(levels, options.crisisTimestamp),
    allocationAtPreCrisisUsd: levelOnDay(levels, options.preCrisisTimestamp),
    adminEventCount: adminEvents.length,
    earliestActionTs: earliest ? earliest.timestamp : null,
    earliestActionSource: earliest ? earliest.source : null,
    daysBeforeCrisis,
    responseClass,
    missingStreams
  };
}
