import type { ExposureStatus } from '../types/index.js';

export interface CrisisWindow {
  /** Unix seconds at which the crisis began. */
  crisisTimestamp: number;
  /** Unix seconds at which the pre-crisis window opens. */
  preCrisisTimestamp: number;
}

export interface LiveAllocationState {
  supplyCap: bigint;
  supplyAssets: bigint;
  removableAt: number | null;
}

/**
 * Status of a live allocation. A zero cap means new supply is blocked; the
 * removal timestamp tells when the market was scheduled out of the queue.
 */
export function deriveExposureStatus(state: LiveAllocationState, window: CrisisWindow): ExposureStatus {
  if (state.supplyCap === 0n) {
    if (state.removableAt !== null && state.removableAt >= window.crisisTimestamp) {
      return 'WITHDREW_DURING_CRISIS';
    }
    if (state.removableAt !== null && state.removableAt >= window.preCrisisTimestamp) {
      return 'WITHDREW_PRE_CRISIS';
    }
    return 'STOPPED_SUPPLYING';
  }
  if (state.supplyAssets === 0n) {
    return 'FULLY_EXITED';
  }
  return 'ACTIVE_EXPOSURE';
}

const STATUS_PRECEDENCE: readonly ExposureStatus[] = [
  'ACTIVE_EXPOSURE',
  'WITHDREW_DURING_CRISIS',
  'WITHDREW_PRE_CRISIS',
  'STOPPED_SUPPLYING',
  'FULLY_EXITED',
  'HISTORICALLY_EXPOSED'
];

/**
 * One status for a vault with several exposure rows: any live exposure wins,
 * then the most recent kind of exit.
 */
export function aggregateExposureStatus(statuses: readonly ExposureStatus[]): ExposureStatus | null {
  for (const status of STATUS_PRECEDENCE) {
    if (statuses.includes(status)) return status;
  }
  return null;
}
