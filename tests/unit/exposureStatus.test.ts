import { describe, it, expect } from 'vitest';

import { aggregateExposureStatus, deriveExposureStatus } from '../../src/services/exposureStatus.js';
import { CRISIS, DAY, PRE_CRISIS } from './fixtures.js';

const window = { crisisTimestamp: CRISIS, preCrisisTimestamp: PRE_CRISIS };

describe('deriveExposureStatus', () => {
  it('should report active exposure while supplying under a live cap', () => {
    expect(deriveExposureStatus({ supplyCap: 10n, supplyAssets: 5n, removableAt: null }, window)).toBe('ACTIVE_EXPOSURE');
  });

  it('should report a full exit when nothing is supplied', () => {
    expect(deriveExposureStatus({ supplyCap: 10n, supplyAssets: 0n, removableAt: null }, window)).toBe('FULLY_EXITED');
  });

  it('should date a zero cap by its removal timestamp', () => {
    const status = (removableAt: number | null) =>
      deriveExposureStatus({ supplyCap: 0n, supplyAssets: 5n, removableAt }, window);

    expect(status(CRISIS)).toBe('WITHDREW_DURING_CRISIS');
    expect(status(CRISIS + DAY)).toBe('WITHDREW_DURING_CRISIS');
    expect(status(PRE_CRISIS)).toBe('WITHDREW_PRE_CRISIS');
    expect(status(CRISIS - 1)).toBe('WITHDREW_PRE_CRISIS');
    expect(status(PRE_CRISIS - 1)).toBe('STOPPED_SUPPLYING');
    expect(status(null)).toBe('STOPPED_SUPPLYING');
  });
});

describe('aggregateExposureStatus', () => {
  it('should let live exposure win over any exit', () => {
    expect(aggregateExposureStatus(['HISTORICALLY_EXPOSED', 'FULLY_EXITED', 'ACTIVE_EXPOSURE'])).toBe('ACTIVE_EXPOSURE');
  });

  it('should prefer the latest kind of exit', () => {
    expect(aggregateExposureStatus(['STOPPED_SUPPLYING', 'WITHDREW_PRE_CRISIS'])).toBe('WITHDREW_PRE_CRISIS');
    expect(aggregateExposureStatus(['HISTORICALLY_EXPOSED', 'FULLY_EXITED'])).toBe('FULLY_EXITED');
  });

  it('should return null for no rows', () => {
    expect(aggregateExposureStatus([])).toBeNull();
  });
});
