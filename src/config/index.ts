import dotenv from 'dotenv';

import { parseAnalysisEnv, type AnalysisEnv } from './envSchema.js';

dotenv.config();

let cached: AnalysisEnv | undefined;

function env(): AnalysisEnv {
  if (!cached) {
    cached = parseAnalysisEnv(process.env);
  }
  return cached;
}

/**
 * Process-wide configuration, read from the environment on first access.
 */
export const config = {
  get nodeEnv() { return env().nodeEnv; },
  get logLevel() { return env().logLevel; },
  get apiUrl() { return env().apiUrl; },
  get chains() { return env().chains; },

  get toxicSymbols() { return env().toxicSymbols; },
  get falsePositiveSymbols() { return env().falsePositiveSymbols; },

  get crisisTimestamp() { return env().crisisTimestamp; },
  get preCrisisTimestamp() { return env().preCrisisTimestamp; },
  get historyStart() { return env().historyStart; },
  get historyEnd() { return env().historyEnd; },

  get requestDelayMs() { return env().requestDelayMs; },
  get burstCapacity() { return env().burstCapacity; },
  get refillPerSec() { return env().refillPerSec; },
  get retryAttempts() { return env().retryAttempts; },
  get retryBaseMs() { return env().retryBaseMs; },

  get marketsPageSize() { return env().marketsPageSize; },
  get vaultsPageSize() { return env().vaultsPageSize; },
  get reallocationsPageSize() { return env().reallocationsPageSize; },
  get adminEventsPageSize() { return env().adminEventsPageSize; },

  get zeroAllocationThresholdUsd() { return env().zeroAllocationThresholdUsd; },
  get outputDir() { return env().outputDir; },

  /** Full validated snapshot; throws on invalid configuration. */
  snapshot(): AnalysisEnv {
    return env();
  }
};

export type { AnalysisEnv } from './envSchema.js';
export type { ChainEntry } from './parseEnv.js';
