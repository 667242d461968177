import { z } from 'zod';

import { DEFAULT_CHAINS } from './chains.js';
import {
  parseChainMapEnv,
  parseFloatEnv,
  parseIntEnv,
  parseListEnv,
  parseTimestampEnv,
  type ChainEntry
} from './parseEnv.js';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export const rawEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim().toLowerCase()))
    .pipe(z.enum(LOG_LEVELS).optional()),

  MORPHO_API_URL: z.string().url().optional(),
  ANALYSIS_CHAINS: z.string().optional(),

  TOXIC_SYMBOLS: z.string().optional(),
  FALSE_POSITIVE_SYMBOLS: z.string().optional(),

  CRISIS_TIMESTAMP: z.string().optional(),
  PRE_CRISIS_TIMESTAMP: z.string().optional(),
  HISTORY_START_TIMESTAMP: z.string().optional(),
  HISTORY_END_TIMESTAMP: z.string().optional(),

  API_REQUEST_DELAY_MS: z.string().optional(),
  API_BURST_CAPACITY: z.string().optional(),
  API_REFILL_PER_SEC: z.string().optional(),
  API_RETRY_ATTEMPTS: z.string().optional(),
  API_RETRY_BASE_MS: z.string().optional(),

  MARKETS_PAGE_SIZE: z.string().optional(),
  VAULTS_PAGE_SIZE: z.string().optional(),
  REALLOCATIONS_PAGE_SIZE: z.string().optional(),
  ADMIN_EVENTS_PAGE_SIZE: z.string().optional(),

  ZERO_ALLOCATION_THRESHOLD_USD: z.string().optional(),
  OUTPUT_DIR: z.string().optional()
});

export type RawEnv = z.infer<typeof rawEnvSchema>;

export const DEFAULT_API_URL = 'https://blue-api.morpho.org/graphql';
export const DEFAULT_TOXIC_SYMBOLS = ['xUSD', 'deUSD', 'sdeUSD'];
export const DEFAULT_FALSE_POSITIVE_SYMBOLS = [
  'AA_FalconXUSDC',
  'stakedao-crvfrxUSD',
  'crvfrxUSD',
  'sfrxUSD',
  'fxUSD'
];

/** 2025-11-04T00:00:00Z */
export const DEFAULT_CRISIS_TIMESTAMP = 1762214400;
/** 2025-10-28T00:00:00Z */
export const DEFAULT_PRE_CRISIS_TIMESTAMP = 1761609600;
/** 2025-09-01T00:00:00Z */
export const DEFAULT_HISTORY_START = 1756684800;
/** 2026-01-31T00:00:00Z */
export const DEFAULT_HISTORY_END = 1769817600;

export interface AnalysisEnv {
  nodeEnv: string;
  logLevel: (typeof LOG_LEVELS)[number];
  apiUrl: string;
  chains: ChainEntry[];
  toxicSymbols: string[];
  falsePositiveSymbols: string[];
  crisisTimestamp: number;
  preCrisisTimestamp: number;
  historyStart: number;
  historyEnd: number;
  requestDelayMs: number;
  burstCapacity: number;
  refillPerSec: number;
  retryAttempts: number;
  retryBaseMs: number;
  marketsPageSize: number;
  vaultsPageSize: number;
  reallocationsPageSize: number;
  adminEventsPageSize: number;
  zeroAllocationThresholdUsd: number;
  outputDir: string;
}

/**
 * Validate and default the analysis environment.
 * @throws Error (or ZodError) describing the first invalid setting
 */
export function parseAnalysisEnv(source: NodeJS.ProcessEnv): AnalysisEnv {
  const parsed = rawEnvSchema.parse(source);

  const toxicSymbols = parseListEnv(parsed.TOXIC_SYMBOLS, DEFAULT_TOXIC_SYMBOLS);
  if (toxicSymbols.length === 0) {
    throw new Error('TOXIC_SYMBOLS must name at least one collateral symbol');
  }

  const chains = parseChainMapEnv(parsed.ANALYSIS_CHAINS, DEFAULT_CHAINS);
  if (chains.length === 0) {
    throw new Error('ANALYSIS_CHAINS must name at least one chain');
  }

  const crisisTimestamp = parseTimestampEnv(parsed.CRISIS_TIMESTAMP, DEFAULT_CRISIS_TIMESTAMP);
  const preCrisisTimestamp = parseTimestampEnv(parsed.PRE_CRISIS_TIMESTAMP, DEFAULT_PRE_CRISIS_TIMESTAMP);
  if (preCrisisTimestamp > crisisTimestamp) {
    throw new Error(
      `PRE_CRISIS_TIMESTAMP (${preCrisisTimestamp}) must not be after CRISIS_TIMESTAMP (${crisisTimestamp})`
    );
  }

  const historyStart = parseTimestampEnv(parsed.HISTORY_START_TIMESTAMP, DEFAULT_HISTORY_START);
  const historyEnd = parseTimestampEnv(parsed.HISTORY_END_TIMESTAMP, DEFAULT_HISTORY_END);
  if (historyStart >= historyEnd) {
    throw new Error('HISTORY_START_TIMESTAMP must be before HISTORY_END_TIMESTAMP');
  }

  return {
    nodeEnv: parsed.NODE_ENV || 'development',
    logLevel: parsed.LOG_LEVEL ?? 'info',
    apiUrl: parsed.MORPHO_API_URL ?? DEFAULT_API_URL,
    chains,
    toxicSymbols,
    falsePositiveSymbols: parseListEnv(parsed.FALSE_POSITIVE_SYMBOLS, DEFAULT_FALSE_POSITIVE_SYMBOLS),
    crisisTimestamp,
    preCrisisTimestamp,
    historyStart,
    historyEnd,
    requestDelayMs: parseIntEnv(parsed.API_REQUEST_DELAY_MS, 300, 0),
    burstCapacity: parseIntEnv(parsed.API_BURST_CAPACITY, 20, 1),
    refillPerSec: parseFloatEnv(parsed.API_REFILL_PER_SEC, 16, 0.01),
    retryAttempts: parseIntEnv(parsed.API_RETRY_ATTEMPTS, 3, 1, 10),
    retryBaseMs: parseIntEnv(parsed.API_RETRY_BASE_MS, 1000, 0),
    marketsPageSize: parseIntEnv(parsed.MARKETS_PAGE_SIZE, 100, 1, 1000),
    vaultsPageSize: parseIntEnv(parsed.VAULTS_PAGE_SIZE, 100, 1, 1000),
    reallocationsPageSize: parseIntEnv(parsed.REALLOCATIONS_PAGE_SIZE, 500, 1, 1000),
    adminEventsPageSize: parseIntEnv(parsed.ADMIN_EVENTS_PAGE_SIZE, 100, 1, 1000),
    zeroAllocationThresholdUsd: parseFloatEnv(parsed.ZERO_ALLOCATION_THRESHOLD_USD, 1, 0),
    outputDir: parsed.OUTPUT_DIR?.trim() || './data'
  };
}
