#!/usr/bin/env node
/**
 * Exposure analysis CLI entry point
 *
 * Validates the environment, runs the full pipeline once and writes every
 * table to the output directory (OUTPUT_DIR, or --output <dir>).
 */

import { config } from '../config/index.js';
import { createScopedLogger, errorMessage } from '../logging/logger.js';
import { AnalysisPipeline } from '../pipeline/AnalysisPipeline.js';
import { MorphoApiService } from '../services/MorphoApiService.js';
import { RequestBudget } from '../services/RequestBudget.js';
import { TabularSink } from '../sink/TabularSink.js';

import { parseOutputArg } from './args.js';

const logger = createScopedLogger('cli');

async function main(): Promise<void> {
  const settings = config.snapshot();
  const outputDir = parseOutputArg(process.argv.slice(2)) ?? settings.outputDir;

  logger.info('Starting exposure analysis', {
    apiUrl: settings.apiUrl,
    chains: settings.chains.map((c) => `${c.name}:${c.chainId}`).join(','),
    toxicSymbols: settings.toxicSymbols.join(','),
    crisis: new Date(settings.crisisTimestamp * 1000).toISOString(),
    outputDir
  });

  const budget = new RequestBudget({
    capacity: settings.burstCapacity,
    refillRate: settings.refillPerSec,
    minSpacingMs: settings.requestDelayMs
  });
  const api = new MorphoApiService({
    endpoint: settings.apiUrl,
    budget,
    retryAttempts: settings.retryAttempts,
    retryBaseMs: settings.retryBaseMs,
    pageSizes: {
      markets: settings.marketsPageSize,
      vaults: settings.vaultsPageSize,
      reallocations: settings.reallocationsPageSize,
      adminEvents: settings.adminEventsPageSize
    }
  });

  const pipeline = new AnalysisPipeline({
    source: api,
    settings,
    sink: new TabularSink(outputDir)
  });
  const result = await pipeline.run();

  logger.info('Exposure analysis finished', {
    toxicMarkets: result.summary.toxicMarkets,
    exposures: result.summary.exposures,
    exposedVaults: result.summary.exposedVaults,
    requestsIssued: budget.getMetrics().acquiredTotal,
    outputDir
  });
}

main().catch((error) => {
  logger.error('Exposure analysis failed', { error: errorMessage(error) });
  process.exit(1);
});
