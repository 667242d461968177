// Library entry point. The CLI lives in ./cli/analyze.ts.

export { parseAnalysisEnv, type AnalysisEnv } from './config/envSchema.js';
export { DEFAULT_CHAINS, chainName } from './config/chains.js';
export type { ChainEntry } from './config/parseEnv.js';
export { logger, createScopedLogger } from './logging/logger.js';
export { metricsRegistry } from './metrics/index.js';

export {
  MorphoApiService,
  ApiRequestError,
  isNotFoundError,
  isRetryableError,
  type AdminEventsResult,
  type MorphoApiServiceOptions,
  type PageResult,
  type TimeWindow
} from './services/MorphoApiService.js';
export { RequestBudget, type RequestBudgetOptions } from './services/RequestBudget.js';
export { EntityNormalizer } from './services/EntityNormalizer.js';
export { InMemoryVaultRecordStore, type VaultRecordStore } from './services/VaultRecordStore.js';
export { DiscoveryEngine, reconcileExposures, type DiscoveryResult, type DiscoverySource } from './services/DiscoveryEngine.js';
export { deriveExposureStatus, aggregateExposureStatus } from './services/exposureStatus.js';
export { BadDebtClassifier, describeOracle, type BadDebtAssessment } from './services/BadDebtClassifier.js';
export { CuratorHistoryCollector, type CuratorHistorySource } from './services/CuratorHistoryCollector.js';
export {
  reconstructResponse,
  classifyResponseSpeed,
  type CuratorResponseProfile,
  type ResponseClass
} from './services/CuratorResponseReconstructor.js';
export { analyzeMarketStress, type MarketStressProfile } from './services/MarketStressAnalyzer.js';
export { analyzeShareImpact, type ShareImpactProfile } from './services/ShareImpactAnalyzer.js';
export { analyzeContagion, type ContagionPath, type VaultContagionProfile } from './services/ContagionAnalyzer.js';
export { AnalysisPipeline, type AnalysisResult, type AnalysisSource, type RunSummary } from './pipeline/AnalysisPipeline.js';
export { TabularSink } from './sink/TabularSink.js';
export { toVaultKey, toMarketKey } from './utils/Address.js';

export type * from './types/index.js';
