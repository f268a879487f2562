/**
 * @certmap/discovery
 *
 * Discovery pipeline: structure mapping, content categorization and
 * quality scoring for certification websites.
 */

export { DiscoveryOrchestrator } from './discovery/orchestrator/orchestrator.js'
export type { OrchestratorDeps, RunOptions } from './discovery/orchestrator/orchestrator.js'
export { validateQuery, certificationQuerySchema } from './discovery/orchestrator/query.js'

export { StructureMapper, buildIncludePaths, buildSearchTerm } from './discovery/mapper/structure-mapper.js'
export { ContentCategorizer } from './discovery/categorizer/categorizer.js'
export type {
  CategorizerInput,
  CategorizerOptions,
  CategoryDecision,
  CategorizationDiagnosis,
} from './discovery/categorizer/categorizer.js'
export { compileVocabulary, DEFAULT_SIGNAL_WEIGHTS } from './discovery/categorizer/signals.js'
export type { SignalWeights } from './discovery/categorizer/signals.js'
export { QualityScorer, QUALITY_WEIGHTS } from './discovery/quality/scorer.js'

export { FirecrawlClient, DEFAULT_RETRY_POLICY } from './discovery/fetch/firecrawl-client.js'
export type { FirecrawlClientOptions, RetryPolicy } from './discovery/fetch/firecrawl-client.js'
export { SlidingWindowRateLimiter } from './discovery/fetch/rate-limiter.js'
export type { RateLimiter, RateLimitStatus } from './discovery/fetch/rate-limiter.js'

export { exportJson, summarize, toExportDocument } from './discovery/export.js'
export type { DiscoverySummary, ExportDocument } from './discovery/export.js'
export { DiscoveryError, ERROR_CODES, classifyError } from './discovery/errors.js'
export type { ClassifiedError, ErrorCategory, ErrorCode } from './discovery/errors.js'
export { loadDiscoveryConfig, withOverrides, DEFAULT_CONFIG } from './config/discovery-config.js'
export type { DiscoveryConfig } from './config/discovery-config.js'
export { systemClock, ManualClock } from './discovery/utils/clock.js'
export type { Clock } from './discovery/utils/clock.js'
export * from './discovery/types.js'
