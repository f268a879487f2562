/**
 * Per-run context. Built once when a run starts and handed to every phase;
 * nothing here is shared between runs unless the caller passes it in.
 */

import { randomUUID } from 'node:crypto'
import type { ILogger } from '@certmap/logger'
import { loggers } from '../../config/logger.js'
import type { DiscoveryConfig } from '../../config/discovery-config.js'
import type { CategorizerOptions } from '../categorizer/categorizer.js'
import { ContentCategorizer } from '../categorizer/categorizer.js'
import type { RateLimiter } from '../fetch/rate-limiter.js'
import { SlidingWindowRateLimiter } from '../fetch/rate-limiter.js'
import { QualityScorer } from '../quality/scorer.js'
import type { ScrapingCapability } from '../types.js'
import type { Clock } from '../utils/clock.js'
import { systemClock } from '../utils/clock.js'

export interface DiscoveryContext {
  readonly runId: string
  readonly config: DiscoveryConfig
  readonly capability: ScrapingCapability
  readonly rateLimiter: RateLimiter
  readonly categorizer: ContentCategorizer
  readonly scorer: QualityScorer
  readonly clock: Clock
  readonly logger: ILogger
  readonly startedAt: number
  /** Epoch ms after which no further outbound calls are made */
  readonly deadline: number
}

export interface ContextDeps {
  config: DiscoveryConfig
  capability: ScrapingCapability
  clock?: Clock
  /** Share one limiter between runs that use the same API key */
  rateLimiter?: RateLimiter
  categorizer?: CategorizerOptions
  logger?: ILogger
  runId?: string
}

export function createDiscoveryContext(deps: ContextDeps): DiscoveryContext {
  const clock = deps.clock ?? systemClock
  const runId = deps.runId ?? randomUUID()
  const logger = (deps.logger ?? loggers.orchestrator).child({ runId })
  const startedAt = clock.now()

  const categorizer = new ContentCategorizer({
    ...deps.categorizer,
    logger: loggers.categorizer.child({ runId }),
  })

  return Object.freeze({
    runId,
    config: deps.config,
    capability: deps.capability,
    rateLimiter:
      deps.rateLimiter ??
      new SlidingWindowRateLimiter({ maxRequests: deps.config.maxRequestsPerMinute, clock }),
    categorizer,
    scorer: new QualityScorer({
      clock,
      signalWeights: categorizer.weights,
      logger: loggers.quality.child({ runId }),
    }),
    clock,
    logger,
    startedAt,
    deadline: startedAt + deps.config.timeoutSeconds * 1000,
  })
}
