/**
 * Discovery Orchestrator
 *
 * Runs one discovery through a strictly sequential state machine:
 *
 *   STRUCTURE_DISCOVERY -> CONTENT_EXTRACTION -> CATEGORIZATION
 *     -> QUALITY_ASSESSMENT -> COMPILATION -> DONE
 *
 * FAILED is terminal and reached only for an invalid query, a site that
 * cannot be mapped at all, or a broken invariant at compilation. Every other
 * problem is recorded on the result: a degraded structure, per-page fetch
 * failures, uncategorized pages, or truncation at the run deadline.
 *
 * The deadline is checked between phases, before each mapping call and
 * after every page fetch, and aborts any wait for a rate-limiter slot. Once
 * it passes no further outbound calls are made; pages already fetched are
 * still categorized and scored. Pages are fetched most promising first, by a
 * shallow score over URL, title and description, so the deadline cuts the
 * weakest candidates.
 */

import pLimit from 'p-limit'
import type { ILogger } from '@certmap/logger'
import { loggers } from '../../config/logger.js'
import { DiscoveryError, ERROR_CODES, classifyError } from '../errors.js'
import { StructureMapper } from '../mapper/structure-mapper.js'
import type {
  CategorizedContent,
  CategorizedPage,
  CertificationQuery,
  DiscoveredPage,
  DiscoveryPhase,
  DiscoveryResult,
  FetchFailureRecord,
  PhaseTransition,
  QualityAssessment,
  WebsiteStructure,
} from '../types.js'
import { CONTENT_CATEGORIES, UNCATEGORIZED, isContentCategory } from '../types.js'
import { generateInsights } from '../quality/insights.js'
import { stringField } from '../fetch/firecrawl-client.js'
import type { ContextDeps, DiscoveryContext } from './context.js'
import { createDiscoveryContext } from './context.js'
import { validateQuery } from './query.js'
import { AbortedError } from '../utils/clock.js'

/** Longest delay setTimeout accepts */
const MAX_TIMER_MS = 2_147_483_647

export interface RunOptions {
  /** Set false to skip the crawl (map only) */
  crawl?: boolean
  /** Extra filtered map call */
  search?: string
}

export type OrchestratorDeps = Omit<ContextDeps, 'runId'>

export class DiscoveryOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  /**
   * Run one discovery. Each call gets its own context, so concurrent runs
   * share nothing unless a rate limiter was passed in.
   *
   * @throws DiscoveryError INVALID_QUERY, STRUCTURE_UNAVAILABLE or
   *   INTERNAL_INVARIANT_VIOLATION
   */
  async run(input: unknown, options: RunOptions = {}): Promise<DiscoveryResult> {
    const context = createDiscoveryContext(this.deps)
    return new DiscoveryRun(context, options).execute(input)
  }
}

/**
 * State of a single run. Not reused.
 */
class DiscoveryRun {
  private readonly log: ILogger
  private readonly phaseLog: PhaseTransition[] = []
  private readonly fetchFailures: FetchFailureRecord[] = []
  private readonly deadlineController = new AbortController()
  private phase: DiscoveryPhase | null = null
  private truncated = false

  constructor(
    private readonly context: DiscoveryContext,
    private readonly options: RunOptions
  ) {
    this.log = context.logger
  }

  async execute(input: unknown): Promise<DiscoveryResult> {
    const remaining = this.remainingMs()
    const timer =
      remaining <= MAX_TIMER_MS ? setTimeout(() => this.deadlineController.abort(), Math.max(0, remaining)) : undefined
    try {
      return await this.executePhases(input)
    } finally {
      clearTimeout(timer)
    }
  }

  private async executePhases(input: unknown): Promise<DiscoveryResult> {
    let query: CertificationQuery
    try {
      query = validateQuery(input)
    } catch (error) {
      this.fail(error)
      throw error
    }

    this.log.info('Discovery started', {
      certification: query.name,
      officialLink: query.officialLink,
      timeoutSeconds: this.context.config.timeoutSeconds,
    })

    this.enter('STRUCTURE_DISCOVERY')
    let structure: WebsiteStructure
    try {
      structure = await this.discoverStructure(query)
    } catch (error) {
      this.fail(error)
      throw error
    }

    this.enter('CONTENT_EXTRACTION')
    const fetched = this.checkpoint()
      ? await this.extractContent(this.extractionOrder(structure.pageList, query))
      : new Set<string>()

    this.checkpoint()
    this.enter('CATEGORIZATION')
    const content = this.categorize(structure, fetched, query)

    this.checkpoint()
    this.enter('QUALITY_ASSESSMENT')
    const quality = this.assessQuality(content, structure, query)

    this.enter('COMPILATION')
    return this.compile(query, structure, content, quality)
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Phases
  // ═══════════════════════════════════════════════════════════════════════════

  private async discoverStructure(query: CertificationQuery): Promise<WebsiteStructure> {
    const { config, capability, rateLimiter, runId } = this.context
    const mapper = new StructureMapper({ capability, rateLimiter, logger: loggers.mapper.child({ runId }) })

    return mapper.discover({
      rootUrl: query.officialLink,
      options: {
        maxPages: config.maxPages,
        maxDepth: config.maxDepth,
        timeoutMs: config.crawlTimeoutSeconds * 1000,
        crawl: this.options.crawl,
      },
      search: this.options.search,
      query,
      deadline: {
        remainingMs: () => this.remainingMs(),
        signal: this.deadlineController.signal,
      },
    })
  }

  /**
   * Highest shallow category score first; ties keep map order. Nothing is
   * fetched yet, so only URL, title and description count.
   */
  private extractionOrder(pages: DiscoveredPage[], query: CertificationQuery): DiscoveredPage[] {
    const { categorizer } = this.context

    const ranked = pages.map((page, index) => {
      let score = 0
      try {
        score = categorizer.diagnose(
          { url: page.url, title: page.title, description: page.description, metadata: page.metadata },
          query
        ).decision.score
      } catch (error) {
        this.log.warn('Shallow scoring failed, ranking page with score 0', { url: page.url }, error)
      }
      return { page, index, score }
    })

    ranked.sort((a, b) => b.score - a.score || a.index - b.index)
    return ranked.map(entry => entry.page)
  }

  /**
   * Fetch every page through the bounded pool. Results are written to the
   * page objects by URL, so completion order does not matter.
   *
   * @returns URLs fetched successfully
   */
  private async extractContent(pages: DiscoveredPage[]): Promise<Set<string>> {
    const { capability, rateLimiter, clock, config, runId } = this.context
    const log = loggers.extraction.child({ runId })
    const limit = pLimit(config.maxConcurrentJobs)
    const fetched = new Set<string>()
    let skipped = 0

    const work = async (page: DiscoveredPage): Promise<void> => {
      if (!this.checkpoint()) {
        skipped++
        return
      }

      try {
        await rateLimiter.acquire(this.deadlineController.signal)
      } catch (error) {
        if (!(error instanceof AbortedError)) throw error
        this.markTruncated()
        skipped++
        return
      }
      if (!this.checkpoint()) {
        skipped++
        return
      }

      try {
        const result = await capability.fetch(page.url, { formats: ['markdown', 'html'] })
        if (result.ok) {
          const { metadata, ...body } = result.value
          page.content = body
          page.metadata = { ...page.metadata, ...metadata }
          page.title = page.title || (stringField(metadata, 'title') ?? '')
          page.description = page.description || (stringField(metadata, 'description') ?? '')
          page.fetchedAt = new Date(clock.now())
          fetched.add(page.url)
        } else {
          this.fetchFailures.push({ url: page.url, kind: result.failure.kind, message: result.failure.message })
          log.warn('Page fetch failed', { url: page.url, kind: result.failure.kind, reason: result.failure.message })
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        this.fetchFailures.push({ url: page.url, kind: 'unexpected', message })
        log.error('Page fetch threw', { url: page.url }, error)
      }

      // Checkpoint: the page just fetched is kept either way
      this.checkpoint()
    }

    await Promise.all(pages.map(page => limit(() => work(page))))

    log.info('Content extraction finished', {
      pages: pages.length,
      fetched: fetched.size,
      failed: this.fetchFailures.length,
      skipped,
      truncated: this.truncated,
    })
    return fetched
  }

  private categorize(
    structure: WebsiteStructure,
    fetched: Set<string>,
    query: CertificationQuery
  ): CategorizedContent {
    const { categorizer } = this.context
    const content: CategorizedContent = {}

    for (const page of structure.pageList) {
      if (!fetched.has(page.url)) continue

      let category: CategorizedPage['category'] = UNCATEGORIZED
      let confidence = 0
      try {
        const decision = categorizer.categorize(page, query)
        category = decision.category
        confidence = decision.confidence
      } catch (error) {
        this.log.warn('Categorization failed, leaving page uncategorized', { url: page.url }, error)
      }

      const categorized: CategorizedPage = Object.assign(page, { category, confidence })
      const bucket = content[category] ?? []
      bucket.push(categorized)
      content[category] = bucket
    }

    const pagesByCategory: WebsiteStructure['pagesByCategory'] = {}
    for (const [category, pages] of Object.entries(content)) {
      if (pages && (category === UNCATEGORIZED || isContentCategory(category))) {
        pagesByCategory[category] = pages.map(page => page.url)
      }
    }
    structure.pagesByCategory = pagesByCategory

    return content
  }

  private assessQuality(
    content: CategorizedContent,
    structure: WebsiteStructure,
    query: CertificationQuery
  ): QualityAssessment {
    try {
      return this.context.scorer.assess({
        content,
        structure,
        query,
        truncated: this.truncated,
        fetchFailures: this.fetchFailures,
      })
    } catch (error) {
      this.log.error('Quality assessment failed, reporting zero scores', {}, error)
      return zeroAssessment(structure)
    }
  }

  private compile(
    query: CertificationQuery,
    structure: WebsiteStructure,
    content: CategorizedContent,
    quality: QualityAssessment
  ): DiscoveryResult {
    const violation = findInvariantViolation(structure, content)
    if (violation) {
      const error = new DiscoveryError(ERROR_CODES.INTERNAL_INVARIANT_VIOLATION, violation)
      this.fail(error)
      throw error
    }

    const { clock, runId, startedAt } = this.context
    this.enter('DONE')

    const result: DiscoveryResult = {
      runId,
      query,
      structure,
      content,
      quality,
      discoveryTimestamp: new Date(startedAt),
      truncated: this.truncated,
      degraded: structure.degraded,
      fetchFailures: this.fetchFailures,
      phaseLog: this.phaseLog,
      durationMs: clock.now() - startedAt,
    }

    this.log.info('Discovery completed', {
      totalPages: structure.totalPages,
      overall: quality.overall,
      truncated: result.truncated,
      degraded: result.degraded,
      fetchFailures: this.fetchFailures.length,
      durationMs: result.durationMs,
    })
    return deepFreeze(result)
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // State machine
  // ═══════════════════════════════════════════════════════════════════════════

  private enter(phase: DiscoveryPhase): void {
    const enteredAt = new Date(this.context.clock.now())
    this.log.debug('Phase transition', { from: this.phase, to: phase })
    this.phase = phase
    this.phaseLog.push({ phase, enteredAt })
  }

  private fail(error: unknown): void {
    const classified = classifyError(error)
    this.log.error('Discovery failed', { phase: this.phase, code: classified.code, reason: classified.message })
    this.enter('FAILED')
  }

  /**
   * @returns false once the deadline has passed (and marks the run truncated)
   */
  private checkpoint(): boolean {
    if (!this.deadlinePassed()) return true
    this.markTruncated()
    return false
  }

  private markTruncated(): void {
    if (!this.truncated) {
      this.truncated = true
      this.log.warn('Run deadline reached, truncating', { phase: this.phase })
    }
    this.deadlineController.abort()
  }

  private deadlinePassed(): boolean {
    return this.context.clock.now() >= this.context.deadline
  }

  private remainingMs(): number {
    return this.context.deadline - this.context.clock.now()
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Describe the first broken structural invariant, or null.
 */
export function findInvariantViolation(structure: WebsiteStructure, content: CategorizedContent): string | null {
  const urls = new Set(structure.pageList.map(page => page.url))

  if (urls.size !== structure.pageList.length) {
    return 'pageList contains duplicate URLs'
  }
  if (structure.totalPages !== structure.pageList.length) {
    return `totalPages ${structure.totalPages} does not match pageList length ${structure.pageList.length}`
  }

  for (const [category, categoryUrls] of Object.entries(structure.pagesByCategory)) {
    if (category !== UNCATEGORIZED && !isContentCategory(category)) {
      return `unknown category "${category}"`
    }
    for (const url of categoryUrls ?? []) {
      if (!urls.has(url)) {
        return `category ${category} references ${url}, which is not in pageList`
      }
    }
  }

  for (const [category, pages] of Object.entries(content)) {
    for (const page of pages ?? []) {
      if (page.category !== category) {
        return `page ${page.url} is filed under ${category} but categorized as ${page.category}`
      }
    }
  }

  return null
}

function zeroAssessment(structure: WebsiteStructure): QualityAssessment {
  const breakdown = { relevance: 0, completeness: 0, freshness: 0, accessibility: 0 }
  const { insights, recommendations } = generateInsights({
    breakdown,
    overall: 0,
    missingCategories: [...CONTENT_CATEGORIES],
    degradedReasons: structure.degradedReasons,
    truncated: false,
    fetchFailures: 0,
  })
  return {
    ...breakdown,
    overall: 0,
    insights,
    recommendations,
    metrics: {
      totalPagesDiscovered: structure.totalPages,
      pagesExtracted: 0,
      categoriesFound: 0,
      coveragePercentage: 0,
      depthScore: 0,
    },
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}
