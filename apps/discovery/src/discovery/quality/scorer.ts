/**
 * Discovery Quality Scorer
 *
 * Weighted composite of four independent sub-scores, each 0-100:
 *
 *   relevance      0.35  certification relevance, averaged per category
 *                        then across categories present
 *   completeness   0.30  100/6 per category with enough useful pages
 *   freshness      0.20  fetch age buckets plus recency metadata
 *   accessibility  0.15  HTTPS, content and metadata coverage, plus a bonus
 *                        for a non-degraded structure
 *
 * Sub-scores are rounded to two decimals before the weighted sum, so the
 * reported overall can be recomputed from the reported breakdown.
 */

import type { ILogger } from '@certmap/logger'
import { loggers } from '../../config/logger.js'
import type {
  CategorizedContent,
  CategorizedPage,
  CertificationQuery,
  ContentCategory,
  FetchFailureRecord,
  QualityAssessment,
  QualityDimension,
  QualityMetrics,
  ScoreBreakdown,
  WebsiteStructure,
} from '../types.js'
import { CONTENT_CATEGORIES } from '../types.js'
import { certificationRelevance, maxRelevance, relevanceTerms } from '../categorizer/relevance.js'
import type { SignalWeights } from '../categorizer/signals.js'
import { DEFAULT_SIGNAL_WEIGHTS } from '../categorizer/signals.js'
import { bodyText, buildTextBasis } from '../categorizer/text.js'
import type { Clock } from '../utils/clock.js'
import { systemClock } from '../utils/clock.js'
import { isHttps } from '../utils/url.js'
import { generateInsights } from './insights.js'

export const QUALITY_WEIGHTS: Readonly<Record<QualityDimension, number>> = Object.freeze({
  relevance: 0.35,
  completeness: 0.3,
  freshness: 0.2,
  accessibility: 0.15,
})

const DAY_MS = 24 * 60 * 60 * 1000

/** [max age in days, score], first match wins */
const FRESHNESS_BUCKETS: ReadonlyArray<readonly [number, number]> = [
  [1, 100],
  [7, 90],
  [30, 80],
  [90, 70],
  [365, 60],
]
const STALE_SCORE = 50
const UNKNOWN_AGE_SCORE = 50
const RECENCY_FIELDS = ['lastModified', 'modifiedTime', 'updatedAt', 'dateModified']
const RECENCY_BONUS = 10

const ACCESSIBILITY = {
  https: 35,
  content: 30,
  metadata: 25,
  structuralBonus: 10,
} as const

export interface QualityScorerOptions {
  /** Weights must sum to 1 */
  weights?: Readonly<Record<QualityDimension, number>>
  signalWeights?: SignalWeights
  minPagesPerCategory?: number
  /** Body length that counts as substantial content */
  minBodyLength?: number
  clock?: Clock
  logger?: ILogger
}

export interface QualityInput {
  content: CategorizedContent
  structure: WebsiteStructure
  query: CertificationQuery
  truncated?: boolean
  fetchFailures?: FetchFailureRecord[]
}

export class QualityScorer {
  private readonly weights: Readonly<Record<QualityDimension, number>>
  private readonly signalWeights: SignalWeights
  private readonly minPagesPerCategory: number
  private readonly minBodyLength: number
  private readonly clock: Clock
  private readonly log: ILogger

  constructor(options: QualityScorerOptions = {}) {
    const weights = options.weights ?? QUALITY_WEIGHTS
    const sum = weights.relevance + weights.completeness + weights.freshness + weights.accessibility
    if (Math.abs(sum - 1.0) > 0.001) {
      throw new Error(`Quality weights must sum to 1.0, got ${sum}`)
    }
    this.weights = weights
    this.signalWeights = options.signalWeights ?? DEFAULT_SIGNAL_WEIGHTS
    this.minPagesPerCategory = options.minPagesPerCategory ?? 1
    this.minBodyLength = options.minBodyLength ?? 200
    this.clock = options.clock ?? systemClock
    this.log = options.logger ?? loggers.quality
  }

  assess(input: QualityInput): QualityAssessment {
    const byCategory = contentCategoriesOf(input.content)
    const allPages = Object.values(input.content).flatMap(pages => pages ?? [])

    const breakdown: ScoreBreakdown = {
      relevance: round2(this.relevance(byCategory, input.query)),
      completeness: round2(this.completeness(byCategory)),
      freshness: round2(this.freshness(allPages)),
      accessibility: round2(this.accessibility(allPages, input.structure.degraded)),
    }

    const overall = round2(
      clamp(
        this.weights.relevance * breakdown.relevance +
          this.weights.completeness * breakdown.completeness +
          this.weights.freshness * breakdown.freshness +
          this.weights.accessibility * breakdown.accessibility
      )
    )

    const missingCategories = CONTENT_CATEGORIES.filter(category => byCategory[category].length === 0)
    const { insights, recommendations } = generateInsights({
      breakdown,
      overall,
      missingCategories,
      degradedReasons: input.structure.degradedReasons,
      truncated: input.truncated ?? false,
      fetchFailures: input.fetchFailures?.length ?? 0,
    })

    const assessment: QualityAssessment = {
      ...breakdown,
      overall,
      insights,
      recommendations,
      metrics: this.metrics(byCategory, allPages.length, input.structure.totalPages),
    }

    this.log.info('Quality assessed', { overall, ...breakdown })
    return assessment
  }

  /**
   * Per-page relevance rescaled against the best score the query allows,
   * averaged within each category, then across categories present.
   */
  private relevance(byCategory: Record<ContentCategory, CategorizedPage[]>, query: CertificationQuery): number {
    const terms = relevanceTerms(query)
    const ceiling = maxRelevance(terms, this.signalWeights)
    if (ceiling <= 0) return 0

    const categoryAverages: number[] = []
    for (const category of CONTENT_CATEGORIES) {
      const pages = byCategory[category]
      if (pages.length === 0) continue
      const scores = pages.map(page => {
        const relevance = certificationRelevance(buildTextBasis(page), terms, this.signalWeights)
        return clamp((relevance.score / ceiling) * 100)
      })
      categoryAverages.push(average(scores))
    }

    return categoryAverages.length > 0 ? average(categoryAverages) : 0
  }

  private completeness(byCategory: Record<ContentCategory, CategorizedPage[]>): number {
    const share = 100 / CONTENT_CATEGORIES.length
    let score = 0
    for (const category of CONTENT_CATEGORIES) {
      const pages = byCategory[category]
      if (pages.length >= this.minPagesPerCategory && pages.some(page => this.hasQualityIndicator(page))) {
        score += share
      }
    }
    return clamp(score)
  }

  private freshness(pages: CategorizedPage[]): number {
    if (pages.length === 0) return 0
    const now = this.clock.now()
    return average(pages.map(page => pageFreshness(page, now)))
  }

  private accessibility(pages: CategorizedPage[], degraded: boolean): number {
    if (pages.length === 0) return 0

    const fraction = (predicate: (page: CategorizedPage) => boolean) =>
      pages.filter(predicate).length / pages.length

    const score =
      ACCESSIBILITY.https * fraction(page => isHttps(page.url)) +
      ACCESSIBILITY.content * fraction(page => bodyText(page.content).trim().length > 0) +
      ACCESSIBILITY.metadata * fraction(hasCompleteMetadata) +
      (degraded ? 0 : ACCESSIBILITY.structuralBonus)

    return clamp(score)
  }

  private metrics(
    byCategory: Record<ContentCategory, CategorizedPage[]>,
    pagesExtracted: number,
    totalPagesDiscovered: number
  ): QualityMetrics {
    const present = CONTENT_CATEGORIES.filter(category => byCategory[category].length > 0)

    const depths = present.map(category => {
      const pages = byCategory[category]
      let depth = pages.length >= 5 ? 1 : pages.length >= 3 ? 0.8 : pages.length >= 2 ? 0.6 : 0.4
      for (const page of pages) {
        if (bodyText(page.content).length > 100) depth += 0.1
        if (Object.keys(page.metadata).length > 0) depth += 0.1
      }
      return Math.min(1, depth)
    })

    return {
      totalPagesDiscovered,
      pagesExtracted,
      categoriesFound: present.length,
      coveragePercentage: round2((present.length / CONTENT_CATEGORIES.length) * 100),
      depthScore: depths.length > 0 ? round2(average(depths) * 100) : 0,
    }
  }

  private hasQualityIndicator(page: CategorizedPage): boolean {
    return bodyText(page.content).length >= this.minBodyLength || Object.keys(page.metadata).length > 0
  }
}

/**
 * Age bucket of the fetch time plus a bonus per recency metadata field.
 */
export function pageFreshness(page: Pick<CategorizedPage, 'fetchedAt' | 'metadata'>, now: number): number {
  let score = UNKNOWN_AGE_SCORE
  if (page.fetchedAt) {
    const ageDays = Math.max(0, now - page.fetchedAt.getTime()) / DAY_MS
    score = FRESHNESS_BUCKETS.find(([maxDays]) => ageDays <= maxDays)?.[1] ?? STALE_SCORE
  }

  for (const field of RECENCY_FIELDS) {
    const value = page.metadata[field]
    if (value !== undefined && value !== null && value !== '') {
      score += RECENCY_BONUS
    }
  }

  return Math.min(100, score)
}

function hasCompleteMetadata(page: CategorizedPage): boolean {
  return page.title.trim().length > 0 && page.description.trim().length > 0
}

function contentCategoriesOf(content: CategorizedContent): Record<ContentCategory, CategorizedPage[]> {
  return {
    main_certification_pages: content.main_certification_pages ?? [],
    application_forms: content.application_forms ?? [],
    training_materials: content.training_materials ?? [],
    audit_guidelines: content.audit_guidelines ?? [],
    fee_structures: content.fee_structures ?? [],
    regional_offices: content.regional_offices ?? [],
  }
}

function average(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

function clamp(value: number): number {
  return Math.min(100, Math.max(0, value))
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100
}
