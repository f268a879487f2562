/**
 * Content Categorizer
 *
 * Assigns a page to one of the six content categories by additive,
 * multi-signal scoring:
 *
 *   text patterns (per distinct hit) + exact keywords + URL path patterns
 *   + title patterns + content-type indicators + certification relevance
 *
 * The best score must exceed the threshold, otherwise the page is
 * uncategorized. Equal scores resolve by CATEGORY_PRIORITY, so the outcome
 * depends only on the page and the query.
 */

import type { ILogger } from '@certmap/logger'
import { loggers } from '../../config/logger.js'
import type {
  CertificationQuery,
  ContentCategory,
  PageCategory,
  PageContent,
  PageMetadata,
} from '../types.js'
import { CATEGORY_PRIORITY, CONTENT_CATEGORIES, UNCATEGORIZED } from '../types.js'
import { getPath } from '../utils/url.js'
import type { RelevanceBreakdown } from './relevance.js'
import { certificationRelevance, relevanceTerms } from './relevance.js'
import type { CategoryVocabulary, IndicatorGroup, SignalWeights } from './signals.js'
import {
  CONTENT_TYPE_INDICATORS,
  DEFAULT_CONFIDENCE_CEILING,
  DEFAULT_SIGNAL_WEIGHTS,
  DEFAULT_THRESHOLD,
  DEFAULT_VOCABULARY,
  INDICATOR_GROUPS,
} from './signals.js'
import { buildTextBasis } from './text.js'

export interface CategorizerInput {
  url: string
  title: string
  description: string
  content?: PageContent
  metadata: PageMetadata
}

export interface CategoryDecision {
  category: PageCategory
  /** Best score normalized against the confidence ceiling (0-100) */
  confidence: number
  score: number
}

export interface SignalContributions {
  pattern: number
  keyword: number
  urlPath: number
  title: number
  indicators: number
  relevance: number
}

export interface CategoryDiagnosis {
  score: number
  contributions: SignalContributions
  matchedPatterns: string[]
  matchedKeywords: string[]
  urlPatterns: string[]
  titlePatterns: string[]
}

export interface CategorizationDiagnosis {
  decision: CategoryDecision
  textLength: number
  signalCounts: {
    patternHits: number
    keywordHits: number
    urlHits: number
    titleHits: number
    indicatorGroups: IndicatorGroup[]
  }
  relevance: RelevanceBreakdown
  categories: Record<ContentCategory, CategoryDiagnosis>
}

export interface CategorizerOptions {
  threshold?: number
  confidenceCeiling?: number
  weights?: Partial<SignalWeights>
  vocabulary?: Record<ContentCategory, CategoryVocabulary>
  logger?: ILogger
}

export class ContentCategorizer {
  readonly threshold: number
  readonly confidenceCeiling: number
  readonly weights: SignalWeights
  private readonly vocabulary: Record<ContentCategory, CategoryVocabulary>
  private readonly log: ILogger

  constructor(options: CategorizerOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD
    this.confidenceCeiling = options.confidenceCeiling ?? DEFAULT_CONFIDENCE_CEILING
    if (this.confidenceCeiling <= 0) {
      throw new RangeError(`confidenceCeiling must be positive, got ${this.confidenceCeiling}`)
    }
    this.weights = { ...DEFAULT_SIGNAL_WEIGHTS, ...options.weights }
    this.vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY
    this.log = options.logger ?? loggers.categorizer
  }

  categorize(page: CategorizerInput, query: CertificationQuery): CategoryDecision {
    const decision = this.diagnose(page, query).decision
    this.log.debug('Page categorized', {
      url: page.url,
      category: decision.category,
      score: decision.score,
      confidence: decision.confidence,
    })
    return decision
  }

  /**
   * Full scoring detail. categorize() takes its decision from here, so the
   * two can never disagree.
   */
  diagnose(page: CategorizerInput, query: CertificationQuery): CategorizationDiagnosis {
    const text = buildTextBasis(page)
    const path = getPath(page.url)
    const title = page.title.toLowerCase()

    const relevance = certificationRelevance(text, relevanceTerms(query), this.weights)
    const indicatorGroups = this.indicatorGroupsIn(text)

    const scoreOf = (category: ContentCategory) =>
      this.scoreCategory(category, text, path, title, indicatorGroups, relevance.score)

    const categories: Record<ContentCategory, CategoryDiagnosis> = {
      main_certification_pages: scoreOf('main_certification_pages'),
      application_forms: scoreOf('application_forms'),
      training_materials: scoreOf('training_materials'),
      audit_guidelines: scoreOf('audit_guidelines'),
      fee_structures: scoreOf('fee_structures'),
      regional_offices: scoreOf('regional_offices'),
    }

    let best: ContentCategory = CATEGORY_PRIORITY[0]
    for (const category of CATEGORY_PRIORITY) {
      if (categories[category].score > categories[best].score) {
        best = category
      }
    }

    const score = categories[best].score
    const decision: CategoryDecision = {
      category: score > this.threshold ? best : UNCATEGORIZED,
      confidence: this.toConfidence(score),
      score,
    }

    let patternHits = 0
    let keywordHits = 0
    let urlHits = 0
    let titleHits = 0
    for (const category of CONTENT_CATEGORIES) {
      patternHits += categories[category].matchedPatterns.length
      keywordHits += categories[category].matchedKeywords.length
      urlHits += categories[category].urlPatterns.length
      titleHits += categories[category].titlePatterns.length
    }

    return {
      decision,
      textLength: text.length,
      signalCounts: { patternHits, keywordHits, urlHits, titleHits, indicatorGroups },
      relevance,
      categories,
    }
  }

  describeCategory(category: PageCategory): string {
    if (category === UNCATEGORIZED) {
      return 'Pages without a clear category signal'
    }
    return this.vocabulary[category].description
  }

  listCategories(): ContentCategory[] {
    return [...CONTENT_CATEGORIES]
  }

  private scoreCategory(
    category: ContentCategory,
    text: string,
    path: string,
    title: string,
    indicatorGroups: IndicatorGroup[],
    relevance: number
  ): CategoryDiagnosis {
    const { patterns, keywords } = this.vocabulary[category]

    const matchedPatterns = patterns.filter(pattern => pattern.test(text)).map(pattern => pattern.source)
    const matchedKeywords = keywords.filter(keyword => text.includes(keyword))
    const urlPatterns = path ? patterns.filter(pattern => pattern.test(path)).map(pattern => pattern.source) : []
    const titlePatterns = title ? patterns.filter(pattern => pattern.test(title)).map(pattern => pattern.source) : []

    let indicators = 0
    for (const group of indicatorGroups) {
      const indicator = CONTENT_TYPE_INDICATORS[group]
      if (indicator.categories.includes(category)) {
        indicators += indicator.weight
      }
    }

    const contributions: SignalContributions = {
      pattern: matchedPatterns.length * this.weights.pattern,
      keyword: matchedKeywords.length * this.weights.keyword,
      urlPath: urlPatterns.length * this.weights.urlPath,
      title: titlePatterns.length * this.weights.title,
      indicators,
      relevance,
    }

    const score =
      contributions.pattern +
      contributions.keyword +
      contributions.urlPath +
      contributions.title +
      contributions.indicators +
      contributions.relevance

    return { score, contributions, matchedPatterns, matchedKeywords, urlPatterns, titlePatterns }
  }

  private indicatorGroupsIn(text: string): IndicatorGroup[] {
    const groups: IndicatorGroup[] = []
    for (const group of INDICATOR_GROUPS) {
      if (CONTENT_TYPE_INDICATORS[group].terms.some(term => text.includes(term))) {
        groups.push(group)
      }
    }
    return groups
  }

  private toConfidence(score: number): number {
    const normalized = (score / this.confidenceCeiling) * 100
    return Math.round(Math.min(100, Math.max(0, normalized)) * 100) / 100
  }
}
