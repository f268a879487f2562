/**
 * Rule-based quality insights. Same numbers in, same text out.
 */

import type {
  ContentCategory,
  DegradedReason,
  QualityDimension,
  QualityInsights,
  ScoreBreakdown,
} from '../types.js'

export const WEAKNESS_BELOW = 50
export const STRENGTH_ABOVE = 85

const DIMENSIONS: readonly QualityDimension[] = ['relevance', 'completeness', 'freshness', 'accessibility']

const LABELS: Record<QualityDimension, string> = {
  relevance: 'Relevance',
  completeness: 'Completeness',
  freshness: 'Freshness',
  accessibility: 'Accessibility',
}

const DIMENSION_RECOMMENDATIONS: Record<QualityDimension, string> = {
  relevance: 'Review and refine content categorization for better relevance',
  completeness: 'Increase crawling depth to discover missing content categories',
  freshness: 'Implement regular content freshness monitoring',
  accessibility: 'Check for website access restrictions or technical issues',
}

const DEGRADED_REASON_TEXT: Record<DegradedReason, string> = {
  crawl_failed: 'the crawl failed',
  crawl_timeout: 'the crawl timed out',
  map_failed: 'the site map failed',
}

export interface InsightInput {
  breakdown: ScoreBreakdown
  overall: number
  missingCategories: ContentCategory[]
  degradedReasons: DegradedReason[]
  truncated: boolean
  fetchFailures: number
}

export interface InsightOutput {
  insights: QualityInsights
  recommendations: string[]
}

export function generateInsights(input: InsightInput): InsightOutput {
  const insights: QualityInsights = {
    strengths: [],
    weaknesses: [],
    opportunities: [],
    threats: [],
  }
  const recommendations = overallRecommendations(input.overall)

  for (const dimension of DIMENSIONS) {
    const score = input.breakdown[dimension]
    if (score < WEAKNESS_BELOW) {
      insights.weaknesses.push(`${LABELS[dimension]} is low (${score}/100)`)
      recommendations.push(DIMENSION_RECOMMENDATIONS[dimension])
    } else if (score > STRENGTH_ABOVE) {
      insights.strengths.push(`${LABELS[dimension]} is strong (${score}/100)`)
    }
  }

  for (const category of input.missingCategories) {
    insights.opportunities.push(`No ${category} pages found; a targeted search may surface them`)
  }

  if (input.degradedReasons.length > 0) {
    const reasons = input.degradedReasons.map(reason => DEGRADED_REASON_TEXT[reason]).join(' and ')
    insights.threats.push(`Website structure is incomplete because ${reasons}`)
  }
  if (input.truncated) {
    insights.threats.push('Run reached its deadline before every page was fetched')
  }
  if (input.fetchFailures > 0) {
    insights.threats.push(`${input.fetchFailures} page(s) could not be fetched`)
  }

  return { insights, recommendations }
}

function overallRecommendations(overall: number): string[] {
  if (overall < 50) {
    return [
      'Consider re-running discovery with different parameters',
      'Verify website accessibility and availability',
      'Check for website structure changes',
    ]
  }
  if (overall < 75) {
    return [
      'Expand crawling depth for better coverage',
      'Add more specific search terms for content discovery',
      'Consider manual review of discovered content',
    ]
  }
  return [
    'Discovery quality is good - consider moving to content extraction phase',
    'Monitor for content updates and changes',
  ]
}
