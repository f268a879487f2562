/**
 * Result export
 *
 * Snake-case export document (the shape downstream extraction tooling
 * reads), its JSON text, and a compact summary for the CLI.
 */

import type { CategorizedPage, DiscoveryResult, PageCategory, ScoreBreakdown } from './types.js'
import { UNCATEGORIZED, isContentCategory } from './types.js'
import { bodyText, collapseWhitespace } from './categorizer/text.js'

export const EXCERPT_LENGTH = 500

export interface ExportedPage {
  url: string
  title: string
  category: PageCategory
  confidence: number
  content_excerpt: string
}

export interface ExportDocument {
  certification_name: string
  issuing_body: string
  region: string
  discovery_timestamp: string
  website_structure: {
    official_url: string
    domain: string
    total_pages: number
    page_categories: Partial<Record<PageCategory, string[]>>
  }
  discovered_content: Partial<Record<PageCategory, ExportedPage[]>>
  quality_metrics: {
    overall_score: number
    score_breakdown: ScoreBreakdown
    insights: DiscoveryResult['quality']['insights']
    recommendations: string[]
  }
  diagnostics: {
    run_id: string
    truncated: boolean
    degraded: boolean
    degraded_reasons: string[]
    fetch_failures: number
    duration_ms: number
  }
}

export function toExportDocument(result: DiscoveryResult): ExportDocument {
  const discovered: Partial<Record<PageCategory, ExportedPage[]>> = {}
  for (const [category, pages] of categoryEntries(result)) {
    discovered[category] = pages.map(exportPage)
  }

  const { quality, structure } = result
  return {
    certification_name: result.query.name,
    issuing_body: result.query.issuingBody,
    region: result.query.region,
    discovery_timestamp: result.discoveryTimestamp.toISOString(),
    website_structure: {
      official_url: structure.officialUrl,
      domain: structure.domain,
      total_pages: structure.totalPages,
      page_categories: structure.pagesByCategory,
    },
    discovered_content: discovered,
    quality_metrics: {
      overall_score: quality.overall,
      score_breakdown: {
        relevance: quality.relevance,
        completeness: quality.completeness,
        freshness: quality.freshness,
        accessibility: quality.accessibility,
      },
      insights: quality.insights,
      recommendations: quality.recommendations,
    },
    diagnostics: {
      run_id: result.runId,
      truncated: result.truncated,
      degraded: result.degraded,
      degraded_reasons: structure.degradedReasons,
      fetch_failures: result.fetchFailures.length,
      duration_ms: result.durationMs,
    },
  }
}

export function exportJson(result: DiscoveryResult): string {
  return JSON.stringify(toExportDocument(result), null, 2)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════════

export interface DiscoverySummary {
  certification: { name: string; issuingBody: string; region: string }
  stats: {
    totalPagesDiscovered: number
    /** Fetched pages that cleared the category threshold */
    relevantPagesFound: number
    categoriesFound: number
    durationSeconds: number
  }
  /** Page count per category present */
  contentSummary: Partial<Record<PageCategory, number>>
  qualityScore: number
  discoveryTimestamp: string
  truncated: boolean
  degraded: boolean
}

export function summarize(result: DiscoveryResult): DiscoverySummary {
  const contentSummary: Partial<Record<PageCategory, number>> = {}
  let relevantPagesFound = 0
  for (const [category, pages] of categoryEntries(result)) {
    contentSummary[category] = pages.length
    if (category !== UNCATEGORIZED) relevantPagesFound += pages.length
  }

  return {
    certification: {
      name: result.query.name,
      issuingBody: result.query.issuingBody,
      region: result.query.region,
    },
    stats: {
      totalPagesDiscovered: result.structure.totalPages,
      relevantPagesFound,
      categoriesFound: result.quality.metrics.categoriesFound,
      durationSeconds: Math.round(result.durationMs / 10) / 100,
    },
    contentSummary,
    qualityScore: result.quality.overall,
    discoveryTimestamp: result.discoveryTimestamp.toISOString(),
    truncated: result.truncated,
    degraded: result.degraded,
  }
}

function exportPage(page: CategorizedPage): ExportedPage {
  return {
    url: page.url,
    title: page.title,
    category: page.category,
    confidence: page.confidence,
    content_excerpt: collapseWhitespace(bodyText(page.content)).slice(0, EXCERPT_LENGTH),
  }
}

function categoryEntries(result: DiscoveryResult): Array<[PageCategory, CategorizedPage[]]> {
  const entries: Array<[PageCategory, CategorizedPage[]]> = []
  for (const [category, pages] of Object.entries(result.content)) {
    if (pages && (category === UNCATEGORIZED || isContentCategory(category))) {
      entries.push([category, pages])
    }
  }
  return entries
}
