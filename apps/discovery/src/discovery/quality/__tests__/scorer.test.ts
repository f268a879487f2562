import { describe, it, expect } from 'vitest'
import { QualityScorer, QUALITY_WEIGHTS, pageFreshness, round2 } from '../scorer.js'
import { ManualClock } from '../../utils/clock.js'
import type {
  CategorizedContent,
  CategorizedPage,
  CertificationQuery,
  WebsiteStructure,
} from '../../types.js'

const NOW = Date.parse('2026-03-01T00:00:00Z')
const HOUR = 60 * 60 * 1000
const DAY = 24 * HOUR

const query: CertificationQuery = {
  name: 'Zeta Permit',
  issuingBody: 'Bureau of Trade',
  region: 'Atlantis',
  officialLink: 'https://x.gov',
}

function page(overrides: Partial<CategorizedPage> & Pick<CategorizedPage, 'url' | 'category'>): CategorizedPage {
  return {
    title: '',
    description: '',
    discoveredBy: 'map',
    metadata: {},
    confidence: 50,
    ...overrides,
  }
}

function structure(pages: CategorizedPage[], degradedReasons: WebsiteStructure['degradedReasons'] = []): WebsiteStructure {
  return {
    officialUrl: 'https://x.gov/',
    domain: 'x.gov',
    registrableDomain: 'x.gov',
    totalPages: pages.length,
    pageList: pages,
    pagesByCategory: {},
    degraded: degradedReasons.length > 0,
    degradedReasons,
  }
}

const feesPage = page({
  url: 'https://x.gov/fees',
  category: 'fee_structures',
  title: 'Fees',
  description: 'Zeta Permit fees',
  content: { markdown: 'Fees for the Zeta Permit in Atlantis' },
  metadata: { lastModified: '2026-01-01' },
  fetchedAt: new Date(NOW - 2 * HOUR),
})

const applyPage = page({
  url: 'http://x.gov/apply',
  category: 'application_forms',
  title: 'Apply',
  content: { markdown: '' },
})

const content: CategorizedContent = {
  fee_structures: [feesPage],
  application_forms: [applyPage],
}

describe('QualityScorer', () => {
  const scorer = new QualityScorer({ clock: new ManualClock(NOW) })

  it('computes each sub-score and the weighted overall', () => {
    const assessment = scorer.assess({ content, structure: structure([feesPage, applyPage]), query })

    // relevance: fees page 7/9, apply page 0, averaged per category
    expect(assessment.relevance).toBe(38.89)
    // only the fee category has a quality indicator (metadata)
    expect(assessment.completeness).toBe(16.67)
    // fees: 100 (capped after recency bonus), apply: no timestamp 50
    expect(assessment.freshness).toBe(75)
    // 35*0.5 + 30*0.5 + 25*0.5 + 10
    expect(assessment.accessibility).toBe(55)
    expect(assessment.overall).toBe(41.86)
  })

  it('reports overall as the weighted sum of the reported sub-scores', () => {
    const assessment = scorer.assess({ content, structure: structure([feesPage, applyPage]), query })

    const recomputed =
      QUALITY_WEIGHTS.relevance * assessment.relevance +
      QUALITY_WEIGHTS.completeness * assessment.completeness +
      QUALITY_WEIGHTS.freshness * assessment.freshness +
      QUALITY_WEIGHTS.accessibility * assessment.accessibility

    expect(Math.abs(assessment.overall - recomputed)).toBeLessThanOrEqual(0.005)
    expect(assessment.overall).toBeGreaterThanOrEqual(0)
    expect(assessment.overall).toBeLessThanOrEqual(100)
  })

  it('keeps overall within bounds for saturated input', () => {
    const rich = (category: CategorizedPage['category'], url: string) =>
      page({
        url,
        category,
        title: 'Zeta Permit',
        description: 'Bureau of Trade, Atlantis',
        content: { markdown: 'Zeta Permit '.repeat(30) },
        metadata: { updatedAt: '2026-02-28', dateModified: '2026-02-28' },
        fetchedAt: new Date(NOW),
      })
    const pages = [
      rich('main_certification_pages', 'https://x.gov/1'),
      rich('application_forms', 'https://x.gov/2'),
      rich('training_materials', 'https://x.gov/3'),
      rich('audit_guidelines', 'https://x.gov/4'),
      rich('fee_structures', 'https://x.gov/5'),
      rich('regional_offices', 'https://x.gov/6'),
    ]
    const full: CategorizedContent = {}
    for (const p of pages) {
      full[p.category] = [p]
    }

    const assessment = scorer.assess({ content: full, structure: structure(pages), query })

    expect(assessment).toMatchObject({
      relevance: 100,
      completeness: 100,
      freshness: 100,
      accessibility: 100,
      overall: 100,
    })
    expect(assessment.insights.strengths).toHaveLength(4)
    expect(assessment.insights.opportunities).toEqual([])
    expect(assessment.recommendations).toEqual([
      'Discovery quality is good - consider moving to content extraction phase',
      'Monitor for content updates and changes',
    ])
  })

  it('drops the structural bonus for a degraded structure', () => {
    const assessment = scorer.assess({
      content,
      structure: structure([feesPage, applyPage], ['crawl_timeout']),
      query,
    })

    expect(assessment.accessibility).toBe(45)
    expect(assessment.insights.threats).toEqual([
      'Website structure is incomplete because the crawl timed out',
    ])
  })

  it('scores zero across the board with no pages', () => {
    const assessment = scorer.assess({ content: {}, structure: structure([]), query })

    expect(assessment).toMatchObject({
      relevance: 0,
      completeness: 0,
      freshness: 0,
      accessibility: 0,
      overall: 0,
    })
    expect(assessment.insights.opportunities).toHaveLength(6)
    expect(assessment.metrics).toEqual({
      totalPagesDiscovered: 0,
      pagesExtracted: 0,
      categoriesFound: 0,
      coveragePercentage: 0,
      depthScore: 0,
    })
  })

  it('generates insights and recommendations from the scores', () => {
    const assessment = scorer.assess({
      content,
      structure: structure([feesPage, applyPage]),
      query,
      truncated: true,
      fetchFailures: [{ url: 'https://x.gov/gone', kind: 'http', message: 'HTTP 404: Not Found' }],
    })

    expect(assessment.insights).toEqual({
      strengths: [],
      weaknesses: ['Relevance is low (38.89/100)', 'Completeness is low (16.67/100)'],
      opportunities: [
        'No main_certification_pages pages found; a targeted search may surface them',
        'No training_materials pages found; a targeted search may surface them',
        'No audit_guidelines pages found; a targeted search may surface them',
        'No regional_offices pages found; a targeted search may surface them',
      ],
      threats: [
        'Run reached its deadline before every page was fetched',
        '1 page(s) could not be fetched',
      ],
    })
    expect(assessment.recommendations).toEqual([
      'Consider re-running discovery with different parameters',
      'Verify website accessibility and availability',
      'Check for website structure changes',
      'Review and refine content categorization for better relevance',
      'Increase crawling depth to discover missing content categories',
    ])
  })

  it('reports coverage and depth metrics', () => {
    const assessment = scorer.assess({ content, structure: structure([feesPage, applyPage]), query })

    expect(assessment.metrics).toEqual({
      totalPagesDiscovered: 2,
      pagesExtracted: 2,
      categoriesFound: 2,
      coveragePercentage: 33.33,
      depthScore: 45,
    })
  })

  it('rejects weights that do not sum to 1', () => {
    expect(
      () =>
        new QualityScorer({
          weights: { relevance: 0.5, completeness: 0.3, freshness: 0.2, accessibility: 0.15 },
        })
    ).toThrow('Quality weights must sum to 1.0')
  })
})

describe('pageFreshness', () => {
  it('buckets by fetch age', () => {
    expect(pageFreshness({ fetchedAt: new Date(NOW - 12 * HOUR), metadata: {} }, NOW)).toBe(100)
    expect(pageFreshness({ fetchedAt: new Date(NOW - 3 * DAY), metadata: {} }, NOW)).toBe(90)
    expect(pageFreshness({ fetchedAt: new Date(NOW - 20 * DAY), metadata: {} }, NOW)).toBe(80)
    expect(pageFreshness({ fetchedAt: new Date(NOW - 60 * DAY), metadata: {} }, NOW)).toBe(70)
    expect(pageFreshness({ fetchedAt: new Date(NOW - 200 * DAY), metadata: {} }, NOW)).toBe(60)
    expect(pageFreshness({ fetchedAt: new Date(NOW - 400 * DAY), metadata: {} }, NOW)).toBe(50)
  })

  it('scores a missing timestamp neutrally and adds recency metadata', () => {
    expect(pageFreshness({ metadata: {} }, NOW)).toBe(50)
    expect(pageFreshness({ metadata: { modifiedTime: '2026-02-01', updatedAt: '2026-02-02' } }, NOW)).toBe(70)
    expect(pageFreshness({ metadata: { lastModified: '' } }, NOW)).toBe(50)
  })
})

describe('round2', () => {
  it('rounds to two decimals', () => {
    expect(round2(100 / 6)).toBe(16.67)
    expect(round2(77.7777)).toBe(77.78)
  })
})
