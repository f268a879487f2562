/**
 * Discovery Pipeline Core Types
 *
 * Query, page, structure, quality and result shapes shared by the mapper,
 * categorizer, scorer and orchestrator. Also the scraping capability
 * contract the pipeline consumes.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Categories
// ═══════════════════════════════════════════════════════════════════════════════

export const CONTENT_CATEGORIES = [
  'main_certification_pages',
  'application_forms',
  'training_materials',
  'audit_guidelines',
  'fee_structures',
  'regional_offices',
] as const

export type ContentCategory = (typeof CONTENT_CATEGORIES)[number]

/** Fallback for pages whose best score does not clear the threshold */
export const UNCATEGORIZED = 'uncategorized'

export type PageCategory = ContentCategory | typeof UNCATEGORIZED

/**
 * Tie-break order. Earlier wins when two categories score the same.
 */
export const CATEGORY_PRIORITY: readonly ContentCategory[] = [
  'main_certification_pages',
  'application_forms',
  'audit_guidelines',
  'training_materials',
  'fee_structures',
  'regional_offices',
]

export function isContentCategory(value: string): value is ContentCategory {
  return (CONTENT_CATEGORIES as readonly string[]).includes(value)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Query
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Certification descriptor a run starts from. Immutable once validated.
 */
export interface CertificationQuery {
  readonly name: string
  readonly issuingBody: string
  readonly region: string
  /** Absolute http(s) URL of the issuing body's site */
  readonly officialLink: string
  readonly description?: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pages
// ═══════════════════════════════════════════════════════════════════════════════

export type ContentFormat = 'markdown' | 'html' | 'rawHtml'

export interface PageContent {
  markdown?: string
  html?: string
  rawHtml?: string
}

/** Loose key/value page metadata as returned by the scraping service */
export type PageMetadata = Record<string, string | number | boolean | string[] | null>

export type DiscoverySource = 'map' | 'crawl' | 'seed'

/**
 * A page found during structure discovery. Content, fetch time and the
 * category decision are filled in by later phases.
 */
export interface DiscoveredPage {
  /** Normalized URL, unique within a run */
  url: string
  title: string
  description: string
  discoveredBy: DiscoverySource
  content?: PageContent
  metadata: PageMetadata
  fetchedAt?: Date
  category?: PageCategory
  confidence?: number
}

export interface CategorizedPage extends DiscoveredPage {
  category: PageCategory
  confidence: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Structure
// ═══════════════════════════════════════════════════════════════════════════════

export interface DiscoveryOptions {
  /** Page cap for map, crawl and the merged list */
  maxPages: number
  maxDepth: number
  /** Wall-clock budget for the crawl call */
  timeoutMs: number
  /** Set false to skip Phase B entirely */
  crawl?: boolean
}

export type DegradedReason =
  | 'crawl_failed'
  | 'crawl_timeout'
  | 'map_failed'

export interface WebsiteStructure {
  officialUrl: string
  /** Host of the official URL */
  domain: string
  /** eTLD+1 of the official URL */
  registrableDomain: string
  totalPages: number
  pageList: DiscoveredPage[]
  pagesByCategory: Partial<Record<PageCategory, string[]>>
  /** Built without a successful Phase B (or without Phase A) */
  degraded: boolean
  degradedReasons: DegradedReason[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Quality
// ═══════════════════════════════════════════════════════════════════════════════

export interface ScoreBreakdown {
  relevance: number
  completeness: number
  freshness: number
  accessibility: number
}

export type QualityDimension = keyof ScoreBreakdown

export interface QualityInsights {
  strengths: string[]
  weaknesses: string[]
  opportunities: string[]
  threats: string[]
}

export interface QualityMetrics {
  totalPagesDiscovered: number
  pagesExtracted: number
  categoriesFound: number
  /** Share of the six categories with at least one page (0-100) */
  coveragePercentage: number
  /** Page-count and richness score over categories present (0-100) */
  depthScore: number
}

export interface QualityAssessment extends ScoreBreakdown {
  overall: number
  insights: QualityInsights
  recommendations: string[]
  metrics: QualityMetrics
}

// ═══════════════════════════════════════════════════════════════════════════════
// Orchestration
// ═══════════════════════════════════════════════════════════════════════════════

export type DiscoveryPhase =
  | 'STRUCTURE_DISCOVERY'
  | 'CONTENT_EXTRACTION'
  | 'CATEGORIZATION'
  | 'QUALITY_ASSESSMENT'
  | 'COMPILATION'
  | 'DONE'
  | 'FAILED'

export interface PhaseTransition {
  phase: DiscoveryPhase
  enteredAt: Date
}

export interface FetchFailureRecord {
  url: string
  /** 'unexpected' when the fetch threw instead of returning a failure */
  kind: CapabilityFailureKind | 'unexpected'
  message: string
}

export type CategorizedContent = Partial<Record<PageCategory, CategorizedPage[]>>

export interface DiscoveryResult {
  readonly runId: string
  readonly query: CertificationQuery
  readonly structure: WebsiteStructure
  readonly content: CategorizedContent
  readonly quality: QualityAssessment
  readonly discoveryTimestamp: Date
  /** Overall deadline passed before all pages were fetched */
  readonly truncated: boolean
  readonly degraded: boolean
  readonly fetchFailures: FetchFailureRecord[]
  readonly phaseLog: PhaseTransition[]
  readonly durationMs: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Scraping Capability
// ═══════════════════════════════════════════════════════════════════════════════

export type CapabilityFailureKind =
  | 'network'
  | 'http'
  | 'timeout'
  | 'aborted'
  | 'invalid_response'

export interface CapabilityFailure {
  kind: CapabilityFailureKind
  message: string
  statusCode?: number
}

/**
 * Explicit success/failure for every outbound call.
 */
export type CapabilityResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: CapabilityFailure }

export interface MapLink {
  url: string
  title?: string
  description?: string
}

export interface MapRequest {
  search?: string
  limit: number
  signal?: AbortSignal
}

export interface CrawlRequest {
  limit: number
  maxDepth: number
  includePaths: string[]
  excludePaths: string[]
  signal?: AbortSignal
}

export interface PageSummary {
  url: string
  title?: string
  description?: string
  markdown?: string
  metadata?: PageMetadata
}

export interface FetchRequest {
  formats: ContentFormat[]
  signal?: AbortSignal
}

export interface FetchedContent extends PageContent {
  metadata: PageMetadata
}

/**
 * The external scraping/mapping service. Implementations do not rate limit;
 * callers acquire a slot first.
 */
export interface ScrapingCapability {
  map(url: string, request: MapRequest): Promise<CapabilityResult<MapLink[]>>
  crawl(url: string, request: CrawlRequest): Promise<CapabilityResult<PageSummary[]>>
  fetch(url: string, request: FetchRequest): Promise<CapabilityResult<FetchedContent>>
}

export function success<T>(value: T): CapabilityResult<T> {
  return { ok: true, value }
}

export function failure<T>(kind: CapabilityFailureKind, message: string, statusCode?: number): CapabilityResult<T> {
  return statusCode === undefined
    ? { ok: false, failure: { kind, message } }
    : { ok: false, failure: { kind, message, statusCode } }
}
