/**
 * Website Structure Mapper
 *
 * Builds the deduplicated page list a discovery run works on:
 *
 *   Phase A  broad map of the site (no search filter), plus an optional
 *            filtered map whose failure is ignored
 *   Phase B  path-filtered crawl, bounded by depth, page count and a
 *            wall-clock timeout
 *
 * Phase B failing falls back to Phase A (degraded). Both failing means the
 * site cannot be mapped at all, which ends the run. A capability call that
 * throws counts as that call failing. Once the run deadline passes, the
 * filtered map and the crawl are not started.
 */

import type { ILogger } from '@certmap/logger'
import { loggers } from '../../config/logger.js'
import { DiscoveryError, ERROR_CODES } from '../errors.js'
import type { RateLimiter } from '../fetch/rate-limiter.js'
import { AbortedError } from '../utils/clock.js'
import type {
  CapabilityResult,
  CertificationQuery,
  DegradedReason,
  DiscoveredPage,
  DiscoveryOptions,
  DiscoverySource,
  PageMetadata,
  PageSummary,
  ScrapingCapability,
  WebsiteStructure,
} from '../types.js'
import { failure } from '../types.js'
import { issuingBodyAcronyms, issuingBodyKeywords } from '../categorizer/relevance.js'
import {
  getHost,
  getRegistrableDomain,
  isSameSite,
  isValidUrl,
  normalizeUrl,
  tryNormalizeUrl,
} from '../utils/url.js'

/** Path stems a certification site uses for the pages worth crawling */
export const CRAWL_PATH_STEMS: readonly string[] = [
  'certif', 'licen', 'regist', 'approv', 'accred', 'standar', 'complian', 'regulat', 'requir',
  'form', 'applic', 'submi', 'enroll', 'download', 'apply',
  'train', 'educat', 'learn', 'course', 'workshop', 'seminar', 'qualif', 'skill',
  'audit', 'inspect', 'assess', 'evaluat', 'review', 'check', 'verif', 'validat',
  'fee', 'cost', 'price', 'charg', 'payment', 'billing', 'tariff',
  'office', 'branch', 'locat', 'address', 'region',
]

export const EXCLUDED_PATHS: readonly string[] = [
  '.*/news/.*',
  '.*/press/.*',
  '.*/events/.*',
  '.*/blog/.*',
  '.*/about/.*',
  '.*/contact/.*',
  '.*/privacy/.*',
  '.*/terms/.*',
  '.*/sitemap.*',
  '.*/robots.*',
  '.*/404.*',
  '.*/error.*',
]

const GENERIC_SEARCH_TERMS = ['certification', 'license', 'registration', 'approval', 'compliance']
const MAX_SEARCH_TERMS = 10

export interface StructureRequest {
  rootUrl: string
  options: DiscoveryOptions
  /** Extra filtered map call; its failure is ignored */
  search?: string
  /** Adds name and issuing-body acronyms to the crawl's include paths */
  query?: Pick<CertificationQuery, 'name' | 'issuingBody'>
  deadline?: StructureDeadline
}

export interface StructureDeadline {
  /** Milliseconds left in the run; no call starts at 0 or below */
  remainingMs(): number
  /** Aborts rate-limiter waits when the deadline passes */
  signal?: AbortSignal
}

export interface StructureMapperDeps {
  capability: ScrapingCapability
  rateLimiter: RateLimiter
  logger?: ILogger
}

/** A capability result, or the error a call threw instead of returning one */
type CallOutcome<T> = CapabilityResult<T> | { ok: false; failure: { kind: 'unexpected'; message: string } }

export class StructureMapper {
  private readonly capability: ScrapingCapability
  private readonly rateLimiter: RateLimiter
  private readonly log: ILogger

  constructor(deps: StructureMapperDeps) {
    this.capability = deps.capability
    this.rateLimiter = deps.rateLimiter
    this.log = deps.logger ?? loggers.mapper
  }

  /**
   * @throws DiscoveryError STRUCTURE_UNAVAILABLE when no mapping call succeeds
   */
  async discover(request: StructureRequest): Promise<WebsiteStructure> {
    const { options } = request
    const officialUrl = normalizeUrl(request.rootUrl)
    const registrableDomain = getRegistrableDomain(officialUrl)
    const pages = new Map<string, DiscoveredPage>()
    const degradedReasons: DegradedReason[] = []

    const addPage = (
      url: string,
      source: DiscoverySource,
      title?: string,
      description?: string,
      metadata?: PageMetadata
    ) => {
      const key = tryNormalizeUrl(url, officialUrl)
      if (!key || !isValidUrl(key) || !isSameSite(key, registrableDomain)) {
        return
      }
      const existing = pages.get(key)
      if (existing) {
        mergeRicher(existing, title, description, metadata)
        return
      }
      pages.set(key, {
        url: key,
        title: title?.trim() ?? '',
        description: description?.trim() ?? '',
        discoveredBy: source,
        metadata: { ...(metadata ?? {}) },
      })
    }

    const remainingMs = () => request.deadline?.remainingMs() ?? Number.POSITIVE_INFINITY
    const signal = request.deadline?.signal

    // Phase A: broad map
    const mapped = await this.call('Site map', officialUrl, signal, () =>
      this.capability.map(officialUrl, { limit: options.maxPages })
    )
    if (mapped.ok) {
      for (const link of mapped.value) {
        addPage(link.url, 'map', link.title, link.description)
      }
      this.log.info('Site map completed', { url: officialUrl, links: mapped.value.length })
    } else {
      degradedReasons.push('map_failed')
      this.log.warn('Site map failed', {
        url: officialUrl,
        kind: mapped.failure.kind,
        reason: mapped.failure.message,
      })
    }

    if (request.search && remainingMs() <= 0) {
      this.log.warn('Run deadline reached, skipping filtered site map', { url: officialUrl })
    } else if (request.search) {
      const search = request.search
      const filtered = await this.call('Filtered site map', officialUrl, signal, () =>
        this.capability.map(officialUrl, { search, limit: options.maxPages })
      )
      if (filtered.ok) {
        for (const link of filtered.value) {
          addPage(link.url, 'map', link.title, link.description)
        }
      } else {
        this.log.warn('Filtered site map failed, ignoring', {
          url: officialUrl,
          search,
          reason: filtered.failure.message,
        })
      }
    }

    // Phase B: filtered crawl
    let crawlSucceeded = false
    if (options.crawl !== false && remainingMs() <= 0) {
      this.log.warn('Run deadline reached, skipping crawl', { url: officialUrl })
    } else if (options.crawl !== false) {
      const crawled = await this.crawlWithTimeout(officialUrl, request, remainingMs, signal)
      if (crawled.ok) {
        crawlSucceeded = true
        for (const summary of crawled.value) {
          addPage(summary.url, 'crawl', summary.title, summary.description, summary.metadata)
        }
        this.log.info('Crawl completed', { url: officialUrl, pages: crawled.value.length })
      } else {
        degradedReasons.push(crawled.failure.kind === 'timeout' ? 'crawl_timeout' : 'crawl_failed')
        this.log.warn('Crawl failed, falling back to map results', {
          url: officialUrl,
          kind: crawled.failure.kind,
          reason: crawled.failure.message,
        })
      }
    }

    if (!mapped.ok && !crawlSucceeded) {
      throw new DiscoveryError(
        ERROR_CODES.STRUCTURE_UNAVAILABLE,
        `Could not map ${officialUrl}: ${mapped.failure.message}`,
        { url: officialUrl, degradedReasons }
      )
    }

    if (pages.size === 0) {
      addPage(officialUrl, 'seed')
    }

    const pageList = [...pages.values()].slice(0, options.maxPages)
    const structure: WebsiteStructure = {
      officialUrl,
      domain: getHost(officialUrl),
      registrableDomain,
      totalPages: pageList.length,
      pageList,
      pagesByCategory: {},
      degraded: degradedReasons.length > 0,
      degradedReasons,
    }

    this.log.info('Website structure built', {
      url: officialUrl,
      totalPages: structure.totalPages,
      degraded: structure.degraded,
      degradedReasons,
    })
    return structure
  }

  /**
   * Bounded by the crawl timeout or what is left of the run, whichever is
   * shorter, measured from when the crawl actually starts.
   */
  private crawlWithTimeout(
    url: string,
    request: StructureRequest,
    remainingMs: () => number,
    signal?: AbortSignal
  ): Promise<CallOutcome<PageSummary[]>> {
    const { options } = request

    return this.call('Crawl', url, signal, async () => {
      const timeoutMs = Math.max(0, Math.min(options.timeoutMs, remainingMs()))
      const controller = new AbortController()
      let timer: ReturnType<typeof setTimeout> | undefined
      const timedOut = new Promise<CapabilityResult<PageSummary[]>>(resolve => {
        timer = setTimeout(() => {
          controller.abort()
          resolve(failure('timeout', `Crawl exceeded ${timeoutMs}ms`))
        }, timeoutMs)
      })

      try {
        return await Promise.race([
          this.capability.crawl(url, {
            limit: options.maxPages,
            maxDepth: options.maxDepth,
            includePaths: buildIncludePaths(request.query),
            excludePaths: [...EXCLUDED_PATHS],
            signal: controller.signal,
          }),
          timedOut,
        ])
      } finally {
        clearTimeout(timer)
      }
    })
  }

  /**
   * Take a rate-limiter slot, then make the call. A throw from either comes
   * back as a failure.
   */
  private async call<T>(
    operation: string,
    url: string,
    signal: AbortSignal | undefined,
    invoke: () => Promise<CapabilityResult<T>>
  ): Promise<CallOutcome<T>> {
    try {
      await this.rateLimiter.acquire(signal)
      return await invoke()
    } catch (error) {
      if (error instanceof AbortedError) {
        return failure<T>('aborted', `${operation} not started: ${error.message}`)
      }
      const message = error instanceof Error ? error.message : String(error)
      this.log.error(`${operation} threw`, { url }, error)
      return { ok: false, failure: { kind: 'unexpected', message } }
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Crawl filters and search terms
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Include-path regexes for the crawl: category stems, the certification name
 * (spaces as wildcards and as hyphens) and issuing-body acronyms.
 */
export function buildIncludePaths(query?: Pick<CertificationQuery, 'name' | 'issuingBody'>): string[] {
  const paths = CRAWL_PATH_STEMS.map(stem => `.*${stem}.*`)

  if (query) {
    const words = query.name.trim().toLowerCase().split(/\s+/).filter(Boolean).map(escapeRegExp)
    if (words.length > 0) {
      paths.push(`.*${words.join('.*')}.*`, `.*${words.join('-')}.*`)
    }
    for (const acronym of issuingBodyAcronyms(query.issuingBody)) {
      paths.push(`.*${escapeRegExp(acronym)}.*`)
    }
  }

  return [...new Set(paths)]
}

/**
 * Search term for the filtered map: name parts, issuing-body acronyms and
 * words, then generic certification terms.
 */
export function buildSearchTerm(query: Pick<CertificationQuery, 'name' | 'issuingBody'>): string {
  const nameParts = query.name
    .split(/[/\-\s]+/)
    .filter(part => part.length > 2)
    .map(part => part.toLowerCase())

  const unique = new Set([
    ...nameParts,
    ...issuingBodyAcronyms(query.issuingBody),
    ...issuingBodyKeywords(query.issuingBody),
    ...GENERIC_SEARCH_TERMS,
  ])
  return [...unique].slice(0, MAX_SEARCH_TERMS).join(' ')
}

function mergeRicher(page: DiscoveredPage, title?: string, description?: string, metadata?: PageMetadata): void {
  if (title?.trim()) page.title = title.trim()
  if (description?.trim()) page.description = description.trim()
  if (metadata) {
    for (const [key, value] of Object.entries(metadata)) {
      if (value !== null && value !== '' && !(Array.isArray(value) && value.length === 0)) {
        page.metadata[key] = value
      }
    }
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
