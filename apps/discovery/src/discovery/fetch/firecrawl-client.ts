/**
 * Firecrawl Scraping Capability
 *
 * Implements map / crawl / fetch against the Firecrawl v1 REST API using the
 * native fetch API. Transient failures (429, 5xx, network) are retried with
 * exponential backoff; every call resolves to an explicit CapabilityResult.
 *
 * Rate limiting is the caller's job: acquire a slot before each call.
 */

import { z } from 'zod'
import type { ILogger } from '@certmap/logger'
import { loggers } from '../../config/logger.js'
import type {
  CapabilityResult,
  CrawlRequest,
  FetchedContent,
  FetchRequest,
  MapLink,
  MapRequest,
  PageMetadata,
  PageSummary,
  ScrapingCapability,
} from '../types.js'
import { failure, success } from '../types.js'
import type { Clock } from '../utils/clock.js'
import { AbortedError, systemClock } from '../utils/clock.js'

export const DEFAULT_FIRECRAWL_BASE_URL = 'https://api.firecrawl.dev'

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  retryableStatusCodes: number[]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

export interface FirecrawlClientOptions {
  apiKey: string
  baseUrl?: string
  retryPolicy?: RetryPolicy
  /** Per-request timeout (default: 60s) */
  requestTimeoutMs?: number
  /** Delay between crawl status polls (default: 2s) */
  pollIntervalMs?: number
  clock?: Clock
  logger?: ILogger
}

// ═══════════════════════════════════════════════════════════════════════════════
// Response schemas
// ═══════════════════════════════════════════════════════════════════════════════

const rawMetadataSchema = z.record(z.unknown())

const documentSchema = z.object({
  markdown: z.string().nullish(),
  html: z.string().nullish(),
  rawHtml: z.string().nullish(),
  metadata: rawMetadataSchema.nullish(),
})

const mapResponseSchema = z.object({
  success: z.boolean(),
  links: z
    .array(
      z.union([
        z.string(),
        z.object({
          url: z.string(),
          title: z.string().nullish(),
          description: z.string().nullish(),
        }),
      ])
    )
    .default([]),
  error: z.string().nullish(),
})

const scrapeResponseSchema = z.object({
  success: z.boolean(),
  data: documentSchema.nullish(),
  error: z.string().nullish(),
})

const crawlStartSchema = z.object({
  success: z.boolean(),
  id: z.string().nullish(),
  error: z.string().nullish(),
})

const crawlStatusSchema = z.object({
  status: z.string(),
  data: z.array(documentSchema).default([]),
  next: z.string().nullish(),
  error: z.string().nullish(),
})

type RawDocument = z.infer<typeof documentSchema>

// ═══════════════════════════════════════════════════════════════════════════════
// Client
// ═══════════════════════════════════════════════════════════════════════════════

export class FirecrawlClient implements ScrapingCapability {
  private readonly apiKey: string
  private readonly baseUrl: string
  private readonly retryPolicy: RetryPolicy
  private readonly requestTimeoutMs: number
  private readonly pollIntervalMs: number
  private readonly clock: Clock
  private readonly log: ILogger

  constructor(options: FirecrawlClientOptions) {
    if (!options.apiKey) {
      throw new Error('Firecrawl API key is required')
    }
    this.apiKey = options.apiKey
    this.baseUrl = (options.baseUrl ?? DEFAULT_FIRECRAWL_BASE_URL).replace(/\/+$/, '')
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.requestTimeoutMs = options.requestTimeoutMs ?? 60_000
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000
    this.clock = options.clock ?? systemClock
    this.log = options.logger ?? loggers.firecrawl
  }

  async map(url: string, request: MapRequest): Promise<CapabilityResult<MapLink[]>> {
    const body: Record<string, unknown> = { url, limit: request.limit }
    if (request.search) {
      body.search = request.search
    }

    const response = await this.request('POST', '/v1/map', body, request.signal)
    if (!response.ok) return response

    const parsed = mapResponseSchema.safeParse(response.value)
    if (!parsed.success) {
      return failure('invalid_response', `Unexpected map response: ${parsed.error.message}`)
    }
    if (!parsed.data.success) {
      return failure('invalid_response', parsed.data.error ?? 'Map request was not successful')
    }

    const links = parsed.data.links.map(link =>
      typeof link === 'string'
        ? { url: link }
        : {
            url: link.url,
            title: link.title ?? undefined,
            description: link.description ?? undefined,
          }
    )
    this.log.debug('Map completed', { url, links: links.length, search: request.search })
    return success(links)
  }

  async crawl(url: string, request: CrawlRequest): Promise<CapabilityResult<PageSummary[]>> {
    const started = await this.request(
      'POST',
      '/v1/crawl',
      {
        url,
        limit: request.limit,
        maxDepth: request.maxDepth,
        includePaths: request.includePaths,
        excludePaths: request.excludePaths,
        scrapeOptions: { formats: ['markdown'] },
      },
      request.signal
    )
    if (!started.ok) return started

    const start = crawlStartSchema.safeParse(started.value)
    if (!start.success || !start.data.success || !start.data.id) {
      const reason = start.success ? start.data.error : start.error.message
      return failure('invalid_response', reason ?? 'Crawl job was not accepted')
    }

    const jobId = start.data.id
    this.log.info('Crawl job started', { url, jobId })

    const documents: RawDocument[] = []
    let statusPath: string | null = `/v1/crawl/${jobId}`

    while (statusPath) {
      const polled = await this.request('GET', statusPath, undefined, request.signal)
      if (!polled.ok) {
        if (polled.failure.kind === 'aborted') {
          await this.cancelCrawl(jobId)
        }
        return polled
      }

      const status = crawlStatusSchema.safeParse(polled.value)
      if (!status.success) {
        return failure('invalid_response', `Unexpected crawl status: ${status.error.message}`)
      }

      if (status.data.status === 'failed' || status.data.status === 'cancelled') {
        return failure('invalid_response', status.data.error ?? `Crawl job ${status.data.status}`)
      }

      if (status.data.status !== 'completed') {
        try {
          await this.clock.sleep(this.pollIntervalMs, request.signal)
        } catch (error) {
          if (error instanceof AbortedError) {
            await this.cancelCrawl(jobId)
            return failure('aborted', 'Crawl aborted while waiting for completion')
          }
          throw error
        }
        continue
      }

      documents.push(...status.data.data)
      statusPath = status.data.next ? this.toPath(status.data.next) : null
    }

    const pages: PageSummary[] = []
    for (const doc of documents) {
      const metadata = toPageMetadata(doc.metadata ?? {})
      const pageUrl = stringField(metadata, 'sourceURL') ?? stringField(metadata, 'url')
      if (!pageUrl) continue
      pages.push({
        url: pageUrl,
        title: stringField(metadata, 'title'),
        description: stringField(metadata, 'description'),
        markdown: doc.markdown ?? undefined,
        metadata,
      })
    }

    this.log.info('Crawl job completed', { url, jobId, pages: pages.length })
    return success(pages)
  }

  async fetch(url: string, request: FetchRequest): Promise<CapabilityResult<FetchedContent>> {
    const response = await this.request(
      'POST',
      '/v1/scrape',
      { url, formats: request.formats },
      request.signal
    )
    if (!response.ok) return response

    const parsed = scrapeResponseSchema.safeParse(response.value)
    if (!parsed.success) {
      return failure('invalid_response', `Unexpected scrape response: ${parsed.error.message}`)
    }
    if (!parsed.data.success || !parsed.data.data) {
      return failure('invalid_response', parsed.data.error ?? 'Scrape returned no content')
    }

    const doc = parsed.data.data
    return success({
      markdown: doc.markdown ?? undefined,
      html: doc.html ?? undefined,
      rawHtml: doc.rawHtml ?? undefined,
      metadata: toPageMetadata(doc.metadata ?? {}),
    })
  }

  /**
   * JSON request with retries. Never throws for HTTP or network problems.
   */
  private async request(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    body: Record<string, unknown> | undefined,
    signal?: AbortSignal
  ): Promise<CapabilityResult<unknown>> {
    let last: CapabilityResult<unknown> = failure('network', 'Request was not attempted')

    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      if (signal?.aborted) {
        return failure('aborted', `${method} ${path} aborted`)
      }

      last = await this.requestOnce(method, path, body, signal)
      if (last.ok) return last

      const retryable =
        last.failure.kind === 'network' ||
        (last.failure.kind === 'http' &&
          last.failure.statusCode !== undefined &&
          this.retryPolicy.retryableStatusCodes.includes(last.failure.statusCode))

      if (!retryable || attempt >= this.retryPolicy.maxAttempts) {
        return last
      }

      const delay = Math.min(
        this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
        this.retryPolicy.maxDelayMs
      )
      this.log.warn('Retrying Firecrawl request', {
        method,
        path,
        attempt,
        delayMs: delay,
        reason: last.failure.message,
      })

      try {
        await this.clock.sleep(delay, signal)
      } catch (error) {
        if (error instanceof AbortedError) {
          return failure('aborted', `${method} ${path} aborted`)
        }
        throw error
      }
    }

    return last
  }

  /**
   * Single attempt (no retries).
   */
  private async requestOnce(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    body: Record<string, unknown> | undefined,
    signal?: AbortSignal
  ): Promise<CapabilityResult<unknown>> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs)
    const onAbort = () => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      })

      if (!response.ok) {
        return failure('http', `HTTP ${response.status}: ${response.statusText}`, response.status)
      }

      const payload: unknown = await response.json()
      return success(payload)
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return signal?.aborted
          ? failure('aborted', `${method} ${path} aborted`)
          : failure('timeout', `Request timed out after ${this.requestTimeoutMs}ms`)
      }
      if (error instanceof SyntaxError) {
        return failure('invalid_response', `Response was not JSON: ${error.message}`)
      }
      return failure('network', error instanceof Error ? error.message : String(error))
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }
  }

  private async cancelCrawl(jobId: string): Promise<void> {
    const cancelled = await this.request('DELETE', `/v1/crawl/${jobId}`, undefined)
    if (!cancelled.ok) {
      this.log.warn('Failed to cancel crawl job', { jobId, reason: cancelled.failure.message })
    }
  }

  private toPath(next: string): string {
    if (next.startsWith(this.baseUrl)) {
      return next.slice(this.baseUrl.length)
    }
    const parsed = new URL(next, this.baseUrl)
    return `${parsed.pathname}${parsed.search}`
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Metadata helpers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Keep only the scalar (and string list) fields of raw page metadata.
 */
export function toPageMetadata(raw: Record<string, unknown>): PageMetadata {
  const metadata: PageMetadata = {}
  for (const [key, value] of Object.entries(raw)) {
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      metadata[key] = value
    } else if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      metadata[key] = value
    }
  }
  return metadata
}

export function stringField(metadata: PageMetadata, key: string): string | undefined {
  const value = metadata[key]
  if (typeof value === 'string' && value.trim()) return value.trim()
  if (Array.isArray(value) && value.length > 0 && value[0].trim()) return value[0].trim()
  return undefined
}
