/**
 * Discovery Configuration
 *
 * Read once when a run starts and frozen for its duration. Defaults are
 * sized for the scraping service's free tier.
 */

import { z } from 'zod'
import { DiscoveryError, ERROR_CODES } from '../discovery/errors.js'

export interface DiscoveryConfig {
  readonly maxRequestsPerMinute: number
  readonly maxConcurrentJobs: number
  readonly maxPages: number
  readonly maxDepth: number
  /** Overall run deadline */
  readonly timeoutSeconds: number
  /** Budget for the crawl call alone */
  readonly crawlTimeoutSeconds: number
  readonly firecrawlApiKey?: string
  readonly firecrawlBaseUrl: string
}

export const DEFAULT_CONFIG: DiscoveryConfig = Object.freeze({
  maxRequestsPerMinute: 5,
  maxConcurrentJobs: 1,
  maxPages: 100,
  maxDepth: 5,
  timeoutSeconds: 300,
  crawlTimeoutSeconds: 120,
  firecrawlBaseUrl: 'https://api.firecrawl.dev',
})

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const envSchema = z.object({
  MAX_REQUESTS_PER_MINUTE: positiveInt(DEFAULT_CONFIG.maxRequestsPerMinute),
  MAX_CONCURRENT_JOBS: positiveInt(DEFAULT_CONFIG.maxConcurrentJobs),
  MAX_PAGES: positiveInt(DEFAULT_CONFIG.maxPages),
  MAX_DEPTH: positiveInt(DEFAULT_CONFIG.maxDepth),
  TIMEOUT_SECONDS: positiveInt(DEFAULT_CONFIG.timeoutSeconds),
  CRAWL_TIMEOUT_SECONDS: positiveInt(DEFAULT_CONFIG.crawlTimeoutSeconds),
  FIRECRAWL_API_KEY: z
    .string()
    .trim()
    .optional()
    .transform(value => (value ? value : undefined)),
  FIRECRAWL_BASE_URL: z.string().url().default(DEFAULT_CONFIG.firecrawlBaseUrl),
})

/**
 * Build the run configuration from environment variables.
 * Empty strings count as unset.
 *
 * @throws DiscoveryError (INVALID_CONFIG) listing every bad variable
 */
export function loadDiscoveryConfig(env: NodeJS.ProcessEnv = process.env): DiscoveryConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  )
  const parsed = envSchema.safeParse(present)

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new DiscoveryError(
      ERROR_CODES.INVALID_CONFIG,
      `Invalid discovery configuration: ${issues.join('; ')}`,
      { issues }
    )
  }

  const vars = parsed.data
  return Object.freeze({
    maxRequestsPerMinute: vars.MAX_REQUESTS_PER_MINUTE,
    maxConcurrentJobs: vars.MAX_CONCURRENT_JOBS,
    maxPages: vars.MAX_PAGES,
    maxDepth: vars.MAX_DEPTH,
    timeoutSeconds: vars.TIMEOUT_SECONDS,
    crawlTimeoutSeconds: vars.CRAWL_TIMEOUT_SECONDS,
    firecrawlApiKey: vars.FIRECRAWL_API_KEY,
    firecrawlBaseUrl: vars.FIRECRAWL_BASE_URL,
  })
}

/**
 * Copy of a config with the defined overrides applied, frozen.
 * Used by CLI flags and tests.
 */
export function withOverrides(base: DiscoveryConfig, overrides: Partial<DiscoveryConfig>): DiscoveryConfig {
  return Object.freeze({
    maxRequestsPerMinute: overrides.maxRequestsPerMinute ?? base.maxRequestsPerMinute,
    maxConcurrentJobs: overrides.maxConcurrentJobs ?? base.maxConcurrentJobs,
    maxPages: overrides.maxPages ?? base.maxPages,
    maxDepth: overrides.maxDepth ?? base.maxDepth,
    timeoutSeconds: overrides.timeoutSeconds ?? base.timeoutSeconds,
    crawlTimeoutSeconds: overrides.crawlTimeoutSeconds ?? base.crawlTimeoutSeconds,
    firecrawlApiKey: overrides.firecrawlApiKey ?? base.firecrawlApiKey,
    firecrawlBaseUrl: overrides.firecrawlBaseUrl ?? base.firecrawlBaseUrl,
  })
}
