import { describe, it, expect } from 'vitest'
import { DEFAULT_CONFIG, loadDiscoveryConfig, withOverrides } from '../discovery-config.js'
import { DiscoveryError } from '../../discovery/errors.js'

describe('loadDiscoveryConfig', () => {
  it('applies free-tier defaults when nothing is set', () => {
    const config = loadDiscoveryConfig({})

    expect(config).toEqual({
      maxRequestsPerMinute: 5,
      maxConcurrentJobs: 1,
      maxPages: 100,
      maxDepth: 5,
      timeoutSeconds: 300,
      crawlTimeoutSeconds: 120,
      firecrawlApiKey: undefined,
      firecrawlBaseUrl: 'https://api.firecrawl.dev',
    })
  })

  it('coerces numeric variables and treats empty strings as unset', () => {
    const config = loadDiscoveryConfig({
      MAX_REQUESTS_PER_MINUTE: '10',
      MAX_PAGES: '25',
      MAX_DEPTH: '',
      FIRECRAWL_API_KEY: 'test-secret',
    })

    expect(config.maxRequestsPerMinute).toBe(10)
    expect(config.maxPages).toBe(25)
    expect(config.maxDepth).toBe(5)
    expect(config.firecrawlApiKey).toBe('test-secret')
  })

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadDiscoveryConfig({}))).toBe(true)
  })

  it('rejects non-positive and non-numeric values', () => {
    expect(() => loadDiscoveryConfig({ MAX_PAGES: '0' })).toThrow(DiscoveryError)

    try {
      loadDiscoveryConfig({ MAX_CONCURRENT_JOBS: 'many', FIRECRAWL_BASE_URL: 'not a url' })
      expect.unreachable('should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(DiscoveryError)
      if (error instanceof DiscoveryError) {
        expect(error.code).toBe('INVALID_CONFIG')
        expect(error.message).toContain('MAX_CONCURRENT_JOBS')
        expect(error.message).toContain('FIRECRAWL_BASE_URL')
      }
    }
  })
})

describe('withOverrides', () => {
  it('replaces only defined fields', () => {
    const config = withOverrides(DEFAULT_CONFIG, { maxPages: 10, maxDepth: undefined })

    expect(config.maxPages).toBe(10)
    expect(config.maxDepth).toBe(DEFAULT_CONFIG.maxDepth)
    expect(Object.isFrozen(config)).toBe(true)
  })
})
