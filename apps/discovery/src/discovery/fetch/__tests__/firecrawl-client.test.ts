import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { FirecrawlClient, toPageMetadata } from '../firecrawl-client.js'
import { ManualClock } from '../../utils/clock.js'

const BASE = 'https://firecrawl.test'

function json(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  })
}

/**
 * Serve queued responses per "METHOD url". The last response of a queue
 * repeats.
 */
function route(routes: Record<string, Array<() => Response>>) {
  return vi.fn<typeof fetch>().mockImplementation(async (input, init) => {
    const key = `${init?.method ?? 'GET'} ${String(input)}`
    const queue = routes[key]
    if (!queue || queue.length === 0) {
      return json({ error: `no route for ${key}` }, 404, 'Not Found')
    }
    const next = queue.length > 1 ? queue.shift() : queue[0]
    if (!next) throw new Error(`empty route ${key}`)
    return next()
  })
}

describe('FirecrawlClient', () => {
  const originalFetch = globalThis.fetch
  let clock: ManualClock

  beforeEach(() => {
    vi.restoreAllMocks()
    clock = new ManualClock()
  })

  afterEach(() => {
    globalThis.fetch = originalFetch
  })

  function client() {
    return new FirecrawlClient({ apiKey: 'test-secret', baseUrl: `${BASE}/`, clock, pollIntervalMs: 2_000 })
  }

  it('requires an API key', () => {
    expect(() => new FirecrawlClient({ apiKey: '' })).toThrow('Firecrawl API key is required')
  })

  describe('map', () => {
    it('accepts links as strings or objects', async () => {
      const fetchSpy = route({
        [`POST ${BASE}/v1/map`]: [
          () =>
            json({
              success: true,
              links: ['https://agency.gov/a', { url: 'https://agency.gov/b', title: 'B', description: null }],
            }),
        ],
      })
      globalThis.fetch = fetchSpy

      const result = await client().map('https://agency.gov/', { limit: 50, search: 'permit' })

      expect(result).toEqual({
        ok: true,
        value: [{ url: 'https://agency.gov/a' }, { url: 'https://agency.gov/b', title: 'B', description: undefined }],
      })
      const [, init] = fetchSpy.mock.calls[0]
      expect(init).toMatchObject({
        method: 'POST',
        headers: { Authorization: 'Bearer test-secret' },
      })
      expect(JSON.parse(String(init?.body))).toEqual({
        url: 'https://agency.gov/',
        limit: 50,
        search: 'permit',
      })
    })

    it('reports an unsuccessful response body', async () => {
      globalThis.fetch = route({
        [`POST ${BASE}/v1/map`]: [() => json({ success: false, error: 'Insufficient credits' })],
      })

      const result = await client().map('https://agency.gov/', { limit: 10 })

      expect(result).toEqual({ ok: false, failure: { kind: 'invalid_response', message: 'Insufficient credits' } })
    })
  })

  describe('retries', () => {
    it('retries a retryable status with backoff', async () => {
      const fetchSpy = route({
        [`POST ${BASE}/v1/map`]: [
          () => json({}, 503, 'Service Unavailable'),
          () => json({ success: true, links: [] }),
        ],
      })
      globalThis.fetch = fetchSpy

      const result = await client().map('https://agency.gov/', { limit: 10 })

      expect(result).toEqual({ ok: true, value: [] })
      expect(fetchSpy).toHaveBeenCalledTimes(2)
      expect(clock.now()).toBe(1_000)
    })

    it('does not retry a client error', async () => {
      const fetchSpy = route({
        [`POST ${BASE}/v1/scrape`]: [() => json({}, 400, 'Bad Request')],
      })
      globalThis.fetch = fetchSpy

      const result = await client().fetch('https://agency.gov/a', { formats: ['markdown'] })

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'http', message: 'HTTP 400: Bad Request', statusCode: 400 },
      })
      expect(fetchSpy).toHaveBeenCalledTimes(1)
    })

    it('gives up on network errors after the last attempt', async () => {
      const fetchSpy = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'))
      globalThis.fetch = fetchSpy

      const result = await client().fetch('https://agency.gov/a', { formats: ['markdown'] })

      expect(result).toEqual({ ok: false, failure: { kind: 'network', message: 'fetch failed' } })
      expect(fetchSpy).toHaveBeenCalledTimes(3)
      expect(clock.now()).toBe(3_000)
    })

    it('returns aborted without calling out when the signal is already aborted', async () => {
      const fetchSpy = vi.fn<typeof fetch>()
      globalThis.fetch = fetchSpy
      const controller = new AbortController()
      controller.abort()

      const result = await client().fetch('https://agency.gov/a', {
        formats: ['markdown'],
        signal: controller.signal,
      })

      expect(result.ok).toBe(false)
      expect(result.ok ? undefined : result.failure.kind).toBe('aborted')
      expect(fetchSpy).not.toHaveBeenCalled()
    })
  })

  describe('crawl', () => {
    const crawlRequest = {
      limit: 100,
      maxDepth: 3,
      includePaths: ['.*fee.*'],
      excludePaths: ['.*/news/.*'],
    }

    it('polls until completed and follows pagination', async () => {
      const fetchSpy = route({
        [`POST ${BASE}/v1/crawl`]: [() => json({ success: true, id: 'job-1' })],
        [`GET ${BASE}/v1/crawl/job-1`]: [
          () => json({ status: 'scraping' }),
          () =>
            json({
              status: 'completed',
              data: [{ markdown: '# Fees', metadata: { sourceURL: 'https://agency.gov/fees', title: 'Fees' } }],
              next: `${BASE}/v1/crawl/job-1?skip=1`,
            }),
        ],
        [`GET ${BASE}/v1/crawl/job-1?skip=1`]: [
          () =>
            json({
              status: 'completed',
              data: [
                { metadata: { url: 'https://agency.gov/offices', description: 'Regional offices' } },
                { markdown: 'no url', metadata: {} },
              ],
            }),
        ],
      })
      globalThis.fetch = fetchSpy

      const result = await client().crawl('https://agency.gov/', crawlRequest)

      expect(result).toEqual({
        ok: true,
        value: [
          {
            url: 'https://agency.gov/fees',
            title: 'Fees',
            description: undefined,
            markdown: '# Fees',
            metadata: { sourceURL: 'https://agency.gov/fees', title: 'Fees' },
          },
          {
            url: 'https://agency.gov/offices',
            title: undefined,
            description: 'Regional offices',
            markdown: undefined,
            metadata: { url: 'https://agency.gov/offices', description: 'Regional offices' },
          },
        ],
      })
      expect(clock.now()).toBe(2_000)
      expect(JSON.parse(String(fetchSpy.mock.calls[0][1]?.body))).toMatchObject({
        url: 'https://agency.gov/',
        limit: 100,
        maxDepth: 3,
        includePaths: ['.*fee.*'],
        excludePaths: ['.*/news/.*'],
      })
    })

    it('reports a failed crawl job', async () => {
      globalThis.fetch = route({
        [`POST ${BASE}/v1/crawl`]: [() => json({ success: true, id: 'job-2' })],
        [`GET ${BASE}/v1/crawl/job-2`]: [() => json({ status: 'failed', error: 'Site blocked the crawler' })],
      })

      const result = await client().crawl('https://agency.gov/', crawlRequest)

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'invalid_response', message: 'Site blocked the crawler' },
      })
    })

    it('cancels the job when aborted while polling', async () => {
      const controller = new AbortController()
      const fetchSpy = route({
        [`POST ${BASE}/v1/crawl`]: [() => json({ success: true, id: 'job-3' })],
        [`GET ${BASE}/v1/crawl/job-3`]: [
          () => {
            controller.abort()
            return json({ status: 'scraping' })
          },
        ],
        [`DELETE ${BASE}/v1/crawl/job-3`]: [() => json({ status: 'cancelled' })],
      })
      globalThis.fetch = fetchSpy

      const result = await client().crawl('https://agency.gov/', { ...crawlRequest, signal: controller.signal })

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'aborted', message: 'Crawl aborted while waiting for completion' },
      })
      expect(fetchSpy.mock.calls.map(([input, init]) => `${init?.method} ${String(input)}`)).toEqual([
        `POST ${BASE}/v1/crawl`,
        `GET ${BASE}/v1/crawl/job-3`,
        `DELETE ${BASE}/v1/crawl/job-3`,
      ])
    })
  })

  describe('fetch', () => {
    it('returns content and scalar metadata', async () => {
      globalThis.fetch = route({
        [`POST ${BASE}/v1/scrape`]: [
          () =>
            json({
              success: true,
              data: {
                markdown: '# Fees',
                html: '<h1>Fees</h1>',
                metadata: { title: 'Fees', statusCode: 200, keywords: ['fee', 'tariff'], og: { image: 'x' } },
              },
            }),
        ],
      })

      const result = await client().fetch('https://agency.gov/fees', { formats: ['markdown', 'html'] })

      expect(result).toEqual({
        ok: true,
        value: {
          markdown: '# Fees',
          html: '<h1>Fees</h1>',
          rawHtml: undefined,
          metadata: { title: 'Fees', statusCode: 200, keywords: ['fee', 'tariff'] },
        },
      })
    })

    it('reports a body that is not JSON', async () => {
      globalThis.fetch = route({
        [`POST ${BASE}/v1/scrape`]: [() => new Response('<html>gateway</html>', { status: 200 })],
      })

      const result = await client().fetch('https://agency.gov/fees', { formats: ['markdown'] })

      expect(result.ok ? undefined : result.failure.kind).toBe('invalid_response')
    })
  })
})

describe('toPageMetadata', () => {
  it('keeps scalars and string lists only', () => {
    expect(toPageMetadata({ a: 'x', b: 1, c: false, d: null, e: ['y'], f: [1], g: { h: 1 } })).toEqual({
      a: 'x',
      b: 1,
      c: false,
      d: null,
      e: ['y'],
    })
  })
})
