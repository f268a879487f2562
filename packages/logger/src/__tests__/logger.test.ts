import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger, isSensitiveKey, setLogLevel, setRedactionEnabled } from '../index.js'

describe('logger', () => {
  const originalLogFormat = process.env.LOG_FORMAT

  afterEach(() => {
    vi.restoreAllMocks()
    setRedactionEnabled(false)
    setLogLevel(null)
    process.env.LOG_FORMAT = originalLogFormat
  })

  it('writes JSON lines with service and component path', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('info')
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})

    createLogger('discovery').child('mapper').child('crawl').info('Crawl finished', { urls: 3 })

    expect(consoleInfo).toHaveBeenCalledTimes(1)
    const payload = JSON.parse(String(consoleInfo.mock.calls[0][0])) as Record<string, unknown>
    expect(payload.service).toBe('discovery')
    expect(payload.component).toBe('mapper:crawl')
    expect(payload.message).toBe('Crawl finished')
    expect(payload.urls).toBe(3)
    expect(payload.level).toBe('info')
  })

  it('drops entries below the configured level', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('warn')
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const logger = createLogger('discovery')
    logger.info('quiet')
    logger.warn('loud')

    expect(consoleInfo).not.toHaveBeenCalled()
    expect(consoleWarn).toHaveBeenCalledTimes(1)
  })

  it('redacts credential-like keys when enabled', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('info')
    setRedactionEnabled(true)
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})

    createLogger('discovery')
      .child({ apiKey: 'test-secret' })
      .info('Client ready', { baseUrl: 'https://api.example.test', authToken: 'test-token' })

    const payload = JSON.parse(String(consoleInfo.mock.calls[0][0])) as Record<string, unknown>
    expect(payload.apiKey).toBe('[REDACTED]')
    expect(payload.authToken).toBe('[REDACTED]')
    expect(payload.baseUrl).toBe('https://api.example.test')
  })

  it('serializes errors passed to error()', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('info')
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})

    createLogger('discovery').error('Run failed', { runId: 'r1' }, new Error('boom'))

    const payload = JSON.parse(String(consoleError.mock.calls[0][0])) as {
      error: { name: string; message: string }
    }
    expect(payload.error.name).toBe('Error')
    expect(payload.error.message).toBe('boom')
  })

  it('recognizes sensitive keys', () => {
    expect(isSensitiveKey('FIRECRAWL_API_KEY')).toBe(true)
    expect(isSensitiveKey('api-key')).toBe(true)
    expect(isSensitiveKey('maxPages')).toBe(false)
  })
})
