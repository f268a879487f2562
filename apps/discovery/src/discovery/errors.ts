/**
 * Discovery Error Classification
 *
 * Only three conditions end a run without a result. Everything else
 * (crawl failure, per-page fetch failure, low confidence, timeout) is
 * recorded on the result instead of thrown.
 */

import { ZodError } from 'zod'

export type ErrorCategory =
  | 'validation' // Caller sent an unusable query or config
  | 'external' // Scraping service unreachable
  | 'internal' // Defect in the pipeline itself

export const ERROR_CODES = {
  INVALID_QUERY: 'INVALID_QUERY',
  INVALID_CONFIG: 'INVALID_CONFIG',
  STRUCTURE_UNAVAILABLE: 'STRUCTURE_UNAVAILABLE',
  INTERNAL_INVARIANT_VIOLATION: 'INTERNAL_INVARIANT_VIOLATION',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  INVALID_QUERY: 'validation',
  INVALID_CONFIG: 'validation',
  STRUCTURE_UNAVAILABLE: 'external',
  INTERNAL_INVARIANT_VIOLATION: 'internal',
  UNEXPECTED_ERROR: 'internal',
}

export class DiscoveryError extends Error {
  readonly code: ErrorCode
  readonly category: ErrorCategory
  readonly details?: Record<string, unknown>

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'DiscoveryError'
    this.code = code
    this.category = CATEGORY_BY_CODE[code]
    this.details = details
  }
}

/**
 * Structured error information for logging and CLI exit codes
 */
export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  /** Expected failure vs bug */
  isOperational: boolean
  details?: Record<string, unknown>
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof DiscoveryError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isOperational: error.category !== 'internal',
      details: error.details,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.INVALID_QUERY,
      message: 'Validation failed',
      isOperational: true,
      details: {
        issues: error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: error instanceof Error ? error.message : String(error),
    isOperational: false,
  }
}
