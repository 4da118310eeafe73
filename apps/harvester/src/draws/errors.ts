/**
 * Pipeline Error Taxonomy and Classification
 *
 * Stage-level failures are PipelineError subclasses; they end the run and
 * reach the caller in the failed outcome. Per-row rejections are not errors
 * (see RejectionReason in types.ts).
 *
 * classifyError() turns anything thrown into a ClassifiedError so every
 * failure is logged with the same envelope.
 */

import { ZodError } from 'zod'
import type { DateRange } from './types.js'

export type ErrorCategory =
  | 'validation' // bad caller input or configuration, never retried
  | 'scraping' // fetch-layer failure after retries, or oversize payload
  | 'processing' // systemic normalizer failure
  | 'saving' // persistence failure
  | 'cancelled' // cooperative shutdown
  | 'internal' // anything unexpected

export const ERROR_CODES = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_DATE_RANGE: 'INVALID_DATE_RANGE',
  INVALID_CONFIG: 'INVALID_CONFIG',
  PIPELINE_BUSY: 'PIPELINE_BUSY',
  PIPELINE_CLOSED: 'PIPELINE_CLOSED',

  RETRIES_EXHAUSTED: 'RETRIES_EXHAUSTED',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  HTTP_CLIENT_ERROR: 'HTTP_CLIENT_ERROR',

  PROCESSING_FAILED: 'PROCESSING_FAILED',

  BATCH_TOO_LARGE: 'BATCH_TOO_LARGE',
  INVALID_RECORDS: 'INVALID_RECORDS',
  WRITE_FAILED: 'WRITE_FAILED',
  WRITE_TIMEOUT: 'WRITE_TIMEOUT',
  READ_FAILED: 'READ_FAILED',

  RUN_CANCELLED: 'RUN_CANCELLED',

  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export interface PipelineErrorOptions {
  code?: ErrorCode
  details?: Record<string, unknown>
  cause?: unknown
}

export abstract class PipelineError extends Error {
  abstract readonly category: ErrorCategory
  readonly code: ErrorCode
  readonly details: Record<string, unknown>

  protected constructor(message: string, defaultCode: ErrorCode, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.code = options.code ?? defaultCode
    this.details = options.details ?? {}
  }

  get isRetryable(): boolean {
    return false
  }
}

/** Bad caller input: inverted range, invalid config, misuse of the pipeline */
export class ValidationError extends PipelineError {
  readonly category = 'validation'

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, ERROR_CODES.VALIDATION_FAILED, options)
  }
}

export interface ScrapingErrorOptions extends PipelineErrorOptions {
  attempts: number
  range: DateRange
  url: string
  /** Human-readable description of the last underlying failure */
  lastCause: string
}

export class ScrapingError extends PipelineError {
  readonly category = 'scraping'
  readonly attempts: number
  readonly range: DateRange
  readonly url: string
  readonly lastCause: string

  constructor(message: string, options: ScrapingErrorOptions) {
    super(message, ERROR_CODES.RETRIES_EXHAUSTED, {
      ...options,
      details: {
        ...options.details,
        attempts: options.attempts,
        startDate: options.range.start,
        endDate: options.range.end,
        url: options.url,
        lastCause: options.lastCause,
      },
    })
    this.attempts = options.attempts
    this.range = options.range
    this.url = options.url
    this.lastCause = options.lastCause
  }

  /** Exhausted transient failures may clear up by the next scheduled run */
  override get isRetryable(): boolean {
    return this.code === ERROR_CODES.RETRIES_EXHAUSTED
  }
}

/** The normalization stage itself broke, as opposed to rejecting rows */
export class ProcessingError extends PipelineError {
  readonly category = 'processing'

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, ERROR_CODES.PROCESSING_FAILED, options)
  }
}

export interface SavingErrorOptions extends PipelineErrorOptions {
  destination?: string
}

export class SavingError extends PipelineError {
  readonly category = 'saving'
  readonly destination: string | undefined

  constructor(message: string, options: SavingErrorOptions = {}) {
    super(message, ERROR_CODES.WRITE_FAILED, {
      ...options,
      details: { ...options.details, destination: options.destination },
    })
    this.destination = options.destination
  }
}

export class CancelledError extends PipelineError {
  readonly category = 'cancelled'

  constructor(message = 'Run cancelled', options: PipelineErrorOptions = {}) {
    super(message, ERROR_CODES.RUN_CANCELLED, options)
  }

  override get isRetryable(): boolean {
    return true
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification
// ═══════════════════════════════════════════════════════════════════════════════

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  /** Expected operational failure vs. a bug */
  isOperational: boolean
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof PipelineError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isOperational: true,
      isRetryable: error.isRetryable,
      details: error.details,
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      isOperational: true,
      isRetryable: false,
      details: {
        issues: error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isOperational: false,
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isOperational: false,
    isRetryable: false,
  }
}

/**
 * Flatten a classified error into log fields.
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_is_operational: classified.isOperational,
    error_is_retryable: classified.isRetryable,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && { error_name: classified.originalError.name }),
  }
}

/**
 * Readable one-line description of an unknown failure, used as `lastCause`.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message ? `${cause.name}: ${cause.message}` : cause.name
  }
  return String(cause)
}
