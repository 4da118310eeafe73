/**
 * Retryable Draw Fetcher
 *
 * Fetches the results page for a date range and extracts raw rows.
 *
 * Attempt classification:
 * - transport failure (timeout, connection), HTTP 5xx, HTTP 429 → retry
 * - page without a recognisable results table → retry, fatal once exhausted
 * - other HTTP 4xx → fatal at once
 * - payload above the size ceiling → fatal at once, nothing is parsed
 * - results table with no rows / "no results" notice → empty, not an error
 *
 * Delay between attempts: retryDelayMs * backoffMultiplier^(attempt-1),
 * capped at maxRetryDelayMs. The default multiplier of 1 keeps it fixed.
 *
 * Cancellation is cooperative: the signal is checked before each attempt
 * and cuts the wait between attempts short. An in-flight request is never
 * interrupted by it; the transport timeout bounds that.
 */

import { setTimeout as sleepFor } from 'node:timers/promises'
import type { ILogger } from '@sorteo/logger'
import { maxDataSizeBytes, type PipelineConfig } from '../config/pipeline.js'
import { CancelledError, ERROR_CODES, ScrapingError, ValidationError, describeCause } from './errors.js'
import { extractDrawRows } from './extract.js'
import { daysBetween, isIsoDate } from './parse.js'
import type { HttpTransport, TransportResponse } from './transport.js'
import type { DateRange, RawRow } from './types.js'

export type FetcherConfig = Pick<
  PipelineConfig,
  | 'endpointTemplate'
  | 'maxRetries'
  | 'retryDelayMs'
  | 'backoffMultiplier'
  | 'maxRetryDelayMs'
  | 'timeoutMs'
  | 'maxDataSizeMb'
  | 'maxRangeDays'
>

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export interface DrawFetcherDeps {
  transport: HttpTransport
  logger: ILogger
  /** Injected for tests; defaults to an abortable timer */
  sleep?: Sleep
}

export interface FetchOutcome {
  url: string
  rows: RawRow[]
  attempts: number
  bytes: number
  /** True when the page was well-formed but held no draws */
  empty: boolean
}

export interface FetchCallOptions {
  signal?: AbortSignal
}

type AttemptResult =
  | { kind: 'success'; rows: RawRow[]; bytes: number; empty: boolean }
  | { kind: 'retryable'; cause: string }
  | { kind: 'fatal'; cause: string; code: typeof ERROR_CODES.PAYLOAD_TOO_LARGE | typeof ERROR_CODES.HTTP_CLIENT_ERROR }

const defaultSleep: Sleep = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal })
}

export function buildEndpointUrl(template: string, range: DateRange): string {
  return template
    .replaceAll('{start}', encodeURIComponent(range.start))
    .replaceAll('{end}', encodeURIComponent(range.end))
}

/**
 * Caller-input checks. Runs before any network call; never retried.
 */
export function validateDateRange(range: DateRange, maxRangeDays: number): void {
  for (const [label, value] of [
    ['start', range.start],
    ['end', range.end],
  ] as const) {
    if (!isIsoDate(value)) {
      throw new ValidationError(`Invalid ${label} date "${value}", expected YYYY-MM-DD`, {
        code: ERROR_CODES.INVALID_DATE_RANGE,
        details: { startDate: range.start, endDate: range.end },
      })
    }
  }

  const span = daysBetween(range.start, range.end)
  if (span < 0) {
    throw new ValidationError(`Start date ${range.start} is after end date ${range.end}`, {
      code: ERROR_CODES.INVALID_DATE_RANGE,
      details: { startDate: range.start, endDate: range.end },
    })
  }
  if (span > maxRangeDays) {
    throw new ValidationError(`Range of ${span} days exceeds the ${maxRangeDays}-day limit`, {
      code: ERROR_CODES.INVALID_DATE_RANGE,
      details: { startDate: range.start, endDate: range.end, span, maxRangeDays },
    })
  }
}

export class DrawFetcher {
  private readonly sleep: Sleep
  private readonly maxBytes: number

  constructor(
    private readonly config: FetcherConfig,
    private readonly deps: DrawFetcherDeps
  ) {
    this.sleep = deps.sleep ?? defaultSleep
    this.maxBytes = maxDataSizeBytes(config)
  }

  /**
   * Delay before the attempt following `attempt` (1-based).
   */
  retryDelay(attempt: number): number {
    const { retryDelayMs, backoffMultiplier, maxRetryDelayMs } = this.config
    return Math.min(retryDelayMs * Math.pow(backoffMultiplier, attempt - 1), maxRetryDelayMs)
  }

  async fetch(range: DateRange, options: FetchCallOptions = {}): Promise<FetchOutcome> {
    validateDateRange(range, this.config.maxRangeDays)

    const url = buildEndpointUrl(this.config.endpointTemplate, range)
    const log = this.deps.logger.child({ startDate: range.start, endDate: range.end })
    const { signal } = options

    let lastCause = 'no attempt made'

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      if (signal?.aborted) {
        throw new CancelledError(`Fetch cancelled before attempt ${attempt}`, {
          details: { attempt, url },
        })
      }

      log.debug('Fetching results page', { url, attempt })
      const response = await this.request(url)
      if (response.error?.kind === 'closed') {
        throw new CancelledError('Fetch aborted: transport closed', { details: { attempt, url } })
      }
      const result = this.classify(response, range)

      if (result.kind === 'success') {
        if (result.empty) {
          log.warn('No draws published for range', { url, attempt })
        } else {
          log.info('Fetched results page', { url, attempt, rows: result.rows.length, bytes: result.bytes })
        }
        return { url, rows: result.rows, attempts: attempt, bytes: result.bytes, empty: result.empty }
      }

      if (result.kind === 'fatal') {
        log.error('Fetch failed', { url, attempt, cause: result.cause })
        throw new ScrapingError(`Fetch failed for ${range.start}..${range.end}: ${result.cause}`, {
          code: result.code,
          attempts: attempt,
          range,
          url,
          lastCause: result.cause,
        })
      }

      lastCause = result.cause
      if (attempt < this.config.maxRetries) {
        const delayMs = this.retryDelay(attempt)
        log.warn('Fetch attempt failed, retrying', { url, attempt, delayMs, cause: result.cause })
        await this.wait(delayMs, signal, attempt, url)
      }
    }

    log.error('Fetch retries exhausted', { url, attempts: this.config.maxRetries, cause: lastCause })
    throw new ScrapingError(
      `Fetch failed for ${range.start}..${range.end} after ${this.config.maxRetries} attempts: ${lastCause}`,
      { attempts: this.config.maxRetries, range, url, lastCause }
    )
  }

  close(): void {
    this.deps.transport.close()
  }

  /** A transport that throws is treated like a network failure */
  private async request(url: string): Promise<TransportResponse> {
    try {
      return await this.deps.transport.get(url, { timeoutMs: this.config.timeoutMs, maxBytes: this.maxBytes })
    } catch (error) {
      return { statusCode: null, body: '', bytes: 0, error: { kind: 'network', message: describeCause(error) } }
    }
  }

  private classify(response: TransportResponse, range: DateRange): AttemptResult {
    if (response.error?.kind === 'too_large' || response.bytes > this.maxBytes) {
      return {
        kind: 'fatal',
        code: ERROR_CODES.PAYLOAD_TOO_LARGE,
        cause: `payload above ${this.config.maxDataSizeMb} MB limit (${response.error?.message ?? `${response.bytes} bytes`})`,
      }
    }

    if (response.error) {
      return { kind: 'retryable', cause: `${response.error.kind}: ${response.error.message}` }
    }

    const status = response.statusCode
    if (status === null) {
      return { kind: 'retryable', cause: 'no response received' }
    }
    if (status >= 500 || status === 429) {
      return { kind: 'retryable', cause: `HTTP ${status}` }
    }
    if (status >= 400) {
      return { kind: 'fatal', code: ERROR_CODES.HTTP_CLIENT_ERROR, cause: `HTTP ${status}` }
    }

    // Single-day pages list draws without a date of their own
    const extracted = extractDrawRows(response.body, {
      pageDate: range.start === range.end ? range.start : undefined,
    })
    switch (extracted.kind) {
      case 'rows':
        return { kind: 'success', rows: extracted.rows, bytes: response.bytes, empty: false }
      case 'empty':
        return { kind: 'success', rows: [], bytes: response.bytes, empty: true }
      case 'malformed':
        return { kind: 'retryable', cause: `malformed page: ${extracted.reason}` }
    }
  }

  private async wait(delayMs: number, signal: AbortSignal | undefined, attempt: number, url: string): Promise<void> {
    try {
      await this.sleep(delayMs, signal)
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(`Fetch cancelled while waiting to retry after attempt ${attempt}`, {
          details: { attempt, url },
          cause: error,
        })
      }
      throw error
    }
  }
}
