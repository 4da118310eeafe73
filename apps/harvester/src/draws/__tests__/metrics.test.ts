import { describe, expect, it } from 'vitest'
import { ScrapingError } from '../errors.js'
import {
  countRejection,
  createRunMetrics,
  finalizeRunMetrics,
  recordRunCompleted,
  recordRunFailed,
  successRate,
} from '../metrics.js'
import type { StorageResult } from '../types.js'
import { memoryLogger } from './fakes.js'

const RANGE = { start: '2025-01-13', end: '2025-01-20' }
const STARTED = new Date('2025-01-20T12:00:00.000Z')

const WRITTEN: StorageResult = {
  status: 'written',
  destination: 'lotto-activo_20250120T120000000Z_00',
  bytes_written: 512,
  record_count: 4,
  metrics_path: '/tmp/out/lotto-activo_20250120T120000000Z_00.metrics.json',
}

describe('run metrics', () => {
  it('starts zeroed', () => {
    expect(createRunMetrics('run-1', RANGE, STARTED)).toEqual({
      run_id: 'run-1',
      start_date: '2025-01-13',
      end_date: '2025-01-20',
      start_time: '2025-01-20T12:00:00.000Z',
      end_time: null,
      duration_seconds: 0,
      rows_seen: 0,
      rows_valid: 0,
      rows_rejected: 0,
      rows_flagged: 0,
      rows_deduplicated: 0,
      success_rate: 0,
      bytes_written: 0,
      fetch_attempts: 0,
      rejections: {},
    })
  })

  it('defines the success rate as 0 when nothing was seen', () => {
    expect(successRate(0, 0)).toBe(0)
    expect(successRate(3, 4)).toBe(0.75)
  })

  it('counts rejections by reason', () => {
    const metrics = createRunMetrics('run-1', RANGE, STARTED)
    countRejection(metrics, 'BAD_DATE')
    countRejection(metrics, 'BAD_DATE')
    countRejection(metrics, 'UNKNOWN_ANIMAL')

    expect(metrics.rows_rejected).toBe(3)
    expect(metrics.rejections).toEqual({ BAD_DATE: 2, UNKNOWN_ANIMAL: 1 })
  })

  it('stamps end time, duration and success rate', () => {
    const metrics = createRunMetrics('run-1', RANGE, STARTED)
    metrics.rows_seen = 8
    metrics.rows_valid = 6

    finalizeRunMetrics(metrics, new Date('2025-01-20T12:00:02.500Z'))

    expect(metrics.end_time).toBe('2025-01-20T12:00:02.500Z')
    expect(metrics.duration_seconds).toBe(2.5)
    expect(metrics.success_rate).toBe(0.75)
  })
})

describe('run events', () => {
  it('logs completion with the metrics and storage', () => {
    const { logger, sink } = memoryLogger()
    const metrics = createRunMetrics('run-1', RANGE, STARTED)
    metrics.rows_seen = 4
    metrics.rows_valid = 4

    recordRunCompleted(finalizeRunMetrics(metrics, STARTED), WRITTEN, logger)

    expect(sink.messages()).toEqual(['DRAWS_RUN_COMPLETED'])
    expect(sink.entries[0]).toMatchObject({
      level: 'info',
      event_name: 'DRAWS_RUN_COMPLETED',
      run_id: 'run-1',
      rows_valid: 4,
      storage_status: 'written',
      destination: 'lotto-activo_20250120T120000000Z_00',
      record_count: 4,
    })
  })

  it('alerts on a low success rate once enough rows were seen', () => {
    const { logger, sink } = memoryLogger()
    const metrics = createRunMetrics('run-1', RANGE, STARTED)
    metrics.rows_seen = 10
    metrics.rows_valid = 4

    recordRunCompleted(finalizeRunMetrics(metrics, STARTED), WRITTEN, logger)

    expect(sink.messages()).toEqual(['DRAWS_RUN_COMPLETED', 'DRAWS_ALERT_LOW_SUCCESS_RATE'])
    expect(sink.entries[1]).toMatchObject({ level: 'warn', success_rate: 0.4, rows_seen: 10 })
  })

  it('does not alert on small samples', () => {
    const { logger, sink } = memoryLogger()
    const metrics = createRunMetrics('run-1', RANGE, STARTED)
    metrics.rows_seen = 9
    metrics.rows_valid = 0

    recordRunCompleted(finalizeRunMetrics(metrics, STARTED), WRITTEN, logger)

    expect(sink.messages()).toEqual(['DRAWS_RUN_COMPLETED'])
  })

  it('logs failures with their classification', () => {
    const { logger, sink } = memoryLogger()
    const metrics = createRunMetrics('run-1', RANGE, STARTED)
    const error = new ScrapingError('Fetch failed', {
      attempts: 3,
      range: RANGE,
      url: 'https://results.test/',
      lastCause: 'HTTP 503',
    })

    recordRunFailed(metrics, error, 'fetching', logger)

    expect(sink.entries[0]).toMatchObject({
      level: 'error',
      message: 'DRAWS_RUN_FAILED',
      failed_at: 'fetching',
      error_category: 'scraping',
      error_code: 'RETRIES_EXHAUSTED',
      error_is_retryable: true,
      error: { name: 'ScrapingError', message: 'Fetch failed' },
    })
  })
})
