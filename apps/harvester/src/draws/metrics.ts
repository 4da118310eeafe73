/**
 * Run Metrics
 *
 * RunMetrics is created fresh for every run and only the orchestrator
 * mutates it. Completion and failure are reported as structured log events;
 * there is no metrics backend.
 */

import type { ILogger } from '@sorteo/logger'
import { loggers } from '../config/logger.js'
import { classifyError, formatErrorForLog } from './errors.js'
import type { DateRange, RejectionReason, RunMetrics, StorageResult } from './types.js'

const LOW_SUCCESS_RATE_THRESHOLD = 0.5
const MIN_ROWS_FOR_ALERT = 10

export function createRunMetrics(runId: string, range: DateRange, startedAt: Date): RunMetrics {
  return {
    run_id: runId,
    start_date: range.start,
    end_date: range.end,
    start_time: startedAt.toISOString(),
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
  }
}

export function successRate(valid: number, seen: number): number {
  return seen === 0 ? 0 : valid / seen
}

export function countRejection(metrics: RunMetrics, reason: RejectionReason): void {
  metrics.rows_rejected += 1
  metrics.rejections[reason] = (metrics.rejections[reason] ?? 0) + 1
}

/**
 * Stamp end time, duration and success rate.
 */
export function finalizeRunMetrics(metrics: RunMetrics, endedAt: Date): RunMetrics {
  metrics.end_time = endedAt.toISOString()
  metrics.duration_seconds = Math.max(0, (endedAt.getTime() - Date.parse(metrics.start_time)) / 1000)
  metrics.success_rate = successRate(metrics.rows_valid, metrics.rows_seen)
  return metrics
}

export function recordRunCompleted(
  metrics: RunMetrics,
  storage: StorageResult,
  log: ILogger = loggers.metrics
): void {
  log.info('DRAWS_RUN_COMPLETED', {
    event_name: 'DRAWS_RUN_COMPLETED',
    ...metrics,
    storage_status: storage.status,
    destination: storage.destination,
    record_count: storage.record_count,
  })

  if (metrics.rows_seen >= MIN_ROWS_FOR_ALERT && metrics.success_rate < LOW_SUCCESS_RATE_THRESHOLD) {
    log.warn('DRAWS_ALERT_LOW_SUCCESS_RATE', {
      event_name: 'DRAWS_ALERT_LOW_SUCCESS_RATE',
      run_id: metrics.run_id,
      success_rate: metrics.success_rate,
      rows_seen: metrics.rows_seen,
      rejections: metrics.rejections,
    })
  }
}

export function recordRunFailed(
  metrics: RunMetrics,
  error: unknown,
  failedAt: string,
  log: ILogger = loggers.metrics
): void {
  log.error(
    'DRAWS_RUN_FAILED',
    {
      event_name: 'DRAWS_RUN_FAILED',
      ...metrics,
      failed_at: failedAt,
      ...formatErrorForLog(classifyError(error)),
    },
    error
  )
}
