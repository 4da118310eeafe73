/**
 * Draw Pipeline Orchestrator
 *
 * One run walks a fixed state machine:
 *
 *   idle → fetching → normalizing → deduplicating → saving → done
 *
 * with `failed` reachable from every non-terminal state. Stages never retry
 * each other; only the fetcher retries, internally.
 *
 * run() resolves to a RunOutcome instead of throwing, so "done with zero
 * records" and "failed" are distinct results. Misuse (a run while another is
 * in flight, a run after close) rejects with ValidationError.
 */

import { createId } from '@paralleldrive/cuid2'
import type { ILogger } from '@sorteo/logger'
import { loggers } from '../config/logger.js'
import type { PipelineConfig } from '../config/pipeline.js'
import { dedupeRecords } from './dedupe.js'
import {
  CancelledError,
  ERROR_CODES,
  PipelineError,
  ProcessingError,
  SavingError,
  ScrapingError,
  ValidationError,
  describeCause,
} from './errors.js'
import { buildEndpointUrl, DrawFetcher, validateDateRange, type Sleep } from './fetcher.js'
import {
  countRejection,
  createRunMetrics,
  finalizeRunMetrics,
  recordRunCompleted,
  recordRunFailed,
} from './metrics.js'
import { normalizeRow } from './normalizer.js'
import { addDays, splitRange, toLocalIsoDate } from './parse.js'
import { BatchStore } from './store.js'
import { FetchTransport, type HttpTransport } from './transport.js'
import type { CanonicalRecord, DateRange, RawRow, RunMetrics, StorageResult } from './types.js'

// ═══════════════════════════════════════════════════════════════════════════════
// State machine
// ═══════════════════════════════════════════════════════════════════════════════

export type PipelineState = 'idle' | 'fetching' | 'normalizing' | 'deduplicating' | 'saving' | 'done' | 'failed'

export type StageState = Exclude<PipelineState, 'done' | 'failed'>

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  idle: ['fetching', 'failed'],
  fetching: ['normalizing', 'failed'],
  normalizing: ['deduplicating', 'failed'],
  deduplicating: ['saving', 'failed'],
  saving: ['done', 'failed'],
  done: [],
  failed: [],
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to)
}

/**
 * Per-run state holder. An illegal transition is a bug in the orchestrator,
 * not a run failure, so it throws a plain Error.
 */
export class RunStateMachine {
  private current: PipelineState = 'idle'
  private readonly history: PipelineState[] = ['idle']

  get state(): PipelineState {
    return this.current
  }

  get path(): readonly PipelineState[] {
    return this.history
  }

  transition(to: PipelineState): void {
    if (!canTransition(this.current, to)) {
      throw new Error(`Illegal pipeline transition ${this.current} → ${to}`)
    }
    this.current = to
    this.history.push(to)
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Outcomes
// ═══════════════════════════════════════════════════════════════════════════════

export interface RunDone {
  status: 'done'
  /** Valid, deduplicated records as persisted */
  records: CanonicalRecord[]
  /** Mismatched records kept under the `flag` policy; never persisted */
  flagged: CanonicalRecord[]
  metrics: RunMetrics
  storage: StorageResult
}

export interface RunFailed {
  status: 'failed'
  error: PipelineError
  /** Stage that was running when the failure happened */
  failedAt: StageState
  metrics: RunMetrics
}

export type RunOutcome = RunDone | RunFailed

export interface RunOptions {
  signal?: AbortSignal
}

export interface BackfillOptions extends RunOptions {
  /** Days per fetched window; defaults to 7 */
  windowDays?: number
}

export const DEFAULT_BACKFILL_WINDOW_DAYS = 7

export interface DrawPipelineDeps {
  fetcher: DrawFetcher
  store: BatchStore
  logger?: ILogger
  /** Logger for run-level events (DRAWS_RUN_*) */
  metricsLogger?: ILogger
  now?: () => Date
  createRunId?: () => string
}

interface NormalizedRows {
  accepted: CanonicalRecord[]
  flagged: CanonicalRecord[]
}

/** Windows to fetch, validated; throws ValidationError for bad input */
type RunPlan = () => DateRange[]

function isStageState(state: PipelineState): state is StageState {
  return state !== 'done' && state !== 'failed'
}

export class DrawPipeline {
  private readonly log: ILogger
  private readonly metricsLog: ILogger
  private readonly now: () => Date
  private readonly createRunId: () => string
  private running = false
  private closed = false
  private machine: RunStateMachine | null = null

  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: DrawPipelineDeps
  ) {
    this.log = deps.logger ?? loggers.pipeline
    this.metricsLog = deps.metricsLogger ?? loggers.metrics
    this.now = deps.now ?? (() => new Date())
    this.createRunId = deps.createRunId ?? createId
  }

  /** State of the current run, or of the last one; `idle` before any run */
  get state(): PipelineState {
    return this.machine?.state ?? 'idle'
  }

  get isClosed(): boolean {
    return this.closed
  }

  async run(startDate: string, endDate: string, options: RunOptions = {}): Promise<RunOutcome> {
    const range = { start: startDate, end: endDate }
    return this.execute(range, () => {
      validateDateRange(range, this.config.maxRangeDays)
      return [range]
    }, options.signal)
  }

  /**
   * Fetch the last `days` days up to today (local calendar date).
   * `days` must be a whole number of zero or more; 0 fetches today only.
   */
  async getLatestData(days = 7, options: RunOptions = {}): Promise<RunOutcome> {
    const today = toLocalIsoDate(this.now())
    const wellFormed = Number.isInteger(days) && days >= 0
    const range = { start: wellFormed ? addDays(today, -days) : today, end: today }
    return this.execute(range, () => {
      if (!wellFormed) {
        throw new ValidationError(`Days back must be a whole number of zero or more, got ${days}`, {
          code: ERROR_CODES.INVALID_DATE_RANGE,
          details: { days },
        })
      }
      validateDateRange(range, this.config.maxRangeDays)
      return [range]
    }, options.signal)
  }

  /**
   * Fetch a long range as consecutive windows and save one batch.
   * Any window failure fails the run; nothing partial is saved.
   */
  async backfill(startDate: string, endDate: string, options: BackfillOptions = {}): Promise<RunOutcome> {
    const range = { start: startDate, end: endDate }
    const windowDays = options.windowDays ?? DEFAULT_BACKFILL_WINDOW_DAYS
    return this.execute(range, () => {
      if (!Number.isInteger(windowDays) || windowDays < 1 || windowDays > this.config.maxRangeDays) {
        const limit = this.config.maxRangeDays
        throw new ValidationError(`Window of ${windowDays} days must be a whole number from 1 to ${limit}`, {
          code: ERROR_CODES.INVALID_DATE_RANGE,
          details: { windowDays },
        })
      }
      // Windows are bounded individually; the overall range only has to be well-formed
      validateDateRange(range, Number.POSITIVE_INFINITY)
      return splitRange(range.start, range.end, windowDays)
    }, options.signal)
  }

  /** Release the transport. Safe to call more than once. */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.deps.fetcher.close()
    this.log.info('Pipeline closed')
  }

  private async execute(
    range: DateRange,
    plan: RunPlan,
    signal: AbortSignal | undefined
  ): Promise<RunOutcome> {
    if (this.closed) {
      throw new ValidationError('Pipeline is closed', { code: ERROR_CODES.PIPELINE_CLOSED })
    }
    if (this.running) {
      throw new ValidationError('A run is already in progress', { code: ERROR_CODES.PIPELINE_BUSY })
    }

    this.running = true
    try {
      return await this.runStages(range, plan, signal)
    } finally {
      this.running = false
    }
  }

  private async runStages(
    range: DateRange,
    plan: RunPlan,
    signal: AbortSignal | undefined
  ): Promise<RunOutcome> {
    const machine = new RunStateMachine()
    this.machine = machine
    const metrics = createRunMetrics(this.createRunId(), range, this.now())
    const log = this.log.child({ runId: metrics.run_id })

    const fail = (error: unknown): RunFailed => {
      const current = machine.state
      const failedAt = isStageState(current) ? current : 'idle'
      const stageError = this.toStageError(failedAt, error, range)
      machine.transition('failed')
      finalizeRunMetrics(metrics, this.now())
      recordRunFailed(metrics, stageError, failedAt, this.metricsLog)
      return { status: 'failed', error: stageError, failedAt, metrics }
    }

    log.info('Run started', { startDate: range.start, endDate: range.end })

    // fetching
    machine.transition('fetching')
    let rows: RawRow[]
    try {
      rows = await this.fetchRows(plan(), metrics, signal)
    } catch (error) {
      if (error instanceof ScrapingError) {
        metrics.fetch_attempts += error.attempts
      }
      return fail(error)
    }

    // normalizing
    machine.transition('normalizing')
    let normalized: NormalizedRows
    try {
      normalized = this.normalizeRows(rows, metrics, log)
    } catch (error) {
      return fail(error)
    }
    const { accepted, flagged } = normalized

    // deduplicating
    machine.transition('deduplicating')
    const records = dedupeRecords(accepted)
    metrics.rows_deduplicated = accepted.length - records.length
    if (metrics.rows_deduplicated > 0) {
      log.info('Duplicate draws collapsed', { removed: metrics.rows_deduplicated, kept: records.length })
    }

    // saving
    machine.transition('saving')
    let storage: StorageResult
    try {
      if (signal?.aborted) {
        throw new CancelledError('Run cancelled before saving')
      }
      finalizeRunMetrics(metrics, this.now())
      storage = await this.deps.store.save(records, metrics, { signal: this.saveSignal(signal) })
    } catch (error) {
      return fail(error)
    }
    metrics.bytes_written = storage.bytes_written

    machine.transition('done')
    recordRunCompleted(metrics, storage, this.metricsLog)
    return { status: 'done', records, flagged, metrics, storage }
  }

  /** The write is bounded by `timeoutMs` as well as by the run's own signal */
  private saveSignal(signal: AbortSignal | undefined): AbortSignal {
    const timeout = AbortSignal.timeout(this.config.timeoutMs)
    return signal ? AbortSignal.any([signal, timeout]) : timeout
  }

  /**
   * Rows of every window in order. `rowIndex` is renumbered to the row's
   * position across the whole run.
   */
  private async fetchRows(windows: DateRange[], metrics: RunMetrics, signal: AbortSignal | undefined): Promise<RawRow[]> {
    const rows: RawRow[] = []
    for (const window of windows) {
      const outcome = await this.deps.fetcher.fetch(window, { signal })
      metrics.fetch_attempts += outcome.attempts
      const offset = rows.length
      rows.push(...outcome.rows.map(row => ({ ...row, rowIndex: offset + row.rowIndex })))
    }
    return rows
  }

  private normalizeRows(
    rows: readonly RawRow[],
    metrics: RunMetrics,
    log: ILogger
  ): NormalizedRows {
    const accepted: CanonicalRecord[] = []
    const flagged: CanonicalRecord[] = []
    const now = this.now()

    for (const row of rows) {
      metrics.rows_seen += 1
      const result = normalizeRow(row, { mismatchPolicy: this.config.mismatchPolicy, now })

      if (result.status === 'rejected') {
        countRejection(metrics, result.reason)
        log.debug('Row rejected', { rowIndex: row.rowIndex, reason: result.reason, detail: result.detail })
        continue
      }

      if (result.record.valid) {
        metrics.rows_valid += 1
        accepted.push(result.record)
      } else {
        metrics.rows_flagged += 1
        flagged.push(result.record)
        log.warn('Row flagged', { rowIndex: row.rowIndex, flags: result.flags })
      }
    }

    log.info('Rows normalized', {
      seen: metrics.rows_seen,
      valid: metrics.rows_valid,
      rejected: metrics.rows_rejected,
      flagged: metrics.rows_flagged,
    })
    return { accepted, flagged }
  }

  /**
   * Anything that is not already a PipelineError is wrapped in the error
   * type of the stage it escaped from.
   */
  private toStageError(stage: StageState, error: unknown, range: DateRange): PipelineError {
    if (error instanceof PipelineError) {
      return error
    }
    const message = `Unexpected failure while ${stage}: ${describeCause(error)}`
    switch (stage) {
      case 'idle':
      case 'fetching':
        return new ScrapingError(message, {
          code: ERROR_CODES.UNEXPECTED_ERROR,
          attempts: 0,
          range,
          url: buildEndpointUrl(this.config.endpointTemplate, range),
          lastCause: describeCause(error),
          cause: error,
        })
      case 'normalizing':
      case 'deduplicating':
        return new ProcessingError(message, { cause: error })
      case 'saving':
        return new SavingError(message, { destination: this.deps.store.outputDir, cause: error })
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Factory
// ═══════════════════════════════════════════════════════════════════════════════

export interface CreateDrawPipelineOptions {
  transport?: HttpTransport
  sleep?: Sleep
  now?: () => Date
  createRunId?: () => string
  logger?: ILogger
}

/**
 * Wire fetcher, store and orchestrator from a resolved config.
 * Defaults: FetchTransport, real timers, the wall clock, harvester loggers.
 */
export function createDrawPipeline(config: PipelineConfig, options: CreateDrawPipelineOptions = {}): DrawPipeline {
  const logger = options.logger
  const fetcher = new DrawFetcher(config, {
    transport: options.transport ?? new FetchTransport(),
    logger: logger?.child('fetcher') ?? loggers.fetcher,
    sleep: options.sleep,
  })
  const store = new BatchStore(config, {
    logger: logger?.child('store') ?? loggers.store,
    now: options.now,
  })
  return new DrawPipeline(config, {
    fetcher,
    store,
    logger: logger?.child('pipeline'),
    metricsLogger: logger?.child('metrics'),
    now: options.now,
    createRunId: options.createRunId,
  })
}
