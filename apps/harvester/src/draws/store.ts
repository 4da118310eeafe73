/**
 * Bounded Batch Store
 *
 * One run → one batch: `<id>.json` holds the records array and
 * `<id>.metrics.json` the run metrics. Ids look like
 * `lotto-activo_20250115T143000123Z_00`, so a plain string sort is creation
 * order. Existing batches are never overwritten.
 *
 * Writes go to a hidden temp file in the output directory and are renamed
 * into place. A batch is either fully present (both files) or absent.
 *
 * Only `valid: true` records are stored. A save can be aborted through its
 * signal: a timeout reason becomes SavingError (WRITE_TIMEOUT), any other
 * reason CancelledError. The abort cuts an in-progress file write short and
 * is checked between the steps of the save.
 */

import { randomBytes } from 'node:crypto'
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ILogger } from '@sorteo/logger'
import { z } from 'zod'
import { maxDataSizeBytes, type PipelineConfig } from '../config/pipeline.js'
import { CancelledError, ERROR_CODES, PipelineError, SavingError, describeCause } from './errors.js'
import { RejectionReason } from './types.js'
import type { CanonicalRecord, RunMetrics, StorageResult, StoredBatch } from './types.js'

export type StoreConfig = Pick<PipelineConfig, 'outputDir' | 'filePrefix' | 'maxDataSizeMb'>

export interface BatchStoreDeps {
  logger: ILogger
  now?: () => Date
}

export interface SaveOptions {
  signal?: AbortSignal
}

const MAX_SEQ = 99
const METRICS_SUFFIX = '.metrics.json'

// ═══════════════════════════════════════════════════════════════════════════════
// Read-back schemas
// ═══════════════════════════════════════════════════════════════════════════════

const canonicalRecordSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  time: z.string().regex(/^\d{2}:\d{2}:\d{2}$/),
  number: z.string().regex(/^(?:0|\d{2})$/),
  animal: z.string().min(1),
  source: z.string().min(1),
  processed_at: z.string(),
  row_index: z.number().int().nonnegative(),
  valid: z.boolean(),
})

const rejectionCountsSchema = z
  .object({
    [RejectionReason.BadDate]: z.number().int().nonnegative(),
    [RejectionReason.BadTime]: z.number().int().nonnegative(),
    [RejectionReason.BadNumber]: z.number().int().nonnegative(),
    [RejectionReason.UnknownAnimal]: z.number().int().nonnegative(),
    [RejectionReason.NumberAnimalMismatch]: z.number().int().nonnegative(),
  })
  .partial()

const storedMetricsSchema = z.object({
  run_id: z.string(),
  start_date: z.string(),
  end_date: z.string(),
  start_time: z.string(),
  end_time: z.string().nullable(),
  duration_seconds: z.number(),
  rows_seen: z.number().int(),
  rows_valid: z.number().int(),
  rows_rejected: z.number().int(),
  rows_flagged: z.number().int(),
  rows_deduplicated: z.number().int(),
  success_rate: z.number(),
  bytes_written: z.number().int(),
  fetch_attempts: z.number().int(),
  rejections: rejectionCountsSchema,
  record_count: z.number().int(),
})

// ═══════════════════════════════════════════════════════════════════════════════
// Batch ids
// ═══════════════════════════════════════════════════════════════════════════════

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0')
}

/** UTC `yyyyMMddTHHmmssSSS` */
export function formatBatchTimestamp(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1, 2)}${pad(date.getUTCDate(), 2)}` +
    `T${pad(date.getUTCHours(), 2)}${pad(date.getUTCMinutes(), 2)}${pad(date.getUTCSeconds(), 2)}` +
    pad(date.getUTCMilliseconds(), 3)
  )
}

export function batchId(prefix: string, createdAt: Date, seq: number): string {
  return `${prefix}_${formatBatchTimestamp(createdAt)}Z_${pad(seq, 2)}`
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function abortError(signal: AbortSignal, path: string): PipelineError {
  const reason: unknown = signal.reason
  if (reason instanceof Error && reason.name === 'TimeoutError') {
    return new SavingError(`Timed out writing ${path}`, {
      code: ERROR_CODES.WRITE_TIMEOUT,
      destination: path,
      cause: reason,
    })
  }
  return new CancelledError(`Save cancelled while writing ${path}`, { details: { path }, cause: reason })
}

export class BatchStore {
  private readonly maxBytes: number
  private readonly now: () => Date
  private readonly idPattern: RegExp

  constructor(
    private readonly config: StoreConfig,
    private readonly deps: BatchStoreDeps
  ) {
    this.maxBytes = maxDataSizeBytes(config)
    this.now = deps.now ?? (() => new Date())
    this.idPattern = new RegExp(`^${config.filePrefix}_\\d{8}T\\d{9}Z_\\d{2}$`)
  }

  get outputDir(): string {
    return this.config.outputDir
  }

  dataPath(id: string): string {
    return join(this.config.outputDir, `${id}.json`)
  }

  metricsPath(id: string): string {
    return join(this.config.outputDir, `${id}${METRICS_SUFFIX}`)
  }

  async save(
    records: readonly CanonicalRecord[],
    metrics: RunMetrics,
    options: SaveOptions = {}
  ): Promise<StorageResult> {
    const log = this.deps.logger.child({ runId: metrics.run_id })
    const { signal } = options

    const invalid = records.filter(record => record.valid !== true)
    if (invalid.length > 0) {
      throw new SavingError(`Refusing to store ${invalid.length} record(s) not marked valid`, {
        code: ERROR_CODES.INVALID_RECORDS,
        destination: this.config.outputDir,
        details: { rowIndexes: invalid.map(record => record.row_index) },
      })
    }

    if (records.length === 0) {
      log.info('No records to save, skipping write')
      return { status: 'skipped', destination: null, bytes_written: 0, record_count: 0, metrics_path: null }
    }

    const payload = JSON.stringify(records, null, 2)
    const bytes = Buffer.byteLength(payload, 'utf-8')
    if (bytes > this.maxBytes) {
      throw new SavingError(
        `Batch of ${records.length} records is ${bytes} bytes, above the ${this.config.maxDataSizeMb} MB limit`,
        {
          code: ERROR_CODES.BATCH_TOO_LARGE,
          destination: this.config.outputDir,
          details: { bytes, maxBytes: this.maxBytes, recordCount: records.length },
        }
      )
    }

    this.throwIfAborted(signal, this.config.outputDir)
    try {
      await mkdir(this.config.outputDir, { recursive: true })
    } catch (error) {
      throw new SavingError(`Cannot create output directory ${this.config.outputDir}: ${describeCause(error)}`, {
        destination: this.config.outputDir,
        cause: error,
      })
    }

    const id = await this.nextId()
    const dataPath = this.dataPath(id)
    const metricsPath = this.metricsPath(id)
    const storedMetrics = { ...metrics, bytes_written: bytes, record_count: records.length }

    await this.writeAtomic(dataPath, payload, signal)
    try {
      await this.writeAtomic(metricsPath, JSON.stringify(storedMetrics, null, 2), signal)
    } catch (error) {
      await rm(dataPath, { force: true })
      throw error
    }

    log.info('Batch saved', { batchId: id, records: records.length, bytes })
    return {
      status: 'written',
      destination: id,
      bytes_written: bytes,
      record_count: records.length,
      metrics_path: metricsPath,
    }
  }

  async load(id: string): Promise<StoredBatch> {
    if (!this.idPattern.test(id)) {
      throw new SavingError(`"${id}" is not a batch id`, { code: ERROR_CODES.READ_FAILED, destination: id })
    }

    let rawRecords: unknown
    let rawMetrics: unknown
    try {
      rawRecords = JSON.parse(await readFile(this.dataPath(id), 'utf-8'))
      rawMetrics = JSON.parse(await readFile(this.metricsPath(id), 'utf-8'))
    } catch (error) {
      throw new SavingError(`Cannot read batch ${id}: ${describeCause(error)}`, {
        code: ERROR_CODES.READ_FAILED,
        destination: id,
        cause: error,
      })
    }

    const records = z.array(canonicalRecordSchema).safeParse(rawRecords)
    const metrics = storedMetricsSchema.safeParse(rawMetrics)
    if (!records.success || !metrics.success) {
      throw new SavingError(`Batch ${id} failed validation`, {
        code: ERROR_CODES.READ_FAILED,
        destination: id,
        cause: records.error ?? metrics.error,
      })
    }

    return { id, records: records.data, metrics: metrics.data }
  }

  /** Batch ids, oldest first. A missing output directory lists as empty. */
  async list(): Promise<string[]> {
    let names: string[]
    try {
      names = await readdir(this.config.outputDir)
    } catch (error) {
      if (isNotFound(error)) return []
      throw new SavingError(`Cannot list ${this.config.outputDir}: ${describeCause(error)}`, {
        code: ERROR_CODES.READ_FAILED,
        destination: this.config.outputDir,
        cause: error,
      })
    }

    return names
      .filter(name => name.endsWith('.json') && !name.endsWith(METRICS_SUFFIX))
      .map(name => name.slice(0, -'.json'.length))
      .filter(id => this.idPattern.test(id))
      .sort()
  }

  private async nextId(): Promise<string> {
    const createdAt = this.now()
    for (let seq = 0; seq <= MAX_SEQ; seq++) {
      const id = batchId(this.config.filePrefix, createdAt, seq)
      if (!(await this.exists(this.dataPath(id)))) {
        return id
      }
    }
    throw new SavingError(`No free batch id left for ${formatBatchTimestamp(createdAt)}`, {
      destination: this.config.outputDir,
    })
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await stat(path)
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      throw new SavingError(`Cannot inspect ${path}: ${describeCause(error)}`, { destination: path, cause: error })
    }
  }

  private throwIfAborted(signal: AbortSignal | undefined, path: string): void {
    if (signal?.aborted) {
      throw abortError(signal, path)
    }
  }

  private async writeAtomic(path: string, content: string, signal: AbortSignal | undefined): Promise<void> {
    this.throwIfAborted(signal, path)
    const tempPath = join(this.config.outputDir, `.${randomBytes(6).toString('hex')}.tmp`)
    try {
      await writeFile(tempPath, content, { encoding: 'utf-8', flag: 'wx', signal })
      this.throwIfAborted(signal, path)
      await rename(tempPath, path)
    } catch (error) {
      await rm(tempPath, { force: true })
      if (error instanceof PipelineError) throw error
      if (signal?.aborted) throw abortError(signal, path)
      throw new SavingError(`Failed to write ${path}: ${describeCause(error)}`, { destination: path, cause: error })
    }
  }
}
