/**
 * Draw Pipeline Core Types
 *
 * Raw rows, canonical records, normalization outcomes, run metrics and the
 * storage contract shared by every stage of the harvester.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Raw input
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One results-table row exactly as scraped. Free text, untrusted.
 * Discarded after its normalization attempt.
 */
export interface RawRow {
  date: string
  number: string
  animal: string
  /** Missing on some pages; normalization defaults it */
  time: string | null
  /** 0-based position of the row among all rows fetched by the run */
  rowIndex: number
}

/** Inclusive calendar range, both ends as `YYYY-MM-DD` */
export interface DateRange {
  start: string
  end: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Canonical output
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The validated representation of one draw, as consumers read it.
 * Field names are the persisted wire names.
 */
export interface CanonicalRecord {
  /** YYYY-MM-DD */
  date: string
  /** HH:MM:SS, 24h */
  time: string
  /** "0", "00" or "01".."36" */
  number: string
  /** Upper-case, accent-free label */
  animal: string
  source: string
  /** When the row was normalized, not when the draw happened */
  processed_at: string
  row_index: number
  valid: boolean
}

// ═══════════════════════════════════════════════════════════════════════════════
// Normalization outcome
// ═══════════════════════════════════════════════════════════════════════════════

export const RejectionReason = {
  BadDate: 'BAD_DATE',
  BadTime: 'BAD_TIME',
  BadNumber: 'BAD_NUMBER',
  UnknownAnimal: 'UNKNOWN_ANIMAL',
  NumberAnimalMismatch: 'NUMBER_ANIMAL_MISMATCH',
} as const

export type RejectionReason = (typeof RejectionReason)[keyof typeof RejectionReason]

/**
 * Non-fatal data-quality notes attached to an accepted record.
 */
export type RecordFlag =
  | 'MISSING_TIME' // time absent on the page, defaulted to 00:00:00
  | 'NUMBER_ANIMAL_MISMATCH' // kept under the `flag` policy, valid=false

/**
 * What to do when the number and the animal disagree.
 * - reject: the row is rejected with NUMBER_ANIMAL_MISMATCH
 * - flag: the record is kept with valid=false and never persisted
 */
export type MismatchPolicy = 'reject' | 'flag'

export type NormalizeResult =
  | { status: 'ok'; record: CanonicalRecord; flags: RecordFlag[] }
  | { status: 'rejected'; reason: RejectionReason; row: RawRow; detail: string }

export interface NormalizeOptions {
  mismatchPolicy?: MismatchPolicy
  /** Processing timestamp; injected to keep normalization pure */
  now?: Date
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run metrics & storage
// ═══════════════════════════════════════════════════════════════════════════════

export interface RunMetrics {
  run_id: string
  start_date: string
  end_date: string
  start_time: string
  end_time: string | null
  duration_seconds: number
  rows_seen: number
  rows_valid: number
  rows_rejected: number
  rows_flagged: number
  rows_deduplicated: number
  /** rows_valid / rows_seen, 0 when nothing was seen */
  success_rate: number
  bytes_written: number
  fetch_attempts: number
  rejections: Partial<Record<RejectionReason, number>>
}

export interface StorageResult {
  status: 'written' | 'skipped'
  /** Batch identifier, null when nothing was written */
  destination: string | null
  bytes_written: number
  record_count: number
  /** Path of the sibling metrics file, null when nothing was written */
  metrics_path: string | null
}

export interface StoredBatch {
  id: string
  records: CanonicalRecord[]
  metrics: RunMetrics & { record_count: number }
}
