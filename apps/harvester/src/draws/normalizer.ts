/**
 * Record Normalizer
 *
 * Turns one scraped row into a CanonicalRecord or a rejection. Pure: no I/O,
 * no logging, the processing timestamp comes in through options.
 *
 * Checks run in order and the first failure wins:
 * date → time → number → animal → number/animal cross-check.
 */

import { animalForNumber, DRAW_SOURCE, isAnimalLabel, isDrawNumber } from './catalog.js'
import { foldText, parseDrawDate, parseDrawTime } from './parse.js'
import type {
  CanonicalRecord,
  MismatchPolicy,
  NormalizeOptions,
  NormalizeResult,
  RawRow,
  RecordFlag,
} from './types.js'
import { RejectionReason } from './types.js'

export const DEFAULT_MISSING_TIME = '00:00:00'

export const DEFAULT_MISMATCH_POLICY: MismatchPolicy = 'reject'

function reject(row: RawRow, reason: RejectionReason, detail: string): NormalizeResult {
  return { status: 'rejected', reason, row, detail }
}

/**
 * Canonical draw number token, or null when outside the enumeration.
 * "0" and "00" are different draws and stay as written; 1-9 are padded.
 */
export function normalizeDrawNumber(value: string): string | null {
  const text = value.trim()
  if (!/^\d{1,2}$/.test(text)) {
    return null
  }
  const token = text === '0' || text === '00' ? text : String(Number(text)).padStart(2, '0')
  return isDrawNumber(token) ? token : null
}

/**
 * Canonical animal label (upper-case, accent-free), or null when unknown.
 */
export function normalizeAnimal(value: string): string | null {
  const label = foldText(value).toUpperCase()
  return label && isAnimalLabel(label) ? label : null
}

export function normalizeRow(row: RawRow, options: NormalizeOptions = {}): NormalizeResult {
  const policy = options.mismatchPolicy ?? DEFAULT_MISMATCH_POLICY
  const flags: RecordFlag[] = []

  const date = parseDrawDate(row.date)
  if (!date) {
    return reject(row, RejectionReason.BadDate, `unrecognised date "${row.date}"`)
  }

  let time = DEFAULT_MISSING_TIME
  if (row.time === null || row.time.trim() === '') {
    flags.push('MISSING_TIME')
  } else {
    const parsed = parseDrawTime(row.time)
    if (!parsed) {
      return reject(row, RejectionReason.BadTime, `unrecognised time "${row.time}"`)
    }
    time = parsed
  }

  const number = normalizeDrawNumber(row.number)
  if (!number) {
    return reject(row, RejectionReason.BadNumber, `number "${row.number}" is not a draw number`)
  }

  const animal = normalizeAnimal(row.animal)
  if (!animal) {
    return reject(row, RejectionReason.UnknownAnimal, `unknown animal "${row.animal}"`)
  }

  let valid = true
  const expected = animalForNumber(number)
  if (expected !== animal) {
    const detail = `number ${number} is ${expected ?? 'unmapped'}, row says ${animal}`
    if (policy === 'reject') {
      return reject(row, RejectionReason.NumberAnimalMismatch, detail)
    }
    flags.push('NUMBER_ANIMAL_MISMATCH')
    valid = false
  }

  const record: CanonicalRecord = {
    date,
    time,
    number,
    animal,
    source: DRAW_SOURCE,
    processed_at: (options.now ?? new Date()).toISOString(),
    row_index: row.rowIndex,
    valid,
  }

  return { status: 'ok', record, flags }
}
