/**
 * Date and time parsing for scraped draw rows, plus the small amount of
 * calendar arithmetic the pipeline needs. All calendar math runs in UTC on
 * `YYYY-MM-DD` strings so the host timezone never shifts a draw date.
 */

const MONTHS: Record<string, number> = {
  enero: 1,
  febrero: 2,
  marzo: 3,
  abril: 4,
  mayo: 5,
  junio: 6,
  julio: 7,
  agosto: 8,
  septiembre: 9,
  setiembre: 9,
  octubre: 10,
  noviembre: 11,
  diciembre: 12,
}

const MONTH_ABBREVIATIONS: Record<string, number> = {
  ene: 1,
  feb: 2,
  mar: 3,
  abr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  ago: 8,
  sep: 9,
  set: 9,
  oct: 10,
  nov: 11,
  dic: 12,
}

const MIN_YEAR = 1900
const MAX_YEAR = 2100

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/
const SPANISH_LONG_DATE = /^(?:[a-z]+,?\s+)?(\d{1,2})\s+de\s+([a-z]+)\s+(?:de(?:l)?\s+)?(\d{4})$/
const SPANISH_SHORT_DATE = /^(\d{1,2})[\s-]+([a-z]{3,4})\.?[\s-]+(\d{4})$/
const DAY_FIRST_DATE = /^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/

const TIME_12H = /^(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([ap])\.?\s*m\.?$/
const TIME_24H = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/

/**
 * Lower-case, strip diacritics and collapse whitespace.
 */
export function foldText(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
}

function monthNumber(name: string): number | undefined {
  if (Object.hasOwn(MONTHS, name)) return MONTHS[name]
  if (Object.hasOwn(MONTH_ABBREVIATIONS, name)) return MONTH_ABBREVIATIONS[name]
  return undefined
}

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Build an ISO date only if the day exists in that month and year.
 */
function toIsoDate(year: number, month: number, day: number): string | null {
  if (year < MIN_YEAR || year > MAX_YEAR || month < 1 || month > 12 || day < 1) {
    return null
  }
  const candidate = new Date(Date.UTC(year, month - 1, day))
  if (candidate.getUTCMonth() !== month - 1 || candidate.getUTCDate() !== day) {
    return null
  }
  return `${year}-${pad2(month)}-${pad2(day)}`
}

/**
 * Parse a scraped date into `YYYY-MM-DD`.
 *
 * Accepted: "15 de enero de 2025", "15 de Enero del 2025", "15 ene 2025",
 * "15-ene-2025", "2025-01-15", "15/01/2025", "15-01-2025".
 */
export function parseDrawDate(value: string): string | null {
  const text = foldText(value)
  if (!text) return null

  const iso = ISO_DATE.exec(text)
  if (iso) {
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]))
  }

  const long = SPANISH_LONG_DATE.exec(text)
  if (long) {
    const month = monthNumber(long[2])
    return month ? toIsoDate(Number(long[3]), month, Number(long[1])) : null
  }

  const short = SPANISH_SHORT_DATE.exec(text)
  if (short) {
    const month = monthNumber(short[2])
    return month ? toIsoDate(Number(short[3]), month, Number(short[1])) : null
  }

  const dayFirst = DAY_FIRST_DATE.exec(text)
  if (dayFirst) {
    return toIsoDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]))
  }

  return null
}

/**
 * Parse a scraped time into `HH:MM:SS` (24h).
 *
 * Accepted: "2:30 PM", "02:30:15 pm", "2:30 p. m.", "14:30", "14:30:00".
 */
export function parseDrawTime(value: string): string | null {
  const text = foldText(value)
  if (!text) return null

  const twelve = TIME_12H.exec(text)
  if (twelve) {
    let hour = Number(twelve[1])
    const minute = Number(twelve[2])
    const second = twelve[3] ? Number(twelve[3]) : 0
    if (hour < 1 || hour > 12 || minute > 59 || second > 59) {
      return null
    }
    if (twelve[4] === 'p' && hour !== 12) hour += 12
    if (twelve[4] === 'a' && hour === 12) hour = 0
    return `${pad2(hour)}:${pad2(minute)}:${pad2(second)}`
  }

  const twentyFour = TIME_24H.exec(text)
  if (twentyFour) {
    const hour = Number(twentyFour[1])
    const minute = Number(twentyFour[2])
    const second = twentyFour[3] ? Number(twentyFour[3]) : 0
    if (hour > 23 || minute > 59 || second > 59) {
      return null
    }
    return `${pad2(hour)}:${pad2(minute)}:${pad2(second)}`
  }

  return null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Calendar helpers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Strict `YYYY-MM-DD` check, including calendar validity.
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value)
  return match !== null && toIsoDate(Number(match[1]), Number(match[2]), Number(match[3])) === value
}

/**
 * Calendar date of `date` in the host's local time.
 */
export function toLocalIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`
}

function isoToUtcMs(isoDate: string): number {
  const [year, month, day] = isoDate.split('-').map(Number)
  return Date.UTC(year, month - 1, day)
}

const DAY_MS = 24 * 60 * 60 * 1000

export function addDays(isoDate: string, days: number): string {
  return new Date(isoToUtcMs(isoDate) + days * DAY_MS).toISOString().slice(0, 10)
}

/** Whole days from `start` to `end`; negative when `end` is earlier */
export function daysBetween(start: string, end: string): number {
  return Math.round((isoToUtcMs(end) - isoToUtcMs(start)) / DAY_MS)
}

/**
 * Split an inclusive range into consecutive windows of `windowDays` days.
 * The last window is clipped to `end`.
 */
export function splitRange(start: string, end: string, windowDays: number): Array<{ start: string; end: string }> {
  const windows: Array<{ start: string; end: string }> = []
  let cursor = start
  while (daysBetween(cursor, end) >= 0) {
    const windowEnd = addDays(cursor, windowDays - 1)
    windows.push({ start: cursor, end: daysBetween(windowEnd, end) < 0 ? end : windowEnd })
    cursor = addDays(cursor, windowDays)
  }
  return windows
}
