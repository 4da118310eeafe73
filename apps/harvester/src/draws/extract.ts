/**
 * Results Page Extraction
 *
 * Pulls raw draw rows out of the historical results page. The page layout is
 * not under our control, so the extractor tries a short list of table
 * selectors and reports one of three outcomes:
 *
 * - rows: at least one row with date, number and animal cells
 * - empty: a results table without data rows, or an explicit "no results" notice
 * - malformed: nothing recognisable (blank body, error page, layout change)
 *
 * Expected cell order: date, number, animal, time (time optional). Shorter
 * rows are still returned, with the missing fields blank, so normalization
 * rejects and counts them.
 *
 * Single-day pages have no table. Each draw is a `div.col-sm-6` block with
 * an `h4` title ("13 Mono") and an `h5` schedule ("Lotto Activo 08:00 AM").
 * Those blocks carry no date; it comes from `pageDate`.
 */

import * as cheerio from 'cheerio'
import type { RawRow } from './types.js'

export type ExtractOutcome =
  | { kind: 'rows'; rows: RawRow[]; selector: string }
  | { kind: 'empty'; reason: string }
  | { kind: 'malformed'; reason: string }

const ROW_SELECTORS = [
  'table#table tbody tr',
  '.results-table tbody tr',
  '.lotto-table tbody tr',
  'table tbody tr',
  'table tr',
]

const NO_RESULTS_PATTERNS = [
  /no hay resultados/i,
  /no se encontraron resultados/i,
  /sin resultados/i,
  /no results/i,
]

const MIN_CELLS = 3

const BLOCK_SELECTOR = 'div.col-sm-6'

const TIME_IN_TEXT = /\d{1,2}:\d{2}(?::\d{2})?\s*(?:[ap]\.?\s*m\.?)?/i

export interface ExtractOptions {
  /** `YYYY-MM-DD` of a single-day page; blank for block rows when absent */
  pageDate?: string
}

function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

export function extractDrawRows(html: string, options: ExtractOptions = {}): ExtractOutcome {
  if (!html.trim()) {
    return { kind: 'malformed', reason: 'empty response body' }
  }

  const $ = loadHtml(html)

  for (const selector of ROW_SELECTORS) {
    const matched = $(selector)
    if (matched.length === 0) {
      continue
    }

    // Header rows carry only <th> cells
    const dataRows = matched.toArray().filter(row => $(row).find('td').length > 0)
    if (dataRows.length === 0) {
      return { kind: 'empty', reason: `results table without data rows (${selector})` }
    }

    let complete = 0
    const rows = dataRows.map((element, index): RawRow => {
      const cells = $(element)
        .find('td, th')
        .toArray()
        .map(cell => squash($(cell).text()))
        .filter(text => text.length > 0)
      if (cells.length >= MIN_CELLS) {
        complete++
      }
      return {
        date: cells[0] ?? '',
        number: cells[1] ?? '',
        animal: cells[2] ?? '',
        time: cells[3] ?? null,
        rowIndex: index,
      }
    })

    if (complete === 0) {
      return { kind: 'malformed', reason: `no row has ${MIN_CELLS} or more cells (${selector})` }
    }

    return { kind: 'rows', rows, selector }
  }

  const blockRows = extractBlockRows($, options.pageDate ?? '')
  if (blockRows.length > 0) {
    return { kind: 'rows', rows: blockRows, selector: BLOCK_SELECTOR }
  }

  const text = $('body').text()
  if (NO_RESULTS_PATTERNS.some(pattern => pattern.test(text))) {
    return { kind: 'empty', reason: 'page reports no results' }
  }

  return { kind: 'malformed', reason: 'no results table found' }
}

/**
 * Draw blocks of a single-day page. Blocks without an `h4` title are layout
 * columns, not draws, and are skipped.
 */
function extractBlockRows($: cheerio.CheerioAPI, pageDate: string): RawRow[] {
  const rows: RawRow[] = []
  for (const block of $(BLOCK_SELECTOR).toArray()) {
    const title = squash($(block).find('h4').first().text())
    if (!title) {
      continue
    }
    const space = title.indexOf(' ')
    const schedule = squash($(block).find('h5').first().text())
    rows.push({
      date: pageDate,
      number: space > 0 ? title.slice(0, space) : title,
      animal: space > 0 ? title.slice(space + 1) : '',
      time: schedule ? (TIME_IN_TEXT.exec(schedule)?.[0] ?? schedule) : null,
      rowIndex: rows.length,
    })
  }
  return rows
}
