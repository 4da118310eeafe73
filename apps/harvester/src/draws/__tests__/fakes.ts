import { createLogger, type ILogger, type LogEntry, type LogSink } from '@sorteo/logger'
import type { HttpTransport, TransportErrorKind, TransportRequest, TransportResponse } from '../transport.js'

/**
 * Scripted transport: answers each get() with the next queued response.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: Array<{ url: string; request: TransportRequest }> = []
  closed = false

  constructor(private readonly responses: Array<TransportResponse | Error> = []) {}

  enqueue(...responses: Array<TransportResponse | Error>): this {
    this.responses.push(...responses)
    return this
  }

  async get(url: string, request: TransportRequest): Promise<TransportResponse> {
    this.requests.push({ url, request })
    const next = this.responses.shift()
    if (next === undefined) {
      throw new Error(`unexpected request to ${url}`)
    }
    if (next instanceof Error) {
      throw next
    }
    return next
  }

  close(): void {
    this.closed = true
  }
}

export function page(html: string, statusCode = 200): TransportResponse {
  return { statusCode, body: html, bytes: Buffer.byteLength(html), error: null }
}

export function transportError(kind: TransportErrorKind, message = `${kind} failure`): TransportResponse {
  return { statusCode: null, body: '', bytes: 0, error: { kind, message } }
}

export interface DrawCells {
  date: string
  number: string
  animal: string
  time?: string
}

export function resultsPage(rows: DrawCells[]): string {
  const body = rows
    .map(
      row =>
        `<tr><td>${row.date}</td><td>${row.number}</td><td>${row.animal}</td>${row.time ? `<td>${row.time}</td>` : ''}</tr>`
    )
    .join('\n')
  return `<html><body><table id="table"><tbody>\n${body}\n</tbody></table></body></html>`
}

export const EMPTY_PAGE = '<html><body><p>No hay resultados</p></body></html>'

export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = []

  write(entry: LogEntry): void {
    this.entries.push(entry)
  }

  messages(): string[] {
    return this.entries.map(entry => entry.message)
  }
}

export function memoryLogger(): { logger: ILogger; sink: MemorySink } {
  const sink = new MemorySink()
  return { logger: createLogger('test', { level: 'debug', sinks: [sink] }), sink }
}
