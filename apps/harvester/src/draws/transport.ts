/**
 * HTTP Transport
 *
 * The single outbound capability the pipeline needs:
 * GET(url) -> (status code, body, error | null).
 *
 * Transport never throws for network conditions; failures come back as a
 * TransportError so the fetcher can classify them. Retries live in the
 * fetcher, not here.
 */

export type TransportErrorKind =
  | 'timeout' // no complete response within timeoutMs
  | 'network' // DNS, refused, reset, TLS
  | 'too_large' // declared or streamed body above maxBytes
  | 'closed' // transport already closed

export interface TransportError {
  kind: TransportErrorKind
  message: string
}

export interface TransportResponse {
  /** null when no response was received */
  statusCode: number | null
  body: string
  /** Body size in bytes as received */
  bytes: number
  error: TransportError | null
}

export interface TransportRequest {
  timeoutMs: number
  maxBytes: number
}

export interface HttpTransport {
  get(url: string, request: TransportRequest): Promise<TransportResponse>
  /** Release sockets and abort anything in flight. Idempotent. */
  close(): void
}

/**
 * Default headers. Spanish first: the source localizes month names.
 */
export const DEFAULT_REQUEST_HEADERS = {
  'User-Agent': 'sorteo-harvester/0.1 (+scheduled results import)',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'es-ES,es;q=0.9,en;q=0.8',
  'Cache-Control': 'no-cache',
} as const

export interface FetchTransportOptions {
  headers?: Record<string, string>
}

/**
 * Transport over the native fetch API with an AbortController timeout and a
 * streamed size limit.
 */
export class FetchTransport implements HttpTransport {
  private readonly headers: Record<string, string>
  private readonly inFlight = new Set<AbortController>()
  private closed = false

  constructor(options: FetchTransportOptions = {}) {
    this.headers = { ...DEFAULT_REQUEST_HEADERS, ...(options.headers ?? {}) }
  }

  async get(url: string, request: TransportRequest): Promise<TransportResponse> {
    if (this.closed) {
      return failure('closed', 'transport is closed')
    }

    const controller = new AbortController()
    this.inFlight.add(controller)
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, request.timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: this.headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      const contentLength = response.headers.get('content-length')
      if (contentLength && Number.parseInt(contentLength, 10) > request.maxBytes) {
        await response.body?.cancel()
        return {
          statusCode: response.status,
          body: '',
          bytes: Number.parseInt(contentLength, 10),
          error: { kind: 'too_large', message: `declared ${contentLength} bytes` },
        }
      }

      const body = await readBodyWithLimit(response, request.maxBytes)
      if (body === null) {
        return {
          statusCode: response.status,
          body: '',
          bytes: request.maxBytes + 1,
          error: { kind: 'too_large', message: `body exceeded ${request.maxBytes} bytes` },
        }
      }

      return { statusCode: response.status, body: body.text, bytes: body.bytes, error: null }
    } catch (error) {
      if (timedOut) {
        return failure('timeout', `request timed out after ${request.timeoutMs}ms`)
      }
      if (controller.signal.aborted) {
        return failure('closed', 'request aborted by close()')
      }
      return failure('network', error instanceof Error ? describeFetchError(error) : String(error))
    } finally {
      clearTimeout(timeoutId)
      this.inFlight.delete(controller)
    }
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const controller of this.inFlight) {
      controller.abort()
    }
    this.inFlight.clear()
  }
}

function failure(kind: TransportErrorKind, message: string): TransportResponse {
  return { statusCode: null, body: '', bytes: 0, error: { kind, message } }
}

/**
 * undici wraps the socket error in `cause`; surface its code.
 */
function describeFetchError(error: Error): string {
  const cause = error.cause
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? ` (${cause.code})` : ''
    return `${error.message}: ${cause.message}${code}`
  }
  return error.message
}

/**
 * Read the body, giving up as soon as it passes maxBytes.
 * Returns null when the limit was exceeded.
 */
async function readBodyWithLimit(
  response: Response,
  maxBytes: number
): Promise<{ text: string; bytes: number } | null> {
  const reader = response.body?.getReader()
  if (!reader) {
    return { text: '', bytes: 0 }
  }

  const chunks: Uint8Array[] = []
  let totalSize = 0

  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) break

      totalSize += value.length
      if (totalSize > maxBytes) {
        await reader.cancel()
        return null
      }

      chunks.push(value)
    }

    return { text: new TextDecoder('utf-8').decode(Buffer.concat(chunks)), bytes: totalSize }
  } finally {
    reader.releaseLock()
  }
}
