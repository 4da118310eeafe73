import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { resolvePipelineConfig, type PipelineConfigInput } from '../../config/pipeline.js'
import { CancelledError, ProcessingError, SavingError, ScrapingError, ValidationError } from '../errors.js'
import type { Sleep } from '../fetcher.js'
import { RunStateMachine, canTransition, createDrawPipeline, type RunOutcome } from '../pipeline.js'
import { BatchStore } from '../store.js'
import { EMPTY_PAGE, FakeTransport, memoryLogger, page, resultsPage, type DrawCells } from './fakes.js'

// Local noon, so the local calendar date is 2025-01-20 in any timezone
const NOW = new Date(2025, 0, 20, 12, 0, 0)
const TEMPLATE = 'https://results.test/historico/{start}/{end}/'

const LEON: DrawCells = { date: '15 de enero de 2025', number: '5', animal: 'León', time: '2:30 PM' }
const CABALLO: DrawCells = { date: '15 de enero de 2025', number: '12', animal: 'Caballo', time: '3:30 PM' }
const DRAGON: DrawCells = { date: '15 de enero de 2025', number: '20', animal: 'Dragón', time: '4:30 PM' }
const MISMATCH: DrawCells = { date: '16 de enero de 2025', number: '05', animal: 'Tigre', time: '9:00 AM' }

function expectDone(outcome: RunOutcome) {
  if (outcome.status !== 'done') {
    throw new Error(`expected done, got failed at ${outcome.failedAt}: ${outcome.error.message}`)
  }
  return outcome
}

function expectFailed(outcome: RunOutcome) {
  if (outcome.status !== 'failed') {
    throw new Error('expected failed, got done')
  }
  return outcome
}

describe('RunStateMachine', () => {
  it('walks the happy path', () => {
    const machine = new RunStateMachine()
    for (const state of ['fetching', 'normalizing', 'deduplicating', 'saving', 'done'] as const) {
      machine.transition(state)
    }
    expect(machine.path).toEqual(['idle', 'fetching', 'normalizing', 'deduplicating', 'saving', 'done'])
  })

  it('reaches failed from every non-terminal state only', () => {
    for (const state of ['idle', 'fetching', 'normalizing', 'deduplicating', 'saving'] as const) {
      expect(canTransition(state, 'failed')).toBe(true)
    }
    expect(canTransition('done', 'failed')).toBe(false)
    expect(canTransition('failed', 'idle')).toBe(false)
  })

  it('throws on an illegal transition', () => {
    const machine = new RunStateMachine()
    expect(() => machine.transition('saving')).toThrow('Illegal pipeline transition idle → saving')
  })
})

describe('DrawPipeline', () => {
  let dir: string
  let transport: FakeTransport
  let sleep: ReturnType<typeof vi.fn<Sleep>>

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'draw-pipeline-'))
    transport = new FakeTransport()
    sleep = vi.fn<Sleep>().mockResolvedValue(undefined)
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  function setup(overrides: PipelineConfigInput = {}, now: () => Date = () => NOW) {
    const config = resolvePipelineConfig({
      endpointTemplate: TEMPLATE,
      outputDir: join(dir, 'out'),
      retryDelayMs: 10,
      ...overrides,
    })
    const { logger, sink } = memoryLogger()
    const pipeline = createDrawPipeline(config, {
      transport,
      sleep,
      now,
      createRunId: () => 'run-1',
      logger,
    })
    const store = new BatchStore(config, { logger })
    return { pipeline, sink, store }
  }

  it('fetches, normalizes, deduplicates and saves one batch', async () => {
    const { pipeline, sink, store } = setup()
    transport.enqueue(page(resultsPage([LEON, CABALLO, DRAGON, LEON])))

    const outcome = expectDone(await pipeline.run('2025-01-13', '2025-01-20'))

    expect(outcome.records.map(record => `${record.number} ${record.animal}`)).toEqual(['05 LEON', '12 CABALLO'])
    expect(outcome.records[0].row_index).toBe(3)
    expect(outcome.metrics).toMatchObject({
      run_id: 'run-1',
      rows_seen: 4,
      rows_valid: 3,
      rows_rejected: 1,
      rows_flagged: 0,
      rows_deduplicated: 1,
      success_rate: 0.75,
      fetch_attempts: 1,
      rejections: { UNKNOWN_ANIMAL: 1 },
    })
    expect(outcome.storage.status).toBe('written')
    expect(outcome.storage.record_count).toBe(2)
    expect(outcome.metrics.bytes_written).toBe(outcome.storage.bytes_written)
    expect(pipeline.state).toBe('done')
    expect(transport.requests[0].url).toBe('https://results.test/historico/2025-01-13/2025-01-20/')

    const ids = await store.list()
    expect(ids).toHaveLength(1)
    expect((await store.load(ids[0])).records).toEqual(outcome.records)
    expect(sink.messages()).toContain('DRAWS_RUN_COMPLETED')
  })

  it('counts a short row as rejected instead of dropping it', async () => {
    const { pipeline } = setup()
    const html = `<table id="table"><tbody>
      <tr><td>15 de enero de 2025</td><td>5</td><td>León</td><td>2:30 PM</td></tr>
      <tr><td>15 de enero de 2025</td><td>7</td></tr>
    </tbody></table>`
    transport.enqueue(page(html))

    const outcome = expectDone(await pipeline.run('2025-01-13', '2025-01-20'))

    expect(outcome.records.map(record => record.animal)).toEqual(['LEON'])
    expect(outcome.metrics).toMatchObject({
      rows_seen: 2,
      rows_valid: 1,
      rows_rejected: 1,
      success_rate: 0.5,
      rejections: { UNKNOWN_ANIMAL: 1 },
    })
  })

  it('reads a single-day page laid out as draw blocks', async () => {
    const { pipeline } = setup()
    transport.enqueue(
      page(`<div class="row">
        <div class="col-sm-6"><h4 class="mt-3 negro">13 Mono</h4><h5>Lotto Activo 08:00 AM</h5></div>
        <div class="col-sm-6"><h4 class="mt-3 rojo">1 Carnero</h4><h5>Lotto Activo 09:00 AM</h5></div>
      </div>`)
    )

    const outcome = expectDone(await pipeline.run('2025-01-15', '2025-01-15'))

    expect(outcome.records.map(({ date, time, number, animal }) => ({ date, time, number, animal }))).toEqual([
      { date: '2025-01-15', time: '08:00:00', number: '13', animal: 'MONO' },
      { date: '2025-01-15', time: '09:00:00', number: '01', animal: 'CARNERO' },
    ])
  })

  it('completes with zero records when the source has none', async () => {
    const { pipeline, store } = setup()
    transport.enqueue(page(EMPTY_PAGE))

    const outcome = expectDone(await pipeline.run('2025-01-13', '2025-01-20'))

    expect(outcome.records).toEqual([])
    expect(outcome.storage.status).toBe('skipped')
    expect(outcome.metrics.rows_seen).toBe(0)
    expect(outcome.metrics.success_rate).toBe(0)
    expect(await store.list()).toEqual([])
  })

  it('fails at fetching once retries are exhausted', async () => {
    const { pipeline, sink, store } = setup({ maxRetries: 3 })
    transport.enqueue(page('', 503), page('', 503), page('', 503))

    const outcome = expectFailed(await pipeline.run('2025-01-13', '2025-01-20'))

    expect(outcome.failedAt).toBe('fetching')
    expect(outcome.error).toBeInstanceOf(ScrapingError)
    expect(outcome.metrics.fetch_attempts).toBe(3)
    expect(outcome.metrics.end_time).not.toBeNull()
    expect(pipeline.state).toBe('failed')
    expect(sink.messages()).toContain('DRAWS_RUN_FAILED')
    expect(await store.list()).toEqual([])
  })

  it('recovers from transient failures within the retry budget', async () => {
    const { pipeline } = setup({ maxRetries: 3 })
    transport.enqueue(page('', 503), page('', 502), page(resultsPage([LEON])))

    const outcome = expectDone(await pipeline.run('2025-01-13', '2025-01-20'))

    expect(outcome.metrics.rows_seen).toBe(1)
    expect(outcome.metrics.fetch_attempts).toBe(3)
  })

  it('fails an inverted range without touching the network', async () => {
    const { pipeline } = setup()

    const outcome = expectFailed(await pipeline.run('2025-01-20', '2025-01-13'))

    expect(outcome.failedAt).toBe('fetching')
    expect(outcome.error).toBeInstanceOf(ValidationError)
    expect(outcome.error.code).toBe('INVALID_DATE_RANGE')
    expect(transport.requests).toHaveLength(0)
  })

  it('fails at saving when the batch cannot be written', async () => {
    await writeFile(join(dir, 'blocker'), 'not a directory')
    const { pipeline } = setup({ outputDir: join(dir, 'blocker', 'out') })
    transport.enqueue(page(resultsPage([LEON])))

    const outcome = expectFailed(await pipeline.run('2025-01-13', '2025-01-20'))

    expect(outcome.failedAt).toBe('saving')
    expect(outcome.error).toBeInstanceOf(SavingError)
  })

  it('wraps an unexpected normalization failure as ProcessingError', async () => {
    let calls = 0
    // Second clock read happens inside the normalizing stage
    const { pipeline } = setup({}, () => {
      calls += 1
      if (calls === 2) throw new Error('clock unavailable')
      return NOW
    })
    transport.enqueue(page(resultsPage([LEON])))

    const outcome = expectFailed(await pipeline.run('2025-01-13', '2025-01-20'))

    expect(outcome.failedAt).toBe('normalizing')
    expect(outcome.error).toBeInstanceOf(ProcessingError)
    expect(outcome.error.message).toBe('Unexpected failure while normalizing: Error: clock unavailable')
  })

  it('fails with CancelledError when the signal is already aborted', async () => {
    const { pipeline } = setup()
    const controller = new AbortController()
    controller.abort()

    const outcome = expectFailed(await pipeline.run('2025-01-13', '2025-01-20', { signal: controller.signal }))

    expect(outcome.error).toBeInstanceOf(CancelledError)
    expect(transport.requests).toHaveLength(0)
  })

  it('fails with CancelledError and leaves no batch when cancelled while saving', async () => {
    const controller = new AbortController()
    let calls = 0
    // Fourth clock read is the store picking a batch id
    const { pipeline, store } = setup({}, () => {
      calls += 1
      if (calls === 4) controller.abort()
      return NOW
    })
    transport.enqueue(page(resultsPage([LEON])))

    const outcome = expectFailed(await pipeline.run('2025-01-13', '2025-01-20', { signal: controller.signal }))

    expect(outcome.failedAt).toBe('saving')
    expect(outcome.error).toBeInstanceOf(CancelledError)
    expect(await store.list()).toEqual([])
    expect(await readdir(join(dir, 'out'))).toEqual([])
  })

  describe('number/animal mismatch', () => {
    it('rejects mismatched rows by default', async () => {
      const { pipeline } = setup()
      transport.enqueue(page(resultsPage([LEON, MISMATCH])))

      const outcome = expectDone(await pipeline.run('2025-01-13', '2025-01-20'))

      expect(outcome.records).toHaveLength(1)
      expect(outcome.flagged).toEqual([])
      expect(outcome.metrics.rows_rejected).toBe(1)
      expect(outcome.metrics.rejections).toEqual({ NUMBER_ANIMAL_MISMATCH: 1 })
    })

    it('returns mismatched rows as flagged and never saves them under the flag policy', async () => {
      const { pipeline, store } = setup({ mismatchPolicy: 'flag' })
      transport.enqueue(page(resultsPage([LEON, MISMATCH])))

      const outcome = expectDone(await pipeline.run('2025-01-13', '2025-01-20'))

      expect(outcome.records.map(record => record.animal)).toEqual(['LEON'])
      expect(outcome.flagged).toHaveLength(1)
      expect(outcome.flagged[0]).toMatchObject({ number: '05', animal: 'TIGRE', valid: false })
      expect(outcome.metrics).toMatchObject({ rows_seen: 2, rows_valid: 1, rows_flagged: 1, rows_rejected: 0 })

      const [id] = await store.list()
      const saved: unknown = JSON.parse(await readFile(join(dir, 'out', `${id}.json`), 'utf-8'))
      expect(saved).toEqual(outcome.records)
    })
  })

  it('fetches the last N days up to the local date', async () => {
    const { pipeline } = setup()
    transport.enqueue(page(EMPTY_PAGE))

    const outcome = await pipeline.getLatestData(7)

    expect(outcome.metrics.start_date).toBe('2025-01-13')
    expect(outcome.metrics.end_date).toBe('2025-01-20')
    expect(transport.requests[0].url).toBe('https://results.test/historico/2025-01-13/2025-01-20/')
  })

  it.each([Number.NaN, -1, 2.5])('fails getLatestData(%s) without touching the network', async days => {
    const { pipeline } = setup()

    const outcome = expectFailed(await pipeline.getLatestData(days))

    expect(outcome.failedAt).toBe('fetching')
    expect(outcome.error).toBeInstanceOf(ValidationError)
    expect(outcome.error.code).toBe('INVALID_DATE_RANGE')
    expect(transport.requests).toHaveLength(0)
  })

  describe('backfill', () => {
    it('fetches consecutive windows and saves one deduplicated batch', async () => {
      const { pipeline, store } = setup()
      transport.enqueue(page(resultsPage([LEON, CABALLO])), page(resultsPage([CABALLO])))

      const outcome = expectDone(await pipeline.backfill('2025-01-01', '2025-01-08', { windowDays: 5 }))

      expect(transport.requests.map(request => request.url)).toEqual([
        'https://results.test/historico/2025-01-01/2025-01-05/',
        'https://results.test/historico/2025-01-06/2025-01-08/',
      ])
      expect(outcome.records).toHaveLength(2)
      expect(outcome.metrics).toMatchObject({ rows_seen: 3, rows_deduplicated: 1, fetch_attempts: 2 })
      expect(await store.list()).toHaveLength(1)
    })

    it('numbers rows across windows', async () => {
      const { pipeline } = setup()
      const mono: DrawCells = { date: '6 de enero de 2025', number: '13', animal: 'Mono', time: '9:00 AM' }
      transport.enqueue(page(resultsPage([LEON, CABALLO])), page(resultsPage([mono])))

      const outcome = expectDone(await pipeline.backfill('2025-01-01', '2025-01-08', { windowDays: 5 }))

      expect(outcome.records.map(record => record.row_index)).toEqual([0, 1, 2])
    })

    it('saves nothing when any window fails', async () => {
      const { pipeline, store } = setup()
      transport.enqueue(page(resultsPage([LEON])), page('gone', 404))

      const outcome = expectFailed(await pipeline.backfill('2025-01-01', '2025-01-08', { windowDays: 5 }))

      expect(outcome.error).toMatchObject({ code: 'HTTP_CLIENT_ERROR' })
      expect(outcome.metrics.fetch_attempts).toBe(2)
      expect(await store.list()).toEqual([])
    })

    it('rejects a window size of zero', async () => {
      const { pipeline } = setup()

      const outcome = expectFailed(await pipeline.backfill('2025-01-01', '2025-01-08', { windowDays: 0 }))

      expect(outcome.error).toBeInstanceOf(ValidationError)
      expect(transport.requests).toHaveLength(0)
    })
  })

  describe('lifecycle', () => {
    it('refuses a second run while one is in flight', async () => {
      const { pipeline } = setup()
      transport.enqueue(page(EMPTY_PAGE))

      const first = pipeline.run('2025-01-13', '2025-01-20')
      await expect(pipeline.run('2025-01-13', '2025-01-20')).rejects.toMatchObject({
        name: 'ValidationError',
        code: 'PIPELINE_BUSY',
      })
      expect((await first).status).toBe('done')
    })

    it('runs again after a previous run finished', async () => {
      const { pipeline } = setup()
      transport.enqueue(page(EMPTY_PAGE), page(EMPTY_PAGE))

      await pipeline.run('2025-01-13', '2025-01-20')
      const second = await pipeline.run('2025-01-13', '2025-01-20')

      expect(second.status).toBe('done')
    })

    it('closes the transport once and refuses runs afterwards', async () => {
      const { pipeline } = setup()

      pipeline.close()
      pipeline.close()

      expect(transport.closed).toBe(true)
      expect(pipeline.isClosed).toBe(true)
      await expect(pipeline.run('2025-01-13', '2025-01-20')).rejects.toMatchObject({
        name: 'ValidationError',
        code: 'PIPELINE_CLOSED',
      })
    })
  })
})
