export { DRAW_SOURCE, ANIMAL_BY_NUMBER, NUMBER_BY_ANIMAL, DRAW_NUMBERS, ANIMAL_LABELS, animalForNumber } from './draws/catalog.js'
export { normalizeRow, normalizeDrawNumber, normalizeAnimal } from './draws/normalizer.js'
export { dedupeRecords, drawKey } from './draws/dedupe.js'
export { extractDrawRows } from './draws/extract.js'
export type { ExtractOptions, ExtractOutcome } from './draws/extract.js'
export { DrawFetcher, buildEndpointUrl, validateDateRange } from './draws/fetcher.js'
export type { FetchOutcome, FetcherConfig, Sleep } from './draws/fetcher.js'
export { FetchTransport } from './draws/transport.js'
export type { HttpTransport, TransportRequest, TransportResponse, TransportError } from './draws/transport.js'
export { BatchStore, batchId } from './draws/store.js'
export type { SaveOptions } from './draws/store.js'
export { DrawPipeline, RunStateMachine, createDrawPipeline, DEFAULT_BACKFILL_WINDOW_DAYS } from './draws/pipeline.js'
export type {
  PipelineState,
  RunOutcome,
  RunDone,
  RunFailed,
  RunOptions,
  BackfillOptions,
  CreateDrawPipelineOptions,
} from './draws/pipeline.js'
export {
  PipelineError,
  ValidationError,
  ScrapingError,
  ProcessingError,
  SavingError,
  CancelledError,
  ERROR_CODES,
  classifyError,
} from './draws/errors.js'
export type { ErrorCode, ErrorCategory, ClassifiedError } from './draws/errors.js'
export { RejectionReason } from './draws/types.js'
export type {
  CanonicalRecord,
  DateRange,
  MismatchPolicy,
  NormalizeResult,
  RawRow,
  RecordFlag,
  RunMetrics,
  StorageResult,
  StoredBatch,
} from './draws/types.js'
export { loadPipelineConfig, resolvePipelineConfig, DEFAULT_ENDPOINT_TEMPLATE } from './config/pipeline.js'
export type { PipelineConfig, PipelineConfigInput } from './config/pipeline.js'
