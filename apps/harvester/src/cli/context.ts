import type { PipelineConfig } from '../config/pipeline.js'
import type { DrawPipeline } from '../draws/pipeline.js'
import type { BatchStore } from '../draws/store.js'

export const EXIT_OK = 0
export const EXIT_FAILED = 1
export const EXIT_USAGE = 2

/**
 * Everything a command touches from the outside, so commands run in tests
 * against fakes.
 */
export interface CommandContext {
  config: PipelineConfig
  createPipeline: (config: PipelineConfig) => DrawPipeline
  createStore: (config: PipelineConfig) => BatchStore
  out: (line: string) => void
  signal?: AbortSignal
}

/** Bad command line; maps to exit code 2 */
export class UsageError extends Error {
  readonly exitCode = EXIT_USAGE

  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}
