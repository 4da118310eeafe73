// env must load before config reads process.env
import '../env.js'

import { loggers } from '../config/logger.js'
import { loadPipelineConfig } from '../config/pipeline.js'
import { classifyError, formatErrorForLog } from '../draws/errors.js'
import { createDrawPipeline } from '../draws/pipeline.js'
import { BatchStore } from '../draws/store.js'
import { EXIT_FAILED, type CommandContext } from './context.js'
import { dispatch } from './dispatch.js'

const log = loggers.cli

async function main(): Promise<number> {
  const controller = new AbortController()
  const onSignal = (signal: NodeJS.Signals): void => {
    log.warn('Shutdown signal received, cancelling run', { signal })
    controller.abort()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  const ctx: CommandContext = {
    config: loadPipelineConfig(),
    createPipeline: config => createDrawPipeline(config),
    createStore: config => new BatchStore(config, { logger: loggers.store }),
    out: line => console.log(line),
    signal: controller.signal,
  }

  return dispatch(process.argv.slice(2), ctx)
}

main().then(
  exitCode => process.exit(exitCode),
  (error: unknown) => {
    const classified = classifyError(error)
    log.error('Command failed', formatErrorForLog(classified), error)
    console.error(classified.message)
    process.exit(EXIT_FAILED)
  }
)
