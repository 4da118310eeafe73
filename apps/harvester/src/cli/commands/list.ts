import { EXIT_OK, type CommandContext } from '../context.js'

/**
 * Print stored batches, oldest first.
 */
export async function runListCommand(ctx: CommandContext): Promise<number> {
  const store = ctx.createStore(ctx.config)
  const ids = await store.list()

  if (ids.length === 0) {
    ctx.out(`No batches in ${ctx.config.outputDir}`)
    return EXIT_OK
  }

  for (const id of ids) {
    const { metrics } = await store.load(id)
    ctx.out(`${id}  ${metrics.record_count} records  ${metrics.start_date}..${metrics.end_date}`)
  }
  return EXIT_OK
}
