import type { DrawPipeline, RunOutcome } from '../../draws/pipeline.js'
import { EXIT_FAILED, EXIT_OK, UsageError, type CommandContext } from '../context.js'

export interface RunCommandArgs {
  start: string
  end: string
}

export interface LatestCommandArgs {
  days?: number
}

export interface BackfillCommandArgs {
  start: string
  end: string
  windowDays?: number
}

export async function runRunCommand(args: RunCommandArgs, ctx: CommandContext): Promise<number> {
  if (!args.start || !args.end) {
    throw new UsageError('run needs --start <YYYY-MM-DD> and --end <YYYY-MM-DD>')
  }
  return withPipeline(ctx, pipeline => pipeline.run(args.start, args.end, { signal: ctx.signal }))
}

export async function runLatestCommand(args: LatestCommandArgs, ctx: CommandContext): Promise<number> {
  return withPipeline(ctx, pipeline => pipeline.getLatestData(args.days, { signal: ctx.signal }))
}

export async function runBackfillCommand(args: BackfillCommandArgs, ctx: CommandContext): Promise<number> {
  if (!args.start || !args.end) {
    throw new UsageError('backfill needs --start <YYYY-MM-DD> and --end <YYYY-MM-DD>')
  }
  return withPipeline(ctx, pipeline =>
    pipeline.backfill(args.start, args.end, { windowDays: args.windowDays, signal: ctx.signal })
  )
}

async function withPipeline(
  ctx: CommandContext,
  execute: (pipeline: DrawPipeline) => Promise<RunOutcome>
): Promise<number> {
  const pipeline = ctx.createPipeline(ctx.config)
  try {
    const outcome = await execute(pipeline)
    reportOutcome(outcome, ctx.out)
    return outcome.status === 'done' ? EXIT_OK : EXIT_FAILED
  } finally {
    pipeline.close()
  }
}

export function reportOutcome(outcome: RunOutcome, out: (line: string) => void): void {
  const metrics = outcome.metrics
  const range = `${metrics.start_date}..${metrics.end_date}`

  if (outcome.status === 'failed') {
    out(`Run ${metrics.run_id} (${range}) failed while ${outcome.failedAt}: [${outcome.error.code}] ${outcome.error.message}`)
    return
  }

  out(
    `Run ${metrics.run_id} (${range}) done: ${metrics.rows_valid}/${metrics.rows_seen} rows valid, ` +
      `${metrics.rows_rejected} rejected, ${metrics.rows_flagged} flagged, ${metrics.rows_deduplicated} duplicates`
  )
  if (outcome.storage.status === 'written') {
    out(`Saved ${outcome.storage.record_count} records as ${outcome.storage.destination}`)
  } else {
    out('No valid records, nothing saved')
  }
}
