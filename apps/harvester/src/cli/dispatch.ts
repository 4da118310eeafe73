import { runListCommand } from './commands/list.js'
import { runBackfillCommand, runLatestCommand, runRunCommand } from './commands/run.js'
import { EXIT_OK, EXIT_USAGE, UsageError, type CommandContext } from './context.js'
import { asPositiveInt, asString, parseArgs, type Flags } from './parse-flags.js'

export const HELP_TEXT = [
  'Lotto Activo draw harvester',
  '',
  'Commands:',
  '  run --start <YYYY-MM-DD> --end <YYYY-MM-DD>',
  '  latest [--days 7]',
  '  backfill --start <YYYY-MM-DD> --end <YYYY-MM-DD> [--window 7]',
  '  list',
  '',
  'Exit codes: 0 done, 1 failed, 2 usage',
]

function optionalPositiveInt(flags: Flags, name: string): number | undefined {
  if (flags[name] === undefined) {
    return undefined
  }
  const value = asPositiveInt(flags[name])
  if (value === undefined) {
    throw new UsageError(`--${name} must be a positive whole number`)
  }
  return value
}

async function runCommand(command: string, flags: Flags, ctx: CommandContext): Promise<number> {
  switch (command) {
    case 'run':
      return runRunCommand({ start: asString(flags.start), end: asString(flags.end) }, ctx)
    case 'latest':
      return runLatestCommand({ days: optionalPositiveInt(flags, 'days') }, ctx)
    case 'backfill':
      return runBackfillCommand(
        {
          start: asString(flags.start),
          end: asString(flags.end),
          windowDays: optionalPositiveInt(flags, 'window'),
        },
        ctx
      )
    case 'list':
      return runListCommand(ctx)
    default:
      throw new UsageError(`Unknown command: ${command}`)
  }
}

/**
 * Run one CLI invocation and return its exit code. Usage problems are
 * reported here; anything else propagates.
 */
export async function dispatch(argv: string[], ctx: CommandContext): Promise<number> {
  const { command, positionals, flags } = parseArgs(argv)

  if (!command || flags.help === true) {
    HELP_TEXT.forEach(line => ctx.out(line))
    return EXIT_OK
  }

  try {
    if (positionals.length > 0) {
      throw new UsageError(`Unexpected argument: ${positionals[0]}`)
    }
    return await runCommand(command, flags, ctx)
  } catch (error) {
    if (error instanceof UsageError) {
      ctx.out(error.message)
      HELP_TEXT.forEach(line => ctx.out(line))
      return EXIT_USAGE
    }
    throw error
  }
}
