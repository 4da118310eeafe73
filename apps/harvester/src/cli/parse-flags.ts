export type Flags = Record<string, string | boolean>

export interface ParsedArgs {
  /** First positional token, e.g. `run` */
  command: string | undefined
  /** Positional tokens after the command and before the first flag */
  positionals: string[]
  flags: Flags
}

const SHORT_FLAGS: Record<string, string> = {
  '-h': 'help',
}

function isFlagToken(token: string): boolean {
  return token.startsWith('--') || token in SHORT_FLAGS
}

/**
 * `--key value`, `--key=value`, multi-token values (`--note weekly import`)
 * and bare boolean flags. A repeated flag keeps its last value.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Flags = {}
  const positionals: string[] = []

  let i = 0
  while (i < argv.length && !isFlagToken(argv[i])) {
    positionals.push(argv[i])
    i++
  }

  for (; i < argv.length; i++) {
    const token = argv[i]
    const short = SHORT_FLAGS[token]
    if (short) {
      flags[short] = true
      continue
    }
    if (!token.startsWith('--')) {
      continue
    }

    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq > 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
      continue
    }

    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !isFlagToken(argv[j])) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[body] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[body] = true
    }
  }

  const [command, ...rest] = positionals
  return { command, positionals: rest, flags }
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value.trim() : ''
}

/**
 * Whole number from a flag value; undefined when absent or not a positive integer.
 */
export function asPositiveInt(value: string | boolean | undefined): number | undefined {
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) {
    return undefined
  }
  const parsed = Number.parseInt(value, 10)
  return parsed > 0 ? parsed : undefined
}
