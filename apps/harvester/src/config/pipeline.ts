/**
 * Pipeline configuration.
 *
 * Every setting is optional; anything absent falls back to its default.
 * Values that are present but invalid are a ValidationError, raised before
 * any network or disk work starts.
 */

import { z } from 'zod'
import { ERROR_CODES, ValidationError } from '../draws/errors.js'

export const DEFAULT_ENDPOINT_TEMPLATE =
  'https://loteriadehoy.com/animalito/lottoactivo/historico/{start}/{end}/'

export const pipelineConfigSchema = z.object({
  /** Must contain {start} and {end}; both are replaced with YYYY-MM-DD */
  endpointTemplate: z
    .string()
    .url()
    .refine(value => value.includes('{start}') && value.includes('{end}'), {
      message: 'endpoint template needs {start} and {end} placeholders',
    })
    .default(DEFAULT_ENDPOINT_TEMPLATE),
  /** Total attempts per fetch, first one included */
  maxRetries: z.number().int().min(1).max(20).default(3),
  retryDelayMs: z.number().int().min(0).default(2000),
  /** 1 keeps the delay fixed; >1 grows it per attempt */
  backoffMultiplier: z.number().min(1).max(10).default(1),
  maxRetryDelayMs: z.number().int().min(0).default(30_000),
  timeoutMs: z.number().int().positive().default(30_000),
  /** Ceiling for both the fetched payload and the persisted batch */
  maxDataSizeMb: z.number().positive().default(50),
  maxRangeDays: z.number().int().positive().default(365),
  outputDir: z.string().min(1).default('data/lotto-activo'),
  filePrefix: z
    .string()
    .regex(/^[a-z0-9-]+$/, 'lower-case letters, digits and dashes only')
    .default('lotto-activo'),
  mismatchPolicy: z.enum(['reject', 'flag']).default('reject'),
})

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>

export function resolvePipelineConfig(input: PipelineConfigInput = {}): PipelineConfig {
  return parseConfig(input)
}

function parseConfig(input: unknown): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ValidationError(`Invalid pipeline configuration: ${issues.join('; ')}`, {
      code: ERROR_CODES.INVALID_CONFIG,
      details: { issues },
      cause: parsed.error,
    })
  }
  return parsed.data
}

export function maxDataSizeBytes(config: Pick<PipelineConfig, 'maxDataSizeMb'>): number {
  return Math.floor(config.maxDataSizeMb * 1024 * 1024)
}

// Environment variable → config key
const ENV_KEYS = {
  SORTEO_ENDPOINT_TEMPLATE: 'endpointTemplate',
  SORTEO_MAX_RETRIES: 'maxRetries',
  SORTEO_RETRY_DELAY_MS: 'retryDelayMs',
  SORTEO_BACKOFF_MULTIPLIER: 'backoffMultiplier',
  SORTEO_MAX_RETRY_DELAY_MS: 'maxRetryDelayMs',
  SORTEO_TIMEOUT_MS: 'timeoutMs',
  SORTEO_MAX_DATA_SIZE_MB: 'maxDataSizeMb',
  SORTEO_MAX_RANGE_DAYS: 'maxRangeDays',
  SORTEO_OUTPUT_DIR: 'outputDir',
  SORTEO_FILE_PREFIX: 'filePrefix',
  SORTEO_MISMATCH_POLICY: 'mismatchPolicy',
} as const satisfies Record<string, keyof PipelineConfig>

const NUMERIC_KEYS: ReadonlySet<keyof PipelineConfig> = new Set([
  'maxRetries',
  'retryDelayMs',
  'backoffMultiplier',
  'maxRetryDelayMs',
  'timeoutMs',
  'maxDataSizeMb',
  'maxRangeDays',
])

/**
 * Read SORTEO_* variables. Blank variables count as absent.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const input: Record<string, string | number> = {}

  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey]?.trim()
    if (!raw) continue
    input[configKey] = NUMERIC_KEYS.has(configKey) ? Number(raw) : raw
  }

  return parseConfig(input)
}
