import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import {
  CONFIG_FILE_NAME,
  DEFAULT_DATA_DIR,
  DEFAULT_DATABASE_FILE,
  FLUSH_INTERVAL_MS,
  MAX_BACKOFF_TICKS,
  MIN_FLUSH_INTERVAL_MS,
  SHUTDOWN_RETRY_DELAY_MS,
  SHUTDOWN_TIMEOUT_MS,
} from './constants'
import { ValidationError } from './errors'

const configSchema = z
  .object({
    dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
    databaseFile: z.string().min(1).default(DEFAULT_DATABASE_FILE),
    flushIntervalMs: z.number().int().min(MIN_FLUSH_INTERVAL_MS).default(FLUSH_INTERVAL_MS),
    shutdownTimeoutMs: z.number().int().positive().default(SHUTDOWN_TIMEOUT_MS),
    shutdownRetryDelayMs: z.number().int().positive().default(SHUTDOWN_RETRY_DELAY_MS),
    maxBackoffTicks: z.number().int().min(1).default(MAX_BACKOFF_TICKS),
    countNumbers: z.boolean().default(true),
    countSymbols: z.boolean().default(true),
  })
  .strip()

type AppConfig = z.infer<typeof configSchema>

interface ResolvedConfig extends AppConfig {
  databasePath: string
}

const KNOWN_KEYS = new Set(Object.keys(configSchema.shape))

// Environment variables win over the config file
const envSchema = z.object({
  INPUT_COUNTER_DATA_DIR: z.string().min(1).optional(),
  INPUT_COUNTER_FLUSH_INTERVAL_MS: z.coerce.number().int().optional(),
})

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {}

  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'))
  } catch (err: unknown) {
    throw new ValidationError(`Could not read config file ${configPath}`, [
      err instanceof Error ? err.message : String(err),
    ])
  }
  const record = z.record(z.unknown()).safeParse(parsed)
  if (!record.success || Array.isArray(parsed)) {
    throw new ValidationError(`Config file ${configPath} must contain a JSON object`)
  }
  return record.data
}

/**
 * Loads settings from a JSON file and the environment. The result is frozen:
 * the flush interval and storage location do not change while running.
 */
function loadConfig(
  options: { configPath?: string; env?: NodeJS.ProcessEnv; cwd?: string } = {},
): Readonly<ResolvedConfig> {
  const env = options.env || process.env
  const cwd = options.cwd || process.cwd()

  const envParsed = envSchema.safeParse(env)
  if (!envParsed.success) {
    throw new ValidationError(
      'Invalid environment variables',
      envParsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const dataDirFromEnv = envParsed.data.INPUT_COUNTER_DATA_DIR
  const configPath = options.configPath
    ? path.resolve(cwd, options.configPath)
    : path.resolve(cwd, dataDirFromEnv || DEFAULT_DATA_DIR, CONFIG_FILE_NAME)

  const fileValues = readConfigFile(configPath)
  for (const key of Object.keys(fileValues)) {
    if (!KNOWN_KEYS.has(key)) {
      console.warn(`Ignoring unknown config key "${key}" in ${configPath}`)
    }
  }

  const merged: Record<string, unknown> = { ...fileValues }
  if (dataDirFromEnv) merged.dataDir = dataDirFromEnv
  if (envParsed.data.INPUT_COUNTER_FLUSH_INTERVAL_MS !== undefined) {
    merged.flushIntervalMs = envParsed.data.INPUT_COUNTER_FLUSH_INTERVAL_MS
  }

  const parsed = configSchema.safeParse(merged)
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const dataDir = path.resolve(cwd, parsed.data.dataDir)
  return Object.freeze({
    ...parsed.data,
    dataDir,
    databasePath: path.join(dataDir, parsed.data.databaseFile),
  })
}

export { configSchema, loadConfig }
export type { AppConfig, ResolvedConfig }
