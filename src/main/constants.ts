// ── Time durations ──────────────────────────────────────────────────────────

export const ONE_DAY_MS = 86400000
export const ONE_MINUTE_MS = 60000
export const ONE_SECOND_MS = 1000

// ── Flush policy ───────────────────────────────────────────────────────────

export const FLUSH_INTERVAL_MS = ONE_MINUTE_MS
export const MIN_FLUSH_INTERVAL_MS = ONE_SECOND_MS
export const MAX_BACKOFF_TICKS = 8

// ── Shutdown ───────────────────────────────────────────────────────────────

export const SHUTDOWN_TIMEOUT_MS = 5 * ONE_SECOND_MS
export const SHUTDOWN_RETRY_DELAY_MS = 250

// ── Storage ────────────────────────────────────────────────────────────────

export const DEFAULT_DATA_DIR = './data'
export const DEFAULT_DATABASE_FILE = 'daily_stats.db'
export const CONFIG_FILE_NAME = 'config.json'

// ── Reporting ──────────────────────────────────────────────────────────────

export const DAYS_PER_WEEK = 7
export const HOURS_PER_DAY = 24
export const MAX_QUERY_DAYS = 36500
export const CSV_HEADER = 'date,chinese_chars,english_chars,total_chars,session_count'
