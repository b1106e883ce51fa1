import { ONE_DAY_MS } from './constants'

/**
 * The (date, hour) bucket an event belongs to, in local time.
 */
interface TimeBucket {
  date: string
  hour: number
}

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

/**
 * Returns the local calendar date for a timestamp as YYYY-MM-DD.
 */
function toDateKey(timestampMs: number): string {
  const d = new Date(timestampMs)
  return `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`
}

function getBucket(timestampMs: number): TimeBucket {
  return { date: toDateKey(timestampMs), hour: new Date(timestampMs).getHours() }
}

function bucketKey(bucket: TimeBucket): string {
  return `${bucket.date}#${pad(bucket.hour)}`
}

function sameBucket(a: TimeBucket, b: TimeBucket): boolean {
  return a.date === b.date && a.hour === b.hour
}

/**
 * Parses YYYY-MM-DD into UTC midnight. Returns null for anything that is not
 * a real calendar date (2024-02-30, 2024-13-01, ...).
 */
function parseDateKey(dateKey: string): number | null {
  const match = DATE_KEY_PATTERN.exec(dateKey)
  if (!match) return null
  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const ms = Date.UTC(year, month - 1, day)
  const check = new Date(ms)
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null
  }
  return ms
}

function isValidDateKey(dateKey: string): boolean {
  return parseDateKey(dateKey) !== null
}

// Date-key arithmetic runs in UTC so DST transitions never skip or repeat a day
function addDays(dateKey: string, days: number): string {
  const ms = parseDateKey(dateKey)
  if (ms === null) throw new RangeError(`Invalid date key: ${dateKey}`)
  const d = new Date(ms + days * ONE_DAY_MS)
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`
}

/**
 * Lists every date key from start to end inclusive. Empty when end < start.
 */
function listDates(startDate: string, endDate: string): string[] {
  const dates: string[] = []
  for (let cursor = startDate; cursor <= endDate; cursor = addDays(cursor, 1)) {
    dates.push(cursor)
  }
  return dates
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

function monthRange(year: number, month: number): { startDate: string; endDate: string } {
  const prefix = `${pad(year, 4)}-${pad(month)}`
  return { startDate: `${prefix}-01`, endDate: `${prefix}-${pad(daysInMonth(year, month))}` }
}

export {
  addDays,
  bucketKey,
  daysInMonth,
  getBucket,
  isValidDateKey,
  listDates,
  monthRange,
  parseDateKey,
  sameBucket,
  toDateKey,
}
export type { TimeBucket }
