import { z } from 'zod'
import { addCounts, emptyCounts } from '../categories'
import { CSV_HEADER, DAYS_PER_WEEK, HOURS_PER_DAY, MAX_QUERY_DAYS } from '../constants'
import { ValidationError } from '../errors'
import { addDays, isValidDateKey, listDates, monthRange, toDateKey } from '../time-buckets'
import type {
  DailyRecord,
  HourlyBreakdownEntry,
  OverallSummary,
  PeriodSummary,
  TrendAnalysis,
  TrendPoint,
} from '../types'
import type { StatsStore } from './stats-store'

const dateKeySchema = z.string().refine(isValidDateKey, { message: 'expected a real calendar date as YYYY-MM-DD' })

const rangeSchema = z
  .object({ startDate: dateKeySchema, endDate: dateKeySchema })
  .refine((range) => range.endDate >= range.startDate, { message: 'endDate must not be before startDate' })

const monthSchema = z.object({
  year: z.number().int().min(1970).max(9999),
  month: z.number().int().min(1).max(12),
})

const daysSchema = z.number().int().positive().max(MAX_QUERY_DAYS)

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${what}`,
      parsed.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
    )
  }
  return parsed.data
}

function summarize(startDate: string, endDate: string, records: DailyRecord[]): PeriodSummary {
  const summary: PeriodSummary = { startDate, endDate, ...emptyCounts(), sessionCount: 0, activeDays: 0 }
  for (const record of records) {
    addCounts(summary, record)
    summary.sessionCount += record.sessionCount
    if (record.total > 0) summary.activeDays++
  }
  return summary
}

/**
 * Read side over the statistics tables. All inputs are validated before the
 * store is touched.
 */
class QueryEngine {
  stats: StatsStore
  clock: () => number

  constructor(stats: StatsStore, clock: () => number = Date.now) {
    this.stats = stats
    this.clock = clock
  }

  getDaily(date: string): DailyRecord | undefined {
    return this.stats.getDaily(validate(dateKeySchema, date, 'date'))
  }

  getRange(startDate: string, endDate: string): DailyRecord[] {
    const range = validate(rangeSchema, { startDate, endDate }, 'date range')
    return this.stats.getRange(range.startDate, range.endDate)
  }

  /**
   * Totals for the 7 days starting at weekStartDate. Days without a row
   * count as zero.
   */
  weeklySummary(weekStartDate: string): PeriodSummary {
    const startDate = validate(dateKeySchema, weekStartDate, 'week start date')
    const endDate = addDays(startDate, DAYS_PER_WEEK - 1)
    return summarize(startDate, endDate, this.stats.getRange(startDate, endDate))
  }

  monthlySummary(year: number, month: number): PeriodSummary {
    const valid = validate(monthSchema, { year, month }, 'month')
    const { startDate, endDate } = monthRange(valid.year, valid.month)
    return summarize(startDate, endDate, this.stats.getRange(startDate, endDate))
  }

  /**
   * Per-day counts for the trailing `days` days ending today. The average
   * divides by the window length, so days without data pull it down.
   */
  trendAnalysis(days: number, endDate: string = toDateKey(this.clock())): TrendAnalysis {
    const windowDays = validate(daysSchema, days, 'number of days')
    const end = validate(dateKeySchema, endDate, 'end date')
    const startDate = addDays(end, -(windowDays - 1))
    // Date keys stop at 0100-01-01; earlier years do not round-trip through Date.UTC
    if (!isValidDateKey(startDate)) {
      throw new ValidationError('Invalid number of days', [
        `a ${windowDays}-day window ending ${end} starts before 0100-01-01`,
      ])
    }

    const byDate = new Map(this.stats.getRange(startDate, end).map((record) => [record.date, record]))
    const points: TrendPoint[] = listDates(startDate, end).map((date) => {
      const point: TrendPoint = { date, ...emptyCounts() }
      const record = byDate.get(date)
      if (record) addCounts(point, record)
      return point
    })

    const total = points.reduce((sum, point) => sum + point.total, 0)
    return {
      days: windowDays,
      startDate,
      endDate: end,
      points,
      total,
      dailyAverage: total / windowDays,
    }
  }

  /**
   * Always 24 entries; hours without a row are zero.
   */
  getHourlyBreakdown(date: string): HourlyBreakdownEntry[] {
    const valid = validate(dateKeySchema, date, 'date')
    const byHour = new Map(this.stats.getHourly(valid).map((record) => [record.hour, record]))
    const entries: HourlyBreakdownEntry[] = []
    for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
      const entry: HourlyBreakdownEntry = { hour, ...emptyCounts() }
      const record = byHour.get(hour)
      if (record) addCounts(entry, record)
      entries.push(entry)
    }
    return entries
  }

  getRecent(days: number): DailyRecord[] {
    return this.stats.getRecent(validate(daysSchema, days, 'number of days'))
  }

  getOverallSummary(): OverallSummary {
    return this.stats.getOverallSummary()
  }

  /**
   * CSV projection of a date range, one line per stored date, ascending.
   */
  exportCsv(startDate: string, endDate: string): string {
    const lines = [CSV_HEADER]
    for (const record of this.getRange(startDate, endDate)) {
      lines.push([record.date, record.chinese, record.english, record.total, record.sessionCount].join(','))
    }
    return `${lines.join('\n')}\n`
  }
}

export { QueryEngine }
