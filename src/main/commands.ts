import fs from 'node:fs'
import path from 'node:path'
import { describeCharacter } from './categories'
import type { AppDatabase } from './data/database'
import type { QueryEngine } from './data/query-engine'
import { ValidationError } from './errors'
import { addDays, toDateKey } from './time-buckets'

type CommandHandler = (args: string[]) => unknown

function parseInteger(value: string | undefined, name: string): number {
  const parsed = Number(value)
  if (value === undefined || !Number.isInteger(parsed)) {
    throw new ValidationError(`Expected an integer for ${name}`, [`got "${value ?? ''}"`])
  }
  return parsed
}

function parseMonth(value: string): { year: number; month: number } {
  const match = /^(\d{4})-(\d{1,2})$/.exec(value)
  if (!match) throw new ValidationError('Expected a month as YYYY-MM', [`got "${value}"`])
  return { year: Number(match[1]), month: Number(match[2]) }
}

/**
 * Monday of the week containing `date`.
 */
function weekStart(date: string): string {
  const weekday = new Date(`${date}T00:00:00Z`).getUTCDay()
  return addDays(date, weekday === 0 ? -6 : 1 - weekday)
}

/**
 * Read-only commands for the CLI. Each handler takes the positional
 * arguments after the command name and returns something printable.
 */
function registerCommands(
  queryEngine: QueryEngine,
  database: AppDatabase,
  clock: () => number = Date.now,
): Map<string, CommandHandler> {
  const commands = new Map<string, CommandHandler>()
  const today = () => toDateKey(clock())

  commands.set('today', ([date]) => {
    const target = date || today()
    return {
      daily: queryEngine.getDaily(target) ?? null,
      hourly: queryEngine.getHourlyBreakdown(target).filter((entry) => entry.total > 0),
    }
  })

  commands.set('range', ([start, end]) => queryEngine.getRange(start ?? '', end ?? ''))

  commands.set('week', ([start]) => queryEngine.weeklySummary(start || weekStart(today())))

  commands.set('month', ([month]) => {
    const { year, month: monthNumber } = month ? parseMonth(month) : parseMonth(today().slice(0, 7))
    return queryEngine.monthlySummary(year, monthNumber)
  })

  commands.set('trend', ([days]) => queryEngine.trendAnalysis(days === undefined ? 7 : parseInteger(days, 'days')))

  commands.set('recent', ([days]) => queryEngine.getRecent(days === undefined ? 7 : parseInteger(days, 'days')))

  commands.set('summary', () => queryEngine.getOverallSummary())

  commands.set('export', ([start, end, file]) => {
    const csv = queryEngine.exportCsv(start ?? '', end ?? '')
    if (!file) return csv
    fs.writeFileSync(file, csv, 'utf-8')
    return `Exported ${start}..${end} to ${file}`
  })

  commands.set('backup', async ([file]) => {
    const stamp = new Date(clock()).toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15)
    const dest = file || path.join(path.dirname(database.dbPath), `daily_stats_backup_${stamp}.db`)
    return `Backup written to ${await database.backup(dest)}`
  })

  commands.set('classify', ([text]) => [...(text ?? '')].map((char) => describeCharacter(char)))

  return commands
}

export { registerCommands, weekStart }
export type { CommandHandler }
