#!/usr/bin/env node
import { parseArgs } from 'node:util'
import { registerCommands } from './commands'
import { loadConfig } from './config'
import { AppDatabase } from './data/database'
import { QueryEngine } from './data/query-engine'
import { SessionStore } from './data/session-store'
import { StatsStore } from './data/stats-store'
import { CounterError, ShutdownTimeoutError } from './errors'
import { TerminalInputSource } from './tracking/input-source'
import { TrackerManager } from './tracking/tracker-manager'

const USAGE = `Usage: daily-input-counter [--config <file>] [command] [args]

Commands:
  run                        count typed characters until Ctrl+C (default)
  today [YYYY-MM-DD]         daily totals and hourly breakdown
  range <start> <end>        stored days in a date range
  week [YYYY-MM-DD]          7-day summary (default: this week, from Monday)
  month [YYYY-MM]            monthly summary
  trend [days]               per-day trend and daily average (default 7)
  recent [days]              most recent stored days
  summary                    totals over all stored days
  export <start> <end> [file]  CSV export (stdout when no file)
  backup [file]              copy the database
  classify <text>            show how each character is classified`

function print(value: unknown) {
  if (typeof value === 'string') {
    process.stdout.write(value.endsWith('\n') ? value : `${value}\n`)
  } else {
    process.stdout.write(`${JSON.stringify(value, null, 2)}\n`)
  }
}

async function runTracker(database: AppDatabase, config: ReturnType<typeof loadConfig>): Promise<number> {
  const trackerManager = new TrackerManager(database, config, new TerminalInputSource())

  return new Promise<number>((resolve) => {
    let stopping = false
    const stop = () => {
      if (stopping) return
      stopping = true
      const counters = trackerManager.getCurrentCounters()
      trackerManager
        .stop()
        .then(() => {
          console.log(`Today: ${counters.total} characters (${counters.chinese} Chinese, ${counters.english} English)`)
          resolve(0)
        })
        .catch((err: unknown) => {
          if (err instanceof ShutdownTimeoutError) {
            console.error(err.message)
            resolve(2)
            return
          }
          console.error('Unexpected error during shutdown:', err)
          resolve(1)
        })
    }

    process.once('SIGINT', stop)
    process.once('SIGTERM', stop)
    trackerManager.start(stop)
    console.log('Counting input. Press Ctrl+C to stop.')
  })
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
  })

  if (values.help) {
    print(USAGE)
    return 0
  }

  const config = loadConfig({ configPath: values.config })
  const database = new AppDatabase(config.databasePath)
  try {
    const [command = 'run', ...args] = positionals
    if (command === 'run') {
      // Report commands can run beside a live tracker; only a tracker start closes orphans
      database.recoverOrphanedSessions()
      return await runTracker(database, config)
    }

    const queryEngine = new QueryEngine(new StatsStore(database.db, new SessionStore(database.db)))
    const handler = registerCommands(queryEngine, database).get(command)
    if (!handler) {
      console.error(`Unknown command "${command}"\n\n${USAGE}`)
      return 1
    }
    print(await handler(args))
    return 0
  } finally {
    database.close()
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    if (err instanceof CounterError) {
      console.error(err.message)
    } else {
      console.error('Fatal error:', err)
    }
    process.exitCode = 1
  })
