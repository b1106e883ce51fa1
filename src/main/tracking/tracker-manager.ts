import { randomBytes } from 'node:crypto'
import type { ResolvedConfig } from '../config'
import type { AppDatabase } from '../data/database'
import { SessionStore } from '../data/session-store'
import { StatsStore } from '../data/stats-store'
import { toDateKey } from '../time-buckets'
import type { CategoryCounts } from '../types'
import type { Clock } from './counter-aggregator'
import { CounterAggregator } from './counter-aggregator'
import type { FlushState } from './flush-scheduler'
import { FlushScheduler } from './flush-scheduler'
import type { InputSource } from './input-source'
import { InputTracker } from './input-tracker'

type TrackerConfig = Pick<
  ResolvedConfig,
  'flushIntervalMs' | 'shutdownTimeoutMs' | 'shutdownRetryDelayMs' | 'maxBackoffTicks' | 'countNumbers' | 'countSymbols'
>

interface TrackerStatus {
  isTracking: boolean
  sessionId: string | null
  flushState: FlushState | null
  lastFlushAt: number | null
  hasPending: boolean
}

/**
 * Start time plus a random suffix, so restarts within the same millisecond
 * still get distinct ids.
 */
function createSessionId(startTime: number): string {
  return `${startTime}-${randomBytes(4).toString('hex')}`
}

class TrackerManager {
  config: TrackerConfig
  clock: Clock
  statsStore: StatsStore
  sessionStore: SessionStore
  aggregator: CounterAggregator
  inputTracker: InputTracker
  scheduler: FlushScheduler | null
  isTracking: boolean
  onInputEnd: (() => void) | null

  constructor(database: AppDatabase, config: TrackerConfig, source: InputSource, clock: Clock = Date.now) {
    this.config = config
    this.clock = clock
    this.sessionStore = new SessionStore(database.db)
    this.statsStore = new StatsStore(database.db, this.sessionStore)
    this.aggregator = new CounterAggregator({ clock, onRollover: () => this._handleRollover() })
    this.inputTracker = new InputTracker(this.aggregator, source, {
      countNumbers: config.countNumbers,
      countSymbols: config.countSymbols,
    })
    this.scheduler = null
    this.isTracking = false
    this.onInputEnd = null

    const persisted = this.statsStore.getDaily(toDateKey(clock()))
    if (persisted) this.aggregator.seedToday(persisted)
  }

  /**
   * Opens a session and starts listening and flushing. onInputEnd fires when
   * the input source reports that it has no more input.
   */
  start(onInputEnd?: () => void) {
    if (this.isTracking) return

    const now = this.clock()
    const sessionId = createSessionId(now)
    this.sessionStore.openSession(sessionId, now, toDateKey(now))
    this.aggregator.beginSession(sessionId)

    this.scheduler = new FlushScheduler(this.aggregator, this.statsStore, this.sessionStore, {
      flushIntervalMs: this.config.flushIntervalMs,
      shutdownTimeoutMs: this.config.shutdownTimeoutMs,
      shutdownRetryDelayMs: this.config.shutdownRetryDelayMs,
      maxBackoffTicks: this.config.maxBackoffTicks,
      clock: this.clock,
    })
    this.scheduler.start()

    this.onInputEnd = onInputEnd || null
    this.inputTracker.start(() => {
      if (this.onInputEnd) this.onInputEnd()
    })
    this.isTracking = true
    console.log(`Tracking started (session ${sessionId})`)
  }

  _handleRollover() {
    // Push the finished day/hour out right away instead of waiting for the tick
    if (this.scheduler) this.scheduler.flushNow()
  }

  getCurrentCounters(): CategoryCounts {
    return this.aggregator.getCurrentCounters()
  }

  getStatus(): TrackerStatus {
    return {
      isTracking: this.isTracking,
      sessionId: this.aggregator.sessionId,
      flushState: this.scheduler ? this.scheduler.state : null,
      lastFlushAt: this.scheduler ? this.scheduler.lastFlushAt : null,
      hasPending: this.aggregator.hasPending(),
    }
  }

  /**
   * Stops listening, runs the final flush and closes the session. Rejects
   * with ShutdownTimeoutError if the final save failed; tracking is stopped
   * either way.
   */
  async stop() {
    if (!this.isTracking) return
    this.inputTracker.stop()
    this.isTracking = false
    this.onInputEnd = null

    const scheduler = this.scheduler
    this.scheduler = null
    if (!scheduler) return
    const session = this.aggregator.getSessionCounters()
    await scheduler.shutdown()
    console.log(`Tracking stopped. Session: ${session.total} characters (${session.chinese} Chinese, ${session.english} English)`)
  }
}

export { createSessionId, TrackerManager }
export type { TrackerConfig, TrackerStatus }
