import {
  FLUSH_INTERVAL_MS,
  MAX_BACKOFF_TICKS,
  SHUTDOWN_RETRY_DELAY_MS,
  SHUTDOWN_TIMEOUT_MS,
} from '../constants'
import { ShutdownTimeoutError, StorageError } from '../errors'
import type { CategoryCounts, FlushBatch } from '../types'
import type { Clock, CounterAggregator } from './counter-aggregator'

type FlushState = 'idle' | 'flushing' | 'shuttingDown' | 'flushed' | 'terminated'

/**
 * Where flushed deltas go. Satisfied by StatsStore.
 */
interface FlushTarget {
  applyFlush(batch: FlushBatch): void
}

/**
 * Satisfied by SessionStore.
 */
interface SessionCloser {
  closeSession(sessionId: string, endTime: number, finalCounts: CategoryCounts): void
}

interface FlushSchedulerOptions {
  flushIntervalMs?: number
  shutdownTimeoutMs?: number
  shutdownRetryDelayMs?: number
  maxBackoffTicks?: number
  clock?: Clock
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Periodically moves the aggregator's pending deltas into the store.
 *
 * idle → flushing → idle on every tick; a storage error leaves the deltas
 * pending and the scheduler in 'flushing' until a later tick succeeds.
 * Consecutive failures skip 0, 1, 3, 7 … ticks (capped) before retrying.
 * shutdown() is one-way: shuttingDown → flushed → terminated.
 */
class FlushScheduler {
  aggregator: CounterAggregator
  target: FlushTarget
  sessions: SessionCloser
  flushInterval: number
  shutdownTimeout: number
  shutdownRetryDelay: number
  maxBackoffTicks: number
  clock: Clock
  state: FlushState
  timer: ReturnType<typeof setInterval> | null
  consecutiveFailures: number
  ticksToSkip: number
  lastFlushAt: number | null
  lastError: StorageError | null

  constructor(
    aggregator: CounterAggregator,
    target: FlushTarget,
    sessions: SessionCloser,
    options: FlushSchedulerOptions = {},
  ) {
    this.aggregator = aggregator
    this.target = target
    this.sessions = sessions
    this.flushInterval = options.flushIntervalMs ?? FLUSH_INTERVAL_MS
    this.shutdownTimeout = options.shutdownTimeoutMs ?? SHUTDOWN_TIMEOUT_MS
    this.shutdownRetryDelay = options.shutdownRetryDelayMs ?? SHUTDOWN_RETRY_DELAY_MS
    this.maxBackoffTicks = options.maxBackoffTicks ?? MAX_BACKOFF_TICKS
    this.clock = options.clock || Date.now
    this.state = 'idle'
    this.timer = null
    this.consecutiveFailures = 0
    this.ticksToSkip = 0
    this.lastFlushAt = null
    this.lastError = null
  }

  start() {
    if (this.timer || this.isTerminal()) return
    this.timer = setInterval(() => this.tick(), this.flushInterval)
  }

  stop() {
    if (this.timer) clearInterval(this.timer)
    this.timer = null
  }

  tick() {
    if (this.isTerminal()) return
    if (this.ticksToSkip > 0) {
      this.ticksToSkip--
      return
    }
    this.flushNow()
  }

  /**
   * Flushes immediately, ignoring any backoff. Returns true when the store
   * now holds everything that was pending.
   */
  flushNow(): boolean {
    if (this.state === 'terminated' || this.state === 'flushed') return false
    if (this.state !== 'shuttingDown') this.state = 'flushing'

    const ok = this._attemptFlush()
    if (this.state === 'flushing' && ok) this.state = 'idle'
    return ok
  }

  /**
   * Stops the timer, retries the final flush until the shutdown timeout,
   * then closes the open session. Always ends in 'terminated'; rejects with
   * ShutdownTimeoutError when the final save could not be completed.
   */
  async shutdown(): Promise<void> {
    if (this.isTerminal()) return
    this.state = 'shuttingDown'
    this.stop()

    const deadline = this.clock() + this.shutdownTimeout
    let attempts = 0
    let saved = false
    while (true) {
      attempts++
      if (this._attemptFlush()) {
        saved = true
        break
      }
      if (this.clock() + this.shutdownRetryDelay > deadline) break
      await sleep(this.shutdownRetryDelay)
    }

    if (saved) {
      this.state = 'flushed'
      const ended = this.aggregator.endSession()
      if (ended) {
        try {
          this.sessions.closeSession(ended.sessionId, this.clock(), ended.counts)
        } catch (err: unknown) {
          if (!(err instanceof StorageError)) throw err
          // Left open; recoverOrphanedSessions() closes it on the next start
          console.warn(`Could not close session ${ended.sessionId}: ${err.message}`)
        }
      }
    }

    this.state = 'terminated'
    if (!saved) {
      console.error(`Final save failed after ${attempts} attempts; unflushed counts are lost`)
      throw new ShutdownTimeoutError(this.shutdownTimeout, attempts, this.lastError)
    }
  }

  isTerminal(): boolean {
    return this.state === 'shuttingDown' || this.state === 'flushed' || this.state === 'terminated'
  }

  _attemptFlush(): boolean {
    if (!this.aggregator.hasPending()) {
      this._onSuccess()
      return true
    }

    const batch = this.aggregator.snapshotPending(this.clock())
    try {
      this.target.applyFlush(batch)
    } catch (err: unknown) {
      if (!(err instanceof StorageError)) throw err
      this._onFailure(err)
      return false
    }
    this.aggregator.commitFlushed(batch)
    this._onSuccess()
    return true
  }

  _onSuccess() {
    this.consecutiveFailures = 0
    this.ticksToSkip = 0
    this.lastError = null
    this.lastFlushAt = this.clock()
  }

  _onFailure(err: StorageError) {
    this.consecutiveFailures++
    this.lastError = err
    this.ticksToSkip = Math.min(2 ** (this.consecutiveFailures - 1), this.maxBackoffTicks) - 1
    console.warn(`Flush attempt ${this.consecutiveFailures} failed, keeping pending counts: ${err.message}`)
  }
}

export { FlushScheduler }
export type { FlushSchedulerOptions, FlushState, FlushTarget, SessionCloser }
