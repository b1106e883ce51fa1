import { addCounts, emptyCounts, isZero, subtractCounts } from '../categories'
import type { TimeBucket } from '../time-buckets'
import { bucketKey, getBucket, sameBucket } from '../time-buckets'
import type { Category, CategoryCounts, FlushBatch, HourlyDelta } from '../types'

type Clock = () => number

interface CounterAggregatorOptions {
  clock?: Clock
  onRollover?: (previous: TimeBucket, next: TimeBucket) => void
}

/**
 * In-memory counters for today, the current hour and the current session,
 * plus the deltas that have not been flushed yet.
 *
 * Pending deltas are keyed by the bucket they happened in, so a rollover
 * never moves counts into the wrong date or hour: stale buckets simply wait
 * for the next flush. Every method runs to completion on the event loop, so
 * the input path and the flush timer never interleave inside one call.
 */
class CounterAggregator {
  clock: Clock
  onRollover: ((previous: TimeBucket, next: TimeBucket) => void) | null
  bucket: TimeBucket
  today: CategoryCounts
  currentHour: CategoryCounts
  currentSession: CategoryCounts
  sessionId: string | null
  pendingDaily: Map<string, CategoryCounts>
  pendingHourly: Map<string, HourlyDelta>
  pendingSession: CategoryCounts

  constructor(options: CounterAggregatorOptions = {}) {
    this.clock = options.clock || Date.now
    this.onRollover = options.onRollover || null
    this.bucket = getBucket(this.clock())
    this.today = emptyCounts()
    this.currentHour = emptyCounts()
    this.currentSession = emptyCounts()
    this.sessionId = null
    this.pendingDaily = new Map()
    this.pendingHourly = new Map()
    this.pendingSession = emptyCounts()
  }

  /**
   * Adds counts persisted by earlier runs today so getCurrentCounters()
   * reports the whole day.
   */
  seedToday(persisted: CategoryCounts) {
    addCounts(this.today, persisted)
  }

  beginSession(sessionId: string) {
    this.sessionId = sessionId
    this.currentSession = emptyCounts()
    this.pendingSession = emptyCounts()
  }

  endSession(): { sessionId: string; counts: CategoryCounts } | null {
    if (!this.sessionId) return null
    const ended = { sessionId: this.sessionId, counts: { ...this.currentSession } }
    this.sessionId = null
    this.currentSession = emptyCounts()
    this.pendingSession = emptyCounts()
    return ended
  }

  /**
   * Moves the live day/hour counters to the bucket containing `now`.
   * Returns true when the date or hour changed.
   */
  rolloverIfNeeded(now: number = this.clock()): boolean {
    const next = getBucket(now)
    if (sameBucket(next, this.bucket)) return false

    const previous = this.bucket
    if (next.date !== previous.date) {
      this.today = emptyCounts()
    }
    this.currentHour = emptyCounts()
    this.bucket = next
    if (this.onRollover) this.onRollover(previous, next)
    return true
  }

  record(category: Category, timestamp: number = this.clock()) {
    this.rolloverIfNeeded(timestamp)

    const { date, hour } = this.bucket
    let daily = this.pendingDaily.get(date)
    if (!daily) {
      daily = emptyCounts()
      this.pendingDaily.set(date, daily)
    }
    const key = bucketKey(this.bucket)
    let hourly = this.pendingHourly.get(key)
    if (!hourly) {
      hourly = { date, hour, counts: emptyCounts() }
      this.pendingHourly.set(key, hourly)
    }

    for (const counts of [this.today, this.currentHour, daily, hourly.counts]) {
      counts[category]++
      counts.total++
    }
    if (this.sessionId) {
      this.currentSession[category]++
      this.currentSession.total++
      this.pendingSession[category]++
      this.pendingSession.total++
    }
  }

  getCurrentCounters(): CategoryCounts {
    this.rolloverIfNeeded()
    return { ...this.today }
  }

  getHourCounters(): CategoryCounts {
    this.rolloverIfNeeded()
    return { ...this.currentHour }
  }

  getSessionCounters(): CategoryCounts {
    return { ...this.currentSession }
  }

  hasPending(): boolean {
    return this.pendingDaily.size > 0 || this.pendingHourly.size > 0 || !isZero(this.pendingSession)
  }

  /**
   * Copies everything not yet flushed. The copy is independent of later
   * record() calls.
   */
  snapshotPending(flushedAt: number = this.clock()): FlushBatch {
    return {
      daily: [...this.pendingDaily.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([date, counts]) => ({ date, counts: { ...counts } })),
      hourly: [...this.pendingHourly.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([, entry]) => ({ date: entry.date, hour: entry.hour, counts: { ...entry.counts } })),
      session:
        this.sessionId && !isZero(this.pendingSession)
          ? { sessionId: this.sessionId, counts: { ...this.pendingSession } }
          : null,
      flushedAt,
    }
  }

  /**
   * Removes exactly what a successful flush wrote. Anything recorded after
   * the snapshot was taken stays pending.
   */
  commitFlushed(batch: FlushBatch) {
    for (const entry of batch.daily) {
      const pending = this.pendingDaily.get(entry.date)
      if (!pending) continue
      subtractCounts(pending, entry.counts)
      if (isZero(pending)) this.pendingDaily.delete(entry.date)
    }
    for (const entry of batch.hourly) {
      const key = bucketKey(entry)
      const pending = this.pendingHourly.get(key)
      if (!pending) continue
      subtractCounts(pending.counts, entry.counts)
      if (isZero(pending.counts)) this.pendingHourly.delete(key)
    }
    if (batch.session && batch.session.sessionId === this.sessionId) {
      subtractCounts(this.pendingSession, batch.session.counts)
    }
  }
}

export { CounterAggregator }
export type { Clock, CounterAggregatorOptions }
