/**
 * Tests for FlushScheduler: periodic flushing, retry of failed flushes with
 * backoff, and the one-way shutdown path.
 *
 * The store is either a jest.fn target or a real in-memory StatsStore
 * wrapped so it can be made to fail on demand.
 */

import { AppDatabase } from '../src/main/data/database'
import { SessionStore } from '../src/main/data/session-store'
import { StatsStore } from '../src/main/data/stats-store'
import { ShutdownTimeoutError, StorageError } from '../src/main/errors'
import { CounterAggregator } from '../src/main/tracking/counter-aggregator'
import { FlushScheduler } from '../src/main/tracking/flush-scheduler'
import type { FlushBatch } from '../src/main/types'

// ── Helpers ──────────────────────────────────────────────────────────────────

const NOW = new Date(2024, 0, 15, 10, 30, 0).getTime()
const INTERVAL = 60000

function diskError(): StorageError {
  return new StorageError('applyFlush', new Error('disk I/O error'))
}

interface FakeTarget {
  applied: FlushBatch[]
  failuresLeft: number
  applyFlush: jest.Mock
}

function createFakeTarget(failures = 0): FakeTarget {
  const target: FakeTarget = {
    applied: [],
    failuresLeft: failures,
    applyFlush: jest.fn((batch: FlushBatch) => {
      if (target.failuresLeft > 0) {
        target.failuresLeft--
        throw diskError()
      }
      target.applied.push(batch)
    }),
  }
  return target
}

function createFakeSessions() {
  return { closeSession: jest.fn() }
}

function createAggregator(): CounterAggregator {
  const aggregator = new CounterAggregator({ clock: () => NOW })
  aggregator.beginSession('s1')
  return aggregator
}

// ── Test Suite ──────────────────────────────────────────────────────────────

describe('FlushScheduler', () => {
  let warnSpy: jest.SpyInstance
  let errorSpy: jest.SpyInstance

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {})
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    warnSpy.mockRestore()
    errorSpy.mockRestore()
  })

  describe('periodic flush', () => {
    beforeEach(() => {
      jest.useFakeTimers()
    })

    afterEach(() => {
      jest.clearAllTimers()
      jest.useRealTimers()
    })

    test('starts idle with default interval', () => {
      const scheduler = new FlushScheduler(createAggregator(), createFakeTarget(), createFakeSessions())
      expect(scheduler.state).toBe('idle')
      expect(scheduler.flushInterval).toBe(60000)
      expect(scheduler.timer).toBeNull()
    })

    test('flushes pending deltas on each tick', () => {
      const aggregator = createAggregator()
      const target = createFakeTarget()
      const scheduler = new FlushScheduler(aggregator, target, createFakeSessions(), { flushIntervalMs: INTERVAL })
      scheduler.start()

      aggregator.record('english')
      aggregator.record('chinese')
      jest.advanceTimersByTime(INTERVAL)

      expect(target.applied).toHaveLength(1)
      expect(target.applied[0].daily[0].counts.total).toBe(2)
      expect(target.applied[0].session?.counts.total).toBe(2)
      expect(aggregator.hasPending()).toBe(false)
      expect(scheduler.state).toBe('idle')
      expect(scheduler.lastFlushAt).not.toBeNull()
    })

    test('a tick with nothing pending writes nothing', () => {
      const target = createFakeTarget()
      const scheduler = new FlushScheduler(createAggregator(), target, createFakeSessions(), { flushIntervalMs: INTERVAL })
      scheduler.start()

      jest.advanceTimersByTime(INTERVAL * 3)

      expect(target.applyFlush).not.toHaveBeenCalled()
      expect(scheduler.state).toBe('idle')
    })

    test('start twice keeps a single timer', () => {
      const scheduler = new FlushScheduler(createAggregator(), createFakeTarget(), createFakeSessions())
      scheduler.start()
      const timer = scheduler.timer
      scheduler.start()
      expect(scheduler.timer).toBe(timer)
    })

    test('stop clears the timer', () => {
      const aggregator = createAggregator()
      const target = createFakeTarget()
      const scheduler = new FlushScheduler(aggregator, target, createFakeSessions(), { flushIntervalMs: INTERVAL })
      scheduler.start()
      scheduler.stop()

      aggregator.record('english')
      jest.advanceTimersByTime(INTERVAL * 2)

      expect(scheduler.timer).toBeNull()
      expect(target.applyFlush).not.toHaveBeenCalled()
    })
  })

  describe('storage errors', () => {
    beforeEach(() => {
      jest.useFakeTimers()
    })

    afterEach(() => {
      jest.clearAllTimers()
      jest.useRealTimers()
    })

    test('a failed flush keeps the delta and stays in flushing', () => {
      const aggregator = createAggregator()
      const scheduler = new FlushScheduler(aggregator, createFakeTarget(1), createFakeSessions())
      aggregator.record('english')

      expect(scheduler.flushNow()).toBe(false)
      expect(scheduler.state).toBe('flushing')
      expect(aggregator.hasPending()).toBe(true)
      expect(scheduler.lastError).toBeInstanceOf(StorageError)
      expect(warnSpy).toHaveBeenCalledWith(
        'Flush attempt 1 failed, keeping pending counts: Storage operation "applyFlush" failed: disk I/O error',
      )
    })

    test('the same delta is retried on the next tick and applied once', () => {
      const aggregator = createAggregator()
      const target = createFakeTarget(1)
      const scheduler = new FlushScheduler(aggregator, target, createFakeSessions(), { flushIntervalMs: INTERVAL })
      scheduler.start()
      aggregator.record('english')

      jest.advanceTimersByTime(INTERVAL)
      expect(target.applyFlush).toHaveBeenCalledTimes(1)
      expect(target.applied).toHaveLength(0)

      jest.advanceTimersByTime(INTERVAL)
      expect(target.applyFlush).toHaveBeenCalledTimes(2)
      expect(target.applied).toHaveLength(1)
      expect(target.applied[0].daily[0].counts.english).toBe(1)
      expect(scheduler.state).toBe('idle')
      expect(scheduler.consecutiveFailures).toBe(0)
    })

    test('input recorded after a failure is flushed with the retried delta', () => {
      const aggregator = createAggregator()
      const target = createFakeTarget(1)
      const scheduler = new FlushScheduler(aggregator, target, createFakeSessions())
      aggregator.record('english')
      scheduler.flushNow()

      aggregator.record('chinese')
      scheduler.flushNow()

      expect(target.applied).toHaveLength(1)
      expect(target.applied[0].daily[0].counts).toEqual({
        chinese: 1,
        english: 1,
        number: 0,
        symbol: 0,
        other: 0,
        total: 2,
      })
    })

    test('consecutive failures back off exponentially in ticks', () => {
      const aggregator = createAggregator()
      const target = createFakeTarget(100)
      const scheduler = new FlushScheduler(aggregator, target, createFakeSessions(), {
        flushIntervalMs: INTERVAL,
        maxBackoffTicks: 8,
      })
      scheduler.start()
      aggregator.record('english')

      // Attempts on ticks 1, 2, 4 and 8
      jest.advanceTimersByTime(INTERVAL * 8)
      expect(target.applyFlush).toHaveBeenCalledTimes(4)
    })

    test('backoff is capped at maxBackoffTicks', () => {
      const aggregator = createAggregator()
      const target = createFakeTarget(100)
      const scheduler = new FlushScheduler(aggregator, target, createFakeSessions(), {
        flushIntervalMs: INTERVAL,
        maxBackoffTicks: 2,
      })
      scheduler.start()
      aggregator.record('english')

      // Attempts on ticks 1, 2, 4 and 6
      jest.advanceTimersByTime(INTERVAL * 6)
      expect(target.applyFlush).toHaveBeenCalledTimes(4)
    })

    test('flushNow ignores the backoff', () => {
      const aggregator = createAggregator()
      const target = createFakeTarget(2)
      const scheduler = new FlushScheduler(aggregator, target, createFakeSessions())
      aggregator.record('english')
      scheduler.flushNow()
      scheduler.flushNow()
      expect(scheduler.ticksToSkip).toBe(1)

      expect(scheduler.flushNow()).toBe(true)
      expect(scheduler.ticksToSkip).toBe(0)
    })

    test('errors other than StorageError propagate', () => {
      const aggregator = createAggregator()
      const target = {
        applyFlush: jest.fn(() => {
          throw new TypeError('bad batch')
        }),
      }
      const scheduler = new FlushScheduler(aggregator, target, createFakeSessions())
      aggregator.record('english')

      expect(() => scheduler.flushNow()).toThrow(TypeError)
      expect(aggregator.hasPending()).toBe(true)
    })

    test('failure then success against a real store applies the delta exactly once', () => {
      const database = new AppDatabase(':memory:')
      const sessions = new SessionStore(database.db)
      const stats = new StatsStore(database.db, sessions)
      sessions.openSession('s1', NOW, '2024-01-15')
      let fail = true
      const target = {
        applyFlush: (batch: FlushBatch) => {
          if (fail) {
            fail = false
            throw diskError()
          }
          stats.applyFlush(batch)
        },
      }
      const aggregator = createAggregator()
      const scheduler = new FlushScheduler(aggregator, target, sessions)
      for (let i = 0; i < 5; i++) aggregator.record('english')

      expect(scheduler.flushNow()).toBe(false)
      expect(scheduler.flushNow()).toBe(true)
      expect(scheduler.flushNow()).toBe(true)

      expect(stats.getDaily('2024-01-15')?.total).toBe(5)
      expect(stats.getHourly('2024-01-15')).toHaveLength(1)
      expect(sessions.getSession('s1')?.total).toBe(5)
      database.close()
    })
  })

  describe('shutdown', () => {
    test('final flush, then the session is closed with final counters', async () => {
      const aggregator = createAggregator()
      const target = createFakeTarget()
      const sessions = createFakeSessions()
      const scheduler = new FlushScheduler(aggregator, target, sessions, { clock: () => NOW + 5000 })
      scheduler.start()
      aggregator.record('chinese')
      aggregator.record('symbol')

      await scheduler.shutdown()

      expect(target.applied).toHaveLength(1)
      expect(sessions.closeSession).toHaveBeenCalledWith('s1', NOW + 5000, {
        chinese: 1,
        english: 0,
        number: 0,
        symbol: 1,
        other: 0,
        total: 2,
      })
      expect(scheduler.state).toBe('terminated')
      expect(scheduler.timer).toBeNull()
      expect(aggregator.sessionId).toBeNull()
    })

    test('retries until the store recovers within the timeout', async () => {
      const aggregator = createAggregator()
      const target = createFakeTarget(2)
      const sessions = createFakeSessions()
      const scheduler = new FlushScheduler(aggregator, target, sessions, {
        shutdownTimeoutMs: 1000,
        shutdownRetryDelayMs: 5,
      })
      aggregator.record('english')

      await scheduler.shutdown()

      expect(target.applyFlush).toHaveBeenCalledTimes(3)
      expect(target.applied).toHaveLength(1)
      expect(sessions.closeSession).toHaveBeenCalledTimes(1)
      expect(scheduler.state).toBe('terminated')
    })

    test('rejects with ShutdownTimeoutError but still terminates', async () => {
      const aggregator = createAggregator()
      const target = createFakeTarget(1000)
      const sessions = createFakeSessions()
      const scheduler = new FlushScheduler(aggregator, target, sessions, {
        shutdownTimeoutMs: 40,
        shutdownRetryDelayMs: 5,
      })
      aggregator.record('english')

      await expect(scheduler.shutdown()).rejects.toBeInstanceOf(ShutdownTimeoutError)

      expect(scheduler.state).toBe('terminated')
      expect(target.applyFlush.mock.calls.length).toBeGreaterThan(1)
      expect(sessions.closeSession).not.toHaveBeenCalled()
    })

    test('a session that cannot be closed is left for recovery', async () => {
      const aggregator = createAggregator()
      const sessions = {
        closeSession: jest.fn(() => {
          throw new StorageError('closeSession', new Error('database is locked'))
        }),
      }
      const scheduler = new FlushScheduler(aggregator, createFakeTarget(), sessions)

      await scheduler.shutdown()

      expect(scheduler.state).toBe('terminated')
      expect(warnSpy).toHaveBeenCalledWith(
        'Could not close session s1: Storage operation "closeSession" failed: database is locked',
      )
    })

    test('shutdown is one-way', async () => {
      const aggregator = createAggregator()
      const target = createFakeTarget()
      const sessions = createFakeSessions()
      const scheduler = new FlushScheduler(aggregator, target, sessions)
      await scheduler.shutdown()
      await scheduler.shutdown()

      aggregator.record('english')
      expect(scheduler.flushNow()).toBe(false)
      scheduler.tick()
      scheduler.start()

      expect(sessions.closeSession).toHaveBeenCalledTimes(1)
      expect(target.applyFlush).not.toHaveBeenCalled()
      expect(scheduler.timer).toBeNull()
    })
  })
})
