import type Database from 'better-sqlite3'
import type { Statement } from 'better-sqlite3'
import { StorageError } from '../errors'
import type { CategoryCounts, DailyRecord, FlushBatch, HourlyRecord, OverallSummary } from '../types'
import type { SessionStore } from './session-store'

const COUNTER_COLUMNS = `
  chinese_count AS chinese, english_count AS english, number_count AS number,
  symbol_count AS symbol, other_count AS other, total_count AS total`

const DAILY_COLUMNS = `date, ${COUNTER_COLUMNS}, session_count AS sessionCount,
  created_at AS createdAt, updated_at AS updatedAt`

const HOURLY_COLUMNS = `date, hour, ${COUNTER_COLUMNS}, created_at AS createdAt, updated_at AS updatedAt`

// Conflicting rows are merged: the delta is added, never written over
const ADD_COUNTERS = `
        chinese_count = chinese_count + excluded.chinese_count,
        english_count = english_count + excluded.english_count,
        number_count = number_count + excluded.number_count,
        symbol_count = symbol_count + excluded.symbol_count,
        other_count = other_count + excluded.other_count,
        total_count = total_count + excluded.total_count,
        updated_at = excluded.updated_at`

/**
 * Daily and hourly counters. Every write is an upsert that adds a delta to
 * the existing row, so two flushes of D1 and D2 leave the same row as one
 * flush of D1 + D2.
 */
class StatsStore {
  db: Database.Database
  sessions: SessionStore
  _upsertDailyStmt: Statement
  _upsertHourlyStmt: Statement
  _getDailyStmt: Statement
  _getRangeStmt: Statement
  _getHourlyStmt: Statement

  constructor(db: Database.Database, sessions: SessionStore) {
    this.db = db
    this.sessions = sessions
    this._upsertDailyStmt = db.prepare(`
      INSERT INTO daily_stats (date, chinese_count, english_count, number_count, symbol_count,
        other_count, total_count, created_at, updated_at)
      VALUES (@date, @chinese, @english, @number, @symbol, @other, @total, @now, @now)
      ON CONFLICT(date) DO UPDATE SET ${ADD_COUNTERS}
    `)
    this._upsertHourlyStmt = db.prepare(`
      INSERT INTO hourly_stats (date, hour, chinese_count, english_count, number_count, symbol_count,
        other_count, total_count, created_at, updated_at)
      VALUES (@date, @hour, @chinese, @english, @number, @symbol, @other, @total, @now, @now)
      ON CONFLICT(date, hour) DO UPDATE SET ${ADD_COUNTERS}
    `)
    this._getDailyStmt = db.prepare(`SELECT ${DAILY_COLUMNS} FROM daily_stats WHERE date = ?`)
    this._getRangeStmt = db.prepare(`
      SELECT ${DAILY_COLUMNS} FROM daily_stats
      WHERE date >= ? AND date <= ?
      ORDER BY date ASC
    `)
    this._getHourlyStmt = db.prepare(`SELECT ${HOURLY_COLUMNS} FROM hourly_stats WHERE date = ? ORDER BY hour ASC`)
  }

  upsertDaily(date: string, delta: CategoryCounts, now: number = Date.now()) {
    try {
      this._upsertDailyStmt.run({ date, now, ...delta })
    } catch (err: unknown) {
      throw new StorageError('upsertDaily', err)
    }
  }

  upsertHourly(date: string, hour: number, delta: CategoryCounts, now: number = Date.now()) {
    try {
      this._upsertHourlyStmt.run({ date, hour, now, ...delta })
    } catch (err: unknown) {
      throw new StorageError('upsertHourly', err)
    }
  }

  /**
   * Applies one flush (daily rows, hourly rows, open session progress) as a
   * single transaction. Either all of it lands or none of it does.
   */
  applyFlush(batch: FlushBatch) {
    try {
      this.db.transaction(() => {
        for (const entry of batch.daily) {
          this._upsertDailyStmt.run({ date: entry.date, now: batch.flushedAt, ...entry.counts })
        }
        for (const entry of batch.hourly) {
          this._upsertHourlyStmt.run({ date: entry.date, hour: entry.hour, now: batch.flushedAt, ...entry.counts })
        }
        if (batch.session) {
          this.sessions.addProgress(batch.session.sessionId, batch.session.counts, batch.flushedAt)
        }
      })()
    } catch (err: unknown) {
      throw new StorageError('applyFlush', err)
    }
  }

  getDaily(date: string): DailyRecord | undefined {
    try {
      return this._getDailyStmt.get(date) as DailyRecord | undefined
    } catch (err: unknown) {
      throw new StorageError('getDaily', err)
    }
  }

  getRange(startDate: string, endDate: string): DailyRecord[] {
    try {
      return this._getRangeStmt.all(startDate, endDate) as DailyRecord[]
    } catch (err: unknown) {
      throw new StorageError('getRange', err)
    }
  }

  getHourly(date: string): HourlyRecord[] {
    try {
      return this._getHourlyStmt.all(date) as HourlyRecord[]
    } catch (err: unknown) {
      throw new StorageError('getHourly', err)
    }
  }

  /**
   * Most recent days that have a row, newest first.
   */
  getRecent(days: number): DailyRecord[] {
    try {
      return this.db
        .prepare(`SELECT ${DAILY_COLUMNS} FROM daily_stats ORDER BY date DESC LIMIT ?`)
        .all(days) as DailyRecord[]
    } catch (err: unknown) {
      throw new StorageError('getRecent', err)
    }
  }

  getAll(): DailyRecord[] {
    try {
      return this.db.prepare(`SELECT ${DAILY_COLUMNS} FROM daily_stats ORDER BY date DESC`).all() as DailyRecord[]
    } catch (err: unknown) {
      throw new StorageError('getAll', err)
    }
  }

  /**
   * Removes a day and its hourly rows. Returns false when there was nothing
   * to delete.
   */
  deleteDaily(date: string): boolean {
    try {
      return this.db.transaction(() => {
        this.db.prepare('DELETE FROM hourly_stats WHERE date = ?').run(date)
        return this.db.prepare('DELETE FROM daily_stats WHERE date = ?').run(date).changes > 0
      })()
    } catch (err: unknown) {
      throw new StorageError('deleteDaily', err)
    }
  }

  getOverallSummary(): OverallSummary {
    try {
      const row = this.db
        .prepare(
          `
        SELECT
          COUNT(*) as totalDays,
          COALESCE(SUM(chinese_count), 0) as totalChinese,
          COALESCE(SUM(english_count), 0) as totalEnglish,
          COALESCE(SUM(total_count), 0) as totalChars,
          COALESCE(AVG(chinese_count), 0) as avgChinese,
          COALESCE(AVG(english_count), 0) as avgEnglish,
          COALESCE(AVG(total_count), 0) as avgTotal,
          MIN(date) as firstDate,
          MAX(date) as lastDate
        FROM daily_stats
      `,
        )
        .get() as OverallSummary
      return {
        ...row,
        avgChinese: Math.round(row.avgChinese * 10) / 10,
        avgEnglish: Math.round(row.avgEnglish * 10) / 10,
        avgTotal: Math.round(row.avgTotal * 10) / 10,
      }
    } catch (err: unknown) {
      throw new StorageError('getOverallSummary', err)
    }
  }
}

export { StatsStore }
