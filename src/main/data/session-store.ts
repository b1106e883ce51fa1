import type Database from 'better-sqlite3'
import type { Statement } from 'better-sqlite3'
import { StorageError } from '../errors'
import type { CategoryCounts, SessionRecord } from '../types'

const SESSION_COLUMNS = `
  session_id AS sessionId, start_time AS startTime, end_time AS endTime,
  chinese_count AS chinese, english_count AS english, number_count AS number,
  symbol_count AS symbol, other_count AS other, total_count AS total,
  updated_at AS updatedAt`

class SessionStore {
  db: Database.Database
  _insertStmt: Statement
  _bumpDailyStmt: Statement
  _progressStmt: Statement
  _closeStmt: Statement
  _getStmt: Statement

  constructor(db: Database.Database) {
    this.db = db
    this._insertStmt = db.prepare(`
      INSERT INTO input_sessions (session_id, start_time, end_time, updated_at)
      VALUES (@sessionId, @startTime, NULL, @startTime)
    `)
    this._bumpDailyStmt = db.prepare(`
      INSERT INTO daily_stats (date, session_count, created_at, updated_at)
      VALUES (@date, 1, @now, @now)
      ON CONFLICT(date) DO UPDATE SET
        session_count = session_count + 1,
        updated_at = excluded.updated_at
    `)
    this._progressStmt = db.prepare(`
      UPDATE input_sessions SET
        chinese_count = chinese_count + @chinese,
        english_count = english_count + @english,
        number_count = number_count + @number,
        symbol_count = symbol_count + @symbol,
        other_count = other_count + @other,
        total_count = total_count + @total,
        updated_at = @now
      WHERE session_id = @sessionId
    `)
    this._closeStmt = db.prepare(`
      UPDATE input_sessions SET
        end_time = @endTime,
        chinese_count = @chinese,
        english_count = @english,
        number_count = @number,
        symbol_count = @symbol,
        other_count = @other,
        total_count = @total,
        updated_at = @endTime
      WHERE session_id = @sessionId
    `)
    this._getStmt = db.prepare(`SELECT ${SESSION_COLUMNS} FROM input_sessions WHERE session_id = ?`)
  }

  /**
   * Inserts an open session and counts it towards the start date's
   * session_count, atomically.
   */
  openSession(sessionId: string, startTime: number, startDate: string) {
    try {
      this.db.transaction(() => {
        this._insertStmt.run({ sessionId, startTime })
        this._bumpDailyStmt.run({ date: startDate, now: startTime })
      })()
    } catch (err: unknown) {
      throw new StorageError('openSession', err)
    }
  }

  /**
   * Adds flushed counts to an open session. Must run inside the caller's
   * flush transaction.
   */
  addProgress(sessionId: string, delta: CategoryCounts, now: number) {
    this._progressStmt.run({ sessionId, now, ...delta })
  }

  closeSession(sessionId: string, endTime: number, finalCounts: CategoryCounts) {
    try {
      const result = this._closeStmt.run({ sessionId, endTime, ...finalCounts })
      if (result.changes === 0) {
        console.warn(`Tried to close unknown session ${sessionId}`)
      }
    } catch (err: unknown) {
      throw new StorageError('closeSession', err)
    }
  }

  getSession(sessionId: string): SessionRecord | undefined {
    try {
      return this._getStmt.get(sessionId) as SessionRecord | undefined
    } catch (err: unknown) {
      throw new StorageError('getSession', err)
    }
  }

  getSessionsBetween(startMs: number, endMs: number): SessionRecord[] {
    try {
      return this.db
        .prepare(
          `
        SELECT ${SESSION_COLUMNS} FROM input_sessions
        WHERE start_time >= ? AND start_time < ?
        ORDER BY start_time ASC
      `,
        )
        .all(startMs, endMs) as SessionRecord[]
    } catch (err: unknown) {
      throw new StorageError('getSessionsBetween', err)
    }
  }
}

export { SessionStore }
