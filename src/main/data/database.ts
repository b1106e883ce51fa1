import fs from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'
import { StorageError } from '../errors'

const COUNTER_COLUMNS = `
        chinese_count INTEGER NOT NULL DEFAULT 0,
        english_count INTEGER NOT NULL DEFAULT 0,
        number_count INTEGER NOT NULL DEFAULT 0,
        symbol_count INTEGER NOT NULL DEFAULT 0,
        other_count INTEGER NOT NULL DEFAULT 0,
        total_count INTEGER NOT NULL DEFAULT 0,`

class AppDatabase {
  db: Database.Database
  dbPath: string

  /**
   * Opens (creating if needed) the statistics database. Pass ':memory:' for
   * a throwaway database.
   */
  constructor(dbPath: string) {
    this.dbPath = dbPath
    let opened: Database.Database | null = null
    try {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true })
      }
      opened = new Database(dbPath)
      this.db = opened
      this.db.pragma('journal_mode = WAL')
      this.db.pragma('foreign_keys = ON')
      this.migrate()
    } catch (err: unknown) {
      if (opened) opened.close()
      throw new StorageError('open', err)
    }
  }

  migrate() {
    this.db.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY)')
    const row = this.db.prepare('SELECT MAX(version) as v FROM schema_version').get() as { v: number | null } | undefined
    const currentVersion = row?.v || 0
    const migrations = [this._v1.bind(this)]
    for (let i = currentVersion; i < migrations.length; i++) {
      migrations[i]()
      this.db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(i + 1)
    }
  }

  _v1() {
    this.db.exec(`
      CREATE TABLE daily_stats (
        date TEXT PRIMARY KEY,${COUNTER_COLUMNS}
        session_count INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE hourly_stats (
        date TEXT NOT NULL,
        hour INTEGER NOT NULL CHECK (hour BETWEEN 0 AND 23),${COUNTER_COLUMNS}
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (date, hour)
      );

      CREATE TABLE input_sessions (
        session_id TEXT PRIMARY KEY,
        start_time INTEGER NOT NULL,
        end_time INTEGER,${COUNTER_COLUMNS}
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX idx_sessions_start ON input_sessions(start_time);
    `)
  }

  /**
   * Closes sessions a killed process left open. Their counters already hold
   * everything that was flushed, so the last flush time becomes the end time.
   */
  recoverOrphanedSessions(): number {
    try {
      const result = this.db
        .prepare(
          `
        UPDATE input_sessions SET end_time = MAX(updated_at, start_time)
        WHERE end_time IS NULL
      `,
        )
        .run()
      if (result.changes > 0) {
        console.log(`Closed ${result.changes} orphaned input sessions`)
      }
      return result.changes
    } catch (err: unknown) {
      throw new StorageError('recoverOrphanedSessions', err)
    }
  }

  /**
   * Writes a consistent copy of the database to destPath using SQLite's
   * online backup.
   */
  async backup(destPath: string): Promise<string> {
    try {
      fs.mkdirSync(path.dirname(destPath), { recursive: true })
      await this.db.backup(destPath)
      console.log(`Database backed up to ${destPath}`)
      return destPath
    } catch (err: unknown) {
      throw new StorageError('backup', err)
    }
  }

  close() {
    this.db.close()
  }
}

export { AppDatabase }
