/**
 * SQLite connection and schema for the posting ledger.
 *
 * The file lives next to the service (DB_PATH) and is owned by this one
 * process; WAL keeps reads cheap while a dispatch is writing.
 */
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger.js';

export type Db = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS post_records (
    folder_id     TEXT NOT NULL,
    platform      TEXT NOT NULL,
    surface       TEXT NOT NULL,
    status        TEXT NOT NULL CHECK (status IN ('pending', 'posted', 'failed', 'skipped')),
    error_message TEXT,
    external_id   TEXT,
    updated_at    TEXT NOT NULL,
    PRIMARY KEY (folder_id, platform, surface)
  );

  CREATE TABLE IF NOT EXISTS post_attempts (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    folder_id     TEXT NOT NULL,
    platform      TEXT NOT NULL,
    surface       TEXT NOT NULL,
    status        TEXT NOT NULL,
    error_message TEXT,
    external_id   TEXT,
    created_at    TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_post_attempts_folder ON post_attempts (folder_id);

  CREATE TABLE IF NOT EXISTS run_stats (
    id             INTEGER PRIMARY KEY CHECK (id = 1),
    last_run_at    TEXT,
    last_folder_id TEXT,
    runs_today     INTEGER NOT NULL DEFAULT 0,
    today          TEXT
  );

  INSERT OR IGNORE INTO run_stats (id) VALUES (1);
`;

/** Opens (creating if needed) the ledger database and applies the schema. */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);

  logger.info('DB: ledger ready', { dbPath });
  return db;
}
