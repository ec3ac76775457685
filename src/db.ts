import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { config } from './config';

const dbPath = config.db.path;

if (dbPath !== ':memory:') {
  fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
}

const db = new Database(dbPath);

db.pragma('journal_mode = WAL');
db.pragma('foreign_keys = ON');

db.exec(`
  CREATE TABLE IF NOT EXISTS app_settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS shows (
    indexer_id INTEGER PRIMARY KEY,
    show_name TEXT NOT NULL,
    location TEXT NOT NULL,
    quality INTEGER NOT NULL,
    default_ep_status TEXT NOT NULL DEFAULT 'SKIPPED',
    lang TEXT NOT NULL DEFAULT 'en',
    skip_downloaded INTEGER NOT NULL DEFAULT 0,
    subtitles INTEGER NOT NULL DEFAULT 0,
    subtitles_sr_metadata INTEGER NOT NULL DEFAULT 0,
    paused INTEGER NOT NULL DEFAULT 0,
    air_by_date INTEGER NOT NULL DEFAULT 0,
    sports INTEGER NOT NULL DEFAULT 0,
    dvd_order INTEGER NOT NULL DEFAULT 0,
    anime INTEGER NOT NULL DEFAULT 0,
    scene INTEGER NOT NULL DEFAULT 0,
    season_folders INTEGER NOT NULL DEFAULT 1,
    rls_ignore_words TEXT NOT NULL DEFAULT '',
    rls_require_words TEXT NOT NULL DEFAULT '',
    search_delay INTEGER NOT NULL DEFAULT 0,
    added_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS show_scene_exceptions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    indexer_id INTEGER NOT NULL REFERENCES shows(indexer_id) ON DELETE CASCADE,
    name TEXT NOT NULL COLLATE NOCASE,
    UNIQUE (indexer_id, name)
  );

  CREATE INDEX IF NOT EXISTS idx_scene_exceptions_show ON show_scene_exceptions(indexer_id);
`);

export default db;
