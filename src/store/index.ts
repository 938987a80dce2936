import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { MIGRATIONS } from './schema.js';
import { debug } from '../utils/logger.js';

export function runMigrations(db: BetterSqlite3.Database): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db.prepare('SELECT MAX(version) as v FROM _migrations').get() as
    | { v: number | null }
    | undefined;
  const currentVersion = row?.v ?? 0;

  const pending = MIGRATIONS.filter((m) => m.version > currentVersion);
  if (pending.length === 0) return 0;

  const applyAll = db.transaction(() => {
    for (const migration of pending) {
      debug(`Applying migration ${migration.version}: ${migration.description}`);
      db.exec(migration.up);
      db.prepare('INSERT INTO _migrations (version) VALUES (?)').run(
        migration.version,
      );
    }
  });

  applyAll();
  return pending.length;
}

/**
 * Open the panel database, creating it with the current schema if needed.
 * The handle is owned by the caller and must be closed with `db.close()`.
 */
export function openStore(dbPath: string): BetterSqlite3.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  runMigrations(db);
  return db;
}

export { MIGRATIONS, AUTO_INCREMENT_TABLES, ALL_TABLES } from './schema.js';
