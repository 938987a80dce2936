import type BetterSqlite3 from 'better-sqlite3';
import { AUTO_INCREMENT_TABLES } from '../store/schema.js';
import { quoteIdentifier } from '../sql/quote.js';
import { splitSql } from '../sql/splitter.js';
import { debug, errorMessage } from '../utils/logger.js';
import type { ImportMode, ImportResult } from './types.js';

const DDL_PATTERN = /^(CREATE|DROP|ALTER|TRUNCATE)\s/i;

const DEFAULT_MAX_REPORTED_ERRORS = 50;
const DEFAULT_PREVIEW_LENGTH = 80;

const UNTERMINATED_TRANSACTION =
  'Transaction left open by the script was rolled back';

export interface ImportOptions {
  mode: ImportMode;
  maxReportedErrors?: number;
  previewLength?: number;
}

export function isDdlStatement(statement: string): boolean {
  return DDL_PATTERN.test(statement.trimStart());
}

/**
 * Raise `table`'s AUTOINCREMENT counter to at least `maxId`. Never lowers it.
 */
function raiseSequence(
  db: BetterSqlite3.Database,
  table: string,
  maxId: number,
): void {
  const current = db
    .prepare('SELECT seq FROM sqlite_sequence WHERE name = ?')
    .get(table) as { seq: number } | undefined;

  if (current === undefined) {
    db.prepare('INSERT INTO sqlite_sequence (name, seq) VALUES (?, ?)').run(table, maxId);
  } else if (current.seq < maxId) {
    db.prepare('UPDATE sqlite_sequence SET seq = ? WHERE name = ?').run(maxId, table);
  }
}

/**
 * Point every auto-increment table's next id past its highest existing id.
 * Tables that are missing or fail are skipped. Returns how many tables had
 * rows to account for.
 */
export function repairAutoIncrement(
  db: BetterSqlite3.Database,
  tables: readonly string[] = AUTO_INCREMENT_TABLES,
): number {
  let fixed = 0;
  for (const table of tables) {
    try {
      const row = db
        .prepare(`SELECT COALESCE(MAX(id), 0) AS maxId FROM ${quoteIdentifier(table)}`)
        .get() as { maxId: number };
      if (row.maxId > 0) {
        raiseSequence(db, table, row.maxId);
        fixed++;
      }
    } catch (err) {
      debug(`Auto-increment repair skipped for ${table}: ${errorMessage(err)}`);
    }
  }
  return fixed;
}

/**
 * Run every statement of `sql` on its own. Failures are collected and the
 * import carries on; there is no enclosing transaction, so whatever succeeded
 * stays applied.
 *
 * The connection outlives the import, so a transaction the script leaves open
 * is rolled back and `foreign_keys` is put back the way it was found.
 */
export function importSql(
  db: BetterSqlite3.Database,
  sql: string,
  options: ImportOptions,
): ImportResult {
  const maxReportedErrors = options.maxReportedErrors ?? DEFAULT_MAX_REPORTED_ERRORS;
  const previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH;

  let executed = 0;
  let skipped = 0;
  let errorCount = 0;
  const errors: string[] = [];

  const record = (entry: string): void => {
    errorCount++;
    debug(`Statement failed: ${entry}`);
    if (errors.length < maxReportedErrors) errors.push(entry);
  };

  const foreignKeys = db.pragma('foreign_keys', { simple: true }) === 1 ? 'ON' : 'OFF';
  let rolledBack = false;

  try {
    for (const statement of splitSql(sql)) {
      const trimmed = statement.trim();
      if (trimmed === '') continue;

      if (options.mode === 'data_only' && isDdlStatement(trimmed)) {
        skipped++;
        continue;
      }

      try {
        db.exec(trimmed);
        executed++;
      } catch (err) {
        record(`${trimmed.slice(0, previewLength)}... — ${errorMessage(err)}`);
      }
    }
  } finally {
    if (db.inTransaction) {
      db.exec('ROLLBACK');
      rolledBack = true;
      debug('Rolled back a transaction left open by the imported script');
    }
    db.pragma(`foreign_keys = ${foreignKeys}`);
  }

  if (rolledBack) {
    record(UNTERMINATED_TRANSACTION);
  }

  const autoIncrementFixed = repairAutoIncrement(db);

  return { executed, skipped, errorCount, errors, autoIncrementFixed };
}

/** Human-readable summary lines for an import. */
export function summarizeImport(result: ImportResult, filename: string): string[] {
  const lines = [
    `Import complete: ${result.executed} statement(s) executed from ${filename}.`,
  ];
  if (result.autoIncrementFixed > 0) {
    lines.push(`Auto-increment sequences fixed for ${result.autoIncrementFixed} table(s).`);
  }
  if (result.skipped > 0) {
    lines.push(`${result.skipped} DDL statement(s) skipped (data-only mode).`);
  }
  if (result.errorCount > 0) {
    lines.push(`${result.errorCount} statement(s) had errors.`);
    const hidden = result.errorCount - result.errors.length;
    if (hidden > 0) lines.push(`... and ${hidden} more`);
  }
  return lines;
}
