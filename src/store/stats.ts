import type BetterSqlite3 from 'better-sqlite3';
import { ALL_TABLES } from './schema.js';
import { quoteIdentifier } from '../sql/quote.js';
import { debug, errorMessage } from '../utils/logger.js';

export interface TableStat {
  table: string;
  /** null when the table is missing or unreadable */
  rows: number | null;
}

export interface TableStats {
  tables: TableStat[];
  totalRows: number;
}

export function countRows(db: BetterSqlite3.Database, table: string): number {
  const row = db
    .prepare(`SELECT COUNT(*) AS count FROM ${quoteIdentifier(table)}`)
    .get() as { count: number };
  return row.count;
}

export function getTableStats(
  db: BetterSqlite3.Database,
  tables: readonly string[] = ALL_TABLES,
): TableStats {
  let totalRows = 0;
  const stats = [...tables].sort().map((table): TableStat => {
    try {
      const rows = countRows(db, table);
      totalRows += rows;
      return { table, rows };
    } catch (err) {
      debug(`Row count unavailable for ${table}: ${errorMessage(err)}`);
      return { table, rows: null };
    }
  });

  return { tables: stats, totalRows };
}
