import type BetterSqlite3 from 'better-sqlite3';
import { literalExpression, quoteIdentifier } from '../sql/quote.js';
import { debug, errorMessage } from '../utils/logger.js';
import { formatDateTime, formatFileTimestamp } from '../utils/time.js';
import { planSelection } from './planner.js';
import type { ExportSelection, TableSection } from './types.js';

const RULE = '-- ===========================================';
const THIN_RULE = '-- -------------------------------------------';

export interface RenderOptions {
  now?: Date;
  /** Header `Categories:` list; defaults to the planned categories */
  categories?: readonly string[];
}

export function exportFilename(prefix: string, now: Date = new Date()): string {
  return `${prefix}_${formatFileTimestamp(now)}.sql`;
}

/**
 * Serialize the rows matched by `section` as `REPLACE INTO` statements.
 * A failing query is reported as a comment so the rest of the export still
 * goes out.
 */
export function exportTableRows(
  db: BetterSqlite3.Database,
  section: TableSection,
): string {
  const table = quoteIdentifier(section.table);

  try {
    const columns = db
      .prepare(`SELECT * FROM ${table} WHERE ${section.where}`)
      .columns()
      .map((c) => c.name);

    const rows = db
      .prepare(
        `SELECT ${columns.map(literalExpression).join(', ')} FROM ${table}
         WHERE ${section.where} ORDER BY rowid`,
      )
      .raw()
      .all(...section.params) as string[][];

    if (rows.length === 0) {
      return `-- Table: ${section.table} (no matching rows)\n\n`;
    }

    const colList = columns.map(quoteIdentifier).join(', ');
    let out = `${THIN_RULE}\n-- Table: ${section.table} (${rows.length} rows)\n${THIN_RULE}\n\n`;
    for (const values of rows) {
      out += `REPLACE INTO ${table} (${colList}) VALUES (${values.join(', ')});\n`;
    }
    return out + '\n';
  } catch (err) {
    const message = errorMessage(err).replace(/\s+/g, ' ');
    debug(`Export of ${section.table} failed: ${message}`);
    return `-- Error exporting ${section.table}: ${message}\n\n`;
  }
}

/** Build the complete SQL script for a selection. */
export function renderExport(
  db: BetterSqlite3.Database,
  selection: ExportSelection,
  options: RenderOptions = {},
): string {
  const now = options.now ?? new Date();
  const plans = planSelection(selection);

  let out = '-- Steam Test Panel Selective Export\n';
  out += `-- Generated: ${formatDateTime(now)}\n`;
  const categories = options.categories ?? plans.map((p) => p.category);
  out += `-- Categories: ${categories.join(', ')}\n`;
  out += '-- ==========================================\n\n';
  out += 'PRAGMA foreign_keys = OFF;\n\n';

  for (const plan of plans) {
    out += `${RULE}\n-- Category: ${plan.label}\n${RULE}\n\n`;
    for (const section of plan.sections) {
      out += exportTableRows(db, section);
    }
  }

  out += '\nPRAGMA foreign_keys = ON;\n';
  return out;
}
