import type BetterSqlite3 from 'better-sqlite3';
import { SelectionError } from '../utils/errors.js';
import { debug, errorMessage } from '../utils/logger.js';
import { isExportCategory } from './selection.js';
import type { ExportCategory, ExportItem } from './types.js';

interface ReportRow {
  id: number;
  tester: string;
  client_version: string;
  test_type: string;
}

interface UserRow {
  id: number;
  username: string;
  role: string;
}

interface VersionRow {
  id: number;
  version_id: string;
  display_name: string | null;
}

interface TestKeyRow {
  test_key: string;
  n: number;
}

interface NamedRow {
  id: number;
  name: string;
}

interface FlagRow {
  id: number;
  test_key: string;
  client_version: string;
  status: string;
}

function queryItems(db: BetterSqlite3.Database, category: ExportCategory): ExportItem[] {
  switch (category) {
    case 'reports': {
      const rows = db
        .prepare('SELECT id, tester, client_version, test_type FROM reports ORDER BY id DESC')
        .all() as ReportRow[];
      return rows.map((r) => ({
        id: String(r.id),
        label: `#${r.id} ${r.tester} - ${r.client_version} (${r.test_type})`,
      }));
    }

    case 'users': {
      const rows = db
        .prepare('SELECT id, username, role FROM users ORDER BY username')
        .all() as UserRow[];
      return rows.map((r) => ({ id: String(r.id), label: `${r.username} (${r.role})` }));
    }

    case 'client_versions': {
      const rows = db
        .prepare('SELECT id, version_id, display_name FROM client_versions ORDER BY sort_order, id')
        .all() as VersionRow[];
      return rows.map((r) => ({ id: String(r.id), label: r.display_name ?? r.version_id }));
    }

    case 'tests': {
      const rows = db
        .prepare('SELECT test_key, COUNT(*) AS n FROM test_results GROUP BY test_key ORDER BY test_key')
        .all() as TestKeyRow[];
      return rows.map((r) => ({ id: r.test_key, label: `Test ${r.test_key} (${r.n} results)` }));
    }

    case 'templates': {
      const rows = db
        .prepare('SELECT id, name FROM test_templates ORDER BY name')
        .all() as NamedRow[];
      return rows.map((r) => ({ id: String(r.id), label: r.name }));
    }

    case 'tags': {
      const rows = db
        .prepare('SELECT id, name FROM report_tags ORDER BY name')
        .all() as NamedRow[];
      return rows.map((r) => ({ id: String(r.id), label: r.name }));
    }

    case 'retests': {
      const retests = db
        .prepare('SELECT id, test_key, client_version, status FROM retest_requests ORDER BY id DESC')
        .all() as FlagRow[];
      const fixed = db
        .prepare('SELECT id, test_key, client_version, status FROM fixed_tests ORDER BY id DESC')
        .all() as FlagRow[];
      return [
        ...retests.map((r) => ({
          id: `retest_${r.id}`,
          label: `Retest: ${r.test_key} @ ${r.client_version} (${r.status})`,
        })),
        ...fixed.map((r) => ({
          id: `fixed_${r.id}`,
          label: `Fixed: ${r.test_key} @ ${r.client_version} (${r.status})`,
        })),
      ];
    }

    default: {
      const unreachable: never = category;
      throw new Error(`Unhandled export category: ${String(unreachable)}`);
    }
  }
}

/** Entries the export wizard offers for one category. */
export function listExportItems(
  db: BetterSqlite3.Database,
  category: string,
): ExportItem[] {
  if (!isExportCategory(category)) {
    throw new SelectionError(`Unknown category: ${category}`);
  }

  try {
    return queryItems(db, category);
  } catch (err) {
    debug(`Listing ${category} failed: ${errorMessage(err)}`);
    return [];
  }
}
