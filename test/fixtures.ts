import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { MIGRATIONS } from '../src/store/schema.js';

export function createTestDb(): BetterSqlite3.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  for (const migration of MIGRATIONS) {
    db.exec(migration.up);
  }
  return db;
}

/** Blob stored in report_logs.log_data for report 5. */
export const LOG_BLOB = Buffer.from([0x1f, 0x8b, 0x27, 0x3b]);

/**
 * A small panel: two users, reports 5 and 6 with their dependents, two tags,
 * retests 12 and 13, fixed test 7, two client versions and one template.
 */
export function seedPanel(db: BetterSqlite3.Database): void {
  const run = (sql: string, ...params: unknown[]): void => {
    db.prepare(sql).run(...params);
  };

  run(
    `INSERT INTO users (id, username, password, role, api_key, created_at) VALUES (?, ?, ?, ?, ?, ?)`,
    1, 'alice', 'test-hash', 'admin', 'test-key-alice', '2025-01-01 08:00:00',
  );
  run(
    `INSERT INTO users (id, username, password, role, api_key, created_at) VALUES (?, ?, ?, ?, ?, ?)`,
    2, 'bob', 'test-hash', 'user', 'test-key-bob', '2025-01-02 08:00:00',
  );

  run(
    `INSERT INTO reports (id, tester, commit_hash, test_type, client_version, steamui_version, steam_pkg_version,
       submitted_at, raw_json, test_duration, revision_count, restored_from, restored_at, last_modified)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    5, 'bob', 'abc123', 'full', '1700000000', null, null,
    '2025-01-15 10:00:00', '{"tests":{"3":"working"}}', 3600, 1, null, null, '2025-01-16 09:00:00',
  );
  run(
    `INSERT INTO reports (id, tester, commit_hash, test_type, client_version, steamui_version, steam_pkg_version,
       submitted_at, raw_json, test_duration, revision_count, restored_from, restored_at, last_modified)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    6, 'alice', null, 'quick', '1700000001', 'ui-2', 'pkg-9',
    '2025-02-01 12:00:00', null, null, 0, null, null, '2025-02-01 12:00:00',
  );

  const result = `INSERT INTO test_results (id, report_id, test_key, status, notes) VALUES (?, ?, ?, ?, ?)`;
  run(result, 1, 5, '3', 'working', "it's fine; really");
  run(result, 2, 5, '5a', 'broken', 'C:\\logs\\');
  run(result, 3, 6, '3', 'working', null);
  run(result, 4, 6, '7', 'semi', null);

  run(
    `INSERT INTO report_revisions (id, report_id, revision_number, tester, commit_hash, test_type, client_version,
       submitted_at, archived_at, raw_json, test_results, changes_diff)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    1, 5, 0, 'bob', 'abc000', 'full', '1700000000',
    '2025-01-14 10:00:00', '2025-01-15 10:00:00', null, '{"3":"broken"}', '{"3":["broken","working"]}',
  );

  run(
    `INSERT INTO report_logs (id, report_id, filename, log_datetime, size_original, size_compressed, log_data, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    1, 5, 'steam.log', '2025-01-15 09:59:00', 10, 4, LOG_BLOB, '2025-01-15 10:00:00',
  );

  run(
    `INSERT INTO report_comments (id, report_id, user_id, parent_comment_id, content, quoted_text, is_edited, is_deleted, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    1, 5, 2, null, 'Looks good -- ship it; thanks', null, 0, 0, '2025-01-15 11:00:00', null,
  );

  run(`INSERT INTO report_tags (id, name, color, description, created_at) VALUES (?, ?, ?, ?, ?)`,
    1, 'regression', '#ff0000', null, '2025-01-01 00:00:00');
  run(`INSERT INTO report_tags (id, name, color, description, created_at) VALUES (?, ?, ?, ?, ?)`,
    2, 'verified', '#00ff00', 'Checked twice', '2025-01-01 00:00:00');

  run(`INSERT INTO report_tag_assignments (id, report_id, tag_id, assigned_by, assigned_at) VALUES (?, ?, ?, ?, ?)`,
    1, 5, 1, 1, '2025-01-15 12:00:00');
  run(`INSERT INTO report_tag_assignments (id, report_id, tag_id, assigned_by, assigned_at) VALUES (?, ?, ?, ?, ?)`,
    2, 6, 2, 1, '2025-02-01 13:00:00');

  const retest = `INSERT INTO retest_requests (id, report_id, report_revision, test_key, client_version, created_by, reason, notes, status, created_at, completed_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`;
  run(retest, 12, 5, 0, '3', '1700000000', 'alice', 'flaky', null, 'pending', '2025-01-20 10:00:00', null);
  run(retest, 13, 6, 0, '7', '1700000001', 'bob', null, null, 'completed', '2025-02-02 10:00:00', '2025-02-03 10:00:00');

  run(
    `INSERT INTO fixed_tests (id, test_key, client_version, fixed_by, commit_hash, notes, status, created_at, verified_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    7, '5a', '1700000000', 'alice', 'def456', null, 'pending_retest', '2025-01-21 10:00:00', null,
  );

  const version = `INSERT INTO client_versions (id, version_id, display_name, sort_order, created_at) VALUES (?, ?, ?, ?, ?)`;
  run(version, 1, '1700000000', 'Spring Build', 0, '2025-01-01 00:00:00');
  run(version, 2, '1700000001', null, 0, '2025-01-02 00:00:00');

  run(
    `INSERT INTO version_notifications (id, client_version_id, name, message, commit_hash, created_by, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
    1, 1, 'hotfix', 'Fixed crash on start', null, 1, '2025-01-03 00:00:00',
  );

  run(
    `INSERT INTO test_templates (id, name, description, test_keys, created_by, is_default, is_system, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    1, 'Smoke', null, '["3","5a"]', 1, 1, 0, '2025-01-01 00:00:00',
  );
  run(`INSERT INTO test_template_versions (id, template_id, client_version_id, created_at) VALUES (?, ?, ?, ?)`,
    1, 1, 1, '2025-01-01 00:00:00');

  run(
    `INSERT INTO user_notifications (id, user_id, type, report_id, test_key, client_version, title, message, is_read, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    1, 2, 'retest', 5, '3', '1700000000', 'Retest requested', 'Please retest 3', 0, '2025-01-20 10:00:00',
  );

  const invite = `INSERT INTO invite_codes (id, code, created_by, used_by, expires_at, used_at, created_at) VALUES (?, ?, ?, ?, ?, ?, ?)`;
  run(invite, 1, 'invite-1', 1, 2, '2025-01-05 00:00:00', '2025-01-02 08:00:00', '2025-01-02 00:00:00');
  run(invite, 2, 'invite-2', 1, null, '2025-01-08 00:00:00', null, '2025-01-05 00:00:00');

  run(`INSERT INTO site_settings (setting_key, setting_value, setting_type, updated_at) VALUES (?, ?, ?, ?)`,
    'site_name', 'Panel', 'string', '2025-01-01 00:00:00');
}

/** Total rows inserted by seedPanel across every table. */
export const SEEDED_ROW_COUNT = 27;
