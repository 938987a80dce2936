export interface Migration {
  version: number;
  description: string;
  up: string;
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Reports, results, retests and users',
    up: `
      CREATE TABLE IF NOT EXISTS _migrations (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL UNIQUE,
        password TEXT NOT NULL,
        role TEXT NOT NULL DEFAULT 'user' CHECK (role IN ('admin', 'user')),
        api_key TEXT NOT NULL UNIQUE,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS reports (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        tester TEXT NOT NULL,
        commit_hash TEXT,
        test_type TEXT NOT NULL,
        client_version TEXT NOT NULL,
        steamui_version TEXT,
        steam_pkg_version TEXT,
        submitted_at TEXT NOT NULL DEFAULT (datetime('now')),
        raw_json TEXT,
        test_duration INTEGER,
        revision_count INTEGER NOT NULL DEFAULT 0,
        restored_from INTEGER,
        restored_at TEXT,
        last_modified TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS test_results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        report_id INTEGER NOT NULL,
        test_key TEXT NOT NULL,
        status TEXT NOT NULL,
        notes TEXT,
        FOREIGN KEY (report_id) REFERENCES reports(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS report_revisions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        report_id INTEGER NOT NULL,
        revision_number INTEGER NOT NULL DEFAULT 0,
        tester TEXT NOT NULL,
        commit_hash TEXT,
        test_type TEXT NOT NULL,
        client_version TEXT NOT NULL,
        steamui_version TEXT,
        steam_pkg_version TEXT,
        submitted_at TEXT NOT NULL,
        archived_at TEXT NOT NULL DEFAULT (datetime('now')),
        raw_json TEXT,
        test_results TEXT,
        changes_diff TEXT,
        FOREIGN KEY (report_id) REFERENCES reports(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS retest_requests (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        report_id INTEGER,
        report_revision INTEGER,
        test_key TEXT NOT NULL,
        client_version TEXT NOT NULL,
        created_by TEXT NOT NULL,
        reason TEXT,
        notes TEXT,
        status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'completed')),
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        completed_at TEXT
      );

      CREATE TABLE IF NOT EXISTS fixed_tests (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        test_key TEXT NOT NULL,
        client_version TEXT NOT NULL,
        fixed_by TEXT NOT NULL,
        commit_hash TEXT,
        notes TEXT,
        status TEXT NOT NULL DEFAULT 'pending_retest' CHECK (status IN ('pending_retest', 'verified')),
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        verified_at TEXT
      );

      CREATE TABLE IF NOT EXISTS report_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        report_id INTEGER NOT NULL,
        filename TEXT NOT NULL,
        log_datetime TEXT NOT NULL,
        size_original INTEGER NOT NULL,
        size_compressed INTEGER NOT NULL,
        log_data BLOB NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        FOREIGN KEY (report_id) REFERENCES reports(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS user_notifications (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        type TEXT NOT NULL DEFAULT 'retest' CHECK (type IN ('retest', 'fixed', 'info')),
        report_id INTEGER,
        test_key TEXT,
        client_version TEXT,
        title TEXT NOT NULL,
        message TEXT NOT NULL,
        notes TEXT,
        is_read INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        read_at TEXT,
        FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS report_comments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        report_id INTEGER NOT NULL,
        user_id INTEGER NOT NULL,
        parent_comment_id INTEGER,
        content TEXT NOT NULL,
        quoted_text TEXT,
        is_edited INTEGER NOT NULL DEFAULT 0,
        is_deleted INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT,
        FOREIGN KEY (report_id) REFERENCES reports(id) ON DELETE CASCADE,
        FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
        FOREIGN KEY (parent_comment_id) REFERENCES report_comments(id) ON DELETE SET NULL
      );

      CREATE INDEX IF NOT EXISTS idx_reports_tester ON reports(tester);
      CREATE INDEX IF NOT EXISTS idx_reports_client_version ON reports(client_version);
      CREATE INDEX IF NOT EXISTS idx_reports_submitted_at ON reports(submitted_at);
      CREATE INDEX IF NOT EXISTS idx_test_results_report ON test_results(report_id);
      CREATE INDEX IF NOT EXISTS idx_test_results_key ON test_results(test_key);
      CREATE INDEX IF NOT EXISTS idx_revisions_report ON report_revisions(report_id, revision_number);
      CREATE INDEX IF NOT EXISTS idx_retests_status ON retest_requests(status);
      CREATE INDEX IF NOT EXISTS idx_fixed_status ON fixed_tests(status);
      CREATE INDEX IF NOT EXISTS idx_logs_report ON report_logs(report_id);
      CREATE INDEX IF NOT EXISTS idx_notifications_user ON user_notifications(user_id, is_read);
      CREATE INDEX IF NOT EXISTS idx_comments_report ON report_comments(report_id);
    `,
  },
  {
    version: 2,
    description: 'Templates, tags, client versions, invites and site settings',
    up: `
      CREATE TABLE IF NOT EXISTS client_versions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        version_id TEXT NOT NULL UNIQUE,
        display_name TEXT,
        steam_date TEXT,
        steam_time TEXT,
        packages TEXT,
        skip_tests TEXT,
        sort_order INTEGER NOT NULL DEFAULT 0,
        is_enabled INTEGER NOT NULL DEFAULT 1,
        created_by INTEGER,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT
      );

      CREATE TABLE IF NOT EXISTS version_notifications (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        client_version_id INTEGER NOT NULL,
        name TEXT NOT NULL,
        message TEXT NOT NULL,
        commit_hash TEXT,
        created_by INTEGER NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT,
        UNIQUE (client_version_id, name)
      );

      CREATE TABLE IF NOT EXISTS test_templates (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        description TEXT,
        test_keys TEXT NOT NULL,
        created_by INTEGER NOT NULL,
        is_default INTEGER NOT NULL DEFAULT 0,
        is_system INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT
      );

      CREATE TABLE IF NOT EXISTS test_template_versions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        template_id INTEGER NOT NULL,
        client_version_id INTEGER NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE (template_id, client_version_id)
      );

      CREATE TABLE IF NOT EXISTS report_tags (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        color TEXT NOT NULL DEFAULT '#808080',
        description TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS report_tag_assignments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        report_id INTEGER NOT NULL,
        tag_id INTEGER NOT NULL,
        assigned_by INTEGER NOT NULL,
        assigned_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE (report_id, tag_id)
      );

      CREATE TABLE IF NOT EXISTS invite_codes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        code TEXT NOT NULL UNIQUE,
        created_by INTEGER NOT NULL,
        used_by INTEGER,
        expires_at TEXT NOT NULL,
        used_at TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        FOREIGN KEY (created_by) REFERENCES users(id) ON DELETE CASCADE,
        FOREIGN KEY (used_by) REFERENCES users(id) ON DELETE SET NULL
      );

      CREATE TABLE IF NOT EXISTS site_settings (
        setting_key TEXT NOT NULL PRIMARY KEY,
        setting_value TEXT,
        setting_type TEXT NOT NULL DEFAULT 'string' CHECK (setting_type IN ('string', 'int', 'bool', 'json')),
        description TEXT,
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_client_versions_sort ON client_versions(sort_order);
      CREATE INDEX IF NOT EXISTS idx_version_notifications_version ON version_notifications(client_version_id);
      CREATE INDEX IF NOT EXISTS idx_template_versions_template ON test_template_versions(template_id);
      CREATE INDEX IF NOT EXISTS idx_tag_assignments_report ON report_tag_assignments(report_id);
      CREATE INDEX IF NOT EXISTS idx_tag_assignments_tag ON report_tag_assignments(tag_id);
      CREATE INDEX IF NOT EXISTS idx_invites_created_by ON invite_codes(created_by);
      CREATE INDEX IF NOT EXISTS idx_invites_used_by ON invite_codes(used_by);
    `,
  },
];

/** Tables whose `id` is an AUTOINCREMENT integer key. */
export const AUTO_INCREMENT_TABLES = [
  'users',
  'reports',
  'test_results',
  'report_revisions',
  'report_logs',
  'report_comments',
  'test_templates',
  'report_tags',
  'report_tag_assignments',
  'retest_requests',
  'fixed_tests',
  'user_notifications',
  'version_notifications',
  'invite_codes',
  'client_versions',
  'test_template_versions',
] as const;

export const ALL_TABLES: readonly string[] = [...AUTO_INCREMENT_TABLES, 'site_settings'];
