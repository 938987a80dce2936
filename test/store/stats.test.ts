import type BetterSqlite3 from 'better-sqlite3';
import { countRows, getTableStats } from '../../src/store/stats.js';
import { ALL_TABLES } from '../../src/store/schema.js';
import { createTestDb, seedPanel, SEEDED_ROW_COUNT } from '../fixtures.js';

describe('table stats', () => {
  let db: BetterSqlite3.Database;

  beforeEach(() => {
    db = createTestDb();
    seedPanel(db);
  });

  afterEach(() => {
    db.close();
  });

  it('counts rows in one table', () => {
    expect(countRows(db, 'test_results')).toBe(4);
  });

  it('reports every table sorted by name', () => {
    const stats = getTableStats(db);

    expect(stats.tables.map((t) => t.table)).toEqual([...ALL_TABLES].sort());
    expect(stats.tables.find((t) => t.table === 'reports')).toEqual({ table: 'reports', rows: 2 });
    expect(stats.totalRows).toBe(SEEDED_ROW_COUNT);
  });

  it('marks unreadable tables and leaves them out of the total', () => {
    db.exec('DROP TABLE site_settings');

    const stats = getTableStats(db);

    expect(stats.tables.find((t) => t.table === 'site_settings')).toEqual({
      table: 'site_settings',
      rows: null,
    });
    expect(stats.totalRows).toBe(SEEDED_ROW_COUNT - 1);
  });

  it('counts only the requested tables', () => {
    expect(getTableStats(db, ['users', 'report_tags'])).toEqual({
      tables: [
        { table: 'report_tags', rows: 2 },
        { table: 'users', rows: 2 },
      ],
      totalRows: 4,
    });
  });
});
