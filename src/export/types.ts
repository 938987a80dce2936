/**
 * Export categories and the selection shapes they carry.
 * Most categories select rows by integer id; `tests` selects by test key and
 * `retests` spans two tables.
 */

export const EXPORT_CATEGORIES = [
  'reports',
  'users',
  'client_versions',
  'tests',
  'templates',
  'tags',
  'retests',
] as const;

export type ExportCategory = (typeof EXPORT_CATEGORIES)[number];

export const CATEGORY_LABELS: Record<ExportCategory, string> = {
  reports: 'Reports',
  users: 'Users',
  client_versions: 'Client Versions',
  tests: 'Tests',
  templates: 'Templates',
  tags: 'Tags',
  retests: 'Retest Information',
};

type IdCategory = Exclude<ExportCategory, 'tests' | 'retests'>;

type IdCategorySelection = {
  [C in IdCategory]: { category: C; ids: number[] };
}[IdCategory];

export type CategorySelection =
  | IdCategorySelection
  | { category: 'tests'; keys: string[] }
  | { category: 'retests'; retestIds: number[]; fixedIds: number[] };

/** Ordered as the categories appeared in the request. */
export type ExportSelection = CategorySelection[];

export interface TableSection {
  table: string;
  /** SQL predicate with `?` placeholders */
  where: string;
  params: Array<string | number>;
}

export interface CategoryPlan {
  category: ExportCategory;
  label: string;
  sections: TableSection[];
}

export interface ExportItem {
  id: string;
  label: string;
}

export type ImportMode = 'full' | 'data_only';

export interface ImportResult {
  executed: number;
  skipped: number;
  errorCount: number;
  /** First `maxReportedErrors` failures as `<preview>... — <message>` */
  errors: string[];
  autoIncrementFixed: number;
}
