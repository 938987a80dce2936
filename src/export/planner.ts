import { placeholders, quoteIdentifier } from '../sql/quote.js';
import { CATEGORY_LABELS } from './types.js';
import type { CategoryPlan, CategorySelection, ExportSelection, TableSection } from './types.js';

function inList(
  table: string,
  column: string,
  values: Array<string | number>,
): TableSection {
  return {
    table,
    where: `${quoteIdentifier(column)} IN (${placeholders(values.length)})`,
    params: values,
  };
}

/**
 * Tables (and the rows in them) that make up one category's slice of the
 * export. Dependent rows follow the primary rows.
 */
export function planCategory(selection: CategorySelection): TableSection[] {
  switch (selection.category) {
    case 'reports': {
      const { ids } = selection;
      return [
        inList('reports', 'id', ids),
        inList('test_results', 'report_id', ids),
        inList('report_revisions', 'report_id', ids),
        inList('report_logs', 'report_id', ids),
        inList('report_comments', 'report_id', ids),
        inList('report_tag_assignments', 'report_id', ids),
      ];
    }

    case 'users': {
      const { ids } = selection;
      const list = placeholders(ids.length);
      return [
        inList('users', 'id', ids),
        inList('user_notifications', 'user_id', ids),
        {
          table: 'invite_codes',
          where: `"created_by" IN (${list}) OR "used_by" IN (${list})`,
          params: [...ids, ...ids],
        },
      ];
    }

    case 'client_versions':
      return [
        inList('client_versions', 'id', selection.ids),
        inList('version_notifications', 'client_version_id', selection.ids),
      ];

    case 'tests':
      return [inList('test_results', 'test_key', selection.keys)];

    case 'templates':
      return [
        inList('test_templates', 'id', selection.ids),
        inList('test_template_versions', 'template_id', selection.ids),
      ];

    case 'tags':
      return [
        inList('report_tags', 'id', selection.ids),
        inList('report_tag_assignments', 'tag_id', selection.ids),
      ];

    case 'retests': {
      const sections: TableSection[] = [];
      if (selection.retestIds.length > 0) {
        sections.push(inList('retest_requests', 'id', selection.retestIds));
      }
      if (selection.fixedIds.length > 0) {
        sections.push(inList('fixed_tests', 'id', selection.fixedIds));
      }
      return sections;
    }

    default: {
      const unreachable: never = selection;
      throw new Error(`Unhandled export category: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function planSelection(selection: ExportSelection): CategoryPlan[] {
  return selection.map((entry) => ({
    category: entry.category,
    label: CATEGORY_LABELS[entry.category],
    sections: planCategory(entry),
  }));
}
