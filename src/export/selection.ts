import { z } from 'zod';
import { SelectionError } from '../utils/errors.js';
import { EXPORT_CATEGORIES } from './types.js';
import type { CategorySelection, ExportCategory, ExportSelection } from './types.js';

const RawSelectionSchema = z.record(z.unknown());
const EntrySchema = z.union([z.string(), z.number()]);

export function isExportCategory(value: string): value is ExportCategory {
  return EXPORT_CATEGORIES.some((c) => c === value);
}

function toEntries(value: unknown[]): string[] {
  const entries: string[] = [];
  for (const item of value) {
    const parsed = EntrySchema.safeParse(item);
    if (parsed.success) entries.push(String(parsed.data));
  }
  return entries;
}

function toIds(entries: string[]): number[] {
  const ids: number[] = [];
  for (const entry of entries) {
    const id = Number.parseInt(entry, 10);
    if (!Number.isNaN(id)) ids.push(id);
  }
  return ids;
}

function toCategorySelection(
  category: ExportCategory,
  entries: string[],
): CategorySelection | null {
  switch (category) {
    case 'tests':
      return entries.length > 0 ? { category, keys: entries } : null;

    case 'retests': {
      const retestIds = toIds(
        entries.filter((e) => e.startsWith('retest_')).map((e) => e.slice('retest_'.length)),
      );
      const fixedIds = toIds(
        entries.filter((e) => e.startsWith('fixed_')).map((e) => e.slice('fixed_'.length)),
      );
      if (retestIds.length === 0 && fixedIds.length === 0) return null;
      return { category, retestIds, fixedIds };
    }

    default: {
      const ids = toIds(entries);
      return ids.length > 0 ? { category, ids } : null;
    }
  }
}

export interface SelectionRequest {
  /** Every key of the request in the order given, kept or not */
  requested: string[];
  selection: ExportSelection;
}

/**
 * Parse a `{ category: id[] }` object, or a JSON string holding one, into a
 * typed selection. Unknown categories, non-array values and ids that do not
 * parse are dropped; categories left with nothing to export are skipped.
 */
export function parseSelectionRequest(raw: unknown): SelectionRequest {
  if (raw === undefined || raw === null || raw === '') {
    throw new SelectionError('No selection provided');
  }

  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new SelectionError('Malformed selection');
    }
  }

  const parsed = RawSelectionSchema.safeParse(value);
  if (!parsed.success) {
    throw new SelectionError('Malformed selection');
  }
  if (Object.keys(parsed.data).length === 0) {
    throw new SelectionError('No selection provided');
  }

  const selection: ExportSelection = [];
  for (const [key, ids] of Object.entries(parsed.data)) {
    if (!isExportCategory(key) || !Array.isArray(ids)) continue;
    const entry = toCategorySelection(key, toEntries(ids));
    if (entry) selection.push(entry);
  }
  return { requested: Object.keys(parsed.data), selection };
}

export function parseSelection(raw: unknown): ExportSelection {
  return parseSelectionRequest(raw).selection;
}
