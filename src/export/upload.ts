import path from 'node:path';
import { UploadError } from '../utils/errors.js';
import type { ImportMode } from './types.js';

export interface UploadedSql {
  filename: string;
  content: Buffer | string;
}

/**
 * Check an uploaded script and return its text. Runs before anything touches
 * the database.
 */
/** Text after the last dot of the base name, so `.sql` alone counts as `sql`. */
function extensionOf(filename: string): string {
  const base = path.basename(filename);
  const dot = base.lastIndexOf('.');
  return dot === -1 ? '' : base.slice(dot + 1).toLowerCase();
}

export function validateUpload(file: UploadedSql | undefined): string {
  if (!file) {
    throw new UploadError('No file was uploaded.');
  }
  if (extensionOf(file.filename) !== 'sql') {
    throw new UploadError('Only .sql files are accepted.');
  }

  const sql = typeof file.content === 'string' ? file.content : file.content.toString('utf-8');
  if (sql.trim() === '') {
    throw new UploadError('The uploaded file is empty or could not be read.');
  }
  return sql;
}

export function parseImportMode(value: unknown): ImportMode {
  if (value === undefined || value === null || value === '') return 'full';
  if (value === 'full' || value === 'data_only') return value;
  throw new UploadError(`Invalid import mode: ${String(value)}`);
}
