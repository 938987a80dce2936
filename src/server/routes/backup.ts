import { Router } from 'express';
import type { RequestHandler } from 'express';
import multer from 'multer';
import { z } from 'zod';
import type BetterSqlite3 from 'better-sqlite3';
import type { Config } from '../../config.js';
import {
  CATEGORY_LABELS,
  EXPORT_CATEGORIES,
  exportFilename,
  importSql,
  listExportItems,
  parseImportMode,
  parseSelectionRequest,
  renderExport,
  summarizeImport,
  validateUpload,
} from '../../export/index.js';
import { getTableStats } from '../../store/stats.js';
import { SelectionError, UploadError } from '../../utils/errors.js';
import { debug, errorMessage, info, warn } from '../../utils/logger.js';

const FormSelectionSchema = z.object({ export_selection: z.string() });
const ImportFieldsSchema = z.object({ import_mode: z.string().optional() });

/**
 * Single `sql_file` upload held in memory. Any failure while receiving the
 * body (size limit, unexpected field, truncated multipart) becomes an
 * UploadError.
 */
function receiveUpload(maxBytes: number): RequestHandler {
  const handler = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes, files: 1 },
  }).single('sql_file');

  return (req, res, next) => {
    handler(req, res, (err?: unknown) => {
      if (err === undefined || err === null) {
        next();
        return;
      }
      const code = err instanceof multer.MulterError ? err.code : undefined;
      debug(`Upload rejected: ${errorMessage(err)}`);
      next(new UploadError(`Upload failed (error code: ${code ?? 'unknown'})`));
    });
  };
}

export function createBackupRouter(db: BetterSqlite3.Database, config: Config): Router {
  const router = Router();

  // GET /backup/categories - Exportable categories with display labels
  router.get('/categories', (_req, res) => {
    res.json({
      categories: EXPORT_CATEGORIES.map((key) => ({ key, label: CATEGORY_LABELS[key] })),
    });
  });

  // GET /backup/items?category=<c> - Selectable entries for one category
  router.get('/items', (req, res) => {
    const { category } = req.query;
    if (typeof category !== 'string' || category === '') {
      throw new SelectionError('Missing category');
    }
    res.json({ category, items: listExportItems(db, category) });
  });

  // GET /backup/stats - Row counts per table
  router.get('/stats', (_req, res) => {
    res.json(getTableStats(db));
  });

  // POST /backup/export - Download a selective export script
  router.post('/export', (req, res) => {
    const form = FormSelectionSchema.safeParse(req.body);
    const { requested, selection } = parseSelectionRequest(
      form.success ? form.data.export_selection : req.body,
    );

    const now = new Date();
    const script = renderExport(db, selection, { now, categories: requested });
    const filename = exportFilename(config.export.filenamePrefix, now);

    res.setHeader('Content-Type', 'application/sql; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
    res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
    res.send(script);
  });

  // POST /backup/import - Execute an uploaded .sql script
  router.post('/import', receiveUpload(config.import.maxUploadBytes), (req, res) => {
    const file = req.file
      ? { filename: req.file.originalname, content: req.file.buffer }
      : undefined;
    const sql = validateUpload(file);

    const fields = ImportFieldsSchema.safeParse(req.body);
    if (!fields.success) {
      throw new UploadError('Invalid import mode');
    }
    const mode = parseImportMode(fields.data.import_mode);

    const result = importSql(db, sql, {
      mode,
      maxReportedErrors: config.import.maxReportedErrors,
      previewLength: config.import.statementPreviewLength,
    });
    const filename = file?.filename ?? 'upload.sql';
    const summary = summarizeImport(result, filename);
    info(`Imported ${filename} (${mode}): ${result.executed} executed, ${result.skipped} skipped, ${result.errorCount} failed`);

    if (result.errorCount > 0) {
      warn(`${result.errorCount} statement(s) in ${filename} failed; first: ${result.errors[0] ?? ''}`);
    }

    res.json({ message: summary.join('\n'), ...result });
  });

  return router;
}
