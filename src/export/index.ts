export { parseSelection, parseSelectionRequest, isExportCategory } from './selection.js';
export { planCategory, planSelection } from './planner.js';
export { renderExport, exportTableRows, exportFilename } from './exporter.js';
export {
  importSql,
  isDdlStatement,
  repairAutoIncrement,
  summarizeImport,
} from './importer.js';
export type { ImportOptions } from './importer.js';
export { validateUpload, parseImportMode } from './upload.js';
export type { UploadedSql } from './upload.js';
export { listExportItems } from './items.js';
export { EXPORT_CATEGORIES, CATEGORY_LABELS } from './types.js';
export type {
  ExportCategory,
  CategorySelection,
  ExportSelection,
  TableSection,
  CategoryPlan,
  ExportItem,
  ImportMode,
  ImportResult,
} from './types.js';
