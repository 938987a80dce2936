import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import {
  importSql,
  parseImportMode,
  summarizeImport,
  validateUpload,
} from '../export/index.js';
import { fail, loadRuntimeConfig, withStore, withStoreOptions } from './shared.js';
import type { StoreOptions } from './shared.js';

interface ImportCommandOptions extends StoreOptions {
  mode?: string;
}

async function runImport(file: string, options: ImportCommandOptions): Promise<void> {
  const config = loadRuntimeConfig(options);
  const filePath = path.resolve(file);

  if (!fs.existsSync(filePath)) {
    console.error(chalk.red(`Error: ${filePath} does not exist`));
    process.exitCode = 1;
    return;
  }

  const sql = validateUpload({
    filename: path.basename(filePath),
    content: fs.readFileSync(filePath),
  });
  const mode = parseImportMode(options.mode);

  const result = await withStore(config, (db) =>
    importSql(db, sql, {
      mode,
      maxReportedErrors: config.import.maxReportedErrors,
      previewLength: config.import.statementPreviewLength,
    }),
  );

  const [headline, ...rest] = summarizeImport(result, path.basename(filePath));
  console.log(chalk.green(headline));
  for (const line of rest) {
    console.log(`  ${line}`);
  }

  if (result.errors.length > 0) {
    console.log(chalk.red(`\nImport errors (${result.errorCount}):`));
    for (const entry of result.errors) {
      console.log(`  ${entry}`);
    }
    process.exitCode = 1;
  }
}

export function createImportCommand(): Command {
  return withStoreOptions(
    new Command('import')
      .description('Execute an .sql backup statement by statement (best effort)')
      .argument('<file>', 'SQL file to import')
      .option('-m, --mode <mode>', 'full (run everything) or data_only (skip CREATE/DROP/ALTER/TRUNCATE)', 'full'),
  ).action((file: string, options: ImportCommandOptions) => runImport(file, options).catch(fail));
}
