import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { exportFilename, parseSelectionRequest, planSelection, renderExport } from '../export/index.js';
import { fail, loadRuntimeConfig, withStore, withStoreOptions } from './shared.js';
import type { StoreOptions } from './shared.js';

interface ExportOptions extends StoreOptions {
  select: string;
  out?: string;
  dryRun?: boolean;
}

async function runExport(options: ExportOptions): Promise<void> {
  const config = loadRuntimeConfig(options);
  const { requested, selection } = parseSelectionRequest(options.select);

  if (options.dryRun) {
    console.log(chalk.yellow('Dry run: nothing will be queried or written.'));
    for (const plan of planSelection(selection)) {
      console.log(chalk.bold(plan.label));
      for (const section of plan.sections) {
        console.log(`  ${section.table} WHERE ${section.where}  [${section.params.join(', ')}]`);
      }
    }
    return;
  }

  const now = new Date();
  const script = await withStore(config, (db) =>
    renderExport(db, selection, { now, categories: requested }),
  );

  if (options.out === '-') {
    process.stdout.write(script);
    return;
  }

  const outPath = path.resolve(options.out ?? exportFilename(config.export.filenamePrefix, now));
  fs.writeFileSync(outPath, script, 'utf-8');
  console.log(chalk.green('Export complete: ') + outPath);
}

export function createExportCommand(): Command {
  return withStoreOptions(
    new Command('export')
      .description('Write a selective REPLACE INTO export script')
      .requiredOption('-s, --select <json>', 'Selection as JSON, e.g. \'{"reports":[5],"tests":["3"]}\'')
      .option('-o, --out <file>', 'Output file, or - for stdout (default: generated name in cwd)')
      .option('--dry-run', 'Show the tables and filters without querying'),
  ).action((options: ExportOptions) => runExport(options).catch(fail));
}
