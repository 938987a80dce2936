import { Command } from 'commander';
import chalk from 'chalk';
import { listExportItems } from '../export/index.js';
import { fail, loadRuntimeConfig, withStore, withStoreOptions } from './shared.js';
import type { StoreOptions } from './shared.js';

async function runItems(category: string, options: StoreOptions): Promise<void> {
  const config = loadRuntimeConfig(options);
  const items = await withStore(config, (db) => listExportItems(db, category));

  if (items.length === 0) {
    console.log(chalk.yellow('No items found for this category.'));
    return;
  }

  const width = Math.max(...items.map((i) => i.id.length)) + 2;
  for (const item of items) {
    console.log(`${item.id.padEnd(width)}${item.label}`);
  }
  console.log(`\n${items.length} item(s).`);
}

export function createItemsCommand(): Command {
  return withStoreOptions(
    new Command('items')
      .description('List selectable ids for an export category')
      .argument('<category>', 'reports, users, client_versions, tests, templates, tags or retests'),
  ).action((category: string, options: StoreOptions) => runItems(category, options).catch(fail));
}
