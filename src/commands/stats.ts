import { Command } from 'commander';
import chalk from 'chalk';
import { getTableStats } from '../store/stats.js';
import { fail, loadRuntimeConfig, withStore, withStoreOptions } from './shared.js';
import type { StoreOptions } from './shared.js';

async function runStats(options: StoreOptions): Promise<void> {
  const config = loadRuntimeConfig(options);
  const stats = await withStore(config, (db) => getTableStats(db));

  console.log(chalk.bold(`${'Table'.padEnd(28)} ${'Rows'.padStart(10)}`));
  console.log('─'.repeat(39));
  for (const { table, rows } of stats.tables) {
    console.log(`${table.padEnd(28)} ${(rows === null ? '—' : String(rows)).padStart(10)}`);
  }
  console.log('─'.repeat(39));
  console.log(
    `${`${stats.tables.length} tables`.padEnd(28)} ${stats.totalRows.toLocaleString('en-US').padStart(10)}`,
  );
}

export function createStatsCommand(): Command {
  return withStoreOptions(
    new Command('stats').description('Show row counts for every panel table'),
  ).action((options: StoreOptions) => runStats(options).catch(fail));
}
