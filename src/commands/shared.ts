import type BetterSqlite3 from 'better-sqlite3';
import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, resolveConfigPath } from '../config.js';
import type { Config } from '../config.js';
import { openStore } from '../store/index.js';
import { resolveUserPath } from '../utils/paths.js';
import { errorMessage } from '../utils/logger.js';

export interface StoreOptions {
  config?: string;
  db?: string;
}

export function withStoreOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to panel-backup.yml')
    .option('--db <path>', 'SQLite database file (overrides config)');
}

export function loadRuntimeConfig(options: StoreOptions): Config {
  const config = loadConfig(resolveConfigPath(options.config));
  if (options.db) {
    return { ...config, database: { path: options.db } };
  }
  return config;
}

/**
 * Open the configured database for the duration of `fn` and always close it.
 */
export async function withStore<T>(
  config: Config,
  fn: (db: BetterSqlite3.Database) => T | Promise<T>,
): Promise<T> {
  const db = openStore(resolveUserPath(config.database.path));
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

export function fail(err: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  process.exitCode = 1;
}
