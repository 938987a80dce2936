import { Command } from 'commander';
import fs from 'node:fs';
import chalk from 'chalk';
import { resolveConfigPath, writeDefaultConfig } from '../config.js';
import { openStore } from '../store/index.js';
import { resolveUserPath } from '../utils/paths.js';
import { fail, loadRuntimeConfig, withStoreOptions } from './shared.js';
import type { StoreOptions } from './shared.js';

async function runInit(options: StoreOptions & { force?: boolean }): Promise<void> {
  const configPath = resolveConfigPath(options.config);

  if (!fs.existsSync(configPath) || options.force) {
    writeDefaultConfig(configPath);
    console.log(chalk.green('✓') + ` Created ${configPath}`);
  } else {
    console.log(chalk.yellow('⚠') + ` ${configPath} already exists. Use --force to overwrite.`);
  }

  const config = loadRuntimeConfig(options);
  const dbPath = resolveUserPath(config.database.path);
  const db = openStore(dbPath);
  db.close();
  console.log(chalk.green('✓') + ` Database ready at ${dbPath}`);
}

export function createInitCommand(): Command {
  return withStoreOptions(
    new Command('init')
      .description('Write a default panel-backup.yml and create the database schema')
      .option('--force', 'Overwrite an existing config file'),
  ).action((options: StoreOptions & { force?: boolean }) => runInit(options).catch(fail));
}
