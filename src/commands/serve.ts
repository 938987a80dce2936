import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { openStore } from '../store/index.js';
import { closeServer, createApp, listen } from '../server/index.js';
import { resolveUserPath } from '../utils/paths.js';
import { info } from '../utils/logger.js';
import { fail, loadRuntimeConfig, withStoreOptions } from './shared.js';
import type { StoreOptions } from './shared.js';

interface ServeOptions extends StoreOptions {
  port?: number;
  host?: string;
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

async function runServe(options: ServeOptions): Promise<void> {
  const config = loadRuntimeConfig(options);
  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;

  const dbPath = resolveUserPath(config.database.path);
  const db = openStore(dbPath);
  info(`Database: ${dbPath}`);

  const server = await listen(createApp({ db, config }), port, host);
  console.log(chalk.green(`\n✓ Panel backup service listening on http://${host}:${port}`));
  console.log(`  • Health:   GET  /health`);
  console.log(`  • Export:   POST /backup/export`);
  console.log(`  • Import:   POST /backup/import`);
  console.log(`  • Items:    GET  /backup/items?category=<c>`);
  console.log(`  • Stats:    GET  /backup/stats\n`);

  const shutdown = (): void => {
    info('Shutting down gracefully...');
    void closeServer(server)
      .catch(fail)
      .finally(() => db.close());
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

export function createServeCommand(): Command {
  return withStoreOptions(
    new Command('serve')
      .description('Start the backup HTTP API')
      .option('-p, --port <port>', 'Port to listen on (overrides config)', parsePort)
      .option('-H, --host <host>', 'Interface to bind (overrides config)'),
  ).action((options: ServeOptions) => runServe(options).catch(fail));
}
