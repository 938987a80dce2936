import { Command } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createServeCommand } from './commands/serve.js';
import { createExportCommand } from './commands/export.js';
import { createImportCommand } from './commands/import.js';
import { createItemsCommand } from './commands/items.js';
import { createStatsCommand } from './commands/stats.js';

const program = new Command();

program
  .name('panel-backup')
  .version('0.1.0')
  .description('Selective SQL export and best-effort import for the Steam Test Panel');

program.addCommand(createInitCommand());
program.addCommand(createServeCommand());
program.addCommand(createExportCommand());
program.addCommand(createImportCommand());
program.addCommand(createItemsCommand());
program.addCommand(createStatsCommand());

program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // Filter Commander control-flow "errors" (help, version display)
    if (
      err instanceof Error &&
      'code' in err &&
      (err.code === 'commander.helpDisplayed' ||
        err.code === 'commander.version' ||
        err.code === 'commander.help')
    ) {
      return;
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
