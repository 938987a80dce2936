import chalk from 'chalk';

const isDebug = process.env.PANEL_BACKUP_DEBUG === '1';

export function debug(msg: string): void {
  if (isDebug) {
    console.error(chalk.gray(`[debug] ${msg}`));
  }
}

export function info(msg: string): void {
  console.error(chalk.blue(`[info] ${msg}`));
}

export function warn(msg: string): void {
  console.error(chalk.yellow(`[warn] ${msg}`));
}

export function error(msg: string): void {
  console.error(chalk.red(`[error] ${msg}`));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
