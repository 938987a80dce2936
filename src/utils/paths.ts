import path from 'node:path';
import os from 'node:os';

const PANEL_DIR = path.join(os.homedir(), '.steam-test-panel');

export const PANEL_DB_PATH = path.join(PANEL_DIR, 'panel.db');

// Resolved against the working directory unless --config is given
export const PANEL_CONFIG_FILE = 'panel-backup.yml';

/**
 * Expand a leading `~` to the home directory and resolve the result
 * against `baseDir`.
 * e.g. `~/panel.db` → `/home/me/panel.db`
 */
export function resolveUserPath(p: string, baseDir: string = process.cwd()): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return path.resolve(baseDir, p);
}
