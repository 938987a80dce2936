import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { PANEL_CONFIG_FILE, PANEL_DB_PATH } from './utils/paths.js';
import { ConfigError } from './utils/errors.js';

const DatabaseConfigSchema = z.object({
  path: z.string().min(1).default(PANEL_DB_PATH),
});

const ServerConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(8080),
});

const ExportConfigSchema = z.object({
  filenamePrefix: z
    .string()
    .regex(/^[A-Za-z0-9_.-]+$/, 'filenamePrefix may only contain letters, digits, _ . -')
    .default('steam_test_panel_export'),
});

const ImportConfigSchema = z.object({
  maxUploadBytes: z.number().int().positive().default(64 * 1024 * 1024),
  maxReportedErrors: z.number().int().positive().default(50),
  statementPreviewLength: z.number().int().positive().default(80),
});

const ConfigSchema = z.object({
  version: z.literal(1),
  database: DatabaseConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  export: ExportConfigSchema.default({}),
  import: ImportConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({ version: 1 });

export function resolveConfigPath(explicit?: string): string {
  return path.resolve(explicit ?? PANEL_CONFIG_FILE);
}

export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw ?? { version: 1 });
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

export function loadConfig(configPath: string = resolveConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  const raw = fs.readFileSync(configPath, 'utf-8');
  return parseConfig(YAML.parse(raw));
}

export function writeDefaultConfig(configPath: string = resolveConfigPath()): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  const yamlStr = YAML.stringify(DEFAULT_CONFIG, { indent: 2 });
  fs.writeFileSync(configPath, yamlStr, 'utf-8');
}
