import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigError } from './report/errors.js';
import { isNodeError, isRecord } from './report/util.js';

export const CONFIG_KEYS = [
  'capexColumn',
  'capexThreshold',
  'groupBy',
  'output',
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

/**
 * Defaults stored between runs. Values are written as text by
 * `config set`, so the threshold is coerced when read.
 */
export const PersistentConfig = z.object({
  capexColumn: z.string().min(1).optional(),
  capexThreshold: z.coerce.number().optional(),
  groupBy: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
});

export type PersistentConfig = z.infer<typeof PersistentConfig>;

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

function getConfigDir(): string {
  return (
    process.env.CAPEX_REPORT_CONFIG_DIR ??
    path.join(os.homedir(), '.config', 'capex-report')
  );
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/**
 * Reads the raw key/value pairs of the defaults file. A missing file reads
 * as empty.
 */
export async function readConfigFile(): Promise<Record<string, string>> {
  let content: string;
  try {
    content = await fs.readFile(getConfigPath(), 'utf-8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new ConfigError(`Config file is not valid JSON: ${getConfigPath()}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError('Config file must contain a JSON object.');
  }

  const entries: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new ConfigError(`Config "${key}" must be a string or a number.`);
    }
    entries[key] = String(value);
  }
  return entries;
}

export async function writeConfigFile(
  config: Record<string, string>,
): Promise<void> {
  await fs.mkdir(getConfigDir(), { recursive: true });
  await fs.writeFile(
    getConfigPath(),
    JSON.stringify(config, null, 2),
    'utf-8',
  );
}

/**
 * Loads and validates the stored defaults. Unknown keys are ignored.
 */
export async function loadPersistentConfig(): Promise<PersistentConfig> {
  const raw = await readConfigFile();
  const result = PersistentConfig.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${getConfigPath()}:\n${z.prettifyError(result.error)}`,
    );
  }
  return result.data;
}
