import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { PROMPTRAIL_CONFIG_PATH } from '../utils/paths.js';
import { ConfigError, describeError } from '../utils/errors.js';

const ConfigSchema = z.object({
  version: z.literal(1).default(1),
  // 0 forces condensed rendering
  verboseThreshold: z.number().int().min(0).default(5),
  inactivityWindowMinutes: z.number().int().positive().default(30),
  fileDisplayLimit: z.number().int().positive().default(8),
  storeBusyTimeoutMs: z.number().int().min(0).default(2000),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigKey = Exclude<keyof Config, 'version'>;

export const DEFAULT_CONFIG: Readonly<Config> = {
  version: 1,
  verboseThreshold: 5,
  inactivityWindowMinutes: 30,
  fileDisplayLimit: 8,
  storeBusyTimeoutMs: 2000,
};

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'verboseThreshold',
  'inactivityWindowMinutes',
  'fileDisplayLimit',
  'storeBusyTimeoutMs',
];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

function validate(input: unknown, source: string): Config {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${source}: ${detail}`);
  }
  return result.data;
}

export function loadConfig(configPath: string = PROMPTRAIL_CONFIG_PATH): Config {
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  const raw = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}: ${describeError(err)}`);
  }
  if (parsed === null || parsed === undefined) {
    return { ...DEFAULT_CONFIG };
  }
  return validate(parsed, configPath);
}

export function saveConfig(
  config: Config,
  configPath: string = PROMPTRAIL_CONFIG_PATH,
): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, YAML.stringify(config, { indent: 2 }), 'utf-8');
}

/** Writes the defaults unless a config file already exists. */
export function writeDefaultConfig(
  configPath: string = PROMPTRAIL_CONFIG_PATH,
): boolean {
  if (fs.existsSync(configPath)) return false;
  saveConfig({ ...DEFAULT_CONFIG }, configPath);
  return true;
}

/**
 * Read a single tunable, or validate, persist and return a new value for it.
 */
export function getOrSetConfig(
  key: string,
  value?: string | number,
  configPath: string = PROMPTRAIL_CONFIG_PATH,
): number {
  if (!isConfigKey(key)) {
    throw new ConfigError(
      `Unknown config key "${key}". Known keys: ${CONFIG_KEYS.join(', ')}`,
    );
  }

  const config = loadConfig(configPath);
  if (value === undefined) {
    return config[key];
  }

  if (typeof value === 'string' && value.trim() === '') {
    throw new ConfigError(`${key}: expected a number`);
  }
  const numeric = typeof value === 'number' ? value : Number(value.trim());
  const updated = validate({ ...config, [key]: numeric }, key);
  saveConfig(updated, configPath);
  return updated[key];
}
