import { readFile } from 'fs/promises';
import { resolve } from 'path';
import YAML from 'yaml';
import { configDefault } from './defaults.js';
import { configSchema } from './interfaces.js';
import { logger } from './logger.js';
import type { CliOverrides, Config } from './interfaces.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const out: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value)
      ? deepMerge(current, value)
      : value;
  }
  return out;
}

/**
 * Validate a raw config object layered over the defaults.
 * Throws with every schema issue joined into one message.
 */
export function parseConfig(raw: unknown, defaults: Config = configDefault): Config {
  if (raw !== undefined && raw !== null && !isPlainObject(raw)) {
    throw new Error('Config file must contain a mapping at the top level');
  }
  const overrides: PlainObject = isPlainObject(raw) ? raw : {};
  const merged = deepMerge(defaults, overrides);
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

export async function loadConfigFile(confPath?: string): Promise<Config> {
  if (!confPath) {
    return parseConfig({});
  }
  const filePath = resolve(confPath);
  const content = await readFile(filePath, 'utf-8');
  logger().debug('Loaded config file', { filePath });
  return parseConfig(YAML.parse(content));
}

export function mergeCliConf(opts: CliOverrides, config: Config): Config {
  return parseConfig(
    {
      server: { host: opts.host, port: opts.port },
      logLevel: opts.logLevel,
      storage: opts.storage,
      scheduler: opts.scheduler ? { driver: opts.scheduler } : undefined,
      redis: opts.redisUrl ? { url: opts.redisUrl } : undefined,
      preview: opts.image ? { image: opts.image } : undefined,
    },
    config,
  );
}
