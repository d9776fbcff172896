import { existsSync, readFileSync } from 'fs';
import { load } from 'js-yaml';
import { ConfigError } from '../domain/errors/config.error';

export const DEFAULT_CONFIG_FILE = './config.yml';

/**
 * Read a YAML config file and flatten it into environment-style keys:
 * `export_api: { timeout_ms: 5000 }` and `exportApi: { timeoutMs: 5000 }`
 * both become `EXPORT_API_TIMEOUT_MS: 5000`.
 *
 * A missing file is only an error when its path was given explicitly.
 */
export function loadConfigFile(path: string | undefined): Record<string, unknown> {
  const target = path ?? DEFAULT_CONFIG_FILE;

  if (!existsSync(target)) {
    if (path === undefined) {
      return {};
    }
    throw new ConfigError(`Config file not found: ${target}`);
  }

  let document: unknown;
  try {
    document = load(readFileSync(target, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${target} is not valid YAML: ${reason}`);
  }

  if (document === null || document === undefined) {
    return {};
  }
  if (!isPlainObject(document)) {
    throw new ConfigError(`Config file ${target} must contain a mapping at the top level`);
  }

  return flattenConfig(document);
}

export function flattenConfig(
  source: Record<string, unknown>,
  prefix = '',
): Record<string, unknown> {
  const flat: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(source)) {
    const name = prefix ? `${prefix}_${toEnvKey(key)}` : toEnvKey(key);
    if (isPlainObject(value)) {
      Object.assign(flat, flattenConfig(value, name));
    } else {
      flat[name] = value;
    }
  }

  return flat;
}

export function toEnvKey(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toUpperCase();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
