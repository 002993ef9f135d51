/**
 * Configuration engine for skyfleet.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import type { ConfigSource, ResolvedValue, SkyfleetConfig } from '../types/config.js';
import { SkyfleetConfigSchema } from '../types/config.js';
import { readJson, saveJson } from '../store/json.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';
import { SkyfleetError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default configuration values. */
export const DEFAULTS: SkyfleetConfig = {
  api: {
    baseUrl: 'https://global.api.skyfleet.example',
    tokenUrl: 'https://sso.skyfleet.example/as/token.oauth2',
    timeoutMs: 30_000,
    pageSize: 100,
    maxPages: 1000,
  },
  session: {
    expirySkewMs: 30_000,
    persist: true,
  },
  logging: {
    level: 'info',
    filePath: 'logs/skyfleet.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'SKYFLEET_BASE_URL': 'api.baseUrl',
  'SKYFLEET_TOKEN_URL': 'api.tokenUrl',
  'SKYFLEET_TIMEOUT_MS': 'api.timeoutMs',
  'SKYFLEET_PAGE_SIZE': 'api.pageSize',
  'SKYFLEET_MAX_PAGES': 'api.maxPages',
  'SKYFLEET_SESSION_EXPIRY_SKEW_MS': 'session.expirySkewMs',
  'SKYFLEET_SESSION_PERSIST': 'session.persist',
  'SKYFLEET_LOG_LEVEL': 'logging.level',
  'SKYFLEET_LOG_FILE': 'logging.filePath',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
export function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse a string value into its appropriate JS type.
 * Handles booleans, null, integers and floats.
 */
export function parseConfigValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

async function readConfigFile(path: string): Promise<Record<string, unknown> | null> {
  const raw = await readJson<unknown>(path);
  if (raw === null) return null;
  if (!isRecord(raw)) {
    throw new SkyfleetError(ExitCode.CONFIG_ERROR, `Config file is not a JSON object: ${path}`);
  }
  return raw;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<SkyfleetConfig> {
  let merged: Record<string, unknown> = structuredClone(DEFAULTS);

  const globalConfig = await readConfigFile(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  const projectConfig = await readConfigFile(getConfigPath(cwd));
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseConfigValue(envValue));
    }
  }

  const parsed = SkyfleetConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new SkyfleetError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration: ${issues.join('; ')}`,
      { fix: 'skyfleet config list', details: { issues } },
    );
  }
  return parsed.data;
}

/**
 * Get a single config value with source tracking.
 */
export async function getConfigValue(path: string, cwd?: string): Promise<ResolvedValue> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseConfigValue(envValue), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, string]> = [
    ['project', getConfigPath(cwd)],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, file] of layers) {
    const config = await readConfigFile(file);
    if (config) {
      const val = getNestedValue(config, path);
      if (val !== undefined) {
        return { value: val, source };
      }
    }
  }

  return { value: getNestedValue(structuredClone(DEFAULTS), path), source: 'default' };
}

/**
 * Set a config value in the project or global config file (dot-notation supported).
 * Creates intermediate objects as needed. The file is not written when the
 * result would fail schema validation.
 */
export async function setConfigValue(
  key: string,
  value: string,
  cwd?: string,
  opts?: { global?: boolean },
): Promise<{ key: string; value: unknown; scope: 'project' | 'global' }> {
  const configPath = opts?.global ? getGlobalConfigPath() : getConfigPath(cwd);
  const config = (await readConfigFile(configPath)) ?? {};

  const parsedValue = parseConfigValue(value);
  setNestedValue(config, key, parsedValue);

  await saveJson(configPath, config, {
    validate: (data) => {
      const merged = isRecord(data) ? deepMerge(structuredClone(DEFAULTS), data) : data;
      const parsed = SkyfleetConfigSchema.safeParse(merged);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        throw new SkyfleetError(ExitCode.CONFIG_ERROR, `Invalid value for ${key}: ${issues.join('; ')}`, {
          details: { issues },
        });
      }
    },
  });

  return { key, value: parsedValue, scope: opts?.global ? 'global' : 'project' };
}
