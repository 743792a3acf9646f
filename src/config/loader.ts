/**
 * Configuration Loader
 *
 * Loads and validates configuration from files and environment variables.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type { EngineConfig } from './schema.js';
import { EngineConfigSchema } from './schema.js';
import { isRecord } from '../core/protocol/payload.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Path to config file */
  configPath?: string;
  /** Override values (highest priority) */
  overrides?: Record<string, unknown>;
  /** Whether to apply environment variable overrides */
  applyEnv?: boolean;
  /** Environment to read overrides from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigValidationResult {
  valid: boolean;
  config?: EngineConfig;
  errors?: string[];
}

// -----------------------------------------------------------------------------
// Default Paths
// -----------------------------------------------------------------------------

const DEFAULT_CONFIG_PATHS = [
  'rf-source-sync.config.json',
  'config/rf-source-sync.json',
  'config.json',
];

export const CONFIG_PATH_ENV_VAR = 'RFSYNC_CONFIG_PATH';
const ENV_PREFIX = 'RFSYNC_';

// -----------------------------------------------------------------------------
// Loader
// -----------------------------------------------------------------------------

/**
 * Load configuration from file and/or environment.
 *
 * Precedence: defaults < file < env < overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  const { configPath, overrides = {}, applyEnv = true, env = process.env } = options;

  let fileConfig: Record<string, unknown> = {};

  const resolvedPath = findConfigFile(configPath, env);
  if (resolvedPath) {
    fileConfig = loadConfigFile(resolvedPath);
  } else if (configPath) {
    throw new ConfigParseError(resolve(configPath), 'file not found');
  }

  const envConfig = applyEnv ? loadEnvConfig(env) : {};

  const merged = deepMerge({}, fileConfig, envConfig, overrides);

  const result = EngineConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.errors.map(
      (e) => `${e.path.join('.')}: ${e.message}`
    );
    throw new ConfigValidationError(errors);
  }

  return result.data;
}

/**
 * Validate a configuration object.
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const result = EngineConfigSchema.safeParse(config);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  return {
    valid: false,
    errors: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
  };
}

// -----------------------------------------------------------------------------
// File Loading
// -----------------------------------------------------------------------------

/**
 * Find the configuration file.
 */
function findConfigFile(explicitPath: string | undefined, env: NodeJS.ProcessEnv): string | null {
  if (explicitPath) {
    const resolved = resolve(explicitPath);
    return existsSync(resolved) ? resolved : null;
  }

  const envPath = env[CONFIG_PATH_ENV_VAR];
  if (envPath) {
    const resolved = resolve(envPath);
    if (existsSync(resolved)) {
      return resolved;
    }
  }

  for (const defaultPath of DEFAULT_CONFIG_PATHS) {
    const resolved = resolve(defaultPath);
    if (existsSync(resolved)) {
      return resolved;
    }
  }

  return null;
}

/**
 * Load configuration from a JSON file.
 */
export function loadConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigParseError(path, error.message);
    }
    throw error;
  }

  if (!isRecord(parsed)) {
    throw new ConfigParseError(path, 'top-level value must be an object');
  }

  return parsed;
}

// -----------------------------------------------------------------------------
// Environment Loading
// -----------------------------------------------------------------------------

/**
 * Load configuration from environment variables.
 *
 * Format: RFSYNC_<SECTION>_<KEY>=value
 * Examples:
 *   RFSYNC_MQTT_HOST=192.168.1.50
 *   RFSYNC_DEVICE_DEVICENAME=qsource3-lab
 *   RFSYNC_DEVICE_RESYNCFIELDS=dcOffset,calibPointsMz
 *   RFSYNC_LOGGING_LEVEL=debug
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || key === CONFIG_PATH_ENV_VAR || value === undefined) {
      continue;
    }

    const path = key
      .substring(ENV_PREFIX.length)
      .split('_')
      .filter((part) => part.length > 0)
      .map(convertToCamelCase);

    const target = schemaAt(EngineConfigSchema, path);

    // An empty variable only means something for a list: the empty list.
    if (value === '' && !(target instanceof z.ZodArray)) {
      continue;
    }

    setNestedValue(config, path, parseEnvValue(value, target));
  }

  return config;
}

/**
 * Parse an environment variable value into the type its config key expects.
 * Values that do not fit are passed through as strings so the schema reports
 * them.
 */
function parseEnvValue(value: string, target: z.ZodTypeAny | undefined): unknown {
  if (target instanceof z.ZodNumber) {
    const num = Number(value);
    return value.trim() !== '' && !isNaN(num) ? num : value;
  }

  if (target instanceof z.ZodBoolean) {
    const lower = value.trim().toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
    return value;
  }

  if (target instanceof z.ZodArray) {
    const element: z.ZodTypeAny = target.element;
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
      .map((item) => parseEnvValue(item, element));
  }

  return value;
}

/**
 * Find the schema for a config key path, looking through defaults and
 * optionals.
 */
function schemaAt(schema: z.ZodTypeAny, path: string[]): z.ZodTypeAny | undefined {
  let current = unwrapSchema(schema);

  for (const key of path) {
    if (!(current instanceof z.ZodObject)) {
      return undefined;
    }
    const shape: Record<string, z.ZodTypeAny> = current.shape;
    const next = shape[key];
    if (!next) {
      return undefined;
    }
    current = unwrapSchema(next);
  }

  return current;
}

function unwrapSchema(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodDefault) {
    return unwrapSchema(schema.removeDefault());
  }
  if (schema instanceof z.ZodOptional) {
    return unwrapSchema(schema.unwrap());
  }
  return schema;
}

/**
 * Set a nested value in an object using a path array.
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  const finalPart = path.at(-1);
  if (finalPart === undefined) {
    return;
  }

  let current = obj;

  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[finalPart] = value;
}

/**
 * Map a lower-cased env segment to its config key.
 */
function convertToCamelCase(str: string): string {
  const specialCases: Record<string, string> = {
    clientid: 'clientId',
    connecttimeout: 'connectTimeout',
    reconnectperiod: 'reconnectPeriod',
    topicbase: 'topicBase',
    devicename: 'deviceName',
    resyncfields: 'resyncFields',
    loadonstart: 'loadOnStart',
    pushonload: 'pushOnLoad',
    saveonexit: 'saveOnExit',
  };

  const lower = str.toLowerCase();
  return specialCases[lower] ?? lower;
}

// -----------------------------------------------------------------------------
// Deep Merge
// -----------------------------------------------------------------------------

/**
 * Deep merge objects (later objects override earlier).
 */
function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const obj of objects) {
    for (const key of Object.keys(obj)) {
      const value = obj[key];
      const existing = result[key];

      if (isRecord(value) && isRecord(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }

  return result;
}

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

export class ConfigValidationError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Configuration validation failed:\n  ${errors.join('\n  ')}`);
    this.name = 'ConfigValidationError';
  }
}

export class ConfigParseError extends Error {
  constructor(
    public readonly path: string,
    public readonly parseError: string
  ) {
    super(`Failed to parse config file '${path}': ${parseError}`);
    this.name = 'ConfigParseError';
  }
}
