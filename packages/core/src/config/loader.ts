/**
 * Configuration Loader for turnweaver
 *
 * - Config files are validated against the shared zod schemas
 * - Secrets stay in environment variables; config only names them
 * - Every field has a default, so no file at all is a valid setup
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import {
  ConfigSchema,
  PartialConfigSchema,
  type Config,
  type PartialConfig,
} from '@turnweaver/shared';
import { toErrorMessage } from '../utils/errors.js';

// Default config file locations (checked in order)
const DEFAULT_CONFIG_PATHS = [
  './turnweaver.yaml',
  './turnweaver.yml',
  './config/turnweaver.yaml',
  '~/.turnweaver/config.yaml',
];

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

function loadConfigFile(path: string): PartialConfig | null {
  const expandedPath = expandPath(path);

  if (!existsSync(expandedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(expandedPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to load config from ${expandedPath}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }

  // An empty file parses to null
  const result = PartialConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new Error(`Invalid configuration in ${expandedPath}: ${result.error.message}`);
  }
  return result.data;
}

function parseBoolEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function setIfDefined(target: ConfigRecord, key: string, value: unknown): void {
  if (value !== undefined && value !== '') {
    target[key] = value;
  }
}

/**
 * Non-secret settings from TURNWEAVER_* variables. Values are checked by the
 * schema once everything is merged.
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): ConfigRecord {
  const config: ConfigRecord = {};

  const core: ConfigRecord = {};
  setIfDefined(core, 'environment', env.TURNWEAVER_ENV);

  const logging: ConfigRecord = {};
  setIfDefined(logging, 'level', env.TURNWEAVER_LOG_LEVEL);

  const structuring: ConfigRecord = {};
  setIfDefined(structuring, 'enabled', parseBoolEnv(env.TURNWEAVER_ENABLED));
  setIfDefined(structuring, 'mergeConsecutive', parseBoolEnv(env.TURNWEAVER_MERGE_CONSECUTIVE));
  setIfDefined(structuring, 'maxContextSizeOverride', parseIntEnv(env.TURNWEAVER_MAX_CONTEXT_OVERRIDE));
  setIfDefined(structuring, 'fallbackToOriginal', parseBoolEnv(env.TURNWEAVER_FALLBACK));
  setIfDefined(structuring, 'verbose', parseBoolEnv(env.TURNWEAVER_VERBOSE));

  const model: ConfigRecord = {};
  setIfDefined(model, 'model', env.TURNWEAVER_MODEL);
  setIfDefined(model, 'baseUrl', env.TURNWEAVER_MODEL_BASE_URL);

  for (const [key, section] of Object.entries({ core, logging, structuring, model })) {
    if (Object.keys(section).length > 0) {
      config[key] = section;
    }
  }
  return config;
}

/**
 * Deep merge two config objects
 * Later values override earlier ones; arrays are replaced, not merged
 */
export function mergeConfigs(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = result[key];
    result[key] = isRecord(value) && isRecord(baseValue) ? mergeConfigs(baseValue, value) : value;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: PartialConfig;
  /** Skip environment variable loading */
  skipEnv?: boolean;
  /** Skip config file auto-discovery when no explicit path is given */
  skipFileDiscovery?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate configuration
 *
 * Loading order (later overrides earlier):
 * 1. Default values from schema
 * 2. Config file (explicit path or auto-discovered)
 * 3. Environment variables
 * 4. Programmatic overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  let fileConfig: PartialConfig = {};

  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new Error(`Config file not found: ${options.configPath}`);
    }
    fileConfig = loaded;
  } else if (!options.skipFileDiscovery) {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const loaded = loadConfigFile(path);
      if (loaded) {
        fileConfig = loaded;
        break;
      }
    }
  }

  const envConfig = options.skipEnv ? {} : loadEnvConfig(options.env ?? process.env);

  let merged = mergeConfigs(fileConfig, envConfig);
  if (options.overrides) {
    merged = mergeConfigs(merged, options.overrides);
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

/**
 * Get a secret value from environment variable
 * This is the only way to access secrets - they are never stored in config objects
 */
export function getSecret(envVarName: string): string | undefined {
  return process.env[envVarName];
}

/**
 * Get a required secret value from environment variable
 * Throws if the secret is not set
 */
export function requireSecret(envVarName: string): string {
  const value = getSecret(envVarName);
  if (!value) {
    throw new Error(`Required secret not set: ${envVarName}`);
  }
  return value;
}
