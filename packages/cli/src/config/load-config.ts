/**
 * Configuration layering for the CLI: config file (YAML or JSON), then
 * SCHEMOCK_* environment variables, then command-line flags.
 */

import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import {
  ConfigError,
  readDocument,
  type LogLevel,
  type MockConfig,
  type Result,
  err,
  ok,
} from '@schemock/core';

/** One layer of settings; later layers win key by key. */
export interface ConfigLayer {
  mock: Partial<MockConfig>;
  logLevel?: LogLevel;
}

/** On-disk shape; keys are snake_case. */
export interface FileConfig {
  mock?: {
    seed?: number;
    consistent_responses?: boolean;
    cache_enabled?: boolean;
    cache_ttl?: number;
    prefer_examples?: boolean;
    max_depth?: number;
  };
  logging?: {
    level?: string;
  };
}

export const CONFIG_FILE_SCHEMA = {
  $id: 'schemock/config',
  type: 'object',
  properties: {
    mock: {
      type: 'object',
      additionalProperties: false,
      properties: {
        seed: { type: 'integer', minimum: 0 },
        consistent_responses: { type: 'boolean' },
        cache_enabled: { type: 'boolean' },
        cache_ttl: { type: 'integer', minimum: 30, maximum: 86400 },
        prefer_examples: { type: 'boolean' },
        max_depth: { type: 'integer', minimum: 1 },
      },
    },
    logging: {
      type: 'object',
      properties: {
        level: { type: 'string', minLength: 1 },
      },
    },
  },
};

// ajv and ajv-formats are CommonJS; under NodeNext the class and plugin sit on `default`
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const ajv = new Ajv({ allErrors: true, strict: true });
addFormats(ajv);
const validateFileConfig = ajv.compile<FileConfig>(CONFIG_FILE_SCHEMA);

const LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  critical: 'error',
  silent: 'silent',
};

/** Accepts the usual spellings in any case (`WARNING`, `warn`, ...). */
export function normalizeLogLevel(value: string, setting = 'logging.level'): Result<LogLevel, ConfigError> {
  const level = LEVEL_ALIASES[value.trim().toLowerCase()];
  return level
    ? ok(level)
    : err(
        new ConfigError({
          message: `Invalid log level "${value}". Expected one of debug, info, warn, error, silent`,
          setting,
        })
      );
}

/** Validate a decoded config document and map it to a layer. */
export function configLayerFromDocument(
  document: unknown,
  source = 'config file'
): Result<ConfigLayer, ConfigError> {
  if (document === null || document === undefined) return ok({ mock: {} });
  if (!validateFileConfig(document)) {
    const problems = (validateFileConfig.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    return err(
      new ConfigError({
        message: `Invalid ${source}: ${problems}`,
        setting: validateFileConfig.errors?.[0]?.instancePath,
      })
    );
  }

  const mock = document.mock ?? {};
  const layer: ConfigLayer = {
    mock: dropUndefined({
      seed: mock.seed,
      consistentResponses: mock.consistent_responses,
      cacheEnabled: mock.cache_enabled,
      cacheTtl: mock.cache_ttl,
      preferExamples: mock.prefer_examples,
      maxDepth: mock.max_depth,
    }),
  };
  const level = document.logging?.level;
  if (level !== undefined) {
    const normalized = normalizeLogLevel(level);
    if (normalized.isErr()) return normalized;
    layer.logLevel = normalized.value;
  }
  return ok(layer);
}

export async function loadConfigFile(
  filePath: string
): Promise<Result<ConfigLayer, ConfigError>> {
  const document = await readDocument(filePath);
  if (document.isErr()) {
    return err(
      new ConfigError({
        message: document.error.message,
        setting: 'config',
        cause: document.error,
      })
    );
  }
  return configLayerFromDocument(document.value, filePath);
}

const TRUE_WORDS = new Set(['1', 'true', 'yes', 'on']);
const FALSE_WORDS = new Set(['0', 'false', 'no', 'off']);

function envBoolean(name: string, raw: string): Result<boolean, ConfigError> {
  const word = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return ok(true);
  if (FALSE_WORDS.has(word)) return ok(false);
  return err(new ConfigError({ message: `${name} must be a boolean, got "${raw}"`, setting: name }));
}

function envInteger(name: string, raw: string): Result<number, ConfigError> {
  const text = raw.trim();
  return /^\d+$/.test(text) && Number.isSafeInteger(Number(text))
    ? ok(Number(text))
    : err(new ConfigError({ message: `${name} must be a non-negative integer, got "${raw}"`, setting: name }));
}

type EnvBinding =
  | { variable: string; key: 'seed' | 'cacheTtl' | 'maxDepth'; parse: 'integer' }
  | { variable: string; key: 'cacheEnabled' | 'consistentResponses' | 'preferExamples'; parse: 'boolean' };

export const ENV_PREFIX = 'SCHEMOCK_';

const ENV_BINDINGS: readonly EnvBinding[] = [
  { variable: `${ENV_PREFIX}SEED`, key: 'seed', parse: 'integer' },
  { variable: `${ENV_PREFIX}CACHE_TTL`, key: 'cacheTtl', parse: 'integer' },
  { variable: `${ENV_PREFIX}MAX_DEPTH`, key: 'maxDepth', parse: 'integer' },
  { variable: `${ENV_PREFIX}CACHE_ENABLED`, key: 'cacheEnabled', parse: 'boolean' },
  { variable: `${ENV_PREFIX}CONSISTENT_RESPONSES`, key: 'consistentResponses', parse: 'boolean' },
  { variable: `${ENV_PREFIX}PREFER_EXAMPLES`, key: 'preferExamples', parse: 'boolean' },
];

/** Settings taken from SCHEMOCK_* variables; unset or empty variables are skipped. */
export function envLayer(
  env: Readonly<Record<string, string | undefined>>
): Result<ConfigLayer, ConfigError> {
  const layer: ConfigLayer = { mock: {} };
  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.variable];
    if (raw === undefined || raw.trim() === '') continue;
    if (binding.parse === 'integer') {
      const value = envInteger(binding.variable, raw);
      if (value.isErr()) return value;
      layer.mock[binding.key] = value.value;
    } else {
      const value = envBoolean(binding.variable, raw);
      if (value.isErr()) return value;
      layer.mock[binding.key] = value.value;
    }
  }
  const level = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (level !== undefined && level.trim() !== '') {
    const normalized = normalizeLogLevel(level, `${ENV_PREFIX}LOG_LEVEL`);
    if (normalized.isErr()) return normalized;
    layer.logLevel = normalized.value;
  }
  return ok(layer);
}

export function mergeLayers(...layers: readonly ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = { mock: {} };
  for (const layer of layers) {
    merged.mock = { ...merged.mock, ...dropUndefined(layer.mock) };
    if (layer.logLevel !== undefined) merged.logLevel = layer.logLevel;
  }
  return merged;
}

function dropUndefined(config: Partial<MockConfig>): Partial<MockConfig> {
  const out: Partial<MockConfig> = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}
