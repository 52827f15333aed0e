import { ConfigError } from '@schemock/core';
import { normalizeLogLevel, type ConfigLayer } from './config/load-config.js';

export type OutputFormat = 'json' | 'ndjson';

/**
 * CLI options as Commander hands them to actions
 */
export interface CliOptions {
  spec?: string;
  schema?: string;
  operationId?: string;
  path?: string;
  method?: string;
  status?: string;
  contentType?: string;
  count?: string | number;
  n?: string | number;
  seed?: string | number;
  config?: string;
  // Commander sets cache=false for --no-cache
  cache?: boolean;
  vary?: boolean;
  preferExamples?: boolean;
  maxDepth?: string | number;
  out?: string;
  logLevel?: string;
}

function positiveInteger(name: string, value: unknown): number {
  const num = typeof value === 'number' ? value : Number(String(value));
  if (!Number.isSafeInteger(num) || num <= 0) {
    throw new ConfigError({
      message: `Invalid ${name} value "${String(value)}". Expected a positive integer.`,
      setting: name,
    });
  }
  return num;
}

/**
 * Resolve --count/-n into a single positive integer.
 *
 * - Defaults to 1.
 * - When both are given they must agree.
 */
export function resolveCount(options: Pick<CliOptions, 'count' | 'n'>): number {
  const provided: Array<[string, unknown]> = [
    ['count', options.count],
    ['n', options.n],
  ];
  const values = provided
    .filter(([, value]) => value !== undefined)
    .map(([name, value]): [string, number] => [name, positiveInteger(name, value)]);
  const [first] = values;
  if (!first) return 1;
  if (values.some(([, value]) => value !== first[1])) {
    throw new ConfigError({
      message: 'Conflicting count flags (--count, -n) with different values.',
      setting: 'count',
    });
  }
  return first[1];
}

export function resolveSeed(value: unknown): number | undefined {
  if (value === undefined || value === '') return undefined;
  const num = typeof value === 'number' ? value : Number(String(value));
  if (!Number.isSafeInteger(num) || num < 0) {
    throw new ConfigError({
      message: `Invalid seed "${String(value)}". Expected a non-negative integer.`,
      setting: 'seed',
    });
  }
  return num;
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'json';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'json' || raw === 'ndjson') {
    return raw;
  }
  throw new ConfigError({
    message: `Invalid --out value "${String(value)}". Supported formats are "json" and "ndjson".`,
    setting: 'out',
  });
}

/**
 * The settings carried by flags. Only flags the user actually set appear,
 * so lower layers keep their values otherwise.
 */
export function flagLayer(options: CliOptions): ConfigLayer {
  const layer: ConfigLayer = { mock: {} };
  const seed = resolveSeed(options.seed);
  if (seed !== undefined) layer.mock.seed = seed;
  if (options.cache === false) layer.mock.cacheEnabled = false;
  if (options.vary === true) layer.mock.consistentResponses = false;
  if (options.preferExamples === true) layer.mock.preferExamples = true;
  if (options.maxDepth !== undefined) {
    layer.mock.maxDepth = positiveInteger('max-depth', options.maxDepth);
  }
  if (options.logLevel !== undefined) {
    layer.logLevel = normalizeLogLevel(options.logLevel, 'log-level').unwrap();
  }
  return layer;
}
