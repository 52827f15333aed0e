/**
 * Actions behind `schemock generate`, `schemock schema` and `schemock routes`.
 * Each takes its IO explicitly; failures are thrown as SchemockError values
 * and turned into exit codes by the entry point.
 */

import {
  ConfigError,
  ErrorCode,
  MockDataGenerator,
  ParseError,
  ValidationError,
  createLogger,
  createSchema,
  loadSpecFile,
  readDocument,
  selectResponse,
  type JsonValue,
  type Logger,
} from '@schemock/core';
import {
  envLayer,
  loadConfigFile,
  mergeLayers,
  type ConfigLayer,
} from '../config/load-config.js';
import {
  flagLayer,
  resolveCount,
  resolveOutputFormat,
  type CliOptions,
} from '../flags.js';
import { formatRoutes, formatValues } from '../render.js';

export interface CommandIO {
  stdout(text: string): void;
  stderr(text: string): void;
  env: Readonly<Record<string, string | undefined>>;
}

export const processIO: CommandIO = {
  stdout: (text) => void process.stdout.write(text),
  stderr: (text) => void process.stderr.write(text),
  env: process.env,
};

export interface Runtime {
  generator: MockDataGenerator;
  logger: Logger;
}

/** Config file < SCHEMOCK_* environment < flags. */
export async function resolveRuntime(
  options: CliOptions,
  io: CommandIO
): Promise<Runtime> {
  const layers: ConfigLayer[] = [];
  if (options.config !== undefined) {
    layers.push((await loadConfigFile(options.config)).unwrap());
  }
  layers.push(envLayer(io.env).unwrap());
  layers.push(flagLayer(options));
  const merged = mergeLayers(...layers);

  const logger = createLogger({ level: merged.logLevel ?? 'warn', write: io.stderr });
  const generator = MockDataGenerator.create({ config: merged.mock, logger }).unwrap();
  logger.debug('effective configuration', { ...generator.config });
  return { generator, logger };
}

export async function runGenerate(
  options: CliOptions,
  io: CommandIO = processIO
): Promise<void> {
  if (options.spec === undefined) {
    throw new ConfigError({ message: 'Missing --spec <file>', setting: 'spec' });
  }
  const format = resolveOutputFormat(options.out);
  const count = resolveCount(options);
  const { generator, logger } = await resolveRuntime(options, io);

  const spec = (await loadSpecFile(options.spec)).unwrap();
  logger.info(`loaded ${spec.title} ${spec.apiVersion}`, {
    format: spec.format,
    operations: spec.operations.length,
  });

  const { operation, response } = selectResponse(spec, {
    operationId: options.operationId,
    path: options.path,
    method: options.method,
    status: options.status,
    contentType: options.contentType,
  }).unwrap();
  logger.debug('selected response', {
    method: operation.method,
    path: operation.path,
    status: response.status,
    contentType: response.contentType,
  });

  const example = response.example;
  let values: JsonValue[];
  if (response.schema && !(generator.config.preferExamples && example !== undefined)) {
    values = generator.generateMany(response.schema, count).unwrap();
  } else if (example !== undefined) {
    values = Array.from({ length: count }, () => example);
  } else {
    throw new ParseError({
      message: `${operation.method.toUpperCase()} ${operation.path} ${response.status} has no response schema or example`,
      errorCode: ErrorCode.OPERATION_NOT_FOUND,
      context: { path: operation.path, status: response.status },
    });
  }
  io.stdout(formatValues(values, format));
}

/** Generate from a standalone schema document (JSON or YAML). */
export async function runSchema(
  options: CliOptions,
  io: CommandIO = processIO
): Promise<void> {
  if (options.schema === undefined) {
    throw new ConfigError({ message: 'Missing --schema <file>', setting: 'schema' });
  }
  const format = resolveOutputFormat(options.out);
  const count = resolveCount(options);
  const { generator } = await resolveRuntime(options, io);

  const document = (await readDocument(options.schema)).unwrap();
  const schema = createSchema(document);
  if (schema.isErr()) throw new ValidationError(schema.error, { context: { file: options.schema } });
  const values = generator.generateMany(schema.value, count).unwrap();
  io.stdout(formatValues(values, format));
}

export async function runRoutes(
  options: CliOptions,
  io: CommandIO = processIO
): Promise<void> {
  if (options.spec === undefined) {
    throw new ConfigError({ message: 'Missing --spec <file>', setting: 'spec' });
  }
  const spec = (await loadSpecFile(options.spec)).unwrap();
  io.stdout(formatRoutes(spec));
}
