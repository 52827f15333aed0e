#!/usr/bin/env node

// CLI entry point
// - `schemock generate` loads a Swagger 2.0 / OpenAPI 3.x document, selects a
//   response (--operation-id, or --path/--method, plus --status/--content-type)
//   and prints mock bodies as JSON or NDJSON.
// - `schemock schema` generates from a standalone schema file.
// - `schemock routes` lists the operations a document declares.
// Settings come from --config, then SCHEMOCK_* variables, then flags.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ParseError,
  isSchemockError,
  type SchemockError,
} from '@schemock/core';
import { runGenerate, runRoutes, runSchema } from './commands/generate.js';
import { formatCliError } from './render.js';
import type { CliOptions } from './flags.js';

const program = new Command();

program
  .name('schemock')
  .description('Generate mock response data from OpenAPI and Swagger documents')
  .version('0.1.0');

function withRuntimeOptions(command: Command): Command {
  return command
    .option('-c, --count <number>', 'Number of values to generate')
    .option('-n, --n <number>', 'Alias for --count')
    .option('--seed <number>', 'Deterministic seed')
    .option('--config <file>', 'Configuration file (YAML or JSON)')
    .option('--no-cache', 'Disable the response cache')
    .option('--vary', 'Vary values between calls instead of repeating them')
    .option('--prefer-examples', 'Use declared examples before generating')
    .option('--max-depth <number>', 'Nesting limit for arrays and objects')
    .option('--out <format>', 'Output format: json|ndjson', 'json')
    .option('--log-level <level>', 'debug|info|warn|error|silent');
}

withRuntimeOptions(
  program
    .command('generate')
    .description('Generate a mock response body for one operation')
    .option('-s, --spec <file>', 'Swagger 2.0 or OpenAPI 3.x file')
    .option('--operation-id <id>', 'Select the operation by operationId')
    .option('--path <path>', 'Select the operation by path template')
    .option('--method <method>', 'HTTP method used with --path', 'get')
    .option('--status <code>', 'Response status (default: first 2xx)')
    .option('--content-type <type>', 'Response media type')
).action(async (options: CliOptions) => {
  await runGenerate(options);
});

withRuntimeOptions(
  program
    .command('schema')
    .description('Generate values from a standalone schema file')
    .option('--schema <file>', 'Schema file (JSON or YAML)')
).action(async (options: CliOptions) => {
  await runSchema(options);
});

program
  .command('routes')
  .description('List the operations of a document')
  .option('-s, --spec <file>', 'Swagger 2.0 or OpenAPI 3.x file')
  .action(async (options: CliOptions) => {
    await runRoutes(options);
  });

export function toSchemockError(error: unknown): SchemockError {
  if (isSchemockError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ParseError({
    message: message || 'Unexpected error',
    errorCode: ErrorCode.INTERNAL_ERROR,
    cause: error instanceof Error ? error : undefined,
  });
}

async function handleCliError(err: unknown): Promise<never> {
  const error = toSchemockError(err);
  process.stderr.write(formatCliError(error, process.stderr.isTTY === true));
  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
