/**
 * Reading specification and schema documents from disk (JSON or YAML).
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { err, ok, type Result } from '../types/result.js';
import { ParseError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import {
  parseSpecDocument,
  type ParseSpecOptions,
  type ParsedSpec,
} from './spec-parser.js';

type DocumentSyntax = 'json' | 'yaml';

function syntaxFor(fileName: string): DocumentSyntax | undefined {
  switch (path.extname(fileName).toLowerCase()) {
    case '.json':
      return 'json';
    case '.yaml':
    case '.yml':
      return 'yaml';
    default:
      return undefined;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Decode document text. The extension picks the syntax; unknown extensions
 * try JSON first, then YAML.
 */
export function parseDocumentText(
  text: string,
  fileName = 'document'
): Result<unknown, ParseError> {
  const syntax = syntaxFor(fileName);
  const attempts: DocumentSyntax[] = syntax ? [syntax] : ['json', 'yaml'];
  let last: Error | undefined;
  for (const attempt of attempts) {
    try {
      const value: unknown = attempt === 'json' ? JSON.parse(text) : parseYaml(text);
      return ok(value);
    } catch (error) {
      last = toError(error);
    }
  }
  return err(
    new ParseError({
      message: `Cannot parse ${fileName}: ${last?.message ?? 'unknown syntax'}`,
      errorCode: ErrorCode.PARSE_ERROR,
      context: { file: fileName },
      cause: last,
    })
  );
}

export async function readDocument(
  filePath: string
): Promise<Result<unknown, ParseError>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const cause = toError(error);
    return err(
      new ParseError({
        message: `Cannot read ${filePath}: ${cause.message}`,
        errorCode: ErrorCode.PARSE_ERROR,
        context: { file: filePath },
        cause,
      })
    );
  }
  return parseDocumentText(text, filePath);
}

/** Read and parse a Swagger 2.0 or OpenAPI 3.x file. */
export async function loadSpecFile(
  filePath: string,
  options: ParseSpecOptions = {}
): Promise<Result<ParsedSpec, ParseError>> {
  const document = await readDocument(filePath);
  if (document.isErr()) return document;
  return parseSpecDocument(document.value, options);
}
