/**
 * Response selection over a parsed specification.
 * Picks one operation, then one response (status and content type) whose
 * schema the caller generates from.
 */

import { err, ok, type Result } from '../types/result.js';
import { ParseError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import {
  HTTP_METHODS,
  type HttpMethod,
  type ParsedOperation,
  type ParsedResponse,
  type ParsedSpec,
} from '../parser/spec-parser.js';

export interface ResponseSelector {
  /** Searched across all paths and methods */
  operationId?: string;
  /** Used with method when operationId is not given */
  path?: string;
  method?: HttpMethod | string;
  /** Defaults to the first 2xx status, then "default", then the first declared */
  status?: string;
  /** Defaults to application/json when present, otherwise the first declared */
  contentType?: string;
}

export interface ResponseSelection {
  operation: ParsedOperation;
  response: ParsedResponse;
}

function notFound(message: string, context: Record<string, string | undefined>): Result<never, ParseError> {
  return err(
    new ParseError({ message, errorCode: ErrorCode.OPERATION_NOT_FOUND, context })
  );
}

function coerceHttpMethod(method: unknown): HttpMethod | undefined {
  if (typeof method !== 'string') return undefined;
  const lowered = method.toLowerCase();
  return HTTP_METHODS.find((candidate) => candidate === lowered);
}

export function selectOperation(
  spec: ParsedSpec,
  selector: ResponseSelector
): Result<ParsedOperation, ParseError> {
  if (selector.operationId !== undefined) {
    const matches = spec.operations.filter((op) => op.operationId === selector.operationId);
    const [match] = matches;
    if (matches.length === 0) {
      return notFound(`Operation with operationId "${selector.operationId}" not found`, {
        operationId: selector.operationId,
      });
    }
    if (matches.length > 1) {
      return notFound(`OperationId "${selector.operationId}" is ambiguous across multiple paths`, {
        operationId: selector.operationId,
      });
    }
    return ok(match);
  }

  if (selector.path !== undefined || selector.method !== undefined) {
    const method = coerceHttpMethod(selector.method ?? 'get');
    const match = spec.operations.find((op) => op.path === selector.path && op.method === method);
    return match
      ? ok(match)
      : notFound(`Operation for path "${selector.path ?? ''}" and method "${String(selector.method ?? 'get')}" not found`, {
          path: selector.path,
          method: method,
        });
  }

  // a document with exactly one operation needs no selector
  const [only] = spec.operations;
  if (spec.operations.length === 1) return ok(only);
  return notFound(
    `Selection is ambiguous: provide operationId or path and method (${spec.operations.length} operations)`,
    {}
  );
}

function preferredStatus(
  responses: readonly ParsedResponse[],
  requested: string | undefined
): string | undefined {
  const statuses = Array.from(new Set(responses.map((r) => r.status)));
  if (requested !== undefined) return statuses.includes(requested) ? requested : undefined;
  return (
    statuses.find((status) => /^2\d\d$/.test(status)) ??
    statuses.find((status) => status.toUpperCase() === '2XX') ??
    statuses.find((status) => status === 'default') ??
    statuses[0]
  );
}

export function selectResponse(
  spec: ParsedSpec,
  selector: ResponseSelector = {}
): Result<ResponseSelection, ParseError> {
  const operation = selectOperation(spec, selector);
  if (operation.isErr()) return operation;
  const op = operation.value;
  const where = `${op.method.toUpperCase()} ${op.path}`;

  const status = preferredStatus(op.responses, selector.status);
  if (status === undefined) {
    return notFound(
      selector.status === undefined
        ? `${where} declares no responses`
        : `Response with status "${selector.status}" not found for ${where}`,
      { status: selector.status }
    );
  }

  const candidates = op.responses.filter((r) => r.status === status);
  const byType = (type: string | undefined): ParsedResponse | undefined =>
    type === undefined ? undefined : candidates.find((r) => r.contentType === type);

  if (selector.contentType !== undefined) {
    const response = byType(selector.contentType);
    return response
      ? ok({ operation: op, response })
      : notFound(`Content type "${selector.contentType}" not found for ${where} ${status}`, {
          contentType: selector.contentType,
        });
  }
  const response = byType('application/json') ?? candidates[0];
  return ok({ operation: op, response });
}
