import { describe, it, expect } from 'vitest';
import { selectOperation, selectResponse } from '../driver.js';
import { parseSpecDocument, type ParsedSpec } from '../../parser/spec-parser.js';
import { ErrorCode } from '../../errors/codes.js';
import type { ParseError } from '../../types/errors.js';
import type { Result } from '../../types/result.js';

const json = (type: string) => ({ schema: { type } });

const spec: ParsedSpec = parseSpecDocument({
  openapi: '3.0.3',
  info: { title: 'Things', version: '1.0.0' },
  paths: {
    '/things': {
      get: {
        operationId: 'listThings',
        responses: {
          default: { description: 'error', content: { 'application/json': json('object') } },
          '404': { description: 'missing' },
          '201': {
            description: 'created',
            content: { 'application/xml': json('string'), 'application/json': json('integer') },
          },
          '200': { description: 'ok', content: { 'text/plain': json('string') } },
        },
      },
      post: {
        operationId: 'dup',
        responses: {
          '2XX': { description: 'accepted' },
          '404': { description: 'missing' },
        },
      },
    },
    '/other': {
      put: {
        operationId: 'dup',
        responses: { default: { description: 'fallback' }, '500': { description: 'failed' } },
      },
      delete: { responses: {} },
    },
  },
}).unwrap();

function failure(result: Result<unknown, ParseError>): string | undefined {
  return result.isErr() ? result.error.message : undefined;
}

describe('selectOperation', () => {
  it('finds an operation by operationId', () => {
    expect(selectOperation(spec, { operationId: 'listThings' }).unwrap().path).toBe('/things');
  });

  it('reports unknown and ambiguous operationIds', () => {
    const missing = selectOperation(spec, { operationId: 'nope' });
    expect(missing.isErr() && missing.error.message).toBe('Operation with operationId "nope" not found');
    expect(missing.isErr() && missing.error.errorCode).toBe(ErrorCode.OPERATION_NOT_FOUND);
    const dup = selectOperation(spec, { operationId: 'dup' });
    expect(dup.isErr() && dup.error.message).toBe('OperationId "dup" is ambiguous across multiple paths');
  });

  it('finds an operation by path and method in any case', () => {
    expect(selectOperation(spec, { path: '/other', method: 'PUT' }).unwrap().method).toBe('put');
    expect(selectOperation(spec, { path: '/things' }).unwrap().method).toBe('get');
    const missing = selectOperation(spec, { path: '/things', method: 'patch' });
    expect(missing.isErr() && missing.error.message).toBe(
      'Operation for path "/things" and method "patch" not found'
    );
  });

  it('needs a selector when there are several operations', () => {
    const result = selectOperation(spec, {});
    expect(result.isErr() && result.error.message).toBe(
      'Selection is ambiguous: provide operationId or path and method (4 operations)'
    );
  });

  it('takes the only operation of a single-operation document', () => {
    const single = parseSpecDocument({
      swagger: '2.0',
      info: { title: 'One', version: '1' },
      paths: { '/ping': { get: { responses: { '200': { description: 'pong' } } } } },
    }).unwrap();
    expect(selectOperation(single, {}).unwrap().path).toBe('/ping');
  });
});

describe('selectResponse', () => {
  it('prefers the first 2xx status and application/json within it', () => {
    const { response } = selectResponse(spec, { operationId: 'listThings' }).unwrap();
    expect(response.status).toBe('200');
    expect(response.contentType).toBe('text/plain');

    const created = selectResponse(spec, { operationId: 'listThings', status: '201' }).unwrap();
    expect(created.response.contentType).toBe('application/json');
  });

  it('falls back to 2XX, then default, then the first status', () => {
    expect(selectResponse(spec, { path: '/things', method: 'post' }).unwrap().response.status).toBe('2XX');
    expect(selectResponse(spec, { path: '/other', method: 'put' }).unwrap().response.status).toBe('default');
  });

  it('honours a requested content type', () => {
    const { response } = selectResponse(spec, {
      operationId: 'listThings',
      status: '201',
      contentType: 'application/xml',
    }).unwrap();
    expect(response.contentType).toBe('application/xml');
    expect(
      failure(selectResponse(spec, { operationId: 'listThings', status: '201', contentType: 'text/csv' }))
    ).toBe('Content type "text/csv" not found for GET /things 201');
  });

  it('reports missing statuses and operations without responses', () => {
    expect(failure(selectResponse(spec, { operationId: 'listThings', status: '500' }))).toBe(
      'Response with status "500" not found for GET /things'
    );
    expect(failure(selectResponse(spec, { path: '/other', method: 'delete' }))).toBe(
      'DELETE /other declares no responses'
    );
  });
});
