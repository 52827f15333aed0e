import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../errors/codes.js';
import {
  ConfigError,
  GeneratorError,
  GeneratorMessage,
  ParseError,
  ValidationError,
  isSchemockError,
} from '../errors.js';

describe('GeneratorError', () => {
  it('starts the message with its prefix', () => {
    const error = new GeneratorError({
      prefix: GeneratorMessage.INVALID_LENGTH,
      detail: 'minLength 5 > maxLength 2',
      path: '/name',
      constraint: 'minLength',
    });
    expect(error.message).toBe('Invalid length constraints: minLength 5 > maxLength 2');
    expect(error.errorCode).toBe(ErrorCode.CONSTRAINT_VIOLATION);
    expect(error.path).toBe('/name');
    expect(error.constraint).toBe('minLength');
    expect(error.getExitCode()).toBe(30);
    expect(error.name).toBe('GeneratorError');
  });

  it('uses the bare prefix without detail', () => {
    expect(new GeneratorError({ prefix: GeneratorMessage.MISSING_SCHEMA }).message).toBe(
      'Missing schema specification'
    );
  });
});

describe('ValidationError', () => {
  it('summarizes the first issue and counts the rest', () => {
    const error = new ValidationError([
      { path: '/properties/a', message: 'minLength must be a non-negative integer' },
      { path: '', message: 'unknown type' },
    ]);
    expect(error.message).toBe(
      'minLength must be a non-negative integer at /properties/a (+1 more)'
    );
    expect(error.issues).toHaveLength(2);
    expect(error.errorCode).toBe(ErrorCode.INVALID_SCHEMA_STRUCTURE);
  });
});

describe('serialization', () => {
  it('redacts sensitive values in prod and keeps the stack in dev', () => {
    const error = new ParseError({
      message: 'bad',
      context: { value: { token: 'test-secret', id: 1 } },
      cause: new Error('root'),
    });
    const prod = error.toJSON('prod');
    expect(prod.context?.value).toEqual({ token: '[REDACTED]', id: 1 });
    expect(prod.stack).toBeUndefined();
    expect(prod.cause).toEqual({ name: 'Error', message: 'root' });
    expect(error.toJSON().stack).toBeDefined();
  });

  it('exposes a user-facing view', () => {
    const error = new ConfigError({ message: 'bad ttl', setting: 'cacheTtl' });
    expect(error.toUserError()).toEqual({
      message: 'bad ttl',
      code: ErrorCode.CONFIGURATION_ERROR,
      severity: 'error',
      path: undefined,
      schemaPath: undefined,
    });
    expect(isSchemockError(error)).toBe(true);
    expect(isSchemockError(new Error('x'))).toBe(false);
  });
});
