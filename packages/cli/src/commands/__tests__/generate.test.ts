import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ErrorCode, ParseError, isSchemockError } from '@schemock/core';
import {
  resolveRuntime,
  runGenerate,
  runRoutes,
  runSchema,
  type CommandIO,
} from '../generate.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../../__tests__/fixtures/${name}`, import.meta.url));

const PETSTORE = fixture('petstore.yaml');

function captureIO(env: Record<string, string> = {}): CommandIO & {
  out: string[];
  err: string[];
} {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    env,
    stdout: (text) => void out.push(text),
    stderr: (text) => void err.push(text),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectPet(value: unknown): void {
  expect(isRecord(value)).toBe(true);
  if (!isRecord(value)) return;
  expect(Object.keys(value).sort()).toEqual(['id', 'name']);
  expect(Number.isInteger(value.id)).toBe(true);
  expect(value.id).toBeGreaterThanOrEqual(1);
  expect(value.id).toBeLessThanOrEqual(1000);
  expect(typeof value.name).toBe('string');
}

describe('resolveRuntime', () => {
  it('layers config file, environment and flags', async () => {
    const io = captureIO({ SCHEMOCK_SEED: '11', SCHEMOCK_CACHE_TTL: '90' });
    const { generator, logger } = await resolveRuntime(
      { config: fixture('schemock.yaml'), seed: '13' },
      io
    );
    expect(generator.config).toEqual({
      seed: 13,
      consistentResponses: true,
      cacheEnabled: true,
      cacheTtl: 90,
      preferExamples: true,
      maxDepth: 12,
    });
    expect(logger.level).toBe('debug');
    expect(io.err.join('')).toContain('[schemock] debug: effective configuration');
  });

  it('rejects a configuration the generator cannot use', async () => {
    await expect(
      resolveRuntime({ maxDepth: '2' }, captureIO({ SCHEMOCK_CACHE_TTL: '5' }))
    ).rejects.toThrow('cacheTtl must be an integer between 30 and 86400 seconds, got 5');
  });
});

describe('runGenerate', () => {
  it('prints one generated body for the selected operation', async () => {
    const io = captureIO();
    await runGenerate({ spec: PETSTORE, operationId: 'getPet' }, io);
    expect(io.out).toHaveLength(1);
    expectPet(JSON.parse(io.out[0]));
  });

  it('is deterministic for a seed', async () => {
    const first = captureIO();
    const second = captureIO();
    await runGenerate({ spec: PETSTORE, operationId: 'listPets', seed: '5' }, first);
    await runGenerate({ spec: PETSTORE, path: '/pets', method: 'GET', seed: '5' }, second);
    expect(first.out).toEqual(second.out);
  });

  it('prints NDJSON lines for several values', async () => {
    const io = captureIO();
    await runGenerate({ spec: PETSTORE, operationId: 'listPets', count: '3', out: 'ndjson' }, io);
    const lines = io.out.join('').trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    for (const line of lines) {
      const page: unknown = JSON.parse(line);
      expect(Array.isArray(page)).toBe(true);
      if (Array.isArray(page)) {
        expect(page).toHaveLength(2);
        page.forEach(expectPet);
      }
    }
  });

  it('uses the declared example when examples are preferred', async () => {
    const io = captureIO();
    await runGenerate(
      { spec: PETSTORE, operationId: 'getPet', preferExamples: true, count: 2 },
      io
    );
    expect(io.out.join('')).toBe(
      `${JSON.stringify([{ id: 7, name: 'Rex' }, { id: 7, name: 'Rex' }], null, 2)}\n`
    );
  });

  it('fails when the response has neither schema nor example', async () => {
    const error: unknown = await runGenerate(
      { spec: PETSTORE, operationId: 'getPet', status: '404' },
      captureIO()
    ).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({
      errorCode: ErrorCode.OPERATION_NOT_FOUND,
      message: 'GET /pets/{petId} 404 has no response schema or example',
    });
  });

  it('fails for an unknown operationId', async () => {
    const error: unknown = await runGenerate(
      { spec: PETSTORE, operationId: 'deletePet' },
      captureIO()
    ).catch((e: unknown) => e);
    expect(isSchemockError(error) && error.getExitCode()).toBe(62);
    expect(error).toMatchObject({
      message: 'Operation with operationId "deletePet" not found',
    });
  });

  it('requires --spec', async () => {
    await expect(runGenerate({}, captureIO())).rejects.toThrow('Missing --spec <file>');
  });
});

describe('runSchema', () => {
  it('generates from a standalone schema file', async () => {
    const io = captureIO();
    await runSchema({ schema: fixture('user.schema.json'), count: '2' }, io);
    const values: unknown = JSON.parse(io.out.join(''));
    expect(Array.isArray(values)).toBe(true);
    if (!Array.isArray(values)) return;
    expect(values).toHaveLength(2);
    for (const user of values) {
      expect(isRecord(user)).toBe(true);
      if (!isRecord(user)) continue;
      expect(user.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(user.email).toMatch(/^[^@\s]+@[^@\s]+$/);
      const tags = user.tags;
      expect(Array.isArray(tags)).toBe(true);
      if (Array.isArray(tags)) {
        expect(new Set(tags).size).toBe(tags.length);
        expect(tags.every((tag) => ['a', 'b', 'c'].includes(String(tag)))).toBe(true);
      }
    }
  });
});

describe('runRoutes', () => {
  it('lists operations with their statuses', async () => {
    const io = captureIO();
    await runRoutes({ spec: PETSTORE }, io);
    expect(io.out.join('')).toBe(
      'GET\t/pets\tlistPets\t200\nGET\t/pets/{petId}\tgetPet\t200,404\n'
    );
  });
});
