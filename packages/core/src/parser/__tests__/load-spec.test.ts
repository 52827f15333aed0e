import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadSpecFile, parseDocumentText, readDocument } from '../load-spec.js';
import { ErrorCode } from '../../errors/codes.js';

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('parseDocumentText', () => {
  it('picks the syntax from the extension', () => {
    expect(parseDocumentText('{"a": 1}', 'doc.json').unwrap()).toEqual({ a: 1 });
    expect(parseDocumentText('a: 1\nb: [x, y]\n', 'doc.yml').unwrap()).toEqual({ a: 1, b: ['x', 'y'] });
  });

  it('tries JSON then YAML for unknown extensions', () => {
    expect(parseDocumentText('[1, 2]').unwrap()).toEqual([1, 2]);
    expect(parseDocumentText('name: rex').unwrap()).toEqual({ name: 'rex' });
  });

  it('reports text that does not parse', () => {
    const result = parseDocumentText('a: 1', 'doc.json');
    expect(result.isErr() && result.error.message.startsWith('Cannot parse doc.json: ')).toBe(true);
    expect(result.isErr() && result.error.errorCode).toBe(ErrorCode.PARSE_ERROR);
    expect(result.isErr() && result.error.context?.file).toBe('doc.json');
  });
});

describe('readDocument', () => {
  it('reports files that cannot be read', async () => {
    const missing = fixture('missing.yaml');
    const result = await readDocument(missing);
    expect(result.isErr() && result.error.message.startsWith(`Cannot read ${missing}: `)).toBe(true);
    expect(result.isErr() && result.error.getExitCode()).toBeGreaterThan(0);
  });
});

describe('loadSpecFile', () => {
  it('parses a YAML document from disk', async () => {
    const spec = (await loadSpecFile(fixture('inventory.yaml'))).unwrap();
    expect(spec.format).toBe('swagger');
    expect(spec.title).toBe('Inventory');
    expect(spec.apiVersion).toBe('0.3.0');
    expect(spec.operations.map((op) => op.operationId)).toEqual(['listItems']);
    expect(spec.operations[0].responses[0].contentType).toBe('application/json');
    expect(spec.schemas.Item).toMatchObject({ type: 'object', required: ['sku'] });
  });
});
