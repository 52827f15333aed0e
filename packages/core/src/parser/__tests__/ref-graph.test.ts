import { describe, it, expect } from 'vitest';
import {
  RefGraph,
  collectRefs,
  escapeToken,
  pointerName,
  resolvePointer,
  unescapeToken,
} from '../ref-graph.js';

const document = {
  definitions: {
    A: { type: 'object', properties: { b: { $ref: '#/definitions/B' } } },
    B: { type: 'object', properties: { a: { $ref: '#/definitions/A' } } },
    Self: { type: 'array', items: { $ref: '#/definitions/Self' } },
    Leaf: { type: 'string' },
    Broken: { allOf: [{ $ref: '#/definitions/Leaf' }, { $ref: '#/definitions/Missing' }] },
    'a/b': { type: 'null' },
  },
  list: ['zero', 'one'],
};

describe('pointer tokens', () => {
  it('round-trips the two escapes', () => {
    expect(escapeToken('a/b~c')).toBe('a~1b~0c');
    expect(unescapeToken('a~1b~0c')).toBe('a/b~c');
  });

  it('percent-decodes tokens and keeps malformed ones as written', () => {
    expect(unescapeToken('a%20b')).toBe('a b');
    expect(unescapeToken('100%')).toBe('100%');
  });

  it('names a pointer by its last token', () => {
    expect(pointerName('#/components/schemas/Pet')).toBe('Pet');
    expect(pointerName('#/definitions/a~1b')).toBe('a/b');
  });
});

describe('resolvePointer', () => {
  it('walks objects and arrays', () => {
    expect(resolvePointer(document, '#/definitions/Leaf')).toEqual({ type: 'string' });
    expect(resolvePointer(document, '#/definitions/a~1b')).toEqual({ type: 'null' });
    expect(resolvePointer(document, '#/list/1')).toBe('one');
    expect(resolvePointer(document, '#')).toBe(document);
  });

  it('returns undefined for missing and non-local targets', () => {
    expect(resolvePointer(document, '#/definitions/Missing')).toBeUndefined();
    expect(resolvePointer(document, '#/list/2')).toBeUndefined();
    expect(resolvePointer(document, 'other.yaml#/definitions/Leaf')).toBeUndefined();
  });
});

describe('collectRefs', () => {
  it('lists references once in document order', () => {
    expect(
      collectRefs({
        allOf: [{ $ref: '#/x' }, { properties: { y: { $ref: '#/y' }, z: { $ref: '#/x' } } }],
      })
    ).toEqual(['#/x', '#/y']);
  });
});

describe('RefGraph', () => {
  it('adds referenced schemas transitively', () => {
    const graph = new RefGraph(document);
    expect(graph.add('#/definitions/A')).toBeUndefined();
    expect(graph.size).toBe(2);
    expect(graph.successors('#/definitions/A')).toEqual(['#/definitions/B']);
  });

  it('finds a cycle through two schemas', () => {
    const graph = new RefGraph(document);
    graph.add('#/definitions/A');
    expect(graph.findCycle()).toEqual(['#/definitions/A', '#/definitions/B', '#/definitions/A']);
  });

  it('finds a schema that references itself', () => {
    const graph = new RefGraph(document);
    graph.add('#/definitions/Self');
    expect(graph.findCycle()).toEqual(['#/definitions/Self', '#/definitions/Self']);
  });

  it('reports no cycle for acyclic graphs', () => {
    const graph = new RefGraph(document);
    graph.add('#/definitions/Leaf');
    expect(graph.findCycle()).toBeUndefined();
  });

  it('reports the first unresolvable reference', () => {
    expect(new RefGraph(document).add('#/definitions/Broken')).toEqual({
      ref: '#/definitions/Missing',
      from: '#/definitions/Broken',
    });
  });
});
