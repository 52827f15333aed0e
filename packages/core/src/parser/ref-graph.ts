/**
 * Reference graph over a specification document.
 * Nodes are JSON pointers to schemas; an edge A -> B means the subtree at A
 * contains `$ref: B`. Cycles are found with a three-color depth-first search.
 */

import { isPlainRecord } from '../schema/json-value.js';

export type Pointer = string;

/** Decode one reference token (`~1` is `/`, `~0` is `~`). */
export function unescapeToken(token: string): string {
  let decoded = token;
  try {
    decoded = decodeURIComponent(token);
  } catch {
    // not percent-encoded; use the token as written
  }
  return decoded.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function escapeToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function isLocalRef(ref: string): boolean {
  return ref === '#' || ref.startsWith('#/');
}

/**
 * Follow a local reference inside the document; undefined when any segment
 * is missing or the reference points outside the document.
 */
export function resolvePointer(document: unknown, ref: string): unknown {
  if (!isLocalRef(ref)) return undefined;
  let current: unknown = document;
  const tokens = ref === '#' ? [] : ref.slice(2).split('/');
  for (const raw of tokens) {
    const token = unescapeToken(raw);
    if (Array.isArray(current)) {
      const index = Number(token);
      if (!Number.isInteger(index) || index < 0 || index >= current.length) return undefined;
      current = current[index];
    } else if (isPlainRecord(current) && Object.hasOwn(current, token)) {
      current = current[token];
    } else {
      return undefined;
    }
  }
  return current;
}

/** Every `$ref` string in a subtree, in document order, without repeats. */
export function collectRefs(node: unknown): string[] {
  const found = new Set<string>();
  const walk = (value: unknown): void => {
    if (Array.isArray(value)) {
      for (const item of value) walk(item);
      return;
    }
    if (!isPlainRecord(value)) return;
    for (const [key, child] of Object.entries(value)) {
      if (key === '$ref' && typeof child === 'string') {
        found.add(child);
      } else {
        walk(child);
      }
    }
  };
  walk(node);
  return Array.from(found);
}

export interface UnresolvedRef {
  ref: string;
  /** Node whose subtree holds the reference */
  from: Pointer;
}

type Color = 'white' | 'gray' | 'black';

export class RefGraph {
  private readonly edges = new Map<Pointer, Pointer[]>();

  constructor(private readonly document: unknown) {}

  /**
   * Add a node and, transitively, every schema it references. Returns the
   * first reference that cannot be resolved.
   */
  add(pointer: Pointer): UnresolvedRef | undefined {
    const pending: Pointer[] = [pointer];
    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || this.edges.has(current)) continue;
      const refs = collectRefs(resolvePointer(this.document, current));
      for (const ref of refs) {
        if (resolvePointer(this.document, ref) === undefined) {
          return { ref, from: current };
        }
      }
      this.edges.set(current, refs);
      pending.push(...refs);
    }
    return undefined;
  }

  get size(): number {
    return this.edges.size;
  }

  successors(pointer: Pointer): readonly Pointer[] {
    return this.edges.get(pointer) ?? [];
  }

  /** The first cycle found, closed on its starting node. */
  findCycle(): Pointer[] | undefined {
    const color = new Map<Pointer, Color>();
    const stack: Pointer[] = [];

    const visit = (node: Pointer): Pointer[] | undefined => {
      color.set(node, 'gray');
      stack.push(node);
      for (const next of this.successors(node)) {
        const state = color.get(next) ?? 'white';
        if (state === 'gray') {
          return [...stack.slice(stack.indexOf(next)), next];
        }
        if (state === 'white') {
          const cycle = visit(next);
          if (cycle) return cycle;
        }
      }
      stack.pop();
      color.set(node, 'black');
      return undefined;
    };

    for (const node of this.edges.keys()) {
      if ((color.get(node) ?? 'white') === 'white') {
        const cycle = visit(node);
        if (cycle) return cycle;
      }
    }
    return undefined;
  }
}

/** Short display name: the last pointer segment. */
export function pointerName(pointer: Pointer): string {
  const tokens = pointer.split('/');
  return unescapeToken(tokens[tokens.length - 1] ?? pointer);
}
