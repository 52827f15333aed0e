/**
 * Structural check of a literal value (default, example, enum entry) against
 * a schema. Covers type, string length and pattern, array length, uniqueness
 * and item types, and required object members.
 */

import {
  isJsonObject,
  isTupleItems,
  resolveSchema,
  type JsonValue,
  type Schema,
} from '../types/schema.js';
import { canonicalJSON } from '../util/canonical-json.js';
import { codePointLength, jsonKind } from './json-value.js';

export function instanceIssues(
  value: JsonValue,
  schema: Schema,
  path = ''
): string[] {
  const target = resolveSchema(schema);
  const at = path ? ` at ${path}` : '';

  if (value === null) {
    return target.type === 'null' || target.nullable === true
      ? []
      : [`expected ${target.type}, got null${at}`];
  }

  switch (target.type) {
    case 'custom':
      return [];
    case 'null':
      return [`expected null, got ${jsonKind(value)}${at}`];
    case 'boolean':
      return typeof value === 'boolean'
        ? []
        : [`expected boolean, got ${jsonKind(value)}${at}`];
    case 'integer':
      if (typeof value !== 'number') {
        return [`expected integer, got ${jsonKind(value)}${at}`];
      }
      return Number.isInteger(value)
        ? []
        : [`expected integer, got fractional number ${value}${at}`];
    case 'number':
      return typeof value === 'number'
        ? []
        : [`expected number, got ${jsonKind(value)}${at}`];
    case 'string': {
      if (typeof value !== 'string') {
        return [`expected string, got ${jsonKind(value)}${at}`];
      }
      const out: string[] = [];
      const length = codePointLength(value);
      if (target.minLength !== undefined && length < target.minLength) {
        out.push(`string shorter than minLength ${target.minLength}${at}`);
      }
      if (target.maxLength !== undefined && length > target.maxLength) {
        out.push(`string longer than maxLength ${target.maxLength}${at}`);
      }
      if (target.pattern !== undefined && !safeTest(target.pattern, value)) {
        out.push(`string does not match pattern ${target.pattern}${at}`);
      }
      return out;
    }
    case 'array': {
      if (!Array.isArray(value)) {
        return [`expected array, got ${jsonKind(value)}${at}`];
      }
      const out: string[] = [];
      if (target.minItems !== undefined && value.length < target.minItems) {
        out.push(`array has fewer than minItems ${target.minItems}${at}`);
      }
      if (target.maxItems !== undefined && value.length > target.maxItems) {
        out.push(`array has more than maxItems ${target.maxItems}${at}`);
      }
      if (target.uniqueItems === true) {
        const seen = new Set(value.map((item) => canonicalJSON(item)));
        if (seen.size !== value.length) {
          out.push(`array items are not unique${at}`);
        }
      }
      const items = target.items;
      const extra = typeof target.additionalItems === 'object' ? target.additionalItems : undefined;
      if (items !== undefined) {
        value.forEach((item, index) => {
          const itemSchema = isTupleItems(items) ? (items[index] ?? extra) : items;
          if (itemSchema) {
            out.push(...instanceIssues(item, itemSchema, `${path}/${index}`));
          } else if (target.additionalItems === false) {
            out.push(`unexpected tuple item at ${path}/${index}`);
          }
        });
      }
      return out;
    }
    case 'object': {
      if (!isJsonObject(value)) {
        return [`expected object, got ${jsonKind(value)}${at}`];
      }
      const out: string[] = [];
      for (const name of target.required ?? []) {
        if (!Object.hasOwn(value, name)) out.push(`missing required member ${name}${at}`);
      }
      const properties: Readonly<Record<string, Schema>> = target.properties ?? {};
      for (const [name, member] of Object.entries(value)) {
        const memberSchema = Object.hasOwn(properties, name) ? properties[name] : undefined;
        if (memberSchema) {
          out.push(...instanceIssues(member, memberSchema, `${path}/${name}`));
        }
      }
      return out;
    }
  }
}

/**
 * Whether a generated value satisfies a schema, including the enum and
 * numeric bounds that literal checks leave out.
 */
export function matchesSchema(value: JsonValue, schema: Schema): boolean {
  const target = resolveSchema(schema);
  if (instanceIssues(value, target).length > 0) return false;
  if (target.enum) {
    const key = canonicalJSON(value);
    if (!target.enum.some((entry) => canonicalJSON(entry) === key)) return false;
  }
  if (typeof value === 'number' && (target.type === 'number' || target.type === 'integer')) {
    const { minimum, maximum } = target;
    if (minimum !== undefined && (target.exclusiveMinimum ? value <= minimum : value < minimum)) {
      return false;
    }
    if (maximum !== undefined && (target.exclusiveMaximum ? value >= maximum : value > maximum)) {
      return false;
    }
  }
  return true;
}

function safeTest(pattern: string, value: string): boolean {
  try {
    return new RegExp(pattern).test(value);
  } catch {
    return false;
  }
}
