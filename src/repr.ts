/**
 * Reconstructive textual representation.
 *
 * A record renders as `Name(v1, v2, named=v3, ...)`. Values render in a
 * form reconstruct() can read back: single-quoted strings, array and
 * object literals, `new Map([...])`, `new Set([...])`, `new Date('...')`
 * and nested records. Objects may supply their own text through
 * `[reprSymbol]()`.
 */

import { infoOfInstance } from './registry.js';
import { isValidIdentifier } from './extractor.js';
import { readAttribute } from './equality.js';
import type { RecordTypeInfo } from './types.js';

/** Well-known symbol for a method returning an object's representation. */
export const reprSymbol: unique symbol = Symbol.for('signature-records.repr');

// ── Strings ─────────────────────────────────────────────────────────────

const ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  "'": "\\'",
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
  '\v': '\\v',
};

export function reprString(value: string): string {
  let out = "'";
  for (const ch of value) {
    const escape = ESCAPES[ch];
    if (escape !== undefined) {
      out += escape;
      continue;
    }
    const code = ch.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f || code === 0x2028 || code === 0x2029) {
      out += `\\u${code.toString(16).padStart(4, '0')}`;
    } else {
      out += ch;
    }
  }
  return `${out}'`;
}

// ── Values ──────────────────────────────────────────────────────────────

function hasReprMethod(value: object): value is { [reprSymbol](): unknown } {
  return reprSymbol in value && typeof value[reprSymbol] === 'function';
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function reprValue(value: unknown, seen: Set<object>): string {
  switch (typeof value) {
    case 'string':
      return reprString(value);
    case 'number':
      return Object.is(value, -0) ? '-0' : String(value);
    case 'bigint':
      return `${value}n`;
    case 'boolean':
    case 'undefined':
      return String(value);
    case 'symbol':
      return value.toString();
    case 'function':
      return `<function ${value.name || 'anonymous'}>`;
  }
  if (value === null || typeof value !== 'object') return 'null';

  if (seen.has(value)) return '...';
  seen.add(value);
  try {
    const info = infoOfInstance(value);
    if (info) return reprRecord(value, info, seen);
    if (hasReprMethod(value)) return String(value[reprSymbol]());
    if (Array.isArray(value)) {
      return `[${value.map((item: unknown) => reprValue(item, seen)).join(', ')}]`;
    }
    if (value instanceof Map) {
      const entries = [...value].map(
        ([k, v]: [unknown, unknown]) => `[${reprValue(k, seen)}, ${reprValue(v, seen)}]`,
      );
      return `new Map([${entries.join(', ')}])`;
    }
    if (value instanceof Set) {
      return `new Set([${[...value].map((item: unknown) => reprValue(item, seen)).join(', ')}])`;
    }
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? 'new Date(NaN)' : `new Date(${reprString(value.toISOString())})`;
    }
    if (isPlainObject(value)) {
      const entries = Object.keys(value).map(
        (key) => `${reprString(key)}: ${reprValue(readAttribute(value, key), seen)}`,
      );
      return `{${entries.join(', ')}}`;
    }
    const ctor = 'constructor' in value && typeof value.constructor === 'function' ? value.constructor.name : '';
    return `<${ctor || 'Object'} object>`;
  } finally {
    seen.delete(value);
  }
}

// ── Records ─────────────────────────────────────────────────────────────

function reprRecord(instance: object, info: RecordTypeInfo, seen: Set<object>): string {
  const args: string[] = [];
  const spread: string[] = [];

  for (const entry of info.layout) {
    const value = readAttribute(instance, entry.name);
    switch (entry.kind) {
      case 'positional-only':
      case 'positional-or-named':
        args.push(reprValue(value, seen));
        break;
      case 'named-only':
        args.push(`${entry.name}=${reprValue(value, seen)}`);
        break;
      case 'rest-positional':
        if (Array.isArray(value)) {
          for (const item of value) args.push(reprValue(item, seen));
        }
        break;
      case 'rest-named':
        if (typeof value === 'object' && value !== null) {
          for (const key of Object.keys(value)) {
            const rendered = reprValue(readAttribute(value, key), seen);
            if (isValidIdentifier(key)) {
              args.push(`${key}=${rendered}`);
            } else {
              spread.push(`${reprString(key)}: ${rendered}`);
            }
          }
        }
        break;
    }
  }
  if (spread.length > 0) args.push(`...{${spread.join(', ')}}`);

  return `${info.name}(${args.join(', ')})`;
}

/** The reconstructive representation of any value. */
export function repr(value: unknown): string {
  return reprValue(value, new Set());
}
