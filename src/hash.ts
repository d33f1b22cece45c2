/**
 * Hashing consistent with equals().
 *
 * Records hash as the tuple of their attribute values, combined with the
 * 32-bit xxHash-style tuple hash. Mutable containers are unhashable and
 * raise HashError when (and only when) a hash is requested.
 */

import { HashError } from './errors.js';
import { layoutOf, readAttribute } from './equality.js';

// ── Tuple hash ──────────────────────────────────────────────────────────

const XXPRIME_1 = 2654435761;
const XXPRIME_2 = 2246822519;
const XXPRIME_5 = 374761393;

function rotate(x: number): number {
  return (x << 13) | (x >>> 19);
}

/** Combine already-computed element hashes, order-sensitively. */
export function hashTuple(hashes: readonly number[]): number {
  let acc = XXPRIME_5;
  for (const lane of hashes) {
    acc = (acc + Math.imul(lane, XXPRIME_2)) | 0;
    acc = rotate(acc);
    acc = Math.imul(acc, XXPRIME_1);
  }
  return (acc + (hashes.length ^ (XXPRIME_5 ^ 3527539))) | 0;
}

// ── Scalars ─────────────────────────────────────────────────────────────

const NULL_HASH = 0x6e756c6c;
const UNDEFINED_HASH = 0x756e6466;
const float = new DataView(new ArrayBuffer(8));

function hashString(value: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    h ^= value.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h | 0;
}

function hashNumber(value: number): number {
  if (Number.isInteger(value) && Math.abs(value) <= 0x7fffffff) return value | 0;
  float.setFloat64(0, value);
  return (float.getInt32(0) ^ float.getInt32(4)) | 0;
}

let nextIdentity = 1;
const identities = new WeakMap<object, number>();

/** Identity hash for values compared with `===`. */
function identityHash(value: object): number {
  let id = identities.get(value);
  if (id === undefined) {
    id = nextIdentity++;
    identities.set(value, id);
  }
  return hashNumber(id);
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function typeNameOf(value: object): string {
  if (Array.isArray(value)) return 'Array';
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null) return 'Object';
  return 'constructor' in value && typeof value.constructor === 'function'
    ? value.constructor.name
    : 'Object';
}

// ── Values ──────────────────────────────────────────────────────────────

function hashValue(value: unknown, active: Set<object>): number {
  switch (typeof value) {
    case 'undefined':
      return UNDEFINED_HASH;
    case 'boolean':
      return value ? 1 : 0;
    case 'number':
      return hashNumber(value);
    case 'bigint':
      return hashNumber(Number(BigInt.asIntN(32, value)));
    case 'string':
      return hashString(value);
    case 'symbol':
      return hashString(value.description ?? '') ^ 0x73796d62;
    case 'function':
      return identityHash(value);
  }
  if (value === null || typeof value !== 'object') return NULL_HASH;

  const layout = layoutOf(value);
  if (layout === undefined && !Array.isArray(value) && !isPlainObject(value)) {
    if (value instanceof Map || value instanceof Set || value instanceof Date) {
      throw new HashError(typeNameOf(value));
    }
    return identityHash(value);
  }

  // A container that holds itself has no finite hash.
  if (active.has(value)) throw new HashError(typeNameOf(value));
  active.add(value);
  try {
    if (layout !== undefined) {
      return hashTuple(layout.map((name) => hashValue(readAttribute(value, name), active)));
    }
    if (!Object.isFrozen(value)) throw new HashError(typeNameOf(value));
    if (Array.isArray(value)) return hashTuple(value.map((item: unknown) => hashValue(item, active)));
    const keys = Object.keys(value).sort();
    return hashTuple(
      keys.map((key) => hashTuple([hashString(key), hashValue(readAttribute(value, key), active)])),
    );
  } finally {
    active.delete(value);
  }
}

/**
 * Hash any value equals() can compare. Frozen arrays hash as tuples,
 * frozen plain objects independently of key order.
 */
export function hash(value: unknown): number {
  return hashValue(value, new Set());
}
