/**
 * Structural equality.
 *
 * A record compares against any value with an identical layout: another
 * synthesized type's instance, or an object whose constructor declares
 * `static [layoutSymbol]`. Mismatched layouts are NOT_APPLICABLE rather
 * than false, so equals() tries the reverse comparison and then falls
 * back to identity.
 */

import { infoOfInstance } from './registry.js';

/** Well-known symbol a class uses to declare its attribute layout. */
export const layoutSymbol: unique symbol = Symbol.for('signature-records.layout');

/** Result of a comparison that does not apply to its operands. */
export const NOT_APPLICABLE: unique symbol = Symbol('not-applicable');

export type Comparison = boolean | typeof NOT_APPLICABLE;

/** Pairs currently under comparison, for cyclic containers. */
type ActivePairs = WeakMap<object, Set<object>>;

// ── Layout discovery ─────────────────────────────────────────────────────

/** The ordered attribute names of `value`, if it has a declared layout. */
export function layoutOf(value: unknown): readonly string[] | undefined {
  const info = infoOfInstance(value);
  if (info) return info.layout.map((entry) => entry.name);
  if (typeof value !== 'object' || value === null || !('constructor' in value)) return undefined;

  const ctor = value.constructor;
  if (typeof ctor !== 'function' || !(layoutSymbol in ctor)) return undefined;
  const declared = ctor[layoutSymbol];
  if (!Array.isArray(declared)) return undefined;
  const names: string[] = [];
  for (const name of declared) {
    if (typeof name !== 'string') return undefined;
    names.push(name);
  }
  return names;
}

export function readAttribute(target: object, name: string): unknown {
  return Reflect.get(target, name);
}

function sameLayout(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

// ── Record comparison ────────────────────────────────────────────────────

/**
 * Compare `self` against `other` attribute by attribute, in layout order.
 * NOT_APPLICABLE when either side has no layout, the layouts differ, or
 * `other` lacks one of the attributes.
 */
export function compareRecord(self: unknown, other: unknown): Comparison {
  return compareWithLayout(self, other, new WeakMap());
}

function compareWithLayout(self: unknown, other: unknown, active: ActivePairs): Comparison {
  const selfLayout = layoutOf(self);
  const otherLayout = layoutOf(other);
  if (
    selfLayout === undefined ||
    otherLayout === undefined ||
    typeof self !== 'object' ||
    self === null ||
    typeof other !== 'object' ||
    other === null ||
    !sameLayout(selfLayout, otherLayout)
  ) {
    return NOT_APPLICABLE;
  }

  for (const name of selfLayout) {
    if (!(name in other)) return NOT_APPLICABLE;
  }
  return selfLayout.every((name) =>
    valueEquals(readAttribute(self, name), readAttribute(other, name), active),
  );
}

// ── Value comparison ─────────────────────────────────────────────────────

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function enter(active: ActivePairs, a: object, b: object): boolean {
  let partners = active.get(a);
  if (!partners) {
    partners = new Set();
    active.set(a, partners);
  }
  if (partners.has(b)) return false;
  partners.add(b);
  return true;
}

function valueEquals(a: unknown, b: unknown, active: ActivePairs): boolean {
  if (a === b) return true;
  if (typeof a !== 'object' || a === null || typeof b !== 'object' || b === null) return false;
  // A pair already being compared further up is assumed equal.
  if (!enter(active, a, b)) return true;

  if (layoutOf(a) !== undefined || layoutOf(b) !== undefined) {
    let result = compareWithLayout(a, b, active);
    if (result === NOT_APPLICABLE) result = compareWithLayout(b, a, active);
    return result === NOT_APPLICABLE ? false : result;
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    return (
      Array.isArray(a) &&
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((item: unknown, i) => valueEquals(item, b[i], active))
    );
  }

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map) || a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !valueEquals(value, b.get(key), active)) return false;
    }
    return true;
  }

  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set) || !(b instanceof Set) || a.size !== b.size) return false;
    for (const item of a) {
      if (!b.has(item)) return false;
    }
    return true;
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    return (
      aKeys.length === bKeys.length &&
      aKeys.every(
        (key) =>
          Object.prototype.hasOwnProperty.call(b, key) &&
          valueEquals(readAttribute(a, key), readAttribute(b, key), active),
      )
    );
  }

  return false;
}

// ── Public protocol ──────────────────────────────────────────────────────

/**
 * Structural equality: records by layout and attribute values, containers
 * by content, everything else by identity (`===`).
 */
export function equals(a: unknown, b: unknown): boolean {
  return valueEquals(a, b, new WeakMap());
}
