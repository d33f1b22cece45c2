/**
 * The Type Synthesizer.
 *
 * Builds the callable record type from an extracted signature and its
 * layout. Each call binds its arguments completely, writes every value
 * once into a fresh object, freezes it and hands out only an immutability
 * guard (a Proxy) over it, so no partially built instance is observable
 * and no write path survives construction.
 */

import type {
  AttributeLayout,
  ExportedMetadata,
  ExtractedSignature,
  RecordInstance,
  RecordType,
  RecordTypeInfo,
} from './types.js';
import type { ResolvedRecordOptions } from './config.js';
import { bindArguments } from './binder.js';
import { matchArgsOf } from './layout.js';
import { ImmutabilityError } from './errors.js';
import { infoOfInstance, registerInstance, registerType } from './registry.js';
import { readAttribute } from './equality.js';
import { repr } from './repr.js';

const inspectCustom: unique symbol = Symbol.for('nodejs.util.inspect.custom');

// ── Instance storage ─────────────────────────────────────────────────────

/**
 * Shared base of every synthesized type. Fields are own, enumerable,
 * read-only data properties, written once here.
 */
class RecordBase {
  readonly [field: string]: unknown;

  constructor(layout: AttributeLayout, values: readonly unknown[]) {
    layout.forEach((entry, i) => {
      Object.defineProperty(this, entry.name, {
        value: values[i],
        enumerable: true,
        writable: false,
        configurable: false,
      });
    });
    Object.freeze(this);
  }

  /** Positional destructuring: `const [x, y] = point`. */
  *[Symbol.iterator](): Iterator<unknown> {
    const info = infoOfInstance(this);
    if (!info) return;
    for (const name of info.matchArgs) {
      yield readAttribute(this, name);
    }
  }

  toString(): string {
    return repr(this);
  }

  [inspectCustom](): string {
    return repr(this);
  }
}

Object.freeze(RecordBase.prototype);

/** String keys an instance inherits from its shared prototype. */
export function protocolNames(): readonly string[] {
  return Object.getOwnPropertyNames(RecordBase.prototype);
}

// ── Immutability guard ───────────────────────────────────────────────────

/**
 * A redefinition that keeps a frozen data property as it is, such as the
 * one Object.freeze() performs.
 */
function changesNothing(current: PropertyDescriptor | undefined, next: PropertyDescriptor): boolean {
  return (
    current !== undefined &&
    current.writable === false &&
    current.configurable === false &&
    !('get' in next) &&
    !('set' in next) &&
    next.writable !== true &&
    next.configurable !== true &&
    (next.enumerable === undefined || next.enumerable === current.enumerable) &&
    (!('value' in next) || Object.is(next.value, current.value))
  );
}

function immutabilityGuard(typeName: string): ProxyHandler<RecordBase> {
  return {
    set(_target, property) {
      throw new ImmutabilityError(typeName, String(property), 'assignment');
    },
    defineProperty(target, property, attributes) {
      if (changesNothing(Reflect.getOwnPropertyDescriptor(target, property), attributes)) {
        return Reflect.defineProperty(target, property, attributes);
      }
      throw new ImmutabilityError(typeName, String(property), 'assignment');
    },
    deleteProperty(_target, property) {
      throw new ImmutabilityError(typeName, String(property), 'deletion');
    },
    setPrototypeOf() {
      throw new ImmutabilityError(typeName, '__proto__', 'assignment');
    },
  };
}

// ── Synthesis ────────────────────────────────────────────────────────────

export function synthesize(
  signature: ExtractedSignature,
  layout: AttributeLayout,
  metadata: ExportedMetadata,
  options: ResolvedRecordOptions,
): RecordType {
  const { name, parameters } = signature;
  const matchArgs = matchArgsOf(layout);
  const info: RecordTypeInfo = Object.freeze({ name, layout, parameters, matchArgs });
  const guard = immutabilityGuard(name);

  const Synthesized = class extends RecordBase {};
  Object.defineProperty(Synthesized, 'name', { value: name });

  function construct(...args: unknown[]): RecordInstance {
    const values = bindArguments(name, parameters, args);
    const target = new Synthesized(layout, values);
    const instance = new Proxy(target, guard);
    // util.inspect() looks through proxies to the target.
    registerInstance(target, info);
    registerInstance(instance, info);
    return instance;
  }

  const type = Object.assign(construct, {
    qualifiedName: options.qualifiedName,
    module: options.module,
    doc: metadata.doc,
    fields: Object.freeze(layout.map((entry) => entry.name)),
    matchArgs,
    annotations: metadata.annotations,
    parameters,
    prototype: Synthesized.prototype,
  });
  Object.defineProperty(type, 'name', { value: name });
  Object.defineProperty(Synthesized.prototype, 'constructor', { value: type });
  Object.freeze(Synthesized.prototype);
  Object.freeze(Synthesized);

  registerType(type, info);
  return Object.freeze(type);
}
