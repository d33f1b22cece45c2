/**
 * Side tables linking synthesized types and their instances to the
 * RecordTypeInfo captured at synthesis. WeakMaps keep the info off the
 * instances themselves, so nothing internal is reachable from them.
 */

import type { RecordInstance, RecordType, RecordTypeInfo } from './types.js';

const instanceInfo = new WeakMap<object, RecordTypeInfo>();
const typeInfo = new WeakMap<object, RecordTypeInfo>();

export function registerInstance(instance: object, info: RecordTypeInfo): void {
  instanceInfo.set(instance, info);
}

export function registerType(type: object, info: RecordTypeInfo): void {
  typeInfo.set(type, info);
}

export function infoOfInstance(value: unknown): RecordTypeInfo | undefined {
  return typeof value === 'object' && value !== null ? instanceInfo.get(value) : undefined;
}

export function infoOfType(value: unknown): RecordTypeInfo | undefined {
  return typeof value === 'function' ? typeInfo.get(value) : undefined;
}

/** True for instances produced by any synthesized type. */
export function isRecord(value: unknown): value is RecordInstance {
  return infoOfInstance(value) !== undefined;
}

/** True for types produced by record() or recordFromSource(). */
export function isRecordType(value: unknown): value is RecordType {
  return infoOfType(value) !== undefined;
}
