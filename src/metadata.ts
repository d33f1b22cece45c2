/**
 * The Metadata Exporter.
 *
 * Copies the docstring and per-parameter annotations onto the synthesized
 * type. Only annotated parameters appear, in declaration order.
 * Collector annotations describe the element or value type, so they are
 * widened to the stored container type:
 *
 *   rest-positional  'number'         →  'readonly number[]'
 *   rest-named       'string'         →  'Record<string, string>'
 *   rest-named       '{ a: number }'  →  '{ a: number }'   (already a mapping type)
 *   non-text annotations              →  { container, of }
 */

import type {
  ExportedMetadata,
  ExtractedSignature,
  MappingAnnotation,
  ParameterDescriptor,
  SequenceAnnotation,
} from './types.js';

function sequenceAnnotation(annotation: unknown): string | SequenceAnnotation {
  if (typeof annotation === 'string') return `readonly ${annotation}[]`;
  return Object.freeze<SequenceAnnotation>({ container: 'sequence', of: annotation });
}

function mappingAnnotation(annotation: unknown): string | MappingAnnotation {
  if (typeof annotation === 'string') {
    return annotation.trimStart().startsWith('{') ? annotation : `Record<string, ${annotation}>`;
  }
  return Object.freeze<MappingAnnotation>({ container: 'mapping', of: annotation });
}

function exportedAnnotation(descriptor: ParameterDescriptor): unknown {
  switch (descriptor.kind) {
    case 'rest-positional':
      return sequenceAnnotation(descriptor.annotation);
    case 'rest-named':
      return mappingAnnotation(descriptor.annotation);
    default:
      return descriptor.annotation;
  }
}

export function exportMetadata(signature: ExtractedSignature): ExportedMetadata {
  const annotations = new Map<string, unknown>();
  for (const descriptor of signature.parameters) {
    if (!('annotation' in descriptor)) continue;
    annotations.set(descriptor.name, exportedAnnotation(descriptor));
  }
  return Object.freeze({ doc: signature.doc, annotations: new ReadonlyMapView(annotations) });
}

/** A Map wrapper exposing only the read side. */
class ReadonlyMapView<K, V> implements ReadonlyMap<K, V> {
  readonly #map: Map<K, V>;

  constructor(map: Map<K, V>) {
    this.#map = map;
    Object.freeze(this);
  }

  get size(): number {
    return this.#map.size;
  }

  get(key: K): V | undefined {
    return this.#map.get(key);
  }

  has(key: K): boolean {
    return this.#map.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.#map.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.#map.entries();
  }

  keys() {
    return this.#map.keys();
  }

  values() {
    return this.#map.values();
  }

  [Symbol.iterator]() {
    return this.#map[Symbol.iterator]();
  }
}
