/**
 * The Layout Planner.
 *
 * Turns an extracted signature into the fixed attribute layout that backs
 * instance storage. Scalars get one slot each; the rest-positional
 * collector gets one sequence slot directly after the positional slots;
 * the rest-named collector gets one mapping slot, always last.
 */

import type {
  AttributeLayout,
  ExtractedSignature,
  LayoutEntry,
  ParameterDescriptor,
  StorageKind,
} from './types.js';
import { SpecificationError } from './errors.js';

function storageFor(descriptor: ParameterDescriptor): StorageKind {
  switch (descriptor.kind) {
    case 'rest-positional':
      return 'sequence';
    case 'rest-named':
      return 'mapping';
    default:
      return 'scalar';
  }
}

export function planLayout(signature: ExtractedSignature): AttributeLayout {
  const entries: LayoutEntry[] = signature.parameters.map((p) =>
    Object.freeze({ name: p.name, kind: p.kind, storage: storageFor(p) }),
  );

  entries.forEach((entry, index) => {
    if (entry.storage === 'mapping' && index !== entries.length - 1) {
      throw new SpecificationError(`${signature.name}: mapping slot '${entry.name}' must be last`);
    }
    if (entry.storage === 'sequence') {
      const misplaced = entries
        .slice(0, index)
        .find((e) => e.kind !== 'positional-only' && e.kind !== 'positional-or-named');
      if (misplaced) {
        throw new SpecificationError(
          `${signature.name}: sequence slot '${entry.name}' must directly follow the positional slots`,
        );
      }
    }
  });

  return Object.freeze(entries);
}

/**
 * Names bound positionally when destructuring: every leading positional
 * slot, stopping at the first slot of any other kind.
 */
export function matchArgsOf(layout: AttributeLayout): readonly string[] {
  const names: string[] = [];
  for (const entry of layout) {
    if (entry.kind !== 'positional-only' && entry.kind !== 'positional-or-named') break;
    names.push(entry.name);
  }
  return Object.freeze(names);
}
