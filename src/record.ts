/**
 * record(): the declaration entry point.
 *
 * Runs the pipeline once per declaration:
 *   extractSignature → planLayout → synthesize (+ exportMetadata)
 *
 * A failing stage throws before anything is built; no partial type is
 * ever returned.
 */

import type { ParameterDescriptor, RecordType } from './types.js';
import type { FieldsOf } from './api/types.js';
import type { RecordOptions, SourceOptions } from './config.js';
import { resolveRecordOptions } from './config.js';
import { extractSignature } from './extractor.js';
import { planLayout } from './layout.js';
import { exportMetadata } from './metadata.js';
import { synthesize } from './synthesizer.js';
import { parseDeclaration } from './source.js';

/**
 * Declare a record type.
 *
 *   const InventoryItem = record('InventoryItem', [
 *     param.positional('name'),
 *     param.positional('price'),
 *     param.named('quantity', { default: 0 }),
 *   ]);
 *   InventoryItem('Widget', 9.99).quantity;   // 0
 */
export function record<P extends readonly ParameterDescriptor[]>(
  name: string,
  parameters: P,
  options?: RecordOptions,
): RecordType<FieldsOf<P>>;

export function record(
  name: string,
  parameters: readonly ParameterDescriptor[],
  options?: RecordOptions,
): RecordType {
  const resolved = resolveRecordOptions(name, options);
  const signature = extractSignature(name, parameters, resolved.doc);
  const layout = planLayout(signature);
  const metadata = exportMetadata(signature);
  return synthesize(signature, layout, metadata, resolved);
}

/**
 * Declare a record type from TypeScript source holding one function
 * declaration. The function's JSDoc becomes the docstring unless
 * `options.doc` is given.
 *
 *   const Point = recordFromSource(`
 *     /** A point in the plane. *\/
 *     function Point(x: number, y: number, { label = '' }: { label?: string }) {}
 *   `);
 */
export function recordFromSource(text: string, options: SourceOptions = {}): RecordType {
  const declaration = parseDeclaration(text, options);
  return record(declaration.name, declaration.parameters, {
    doc: options.doc ?? declaration.doc,
    module: options.module,
    qualifiedName: options.qualifiedName,
  });
}
