#!/usr/bin/env tsx
/**
 * Record synthesizer showcase
 *
 * Usage:
 *   npx tsx examples/showcase.ts                 # Declare with the param builder (default)
 *   npx tsx examples/showcase.ts --mode=source   # Declare from a function declaration
 *
 * Or via npm scripts:
 *   npm run showcase
 */

import { parseArgs } from 'node:util';
import {
  record,
  recordFromSource,
  param,
  kw,
  equals,
  hash,
  repr,
  reconstruct,
  RecordError,
} from '../src/index.js';
import type { ParameterDescriptor, RecordType } from '../src/index.js';

const { values } = parseArgs({
  options: {
    mode: { type: 'string', default: 'builder', short: 'm' },
  },
  strict: true,
});

const mode = values.mode ?? 'builder';

function declare(): RecordType {
  if (mode === 'source') {
    return recordFromSource(`
      /** An item held in stock. */
      function InventoryItem(name: string, price: number, { quantity = 0 }: { quantity?: number }) {}
    `);
  }
  return record<readonly ParameterDescriptor[]>(
    'InventoryItem',
    [
      param.positional('name', { annotation: 'string' }),
      param.positional('price', { annotation: 'number' }),
      param.named('quantity', { default: 0, annotation: 'number' }),
    ],
    { doc: 'An item held in stock.' },
  );
}

function attempt(label: string, fn: () => unknown): void {
  try {
    console.log(`  ${label}: ${repr(fn())}`);
  } catch (error) {
    if (!(error instanceof RecordError)) throw error;
    console.log(`  ${label}: ${error.name}: ${error.message}`);
  }
}

function main(): void {
  console.log('\n  ┌───────────────────────────────┐');
  console.log('  │  Record Synthesizer Showcase  │');
  console.log('  └───────────────────────────────┘\n');
  console.log(`  Mode: ${mode}\n`);

  if (mode !== 'builder' && mode !== 'source') {
    console.error(`  Unknown mode: ${mode}. Use --mode=builder or --mode=source`);
    process.exit(1);
  }

  const InventoryItem = declare();
  console.log(`  ${InventoryItem.qualifiedName}: ${InventoryItem.doc ?? ''}`);
  console.log(`  fields:      ${InventoryItem.fields.join(', ')}`);
  console.log(`  matchArgs:   ${InventoryItem.matchArgs.join(', ')}`);
  for (const [name, annotation] of InventoryItem.annotations) {
    console.log(`  annotation:  ${name}: ${String(annotation)}`);
  }
  console.log();

  const widget = InventoryItem('Widget', 9.99);
  const stocked = InventoryItem('Widget', 9.99, kw({ quantity: 5 }));
  console.log(`  ${repr(widget)}`);
  console.log(`  ${repr(stocked)}`);
  console.log(`  equal:       ${equals(widget, stocked)}`);
  console.log(`  hash:        ${hash(widget)}`);

  const copy = reconstruct(repr(stocked), { InventoryItem });
  console.log(`  round trip:  ${equals(copy, stocked)}\n`);

  attempt("InventoryItem('Widget', 9.99, 5)", () => InventoryItem('Widget', 9.99, 5));
  attempt("InventoryItem('Widget')", () => InventoryItem('Widget'));
  attempt('widget.quantity = 5', () => Reflect.set(widget, 'quantity', 5));
  console.log();
}

main();
