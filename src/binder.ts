/**
 * The argument binder.
 *
 * Maps one call's arguments onto the declared parameters, the way the
 * declared signature would bind them, and returns the values in layout
 * order. Nothing is stored here: the synthesizer writes the result only
 * once binding has fully succeeded.
 *
 * Algorithm (4 steps):
 *   Step 1: Split off a trailing kw({...}) bag
 *   Step 2: Bind positional values; overflow to the sequence collector
 *   Step 3: Bind named values; unknown names to the mapping collector
 *   Step 4: Fill defaults and report every missing parameter
 */

import type { ParameterDescriptor } from './types.js';
import { isNamedArguments } from './api/kw.js';
import {
  MissingArgumentError,
  TooManyArgumentsError,
  UnexpectedArgumentError,
  quoteList,
} from './errors.js';

/** Marker for a slot not yet bound. */
const UNBOUND: unique symbol = Symbol('unbound');

// ── Step 1: call shape ──────────────────────────────────────────────────

interface CallShape {
  positional: readonly unknown[];
  named: ReadonlyArray<readonly [string, unknown]>;
}

function splitCall(args: readonly unknown[]): CallShape {
  const last = args[args.length - 1];
  if (args.length > 0 && isNamedArguments(last)) {
    return { positional: args.slice(0, -1), named: last.entries };
  }
  return { positional: args, named: [] };
}

// ── Messages ────────────────────────────────────────────────────────────

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function tooManyMessage(
  recordName: string,
  positional: readonly ParameterDescriptor[],
  given: number,
): string {
  const max = positional.length;
  const min = positional.filter((p) => !p.hasDefault).length;
  const takes = min === max ? plural(max, 'positional argument') : `from ${min} to ${max} positional arguments`;
  const were = given === 1 ? 'was' : 'were';
  return `${recordName}() takes ${takes} but ${given} ${were} given`;
}

// ── Binding ─────────────────────────────────────────────────────────────

/**
 * Bind `args` against `parameters` (already validated by the extractor).
 * Returns one value per parameter, in declaration order.
 */
export function bindArguments(
  recordName: string,
  parameters: readonly ParameterDescriptor[],
  args: readonly unknown[],
): readonly unknown[] {
  const { positional, named } = splitCall(args);
  const slots: unknown[] = parameters.map(() => UNBOUND);
  const indexByName = new Map(parameters.map((p, i) => [p.name, i]));

  const positionalParams = parameters.filter(
    (p) => p.kind === 'positional-only' || p.kind === 'positional-or-named',
  );
  const restIndex = parameters.findIndex((p) => p.kind === 'rest-positional');
  const restNamedIndex = parameters.findIndex((p) => p.kind === 'rest-named');

  // Step 2: positional values
  const extra: unknown[] = [];
  positional.forEach((value, i) => {
    if (i < positionalParams.length) {
      slots[i] = value;
    } else {
      extra.push(value);
    }
  });
  if (extra.length > 0 && restIndex === -1) {
    throw new TooManyArgumentsError(tooManyMessage(recordName, positionalParams, positional.length));
  }

  // Step 3: named values
  const collected: Array<readonly [string, unknown]> = [];
  const misnamed: string[] = [];
  for (const [key, value] of named) {
    const index = indexByName.get(key);
    const target = index === undefined ? undefined : parameters[index];
    if (index !== undefined && (target?.kind === 'positional-or-named' || target?.kind === 'named-only')) {
      if (slots[index] !== UNBOUND) {
        throw new UnexpectedArgumentError(`${recordName}() got multiple values for argument '${key}'`, key);
      }
      slots[index] = value;
    } else if (restNamedIndex !== -1) {
      if (collected.some(([k]) => k === key)) {
        throw new UnexpectedArgumentError(`${recordName}() got multiple values for argument '${key}'`, key);
      }
      collected.push([key, value]);
    } else if (target?.kind === 'positional-only') {
      misnamed.push(key);
    } else {
      throw new UnexpectedArgumentError(`${recordName}() got an unexpected named argument '${key}'`, key);
    }
  }
  if (misnamed.length > 0) {
    throw new UnexpectedArgumentError(
      `${recordName}() got some positional-only arguments passed as named arguments: ${misnamed.map((n) => `'${n}'`).join(', ')}`,
      misnamed[0],
    );
  }

  if (restIndex !== -1) slots[restIndex] = Object.freeze(extra);
  if (restNamedIndex !== -1) slots[restNamedIndex] = freezeMapping(collected);

  // Step 4: defaults, then missing parameters
  const missingPositional: string[] = [];
  const missingNamed: string[] = [];
  parameters.forEach((p, i) => {
    if (slots[i] !== UNBOUND) return;
    if (p.hasDefault) {
      slots[i] = p.default;
    } else if (p.kind === 'named-only') {
      missingNamed.push(p.name);
    } else {
      missingPositional.push(p.name);
    }
  });
  if (missingPositional.length > 0) {
    throw new MissingArgumentError(
      `${recordName}() missing ${plural(missingPositional.length, 'required positional argument')}: ${quoteList(missingPositional)}`,
      missingPositional,
    );
  }
  if (missingNamed.length > 0) {
    throw new MissingArgumentError(
      `${recordName}() missing ${plural(missingNamed.length, 'required named-only argument')}: ${quoteList(missingNamed)}`,
      missingNamed,
    );
  }

  return Object.freeze(slots);
}

/** Build the frozen plain object a mapping collector stores. */
function freezeMapping(entries: ReadonlyArray<readonly [string, unknown]>): Readonly<Record<string, unknown>> {
  const mapping: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    Object.defineProperty(mapping, key, { value, enumerable: true, writable: false, configurable: false });
  }
  return Object.freeze(mapping);
}
