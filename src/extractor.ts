/**
 * The Signature Extractor.
 *
 * Validates a parameter specification and produces the ordered descriptor
 * list the rest of the pipeline consumes. Nothing is built unless every
 * rule holds.
 *
 * Rules (checked in declaration order):
 *   1. Names are unique identifiers and not reserved words
 *   2. Kinds appear as positional-only, positional-or-named, rest-positional,
 *      named-only, rest-named; at most one collector of each kind
 *   3. A positional-or-named parameter after rest-positional becomes named-only
 *   4. A positional parameter without a default may not follow one with a default
 *   5. Collectors take no default
 */

import ts from 'typescript';
import type { ExtractedSignature, ParameterDescriptor, ParameterKind } from './types.js';
import { KIND_ORDER } from './types.js';
import { SpecificationError } from './errors.js';
import { protocolNames } from './synthesizer.js';

// ── Name validation ──────────────────────────────────────────────────────

/** Names an own field would shadow on the instance prototype. */
function isReservedFieldName(name: string): boolean {
  return name === '__proto__' || protocolNames().includes(name);
}

function isReservedWord(name: string): boolean {
  const token = ts.stringToToken(name);
  return (
    token !== undefined &&
    token >= ts.SyntaxKind.FirstReservedWord &&
    token <= ts.SyntaxKind.LastReservedWord
  );
}

/** True when `name` can appear bare as a binding or named argument. */
export function isValidIdentifier(name: string): boolean {
  return ts.isIdentifierText(name, ts.ScriptTarget.Latest) && !isReservedWord(name);
}

function validateName(recordName: string, name: string): void {
  if (!isValidIdentifier(name)) {
    throw new SpecificationError(`${recordName}: '${name}' is not a valid parameter name`);
  }
  if (isReservedFieldName(name)) {
    throw new SpecificationError(`${recordName}: '${name}' is reserved and cannot be a parameter name`);
  }
}

// ── Kind helpers ─────────────────────────────────────────────────────────

function isPositional(kind: ParameterKind): boolean {
  return kind === 'positional-only' || kind === 'positional-or-named';
}

export function isCollector(kind: ParameterKind): boolean {
  return kind === 'rest-positional' || kind === 'rest-named';
}

function withKind(descriptor: ParameterDescriptor, kind: ParameterKind): ParameterDescriptor {
  return Object.freeze({ ...descriptor, kind });
}

// ── Extraction ───────────────────────────────────────────────────────────

/**
 * Validate and normalize `parameters` for a record called `name`.
 * Throws SpecificationError on the first violated rule.
 */
export function extractSignature(
  name: string,
  parameters: readonly ParameterDescriptor[],
  doc?: string,
): ExtractedSignature {
  if (!isValidIdentifier(name)) {
    throw new SpecificationError(`'${name}' is not a valid record name`);
  }

  const seen = new Set<string>();
  const result: ParameterDescriptor[] = [];
  let previousRank = -1;
  let afterRestPositional = false;
  let positionalDefaultSeen = false;

  for (const declared of parameters) {
    validateName(name, declared.name);
    if (seen.has(declared.name)) {
      throw new SpecificationError(`${name}: duplicate parameter '${declared.name}'`);
    }
    seen.add(declared.name);

    let descriptor = declared;
    if (afterRestPositional && descriptor.kind === 'positional-or-named') {
      descriptor = withKind(descriptor, 'named-only');
    }

    const rank = KIND_ORDER[descriptor.kind];
    if (rank < previousRank || (rank === previousRank && isCollector(descriptor.kind))) {
      throw new SpecificationError(
        `${name}: ${descriptor.kind} parameter '${descriptor.name}' cannot follow ${result[result.length - 1].kind} parameter '${result[result.length - 1].name}'`,
      );
    }
    previousRank = rank;

    if (isCollector(descriptor.kind) && descriptor.hasDefault) {
      throw new SpecificationError(`${name}: collector '${descriptor.name}' cannot have a default`);
    }

    if (isPositional(descriptor.kind)) {
      if (descriptor.hasDefault) {
        positionalDefaultSeen = true;
      } else if (positionalDefaultSeen) {
        throw new SpecificationError(
          `${name}: parameter '${descriptor.name}' without a default follows a parameter with a default`,
        );
      }
    }

    if (descriptor.kind === 'rest-positional') afterRestPositional = true;
    result.push(Object.isFrozen(descriptor) ? descriptor : Object.freeze({ ...descriptor }));
  }

  return Object.freeze({ name, parameters: Object.freeze(result), doc });
}
