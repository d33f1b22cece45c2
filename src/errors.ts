/**
 * Error taxonomy. Every error is a TypeError carrying a RecordErrorCode,
 * so callers can branch on `code` without instanceof chains.
 */

import { RecordErrorCode } from './types.js';

export class RecordError extends TypeError {
  readonly code: RecordErrorCode;

  constructor(code: RecordErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed parameter declaration, raised before any type exists. */
export class SpecificationError extends RecordError {
  constructor(message: string) {
    super(RecordErrorCode.Specification, message);
  }
}

export class MissingArgumentError extends RecordError {
  readonly missing: readonly string[];

  constructor(message: string, missing: readonly string[]) {
    super(RecordErrorCode.MissingArgument, message);
    this.missing = missing;
  }
}

export class TooManyArgumentsError extends RecordError {
  constructor(message: string) {
    super(RecordErrorCode.TooManyArguments, message);
  }
}

export class UnexpectedArgumentError extends RecordError {
  readonly argument: string;

  constructor(message: string, argument: string) {
    super(RecordErrorCode.UnexpectedArgument, message);
    this.argument = argument;
  }
}

export class ImmutabilityError extends RecordError {
  readonly typeName: string;
  readonly attribute: string;

  constructor(typeName: string, attribute: string, operation: 'assignment' | 'deletion') {
    super(
      RecordErrorCode.Immutability,
      `${typeName} object does not support ${operation} of attribute '${attribute}'`,
    );
    this.typeName = typeName;
    this.attribute = attribute;
  }
}

export class HashError extends RecordError {
  constructor(typeName: string) {
    super(RecordErrorCode.Hash, `unhashable type: '${typeName}'`);
  }
}

export class ReconstructError extends RecordError {
  constructor(message: string) {
    super(RecordErrorCode.Reconstruct, message);
  }
}

// ── Message helpers ──

/** Join quoted names the way argument errors list them: 'a', 'b', and 'c'. */
export function quoteList(names: readonly string[]): string {
  const quoted = names.map((n) => `'${n}'`);
  if (quoted.length <= 1) return quoted.join('');
  if (quoted.length === 2) return `${quoted[0]} and ${quoted[1]}`;
  return `${quoted.slice(0, -1).join(', ')}, and ${quoted[quoted.length - 1]}`;
}
