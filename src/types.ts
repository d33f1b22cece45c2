/**
 * Internal type definitions for the record synthesizer.
 *
 * These types flow through the extractor, layout planner and synthesizer.
 * The user-facing helpers live in ./api/.
 */

// ── Parameter kinds ──

/**
 * The calling convention of one declared parameter, in the order the kinds
 * may appear in a declaration.
 */
export type ParameterKind =
  | 'positional-only'
  | 'positional-or-named'
  | 'rest-positional'
  | 'named-only'
  | 'rest-named';

/** Declaration order rank of each kind. */
export const KIND_ORDER: Readonly<Record<ParameterKind, number>> = {
  'positional-only': 0,
  'positional-or-named': 1,
  'rest-positional': 2,
  'named-only': 3,
  'rest-named': 4,
};

// ── ParameterDescriptor ──

/**
 * One declared parameter. `default` is meaningful only when `hasDefault`
 * is set (an explicit `undefined` default is a default). `annotation` is
 * an opaque payload that is never checked against values.
 */
export interface ParameterDescriptor<
  N extends string = string,
  K extends ParameterKind = ParameterKind,
  T = unknown,
> {
  readonly name: N;
  readonly kind: K;
  readonly hasDefault: boolean;
  readonly default?: T;
  readonly annotation?: unknown;
}

/** Extractor output: validated descriptors plus the docstring. */
export interface ExtractedSignature {
  readonly name: string;
  readonly parameters: readonly ParameterDescriptor[];
  readonly doc: string | undefined;
}

// ── AttributeLayout ──

/** How a layout entry stores its value. */
export type StorageKind = 'scalar' | 'sequence' | 'mapping';

export interface LayoutEntry {
  readonly name: string;
  readonly kind: ParameterKind;
  readonly storage: StorageKind;
}

/** Ordered, duplicate-free attribute layout. Order is declaration order. */
export type AttributeLayout = readonly LayoutEntry[];

// ── Metadata ──

/** Annotation exported for a rest-positional collector with a non-text annotation. */
export interface SequenceAnnotation {
  readonly container: 'sequence';
  readonly of: unknown;
}

/** Annotation exported for a rest-named collector with a non-text annotation. */
export interface MappingAnnotation {
  readonly container: 'mapping';
  readonly of: unknown;
}

export interface ExportedMetadata {
  readonly doc: string | undefined;
  readonly annotations: ReadonlyMap<string, unknown>;
}

// ── Synthesized type ──

/** Behavior every record instance carries on its prototype. */
export interface RecordProtocol {
  /** Yields the `matchArgs` values in order, for positional destructuring. */
  [Symbol.iterator](): Iterator<unknown>;
  /** The reconstructive textual representation. */
  toString(): string;
}

export type RecordInstance<F extends object = Record<string, unknown>> =
  Readonly<F> & RecordProtocol;

/** Static metadata attached to a synthesized type. */
export interface RecordMetadata<F extends object = Record<string, unknown>> {
  readonly qualifiedName: string;
  readonly module: string | undefined;
  readonly doc: string | undefined;
  /** Attribute layout names, in declaration order. */
  readonly fields: ReadonlyArray<keyof F & string>;
  /** Leading positional parameter names, for destructuring. */
  readonly matchArgs: readonly string[];
  readonly annotations: ReadonlyMap<string, unknown>;
  /** The constructor signature, defaults included. */
  readonly parameters: readonly ParameterDescriptor[];
  readonly prototype: RecordInstance<F>;
}

/**
 * A synthesized record type: called like the declared signature, with
 * named values passed through a trailing `kw({...})` bag.
 */
export type RecordType<F extends object = Record<string, unknown>> =
  ((...args: unknown[]) => RecordInstance<F>) & RecordMetadata<F>;

/** Everything the synthesizer captures about one type. */
export interface RecordTypeInfo {
  readonly name: string;
  readonly layout: AttributeLayout;
  readonly parameters: readonly ParameterDescriptor[];
  readonly matchArgs: readonly string[];
}

// ── Errors ──

/** Record error codes start at 71001. */
export enum RecordErrorCode {
  Specification = 71001,
  MissingArgument = 71002,
  TooManyArguments = 71003,
  UnexpectedArgument = 71004,
  Immutability = 71005,
  Hash = 71006,
  Reconstruct = 71007,
}
