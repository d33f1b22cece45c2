/**
 * Options accepted by record() and recordFromSource().
 *
 *   const Point = record('Point', [param.positional('x'), param.positional('y')], {
 *     doc: 'A point in the plane.',
 *     module: 'geometry',
 *   });
 */

// ── Option types ──

export interface RecordOptions {
  /** Docstring exported on the type. */
  readonly doc?: string;
  /** Name of the declaring module, for introspection only. */
  readonly module?: string;
  /** Dotted path of the declaration. Defaults to the record name. */
  readonly qualifiedName?: string;
}

/** A name-to-value environment for evaluating expressions. */
export type Scope = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

export interface SourceOptions extends RecordOptions {
  /** Names visible to default-value expressions in the declaration. */
  readonly scope?: Scope;
  /** File name reported by the parser. */
  readonly fileName?: string;
}

// ── Resolution ──

export interface ResolvedRecordOptions {
  readonly doc: string | undefined;
  readonly module: string | undefined;
  readonly qualifiedName: string;
}

export function resolveRecordOptions(
  name: string,
  options: RecordOptions = {},
): ResolvedRecordOptions {
  return {
    doc: options.doc,
    module: options.module,
    qualifiedName: options.qualifiedName ?? name,
  };
}

export const DEFAULT_SOURCE_FILE_NAME = 'declaration.ts';

/** Look a name up in either scope form. */
export function lookupScope(scope: Scope | undefined, name: string): { found: boolean; value: unknown } {
  if (scope === undefined) return { found: false, value: undefined };
  if (isMapScope(scope)) {
    return { found: scope.has(name), value: scope.get(name) };
  }
  return Object.prototype.hasOwnProperty.call(scope, name)
    ? { found: true, value: scope[name] }
    : { found: false, value: undefined };
}

function isMapScope(scope: Scope): scope is ReadonlyMap<string, unknown> {
  return scope instanceof Map;
}
