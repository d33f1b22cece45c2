/**
 * User-facing type helpers.
 *
 *   import { record, param, type InstanceOf } from 'signature-records';
 *   const Point = record('Point', [param.positional('x', { default: 0 })]);
 *   type Point = InstanceOf<typeof Point>;   // Readonly<{ x: number }> & RecordProtocol
 */

import type {
  ParameterDescriptor,
  ParameterKind,
  RecordInstance,
  RecordType,
} from '../types.js';

// ── Field typing ──

/**
 * The stored value type of one descriptor. Collectors hold a frozen array
 * or mapping; every other kind holds its default's type (or unknown).
 */
export type FieldValue<D> =
  D extends ParameterDescriptor<string, 'rest-positional', infer T>
    ? readonly T[]
    : D extends ParameterDescriptor<string, 'rest-named', infer T>
      ? Readonly<Record<string, T>>
      : D extends ParameterDescriptor<string, ParameterKind, infer T>
        ? T
        : never;

/** Map a descriptor list to the field record its instances carry. */
export type FieldsOf<P extends readonly ParameterDescriptor[]> = {
  [D in P[number] as D['name']]: FieldValue<D>;
};

/** The instance type produced by a synthesized record type. */
export type InstanceOf<R> = R extends RecordType<infer F> ? RecordInstance<F> : never;

// ── Builder options ──

export interface ParameterOptions<T> {
  /** Presence of the key marks a default, even when the value is undefined. */
  readonly default?: T;
  readonly annotation?: unknown;
}

export interface CollectorOptions {
  readonly annotation?: unknown;
}
