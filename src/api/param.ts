/**
 * The param builder object: runtime functions for declaring parameters.
 *
 *   import { param } from 'signature-records';
 *   const InventoryItem = record('InventoryItem', [
 *     param.positional('name'),
 *     param.positional('price'),
 *     param.named('quantity', { default: 0 }),
 *   ]);
 */

import type { ParameterDescriptor, ParameterKind } from '../types.js';
import type { CollectorOptions, ParameterOptions } from './types.js';

function describe<N extends string, K extends ParameterKind, T>(
  name: N,
  kind: K,
  options: ParameterOptions<T> | undefined,
): ParameterDescriptor<N, K, T> {
  const hasDefault = options !== undefined && 'default' in options;
  return Object.freeze({
    name,
    kind,
    hasDefault,
    ...(hasDefault ? { default: options.default } : {}),
    ...(options !== undefined && 'annotation' in options ? { annotation: options.annotation } : {}),
  });
}

export const param = {
  /** Fixed-position parameter; never accepted by name. */
  positionalOnly<N extends string, T = unknown>(
    name: N,
    options?: ParameterOptions<T>,
  ): ParameterDescriptor<N, 'positional-only', T> {
    return describe(name, 'positional-only', options);
  },
  /** Accepted either positionally or by name. */
  positional<N extends string, T = unknown>(
    name: N,
    options?: ParameterOptions<T>,
  ): ParameterDescriptor<N, 'positional-or-named', T> {
    return describe(name, 'positional-or-named', options);
  },
  /** Accepted by name only. */
  named<N extends string, T = unknown>(
    name: N,
    options?: ParameterOptions<T>,
  ): ParameterDescriptor<N, 'named-only', T> {
    return describe(name, 'named-only', options);
  },
  /** Collects excess positional values into a frozen array. */
  rest<N extends string>(
    name: N,
    options?: CollectorOptions,
  ): ParameterDescriptor<N, 'rest-positional', unknown> {
    return describe(name, 'rest-positional', options);
  },
  /** Collects unknown named values into a frozen mapping. */
  restNamed<N extends string>(
    name: N,
    options?: CollectorOptions,
  ): ParameterDescriptor<N, 'rest-named', unknown> {
    return describe(name, 'rest-named', options);
  },
};
