/**
 * Named arguments for a record call site.
 *
 *   InventoryItem('Widget', 9.99, kw({ quantity: 5 }));
 *
 * The bag must be the last argument; anywhere else it is an ordinary
 * positional value.
 */

export class NamedArguments {
  readonly entries: ReadonlyArray<readonly [string, unknown]>;

  constructor(entries: Iterable<readonly [string, unknown]>) {
    this.entries = Object.freeze([...entries].map((entry) => Object.freeze([entry[0], entry[1]] as const)));
    Object.freeze(this);
  }
}

export function kw(values: Readonly<Record<string, unknown>>): NamedArguments {
  return new NamedArguments(Object.entries(values));
}

export function isNamedArguments(value: unknown): value is NamedArguments {
  return value instanceof NamedArguments;
}
