import { describe, it, expect } from 'vitest';
import { parseDeclaration } from '../src/source.js';
import { recordFromSource } from '../src/record.js';
import { repr } from '../src/repr.js';
import { SpecificationError } from '../src/errors.js';
import { kw } from '../src/api/index.js';

const inventoryItemSource = `
/** An item held in stock. */
function InventoryItem(name: string, price: number, { quantity = 0 }: { quantity?: number }) {}
`;

describe('parseDeclaration', () => {
  it('maps parameters onto kinds', () => {
    const declaration = parseDeclaration(inventoryItemSource);
    expect(declaration.name).toBe('InventoryItem');
    expect(declaration.doc).toBe('An item held in stock.');
    expect(declaration.parameters).toEqual([
      { name: 'name', kind: 'positional-or-named', hasDefault: false, annotation: 'string' },
      { name: 'price', kind: 'positional-or-named', hasDefault: false, annotation: 'number' },
      { name: 'quantity', kind: 'named-only', hasDefault: true, default: 0, annotation: 'number' },
    ]);
  });

  it('reads rest parameters and an index signature', () => {
    const declaration = parseDeclaration(
      'function Tagged(label: string, ...tags: string[], { ...extra }: { [key: string]: number }) {}',
    );
    expect(declaration.parameters).toEqual([
      { name: 'label', kind: 'positional-or-named', hasDefault: false, annotation: 'string' },
      { name: 'tags', kind: 'rest-positional', hasDefault: false, annotation: 'string' },
      { name: 'extra', kind: 'rest-named', hasDefault: false, annotation: 'number' },
    ]);
  });

  it('reads Array<T> and readonly T[] rest annotations', () => {
    expect(parseDeclaration('function A(...xs: Array<number>) {}').parameters[0].annotation).toBe('number');
    expect(parseDeclaration('function B(...xs: readonly boolean[]) {}').parameters[0].annotation).toBe('boolean');
  });

  it('treats optional parameters as defaulting to undefined', () => {
    const [label] = parseDeclaration('function P(label?: string) {}').parameters;
    expect(label.hasDefault).toBe(true);
    expect('default' in label).toBe(true);
    expect(label.default).toBeUndefined();
  });

  it('evaluates literal defaults', () => {
    const parameters = parseDeclaration("function P(x = -1, tags = ['a'], when = new Date(0), n = 2n) {}").parameters;
    expect(parameters.map((p) => p.default)).toEqual([-1, ['a'], new Date(0), 2n]);
    expect(parameters.every((p) => p.annotation === undefined)).toBe(true);
  });

  it('resolves default names from the scope', () => {
    const origin = { x: 0 };
    const [p] = parseDeclaration('function P(at = ORIGIN) {}', { scope: { ORIGIN: origin } }).parameters;
    expect(p.default).toBe(origin);
  });

  it('accepts a void return type and no docstring', () => {
    const declaration = parseDeclaration('function P(x: number): void {}');
    expect(declaration.doc).toBeUndefined();
  });

  describe('errors', () => {
    it('requires exactly one named function declaration', () => {
      expect(() => parseDeclaration('function A() {}\nfunction B() {}')).toThrow(
        'expected exactly one function declaration, found 2',
      );
      expect(() => parseDeclaration('const x = 1;')).toThrow('expected exactly one function declaration, found 0');
      expect(() => parseDeclaration('export default function () {}')).toThrow(
        'the function declaration must be named',
      );
    });

    it('rejects a return type other than void', () => {
      expect(() => parseDeclaration('function Point(x: number): number { return x; }')).toThrow(
        "Point: return type annotation can only be 'void' or unset",
      );
    });

    it('rejects defaults that are not literals', () => {
      const error = (() => {
        try {
          parseDeclaration('function P(x = Date.now()) {}');
        } catch (e) {
          return e;
        }
        return undefined;
      })();
      expect(error).toBeInstanceOf(SpecificationError);
      expect(error).toHaveProperty('message', "P: default for 'x' is not a literal: unsupported callee 'Date.now'");
      expect(() => parseDeclaration('function P(x = y) {}')).toThrow(
        "P: default for 'x' is not a literal: name 'y' is not defined",
      );
    });

    it('rejects binding patterns it cannot map', () => {
      expect(() => parseDeclaration('function P({ a: b }: { a: number }) {}')).toThrow(
        "P: renamed binding 'a: b' is not supported",
      );
      expect(() => parseDeclaration('function P([a]: number[]) {}')).toThrow(
        'P: array binding patterns are not supported',
      );
      expect(() => parseDeclaration('function P({ a } = { a: 1 }) {}')).toThrow(
        "P: named parameters may only default to '{}' as a whole",
      );
      expect(() => parseDeclaration('function P(this: Window) {}')).toThrow(
        "P: a 'this' parameter is not supported",
      );
    });
  });
});

describe('recordFromSource', () => {
  it('builds a working record type', () => {
    const InventoryItem = recordFromSource(inventoryItemSource);
    const item = InventoryItem('Widget', 9.99);
    expect(repr(item)).toBe("InventoryItem('Widget', 9.99, quantity=0)");
    expect(repr(InventoryItem('Widget', 9.99, kw({ quantity: 5 })))).toBe("InventoryItem('Widget', 9.99, quantity=5)");
    expect(InventoryItem.doc).toBe('An item held in stock.');
    expect([...InventoryItem.annotations]).toEqual([
      ['name', 'string'],
      ['price', 'number'],
      ['quantity', 'number'],
    ]);
  });

  it('widens collector annotations', () => {
    const Tagged = recordFromSource(
      'function Tagged(label: string, ...tags: string[], { ...extra }: { [key: string]: number }) {}',
    );
    expect(Tagged.annotations.get('tags')).toBe('readonly string[]');
    expect(Tagged.annotations.get('extra')).toBe('Record<string, number>');
    expect(repr(Tagged('a', 'b', kw({ n: 1 })))).toBe("Tagged('a', 'b', n=1)");
  });

  it('prefers an explicit doc option', () => {
    expect(recordFromSource(inventoryItemSource, { doc: 'Stock.' }).doc).toBe('Stock.');
  });

  it('validates the extracted parameters', () => {
    expect(() => recordFromSource('function D(a: number, { a }: { a: number }) {}')).toThrow(
      "D: duplicate parameter 'a'",
    );
  });
});
