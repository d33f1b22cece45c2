import { describe, it, expect } from 'vitest';
import { bindArguments } from '../src/binder.js';
import {
  MissingArgumentError,
  TooManyArgumentsError,
  UnexpectedArgumentError,
} from '../src/errors.js';
import { RecordErrorCode } from '../src/types.js';
import { param, kw, isNamedArguments } from '../src/api/index.js';

const inventoryItem = [
  param.positional('name'),
  param.positional('price'),
  param.named('quantity', { default: 0 }),
];

const allKinds = [
  param.positionalOnly('pos'),
  param.positional('pos_kw'),
  param.rest('args'),
  param.named('kw'),
  param.restNamed('options'),
];

/** Helper: run `fn` and return what it threw. */
function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('bindArguments', () => {
  describe('positional values', () => {
    it('binds in declaration order and fills defaults', () => {
      expect(bindArguments('InventoryItem', inventoryItem, ['Widget', 9.99])).toEqual(['Widget', 9.99, 0]);
    });

    it('sends excess values to the sequence collector', () => {
      const values = bindArguments('AllParameterTypes', allKinds, [1, 2, 3, 4, kw({ kw: '5' })]);
      expect(values).toEqual([1, 2, [3, 4], '5', {}]);
      expect(Object.isFrozen(values[2])).toBe(true);
    });

    it('rejects excess values without a collector', () => {
      const error = thrown(() => bindArguments('InventoryItem', inventoryItem, ['Widget', 9.99, 5]));
      expect(error).toBeInstanceOf(TooManyArgumentsError);
      expect(error).toHaveProperty('message', 'InventoryItem() takes 2 positional arguments but 3 were given');
      expect(error).toHaveProperty('code', RecordErrorCode.TooManyArguments);
    });

    it('reports a range when some positional parameters have defaults', () => {
      const defaults = [
        param.positionalOnly('a', { default: 1 }),
        param.positional('b', { default: 2 }),
        param.named('c', { default: 3 }),
      ];
      expect(bindArguments('Defaults', defaults, [])).toEqual([1, 2, 3]);
      expect(() => bindArguments('Defaults', defaults, [10, 20, 30])).toThrow(
        'Defaults() takes from 0 to 2 positional arguments but 3 were given',
      );
    });

    it('uses the singular for one value', () => {
      expect(() => bindArguments('Empty', [], [1])).toThrow('Empty() takes 0 positional arguments but 1 was given');
    });

    it('treats a kw() bag that is not last as a positional value', () => {
      const pair = [param.positional('a'), param.positional('b')];
      const values = bindArguments('Pair', pair, [kw({ a: 1 }), 2]);
      expect(isNamedArguments(values[0])).toBe(true);
      expect(values[1]).toBe(2);
    });
  });

  describe('named values', () => {
    it('binds positional-or-named parameters by name', () => {
      expect(
        bindArguments('InventoryItem', inventoryItem, [kw({ price: 1, name: 'Widget', quantity: 4 })]),
      ).toEqual(['Widget', 1, 4]);
    });

    it('sends unknown names to the mapping collector in call order', () => {
      const values = bindArguments('AllParameterTypes', allKinds, [1, 2, kw({ kw: '5', b: 2, a: 1 })]);
      expect(values[3]).toBe('5');
      expect(JSON.stringify(values[4])).toBe('{"b":2,"a":1}');
      expect(Object.isFrozen(values[4])).toBe(true);
    });

    it('rejects an unknown name without a collector', () => {
      const error = thrown(() =>
        bindArguments('InventoryItem', inventoryItem, ['Widget', 9.99, kw({ colour: 'red' })]),
      );
      expect(error).toBeInstanceOf(UnexpectedArgumentError);
      expect(error).toHaveProperty('message', "InventoryItem() got an unexpected named argument 'colour'");
      expect(error).toHaveProperty('argument', 'colour');
    });

    it('rejects a second value for the same parameter', () => {
      expect(() =>
        bindArguments('InventoryItem', inventoryItem, ['Widget', kw({ name: 'Gadget', price: 1 })]),
      ).toThrow("InventoryItem() got multiple values for argument 'name'");
    });

    it('rejects positional-only parameters passed by name', () => {
      expect(() => bindArguments('P', [param.positionalOnly('x')], [kw({ x: 1 })])).toThrow(
        "P() got some positional-only arguments passed as named arguments: 'x'",
      );
    });

    it('collects a positional-only name when a mapping collector exists', () => {
      const params = [param.positionalOnly('x'), param.restNamed('extra')];
      expect(bindArguments('P', params, [1, kw({ x: 2 })])).toEqual([1, { x: 2 }]);
    });
  });

  describe('missing values', () => {
    it('reports one missing positional parameter', () => {
      const error = thrown(() => bindArguments('InventoryItem', inventoryItem, ['Widget']));
      expect(error).toBeInstanceOf(MissingArgumentError);
      expect(error).toHaveProperty('message', "InventoryItem() missing 1 required positional argument: 'price'");
      expect(error).toHaveProperty('missing', ['price']);
    });

    it('reports every missing positional parameter', () => {
      expect(() => bindArguments('InventoryItem', inventoryItem, [])).toThrow(
        "InventoryItem() missing 2 required positional arguments: 'name' and 'price'",
      );
      expect(() =>
        bindArguments('Triple', [param.positional('a'), param.positional('b'), param.positional('c')], []),
      ).toThrow("Triple() missing 3 required positional arguments: 'a', 'b', and 'c'");
    });

    it('reports missing named-only parameters', () => {
      expect(() => bindArguments('N', [param.named('a'), param.named('b', { default: 0 })], [])).toThrow(
        "N() missing 1 required named-only argument: 'a'",
      );
    });

    it('leaves collectors empty when nothing overflows', () => {
      expect(bindArguments('AllParameterTypes', allKinds, [1, 2, kw({ kw: 3 })])).toEqual([1, 2, [], 3, {}]);
    });
  });

  it('returns a frozen value list', () => {
    expect(Object.isFrozen(bindArguments('InventoryItem', inventoryItem, ['Widget', 1]))).toBe(true);
  });
});
