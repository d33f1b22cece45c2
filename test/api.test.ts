import { describe, it, expect } from 'vitest';
import { param, kw, isNamedArguments, NamedArguments } from '../src/api/index.js';

describe('param builder', () => {
  it('param.positional() describes a positional-or-named parameter', () => {
    const p = param.positional('price');
    expect(p).toEqual({ name: 'price', kind: 'positional-or-named', hasDefault: false });
    expect('default' in p).toBe(false);
    expect('annotation' in p).toBe(false);
  });

  it('param.positionalOnly() records the annotation', () => {
    const p = param.positionalOnly('x', { annotation: 'number' });
    expect(p.kind).toBe('positional-only');
    expect(p.annotation).toBe('number');
    expect(p.hasDefault).toBe(false);
  });

  it('param.named() with a default', () => {
    const p = param.named('quantity', { default: 0 });
    expect(p).toEqual({ name: 'quantity', kind: 'named-only', hasDefault: true, default: 0 });
  });

  it('an explicit undefined default is still a default', () => {
    const p = param.named('note', { default: undefined });
    expect(p.hasDefault).toBe(true);
    expect('default' in p).toBe(true);
    expect(p.default).toBeUndefined();
  });

  it('param.rest() and param.restNamed() describe collectors', () => {
    expect(param.rest('args').kind).toBe('rest-positional');
    expect(param.restNamed('extra').kind).toBe('rest-named');
    expect(param.rest('args').hasDefault).toBe(false);
  });

  it('descriptors are frozen', () => {
    expect(Object.isFrozen(param.positional('x', { default: 1 }))).toBe(true);
  });
});

describe('kw()', () => {
  it('captures named values in insertion order', () => {
    const bag = kw({ quantity: 5, colour: 'red' });
    expect(bag.entries).toEqual([
      ['quantity', 5],
      ['colour', 'red'],
    ]);
  });

  it('is recognized by isNamedArguments()', () => {
    expect(isNamedArguments(kw({}))).toBe(true);
    expect(isNamedArguments(new NamedArguments([['a', 1]]))).toBe(true);
    expect(isNamedArguments({ quantity: 5 })).toBe(false);
  });

  it('is frozen', () => {
    const bag = kw({ a: 1 });
    expect(Object.isFrozen(bag)).toBe(true);
    expect(Object.isFrozen(bag.entries)).toBe(true);
  });
});
