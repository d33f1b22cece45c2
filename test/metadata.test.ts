import { describe, it, expect } from 'vitest';
import { exportMetadata } from '../src/metadata.js';
import { extractSignature } from '../src/extractor.js';
import { record } from '../src/record.js';
import { param } from '../src/api/index.js';

describe('exportMetadata', () => {
  it('exports annotated parameters in declaration order', () => {
    const metadata = exportMetadata(
      extractSignature(
        'AllParameterTypes',
        [
          param.positionalOnly('pos', { annotation: 'number' }),
          param.positional('pos_kw', { annotation: 'number' }),
          param.rest('args', { annotation: 'number' }),
          param.named('kw', { annotation: 'string' }),
          param.restNamed('options', { annotation: 'number' }),
        ],
        'One parameter of every kind.',
      ),
    );
    expect(metadata.doc).toBe('One parameter of every kind.');
    expect([...metadata.annotations]).toEqual([
      ['pos', 'number'],
      ['pos_kw', 'number'],
      ['args', 'readonly number[]'],
      ['kw', 'string'],
      ['options', 'Record<string, number>'],
    ]);
  });

  it('skips parameters without an annotation', () => {
    const metadata = exportMetadata(
      extractSignature('P', [param.positional('a'), param.positional('b', { annotation: 'string' })]),
    );
    expect([...metadata.annotations.keys()]).toEqual(['b']);
    expect(metadata.annotations.has('a')).toBe(false);
  });

  it('keeps a mapping type annotation on a rest-named collector', () => {
    const metadata = exportMetadata(extractSignature('P', [param.restNamed('opts', { annotation: '{ a: number }' })]));
    expect(metadata.annotations.get('opts')).toBe('{ a: number }');
  });

  it('wraps non-text collector annotations', () => {
    const metadata = exportMetadata(
      extractSignature('P', [param.rest('xs', { annotation: Number }), param.restNamed('kw', { annotation: String })]),
    );
    expect(metadata.annotations.get('xs')).toEqual({ container: 'sequence', of: Number });
    expect(metadata.annotations.get('kw')).toEqual({ container: 'mapping', of: String });
  });

  it('passes other annotations through untouched', () => {
    const annotation = { type: 'decimal', places: 2 };
    const metadata = exportMetadata(extractSignature('P', [param.positional('price', { annotation })]));
    expect(metadata.annotations.get('price')).toBe(annotation);
  });

  it('exposes only the read side of the annotation map', () => {
    const Typed = record('Typed', [param.positional('x', { annotation: 'number' })]);
    expect(Typed.annotations.size).toBe(1);
    expect('set' in Typed.annotations).toBe(false);
    expect('delete' in Typed.annotations).toBe(false);
    const seen: string[] = [];
    Typed.annotations.forEach((value, key) => seen.push(`${key}: ${String(value)}`));
    expect(seen).toEqual(['x: number']);
  });
});
