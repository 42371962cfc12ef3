/**
 * Runtime Tests: Bindings
 * Ordered top-level variable store
 */

import { describe, expect, it } from 'vitest';

import { Bindings, Scope, variable } from '../../src/index.js';

describe('Runtime: Bindings', () => {
  it('replaces an existing name in place', () => {
    const bindings = new Bindings([
      variable('a', 1),
      variable('b', 2),
      variable('c', 3),
    ]);

    bindings.set('b', { type: 'Str', value: 'two' });

    expect(bindings.names()).toEqual(['a', 'b', 'c']);
    expect(bindings.get('b')).toEqual({ type: 'Str', value: 'two' });
  });

  it('appends a new name', () => {
    const bindings = new Bindings([variable('a', 1)]);

    bindings.set('d', { type: 'None' });

    expect(bindings.names()).toEqual(['a', 'd']);
    expect(bindings.size).toBe(2);
  });

  it('collapses duplicate names given at construction', () => {
    const bindings = new Bindings([
      variable('x', 1),
      variable('y', 2),
      variable('x', 3),
    ]);

    expect(bindings.names()).toEqual(['x', 'y']);
    expect(bindings.get('x')).toEqual({ type: 'Int', number: 3 });
  });

  it('builds from a record of host values', () => {
    const bindings = Bindings.fromRecord({ user: 'ada', admin: true });

    expect(bindings.toVariables()).toEqual([
      variable('user', 'ada'),
      variable('admin', true),
    ]);
  });

  it('reports missing names', () => {
    const bindings = new Bindings();

    expect(bindings.has('nope')).toBe(false);
    expect(bindings.get('nope')).toBeUndefined();
  });

  it('hands out copies of the variable list', () => {
    const bindings = new Bindings([variable('a', 1)]);
    const copy = bindings.toVariables();
    copy.push(variable('b', 2));

    expect(bindings.size).toBe(1);
  });

  it('decodes into an independent host mapping', () => {
    const bindings = new Bindings([variable('a', 1), variable('b', 'x')]);
    const mapping = bindings.toHostMapping();
    mapping.set('a', 99);

    expect(mapping).toBeInstanceOf(Scope);
    expect(bindings.get('a')).toEqual({ type: 'Int', number: 1 });
    expect(bindings.toString()).toBe('{\n    a = 1;\n    b = "x";\n}');
  });
});
