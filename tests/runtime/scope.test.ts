/**
 * Runtime Tests: Scope
 * Ordered host mapping and value formatting
 */

import { describe, expect, it } from 'vitest';

import {
  formatValue,
  renderScope,
  Scope,
  ScriptException,
} from '../../src/index.js';

class Widget {}

describe('Runtime: Scope', () => {
  describe('ordering', () => {
    it('keeps insertion order when a value is replaced', () => {
      const scope = new Scope([
        ['a', 1],
        ['b', 2],
      ]);
      scope.set('a', 3);
      scope.set('c', 4);

      expect([...scope.entries()]).toEqual([
        ['a', 3],
        ['b', 2],
        ['c', 4],
      ]);
    });
  });

  describe('toString', () => {
    it('renders an empty scope as braces', () => {
      expect(new Scope().toString()).toBe('{}');
    });

    it('renders one entry per line', () => {
      const scope = new Scope([
        ['a', 1],
        ['b', 'x'],
      ]);

      expect(scope.toString()).toBe('{\n    a = 1;\n    b = "x";\n}');
    });

    it('indents nested scopes one level deeper', () => {
      const scope = new Scope([
        ['outer', new Scope([['inner', true]])],
        ['after', null],
      ]);

      expect(scope.toString()).toBe(
        [
          '{',
          '    outer = {',
          '        inner = true;',
          '    };',
          '    after = none;',
          '}',
        ].join('\n')
      );
    });

    it('renders sibling scopes identically', () => {
      const first = new Scope([['x', new Scope([['y', 1]])]]);
      const second = new Scope([['x', new Scope([['y', 1]])]]);

      const renderedFirst = first.toString();
      expect(second.toString()).toBe(renderedFirst);
      expect(first.toString()).toBe(renderedFirst);
    });

    it('renders an empty nested scope inline', () => {
      const scope = new Scope([['empty', new Scope()]]);

      expect(scope.toString()).toBe('{\n    empty = {};\n}');
    });
  });

  describe('renderScope', () => {
    it('accepts an explicit depth', () => {
      const scope = new Scope([['k', 1]]);

      expect(renderScope(scope, 2)).toBe('{\n        k = 1;\n    }');
    });
  });

  describe('formatValue', () => {
    it('formats scalars', () => {
      expect(formatValue('say "hi"')).toBe('"say \\"hi\\""');
      expect(formatValue(42)).toBe('42');
      expect(formatValue(1.5)).toBe('1.5');
      expect(formatValue(false)).toBe('false');
      expect(formatValue(null)).toBe('none');
    });

    it('formats bytes as hex', () => {
      expect(formatValue(new Uint8Array([0x0a, 0xff]))).toBe('b"0aff"');
    });

    it('formats lists inline', () => {
      expect(formatValue([1, 'a', null, [true]])).toBe('[1, "a", none, [true]]');
    });

    it('formats named arguments like a scope', () => {
      expect(formatValue({ a: 1, b: 'x' })).toBe('{\n    a = 1;\n    b = "x";\n}');
    });

    it('formats exceptions by message', () => {
      expect(formatValue(new ScriptException('Error: bad'))).toBe('Error: bad');
    });

    it('formats opaque references by kind', () => {
      function connect(): void {}

      expect(formatValue(connect)).toBe('<function connect>');
      expect(formatValue(new Widget())).toBe('<object Widget>');
      expect(formatValue(Symbol('token'))).toBe('Symbol(token)');
    });
  });
});
