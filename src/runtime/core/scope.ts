/**
 * Scope
 *
 * Ordered host-side mapping used for decoded Scope values and for the
 * snapshot of a script's top-level variables.
 */

import { ScriptException } from '../../types.js';
import type { HostValue, NamedArguments } from './values.js';

const INDENT = '    ';

/**
 * Ordered name -> value mapping.
 * Replacing an existing name keeps its position; new names append.
 */
export class Scope extends Map<string, HostValue> {
  toString(): string {
    return renderScope(this, 1);
  }
}

function formatBytes(bytes: Uint8Array): string {
  const hex = Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0'));
  return `b"${hex.join('')}"`;
}

/** Named arguments arrive as plain objects */
function isNamedArguments(value: object): value is NamedArguments {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function formatOpaque(value: object | symbol): string {
  if (typeof value === 'symbol') return value.toString();
  if (typeof value === 'function') {
    return `<function ${value.name || 'anonymous'}>`;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  const name =
    typeof proto === 'object' &&
    proto !== null &&
    'constructor' in proto &&
    typeof proto.constructor === 'function'
      ? proto.constructor.name
      : 'Object';
  return `<object ${name}>`;
}

/**
 * Render a scope at the given nesting depth (1 = top level).
 * Entries are indented one level deeper than the closing brace.
 */
export function renderScope(
  scope: ReadonlyMap<string, HostValue>,
  depth: number
): string {
  if (scope.size === 0) return '{}';

  const space = INDENT.repeat(depth);
  const lines: string[] = [];
  for (const [key, value] of scope) {
    lines.push(`${space}${key} = ${formatValue(value, depth + 1)};`);
  }
  return `{\n${lines.join('\n')}\n${INDENT.repeat(depth - 1)}}`;
}

/**
 * Format a host value for display.
 * `depth` is the level nested scopes render at.
 */
export function formatValue(value: HostValue, depth = 1): string {
  if (value === null) return 'none';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Scope) return renderScope(value, depth);
  if (value instanceof ScriptException) return value.message;
  if (value instanceof Uint8Array) return formatBytes(value);
  if (Array.isArray(value)) {
    return `[${value.map((item) => formatValue(item, depth)).join(', ')}]`;
  }
  if (typeof value !== 'symbol' && isNamedArguments(value)) {
    return renderScope(new Map(Object.entries(value)), depth);
  }
  return formatOpaque(value);
}
