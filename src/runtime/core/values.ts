/**
 * Value Codec
 *
 * Tagged values exchanged with the engine, and the conversions between
 * them and host values.
 * Public API for host applications.
 */

import { ScriptException } from '../../types.js';
import { Scope } from './scope.js';

// ============================================================
// ENGINE VALUES
// ============================================================

/** Structural tags understood by every engine */
export type ValueTag =
  | 'Str'
  | 'Int'
  | 'Bool'
  | 'None'
  | 'List'
  | 'Bytes'
  | 'Scope'
  | 'PyObject';

/** Any tag naming an error kind (Error, TypeError, ModuleNotfoundError, ...) */
export type ErrorTag = `${string}Error${string}`;

export interface StrValue {
  readonly type: 'Str';
  readonly value: string;
}

export interface IntValue {
  readonly type: 'Int';
  readonly number: number;
}

/** Booleans share the numeric payload with Int (1 or 0) */
export interface BoolValue {
  readonly type: 'Bool';
  readonly number: number;
}

export interface NoneValue {
  readonly type: 'None';
}

export interface ListValue {
  readonly type: 'List';
  readonly list: readonly Value[];
}

export interface BytesValue {
  readonly type: 'Bytes';
  readonly bytes: Uint8Array;
}

export interface ScopeValue {
  readonly type: 'Scope';
  readonly scope: readonly Variable[];
}

/** Host reference the codec never decomposes */
export type OpaqueReference = object | symbol;

/** Opaque host reference, carried through the engine untouched */
export interface PyObjectValue {
  readonly type: 'PyObject';
  readonly pyobject: OpaqueReference;
}

export interface ErrorValue {
  readonly type: ErrorTag;
  readonly value: string;
  readonly number: number;
  readonly list: readonly Value[];
}

/** Any value that can flow through the engine */
export type Value =
  | StrValue
  | IntValue
  | BoolValue
  | NoneValue
  | ListValue
  | BytesValue
  | ScopeValue
  | PyObjectValue
  | ErrorValue;

/** A named binding */
export interface Variable {
  readonly name: string;
  readonly value: Value;
}

// ============================================================
// HOST VALUES
// ============================================================

/** Named arguments handed to a host function called with a scope literal */
export interface NamedArguments {
  readonly [name: string]: HostValue;
}

/** Any value on the host side of the codec */
export type HostValue =
  | string
  | number
  | boolean
  | null
  | Uint8Array
  | Scope
  | NamedArguments
  | ScriptException
  | HostValue[]
  | OpaqueReference;

/** Outcome of decoding a value that may carry an error */
export type DecodeResult =
  | { readonly ok: true; readonly value: HostValue }
  | { readonly ok: false; readonly error: ScriptException };

// ============================================================
// CLASSIFICATION
// ============================================================

/** Host value narrowed to the shape its tag is built from */
type HostShape =
  | { readonly tag: 'Str'; readonly value: string }
  | { readonly tag: 'Int'; readonly value: number | bigint }
  | { readonly tag: 'Bool'; readonly value: boolean }
  | { readonly tag: 'None' }
  | { readonly tag: 'List'; readonly value: readonly unknown[] }
  | { readonly tag: 'Bytes'; readonly value: Uint8Array }
  | { readonly tag: 'Scope'; readonly value: Iterable<[unknown, unknown]> }
  | { readonly tag: 'PyObject'; readonly value: OpaqueReference };

/** Plain object literal (no prototype other than Object.prototype or null) */
function isPlainRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function inspectObject(value: object | null): HostShape {
  if (value === null) return { tag: 'None' };
  if (Array.isArray(value)) return { tag: 'List', value };
  if (value instanceof Uint8Array) return { tag: 'Bytes', value };
  if (value instanceof Map) return { tag: 'Scope', value: value.entries() };
  if (isPlainRecord(value)) {
    return { tag: 'Scope', value: Object.entries(value) };
  }
  return { tag: 'PyObject', value };
}

function inspectHost(value: unknown): HostShape {
  if (value === undefined) return { tag: 'None' };
  if (typeof value === 'string') return { tag: 'Str', value };
  if (typeof value === 'number' || typeof value === 'bigint') {
    return { tag: 'Int', value };
  }
  if (typeof value === 'boolean') return { tag: 'Bool', value };
  if (typeof value === 'object') return inspectObject(value);
  if (typeof value === 'symbol') return { tag: 'PyObject', value };
  // Only functions remain
  return typeof value === 'function'
    ? { tag: 'PyObject', value }
    : { tag: 'None' };
}

/**
 * Classify a host value into its engine tag.
 * Floats and bigints both map to Int; unrecognised shapes map to PyObject.
 */
export function classify(value: unknown): ValueTag {
  return inspectHost(value).tag;
}

/** Type guard for error-bearing values (any tag containing "Error") */
export function isErrorValue(value: Value): value is ErrorValue {
  return value.type.includes('Error');
}

// ============================================================
// ENCODING
// ============================================================

/** Convert a host value into an engine value */
export function toEngineValue(value: unknown): Value {
  const shape = inspectHost(value);

  switch (shape.tag) {
    case 'Str':
      return { type: 'Str', value: shape.value };
    case 'Int':
      return { type: 'Int', number: Number(shape.value) };
    case 'Bool':
      return { type: 'Bool', number: shape.value ? 1 : 0 };
    case 'None':
      return { type: 'None' };
    case 'List':
      return { type: 'List', list: shape.value.map(toEngineValue) };
    case 'Bytes':
      return { type: 'Bytes', bytes: Uint8Array.from(shape.value) };
    case 'Scope': {
      const scope: Variable[] = [];
      for (const [key, entry] of shape.value) {
        scope.push({ name: String(key), value: toEngineValue(entry) });
      }
      return { type: 'Scope', scope };
    }
    case 'PyObject':
      return { type: 'PyObject', pyobject: shape.value };
  }
}

/** Build a Variable from a host value */
export function variable(name: string, value: unknown): Variable {
  return { name, value: toEngineValue(value) };
}

/** Build a Variable holding a scope made of existing Variables */
export function scopeVariable(
  name: string,
  variables: readonly Variable[]
): Variable {
  return { name, value: { type: 'Scope', scope: [...variables] } };
}

/** Build an Error value; the message is prefixed with "Error: " */
export function makeError(message: string): ErrorValue {
  return {
    type: 'Error',
    value: `Error: ${message}`,
    number: 0,
    list: [],
  };
}

// ============================================================
// DECODING
// ============================================================

/**
 * Convert an engine value into a host value.
 * Error values become ScriptException instances returned as data.
 */
export function toHostValue(value: Value): HostValue {
  if (isErrorValue(value)) return new ScriptException(value.value);

  switch (value.type) {
    case 'Str':
      return value.value;
    case 'Int':
      return Number.isInteger(value.number)
        ? Math.floor(value.number)
        : value.number;
    case 'Bool':
      return value.number !== 0;
    case 'None':
      return null;
    case 'List':
      return value.list.map(toHostValue);
    case 'Bytes':
      return Uint8Array.from(value.bytes);
    case 'Scope':
      return new Scope(
        value.scope.map((entry) => [entry.name, toHostValue(entry.value)])
      );
    case 'PyObject':
      return value.pyobject;
    default: {
      // Tags outside the vocabulary decode like Str
      const unknownTag: { readonly value?: unknown } = value;
      return typeof unknownTag.value === 'string' ? unknownTag.value : '';
    }
  }
}

/** Decode a value, separating a top-level error from a successful value */
export function decodeValue(value: Value): DecodeResult {
  const decoded = toHostValue(value);
  if (decoded instanceof ScriptException) {
    return { ok: false, error: decoded };
  }
  return { ok: true, value: decoded };
}
