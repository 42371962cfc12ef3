/**
 * Callable Adapters
 *
 * Wraps host functions into the single calling convention the engine
 * invokes, and keeps the table of registered functions.
 *
 * Public API for host applications.
 *
 * Two adapter constructors exist:
 * - createImmediateAdapter: host function runs synchronously within the call
 * - createSuspendingAdapter: host function returns a promise that is awaited
 *
 * Both return a promise, so the engine awaits every call the same way.
 */

import { ERROR_CODES, ScriptError, ScriptException } from '../../types.js';
import type { ObservabilityCallbacks } from './types.js';
import {
  makeError,
  toEngineValue,
  toHostValue,
  type HostValue,
  type ScopeValue,
  type Value,
  type Variable,
} from './values.js';

/** Host function invoked synchronously */
export type HostFunction = (...args: HostValue[]) => unknown;

/** Host function returning a promise */
export type AsyncHostFunction = (...args: HostValue[]) => Promise<unknown>;

/**
 * Arguments as produced by the engine's calling convention.
 * A call with a single scope literal passes named arguments.
 */
export type ArgumentShape =
  | { readonly kind: 'positional'; readonly args: readonly Value[] }
  | { readonly kind: 'named'; readonly scope: ScopeValue };

/** Calling convention the engine uses for every registered function */
export type FunctionAdapter = (
  callName: string,
  args: ArgumentShape,
  callingScope: readonly Variable[]
) => Promise<Value>;

/** Options shared by both adapter constructors */
export interface AdapterOptions {
  /** Prepend the name used at the call site as the first argument */
  readonly withName?: boolean | undefined;
  /** Observability callbacks notified around each call */
  readonly observability?: ObservabilityCallbacks | undefined;
}

/** Decode engine arguments into host arguments */
export function toHostArguments(
  callName: string,
  args: ArgumentShape,
  withName = false
): HostValue[] {
  const leading: HostValue[] = withName ? [callName] : [];

  switch (args.kind) {
    case 'named': {
      // Own keys only: "__proto__" must not hit the prototype setter
      const named = Object.fromEntries(
        args.scope.scope.map((entry): [string, HostValue] => [
          entry.name,
          toHostValue(entry.value),
        ])
      );
      return [...leading, named];
    }
    case 'positional':
      return [...leading, ...args.args.map(toHostValue)];
  }
}

/**
 * Run a host call with error containment and observability.
 * A ScriptException becomes an Error value; anything else propagates.
 * The host function is called before the first await, so an immediate
 * function runs synchronously within the adapter call.
 */
async function invoke(
  callName: string,
  hostArgs: HostValue[],
  call: () => unknown,
  suspend: boolean,
  observability: ObservabilityCallbacks
): Promise<Value> {
  observability.onHostCall?.({ name: callName, args: hostArgs });

  const startTime = performance.now();
  let value: Value;

  try {
    const result = call();
    value = toEngineValue(suspend ? await result : result);
  } catch (error) {
    if (!(error instanceof ScriptException)) throw error;
    observability.onError?.({ name: callName, error });
    value = makeError(error.message);
  }

  observability.onFunctionReturn?.({
    name: callName,
    value,
    durationMs: performance.now() - startTime,
  });

  return value;
}

/**
 * Create an adapter for a synchronous host function.
 * Its return value is encoded as-is; a returned promise is not awaited
 * and travels as an opaque reference.
 */
export function createImmediateAdapter(
  fn: HostFunction,
  options: AdapterOptions = {}
): FunctionAdapter {
  const observability = options.observability ?? {};

  return (callName, args) => {
    const hostArgs = toHostArguments(callName, args, options.withName);
    return invoke(
      callName,
      hostArgs,
      () => fn(...hostArgs),
      false,
      observability
    );
  };
}

/**
 * Create an adapter for a host function returning a promise.
 * The adapter resolves once the promise settles.
 */
export function createSuspendingAdapter(
  fn: AsyncHostFunction,
  options: AdapterOptions = {}
): FunctionAdapter {
  const observability = options.observability ?? {};

  return (callName, args) => {
    const hostArgs = toHostArguments(callName, args, options.withName);
    return invoke(
      callName,
      hostArgs,
      () => fn(...hostArgs),
      true,
      observability
    );
  };
}

// ============================================================
// FUNCTION TABLE
// ============================================================

/**
 * How a name registered more than once resolves:
 * - shadow: the latest registration wins
 * - first: the earliest registration wins
 * - reject: registering an existing name throws
 */
export type DuplicateFunctionPolicy = 'shadow' | 'first' | 'reject';

/** A registered function */
export interface FunctionEntry {
  readonly name: string;
  readonly adapter: FunctionAdapter;
}

/** Read-only view of the function table handed to engines */
export interface FunctionResolver {
  resolve(name: string): FunctionAdapter | undefined;
  entries(): readonly FunctionEntry[];
}

/** Append-only list of registered functions */
export class FunctionTable implements FunctionResolver {
  private readonly registered: FunctionEntry[] = [];

  constructor(readonly policy: DuplicateFunctionPolicy = 'shadow') {}

  get size(): number {
    return this.registered.length;
  }

  add(name: string, adapter: FunctionAdapter): void {
    if (this.policy === 'reject' && this.has(name)) {
      throw new ScriptError({
        code: ERROR_CODES.FUNCTION_ALREADY_REGISTERED,
        message: `Function '${name}' is already registered`,
        context: { functionName: name },
      });
    }
    this.registered.push({ name, adapter });
  }

  has(name: string): boolean {
    return this.registered.some((entry) => entry.name === name);
  }

  resolve(name: string): FunctionAdapter | undefined {
    const matches = this.registered.filter((entry) => entry.name === name);
    const match =
      this.policy === 'shadow' ? matches[matches.length - 1] : matches[0];
    return match?.adapter;
  }

  entries(): readonly FunctionEntry[] {
    return [...this.registered];
  }
}
