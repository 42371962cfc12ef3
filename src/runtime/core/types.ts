/**
 * Runtime Types
 *
 * Public types for script configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { ScriptException } from '../../types.js';
import type {
  AsyncHostFunction,
  DuplicateFunctionPolicy,
  HostFunction,
} from './callable.js';
import type { ScriptEngine } from './engine.js';
import type { Scope } from './scope.js';
import type { DecodeResult, HostValue, Value, Variable } from './values.js';

/** I/O callbacks for runtime operations */
export interface ScriptCallbacks {
  /** Called when the engine emits debug output */
  onLog: (value: HostValue) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before a host function is invoked */
  onHostCall?: (event: HostCallEvent) => void;
  /** Called after a host function returns (including contained errors) */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when a host function throws a ScriptException */
  onError?: (event: ErrorEvent) => void;
  /** Called before the engine evaluates the program */
  onExecuteStart?: (event: ExecuteStartEvent) => void;
  /** Called after the bindings have been replaced */
  onExecuteEnd?: (event: ExecuteEndEvent) => void;
}

/** Event emitted before a host function call */
export interface HostCallEvent {
  /** Name used at the call site */
  name: string;
  /** Decoded arguments passed to the host function */
  args: HostValue[];
}

/** Event emitted after a host function returns */
export interface FunctionReturnEvent {
  /** Name used at the call site */
  name: string;
  /** Encoded return value */
  value: Value;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted when a ScriptException is turned into an Error value */
export interface ErrorEvent {
  name: string;
  error: ScriptException;
}

export interface ExecuteStartEvent {
  debug: boolean;
  /** Number of top-level bindings handed to the engine */
  variableCount: number;
}

export interface ExecuteEndEvent {
  /** Whether the result decoded without an error */
  ok: boolean;
  durationMs: number;
}

/** Options for registering a host function */
export interface RegisterOptions {
  /** Name visible to scripts (defaults to the function's own name) */
  readonly name?: string | undefined;
  /** Prepend the call-site name as the first argument */
  readonly withName?: boolean | undefined;
}

/** Host function registration accepted at construction */
export type FunctionRegistration =
  | (RegisterOptions & {
      readonly mode?: 'immediate';
      readonly fn: HostFunction;
    })
  | (RegisterOptions & {
      readonly mode: 'suspending';
      readonly fn: AsyncHostFunction;
    });

/** Options for creating a script */
export interface ScriptOptions<TProgram> {
  /** Engine that tokenizes, parses and evaluates source */
  engine: ScriptEngine<TProgram>;
  /** Source parsed at construction */
  source?: string | undefined;
  /** Initial top-level variables */
  variables?: Record<string, unknown> | readonly Variable[] | undefined;
  /** Initial host functions */
  functions?: readonly FunctionRegistration[] | undefined;
  /** Initial named modules (name -> source) */
  modules?: Record<string, string> | undefined;
  /** Resolution of function names registered more than once */
  duplicateFunctions?: DuplicateFunctionPolicy | undefined;
  /** I/O callbacks */
  callbacks?: Partial<ScriptCallbacks> | undefined;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks | undefined;
}

/** Options for a single execution */
export interface ExecuteOptions {
  /** Enables the engine's own diagnostics */
  debug?: boolean | undefined;
}

/**
 * Result of executing a script.
 * A top-level Error value surfaces as `ok: false`; execution itself
 * did not fail.
 */
export type ExecutionResult = DecodeResult & {
  /** Top-level variables after execution */
  readonly variables: Scope;
};
