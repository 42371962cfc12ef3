/**
 * Runtime
 *
 * Public API for embedding scripts in a host application.
 *
 * Module Structure:
 * - core/: Marshalling and lifecycle layer
 *   - values.ts: Engine values and the host <-> engine codec
 *   - scope.ts: Host-side ordered mapping and value formatting
 *   - bindings.ts: Ordered top-level variable store
 *   - callable.ts: Host function adapters and the function table
 *   - engine.ts: Contract of the external tokenizer/parser/evaluator
 *   - types.ts: Public types (ScriptOptions, callbacks, results)
 *   - script.ts: Script lifecycle (parse, register, execute)
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ExecuteEndEvent,
  ExecuteOptions,
  ExecuteStartEvent,
  ExecutionResult,
  FunctionRegistration,
  FunctionReturnEvent,
  HostCallEvent,
  ObservabilityCallbacks,
  RegisterOptions,
  ScriptCallbacks,
  ScriptOptions,
} from './core/types.js';

// ============================================================
// VALUE TYPES AND CODEC
// ============================================================

export type {
  BoolValue,
  BytesValue,
  DecodeResult,
  ErrorTag,
  ErrorValue,
  HostValue,
  IntValue,
  ListValue,
  NamedArguments,
  NoneValue,
  OpaqueReference,
  PyObjectValue,
  ScopeValue,
  StrValue,
  Value,
  ValueTag,
  Variable,
} from './core/values.js';

export {
  classify,
  decodeValue,
  isErrorValue,
  makeError,
  scopeVariable,
  toEngineValue,
  toHostValue,
  variable,
} from './core/values.js';

// ============================================================
// SCOPES AND BINDINGS
// ============================================================

export { formatValue, renderScope, Scope } from './core/scope.js';

export { Bindings } from './core/bindings.js';

// ============================================================
// HOST FUNCTION ADAPTERS
// ============================================================

export type {
  AdapterOptions,
  ArgumentShape,
  AsyncHostFunction,
  DuplicateFunctionPolicy,
  FunctionAdapter,
  FunctionEntry,
  FunctionResolver,
  HostFunction,
} from './core/callable.js';

export {
  createImmediateAdapter,
  createSuspendingAdapter,
  FunctionTable,
  toHostArguments,
} from './core/callable.js';

// ============================================================
// ENGINE CONTRACT
// ============================================================

export type {
  EvaluationOutcome,
  EvaluationRequest,
  ScriptEngine,
} from './core/engine.js';

export { evaluateExpression } from './core/engine.js';

// ============================================================
// SCRIPT LIFECYCLE
// ============================================================

export { Script } from './core/script.js';
