/**
 * Engine Contract
 *
 * The tokenizer, parser and evaluator of the language live outside this
 * package. A Script reaches them only through this interface.
 */

import type { FunctionResolver } from './callable.js';
import {
  decodeValue,
  type DecodeResult,
  type Value,
  type Variable,
} from './values.js';

/** Everything the evaluator needs for one run */
export interface EvaluationRequest<TProgram> {
  /** Parsed program, opaque to this package */
  readonly program: TProgram;
  /** Top-level bindings at call time */
  readonly variables: readonly Variable[];
  /** Registered host functions */
  readonly functions: FunctionResolver;
  /** Parsed modules available to import */
  readonly modules: ReadonlyMap<string, TProgram>;
  /** Enables the engine's own diagnostics (print/debug builtins) */
  readonly debug: boolean;
  /** Sink for the engine's debug output */
  readonly onLog: (value: Value) => void;
}

/** What the evaluator hands back */
export interface EvaluationOutcome {
  /** Value of the program */
  readonly result: Value;
  /** Complete top-level scope after evaluation */
  readonly scope: readonly Variable[];
}

/**
 * External engine.
 * Tokenize and parse failures are thrown and never intercepted here.
 */
export interface ScriptEngine<TProgram, TTokens = unknown> {
  tokenize(source: string): TTokens;
  parseProgram(tokens: TTokens): TProgram;
  evaluate(request: EvaluationRequest<TProgram>): Promise<EvaluationOutcome>;
  /** Evaluate a standalone expression without a script */
  evaluateLiteral(text: string): Value;
}

/** Evaluate a standalone expression and decode its value */
export function evaluateExpression<TProgram>(
  engine: ScriptEngine<TProgram>,
  text: string
): DecodeResult {
  return decodeValue(engine.evaluateLiteral(text));
}
