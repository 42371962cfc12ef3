/**
 * Script
 *
 * Owns one script's parsed program, top-level bindings, registered
 * functions and named modules, and runs it through the engine.
 * This is the main entry point for host applications.
 *
 * A Script does not serialize its own executions: concurrent execute()
 * calls on the same instance race on its bindings.
 */

import { ERROR_CODES, ScriptError } from '../../types.js';
import { Bindings } from './bindings.js';
import {
  createImmediateAdapter,
  createSuspendingAdapter,
  FunctionTable,
  type AsyncHostFunction,
  type FunctionAdapter,
  type FunctionEntry,
  type HostFunction,
} from './callable.js';
import type { ScriptEngine } from './engine.js';
import { formatValue, type Scope } from './scope.js';
import type {
  ExecuteOptions,
  ExecutionResult,
  FunctionRegistration,
  ObservabilityCallbacks,
  RegisterOptions,
  ScriptCallbacks,
  ScriptOptions,
} from './types.js';
import {
  decodeValue,
  toEngineValue,
  toHostValue,
  type Variable,
} from './values.js';

const defaultCallbacks: ScriptCallbacks = {
  onLog: (value) => {
    console.log(formatValue(value));
  },
};

/** Module source with its parsed program */
interface ParsedModule<TProgram> {
  readonly source: string;
  readonly program: TProgram;
}

function isVariableList(
  variables: Record<string, unknown> | readonly Variable[]
): variables is readonly Variable[] {
  return Array.isArray(variables);
}

function createBindings(
  variables: Record<string, unknown> | readonly Variable[] | undefined
): Bindings {
  if (variables === undefined) return new Bindings();
  if (isVariableList(variables)) return new Bindings(variables);
  return Bindings.fromRecord(variables);
}

export class Script<TProgram> {
  private readonly engine: ScriptEngine<TProgram>;
  private readonly functionTable: FunctionTable;
  private readonly moduleTable = new Map<string, ParsedModule<TProgram>>();
  private readonly callbacks: ScriptCallbacks;
  private readonly observability: ObservabilityCallbacks;
  private bindings: Bindings;
  private parsed: TProgram | undefined;

  constructor(options: ScriptOptions<TProgram>) {
    this.engine = options.engine;
    this.functionTable = new FunctionTable(options.duplicateFunctions);
    this.callbacks = {
      onLog: options.callbacks?.onLog ?? defaultCallbacks.onLog,
    };
    this.observability = options.observability ?? {};
    this.bindings = createBindings(options.variables);

    for (const registration of options.functions ?? []) {
      this.addRegistration(registration);
    }

    for (const [name, source] of Object.entries(options.modules ?? {})) {
      this.addModule(name, source);
    }

    if (options.source !== undefined) {
      this.parse(options.source);
    }
  }

  /** Current parsed program (undefined until parse() succeeds) */
  get program(): TProgram | undefined {
    return this.parsed;
  }

  /** Snapshot of the top-level variables; changes do not reach the script */
  get variables(): Scope {
    return this.bindings.toHostMapping();
  }

  /** Every registration, in order */
  get functions(): readonly FunctionEntry[] {
    return this.functionTable.entries();
  }

  get moduleNames(): string[] {
    return [...this.moduleTable.keys()];
  }

  /**
   * Parse source into the program to execute, replacing the previous one.
   * Registered modules are re-parsed from their stored source.
   * Engine errors propagate unchanged.
   */
  parse(source = ''): void {
    this.parsed = this.compile(source);

    for (const [name, module] of this.moduleTable) {
      this.moduleTable.set(name, {
        source: module.source,
        program: this.compile(module.source),
      });
    }
  }

  /** Set a top-level variable; an existing name keeps its position */
  addVariable(name: string, value: unknown): void {
    this.bindings.set(name, toEngineValue(value));
  }

  /** Parse and store a module, replacing any module with the same name */
  addModule(name: string, source: string): void {
    this.moduleTable.set(name, { source, program: this.compile(source) });
  }

  /**
   * Register a synchronous host function.
   *
   * @example
   * ```typescript
   * script.register((a, b) => Number(a) + Number(b), { name: 'add' });
   *
   * const shout = script.register({ withName: true })(function shout(name, text) {
   *   return `${name}: ${String(text).toUpperCase()}`;
   * });
   * ```
   */
  register<F extends HostFunction>(fn: F, options?: RegisterOptions): F;
  register(options: RegisterOptions): <F extends HostFunction>(fn: F) => F;
  register(
    fnOrOptions: HostFunction | RegisterOptions,
    options: RegisterOptions = {}
  ): unknown {
    if (typeof fnOrOptions === 'function') {
      this.addFunction(
        fnOrOptions.name,
        options,
        createImmediateAdapter(fnOrOptions, {
          withName: options.withName,
          observability: this.observability,
        })
      );
      return fnOrOptions;
    }
    const decoratorOptions = fnOrOptions;
    return <F extends HostFunction>(fn: F): F => {
      this.register(fn, decoratorOptions);
      return fn;
    };
  }

  /** Register a host function returning a promise; see register() */
  registerAsync<F extends AsyncHostFunction>(
    fn: F,
    options?: RegisterOptions
  ): F;
  registerAsync(
    options: RegisterOptions
  ): <F extends AsyncHostFunction>(fn: F) => F;
  registerAsync(
    fnOrOptions: AsyncHostFunction | RegisterOptions,
    options: RegisterOptions = {}
  ): unknown {
    if (typeof fnOrOptions === 'function') {
      this.addFunction(
        fnOrOptions.name,
        options,
        createSuspendingAdapter(fnOrOptions, {
          withName: options.withName,
          observability: this.observability,
        })
      );
      return fnOrOptions;
    }
    const decoratorOptions = fnOrOptions;
    return <F extends AsyncHostFunction>(fn: F): F => {
      this.registerAsync(fn, decoratorOptions);
      return fn;
    };
  }

  /**
   * Execute the program.
   *
   * The engine's final scope replaces every top-level binding: a name
   * missing from it no longer exists afterwards. Host function errors
   * other than ScriptException reject the returned promise.
   *
   * @throws ScriptError SCRIPT_NOT_PARSED when no program was parsed
   */
  async execute(options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const program = this.parsed;
    if (program === undefined) {
      throw new ScriptError({
        code: ERROR_CODES.SCRIPT_NOT_PARSED,
        message: 'No program to execute: call parse() first',
      });
    }

    const debug = options.debug ?? false;
    this.observability.onExecuteStart?.({
      debug,
      variableCount: this.bindings.size,
    });
    const startTime = performance.now();

    const outcome = await this.engine.evaluate({
      program,
      variables: this.bindings.toVariables(),
      functions: this.functionTable,
      modules: this.modulePrograms(),
      debug,
      onLog: (value) => this.callbacks.onLog(toHostValue(value)),
    });

    this.bindings = new Bindings(outcome.scope);
    const result = decodeValue(outcome.result);

    this.observability.onExecuteEnd?.({
      ok: result.ok,
      durationMs: performance.now() - startTime,
    });

    return { ...result, variables: this.bindings.toHostMapping() };
  }

  private compile(source: string): TProgram {
    return this.engine.parseProgram(this.engine.tokenize(source));
  }

  private modulePrograms(): Map<string, TProgram> {
    const programs = new Map<string, TProgram>();
    for (const [name, module] of this.moduleTable) {
      programs.set(name, module.program);
    }
    return programs;
  }

  private addRegistration(registration: FunctionRegistration): void {
    if (registration.mode === 'suspending') {
      this.registerAsync(registration.fn, registration);
    } else {
      this.register(registration.fn, registration);
    }
  }

  private addFunction(
    fnName: string,
    options: RegisterOptions,
    adapter: FunctionAdapter
  ): void {
    const name = options.name ?? fnName;
    if (name === '') {
      throw new ScriptError({
        code: ERROR_CODES.FUNCTION_NAME_REQUIRED,
        message: 'Anonymous functions need a name option to be registered',
      });
    }
    this.functionTable.add(name, adapter);
  }
}
