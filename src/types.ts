/**
 * Error Types
 * Error hierarchy shared by the codec, the script instance and the manifest loader
 */

// ============================================================
// ERROR CODES
// ============================================================

/** Error codes for programmatic handling */
export const ERROR_CODES = {
  // Script lifecycle
  SCRIPT_NOT_PARSED: 'SCRIPT_NOT_PARSED',

  // Function registration
  FUNCTION_NAME_REQUIRED: 'FUNCTION_NAME_REQUIRED',
  FUNCTION_ALREADY_REGISTERED: 'FUNCTION_ALREADY_REGISTERED',

  // Manifest configuration
  CONFIG_FILE_NOT_FOUND: 'CONFIG_FILE_NOT_FOUND',
  CONFIG_PARSE_FAILED: 'CONFIG_PARSE_FAILED',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ScriptErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured error data for host applications */
export interface ScriptErrorData {
  readonly code: ScriptErrorCode;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/**
 * Base error class for errors raised by this layer itself.
 * Errors raised by the engine (malformed source, evaluation failures)
 * are never wrapped and reach the host as thrown.
 */
export class ScriptError extends Error {
  readonly code: ScriptErrorCode;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ScriptErrorData, options?: { cause?: unknown }) {
    super(data.message, options);
    this.name = 'ScriptError';
    this.code = data.code;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): ScriptErrorData {
    return {
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ScriptErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/** Manifest loading and validation errors */
export class ConfigError extends ScriptError {
  readonly path: string;

  constructor(
    code: ScriptErrorCode,
    message: string,
    path: string,
    options?: { cause?: unknown }
  ) {
    super({ code, message, context: { path } }, options);
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * Domain exception for host functions.
 *
 * Throwing this from a registered function does not abort the script:
 * the call evaluates to an Error value carrying `Error: <message>`.
 * Decoding an Error value yields an instance of this class as data.
 */
export class ScriptException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScriptException';
  }
}
