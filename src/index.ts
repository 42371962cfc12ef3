/**
 * embedscript
 * Host-side marshalling, function adapters and script lifecycle
 */

export * from './runtime/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  ConfigError,
  ERROR_CODES,
  ScriptError,
  type ScriptErrorCode,
  type ScriptErrorData,
  ScriptException,
} from './types.js';

// ============================================================
// MANIFEST LOADING
// ============================================================
export {
  createScriptFromManifest,
  loadManifest,
  type ManifestScript,
  type ScriptManifest,
} from './manifest-loader.js';
