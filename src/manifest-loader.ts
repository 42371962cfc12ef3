/**
 * Manifest Loader
 *
 * Builds a Script from a YAML manifest naming the main source file,
 * module files, initial variables and execution settings.
 *
 * ```yaml
 * main: ./main.script
 * modules:
 *   math: ./lib/math.script
 * variables:
 *   user: alice
 * debug: false
 * duplicateFunctions: shadow
 * ```
 *
 * Paths are resolved against the manifest's directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import type { DuplicateFunctionPolicy } from './runtime/core/callable.js';
import type { ScriptEngine } from './runtime/core/engine.js';
import { Script } from './runtime/core/script.js';
import type { ScriptOptions } from './runtime/core/types.js';
import { ConfigError, ERROR_CODES } from './types.js';

const DUPLICATE_POLICIES: readonly DuplicateFunctionPolicy[] = [
  'shadow',
  'first',
  'reject',
];

/** Manifest contents with every referenced file read */
export interface ScriptManifest {
  /** Absolute path of the manifest file */
  readonly path: string;
  /** Main source, when the manifest names one */
  readonly source?: string | undefined;
  /** Module sources keyed by module name */
  readonly modules: Record<string, string>;
  /** Initial variables as plain host values */
  readonly variables: Record<string, unknown>;
  readonly debug: boolean;
  readonly duplicateFunctions?: DuplicateFunctionPolicy | undefined;
}

/** Script built from a manifest, with the manifest's debug setting */
export interface ManifestScript<TProgram> {
  readonly script: Script<TProgram>;
  readonly debug: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDuplicatePolicy(value: unknown): value is DuplicateFunctionPolicy {
  return DUPLICATE_POLICIES.some((policy) => policy === value);
}

function invalid(manifestPath: string, message: string): ConfigError {
  return new ConfigError(
    ERROR_CODES.CONFIG_INVALID,
    `Invalid manifest ${manifestPath}: ${message}`,
    manifestPath
  );
}

async function readSource(
  filePath: string,
  specifier: string
): Promise<string> {
  try {
    await fs.access(filePath);
  } catch {
    throw new ConfigError(
      ERROR_CODES.CONFIG_FILE_NOT_FOUND,
      `File not found: ${specifier}`,
      filePath
    );
  }
  return fs.readFile(filePath, 'utf-8');
}

function parseYaml(content: string, manifestPath: string): unknown {
  try {
    return yaml.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      ERROR_CODES.CONFIG_PARSE_FAILED,
      `Cannot parse manifest ${manifestPath}: ${reason}`,
      manifestPath,
      { cause: error }
    );
  }
}

/**
 * Read a manifest and every file it references.
 *
 * @throws ConfigError CONFIG_FILE_NOT_FOUND, CONFIG_PARSE_FAILED or CONFIG_INVALID
 */
export async function loadManifest(
  manifestPath: string
): Promise<ScriptManifest> {
  const absolutePath = path.resolve(manifestPath);
  const baseDir = path.dirname(absolutePath);

  // yaml.parse returns null for empty content
  const document =
    parseYaml(await readSource(absolutePath, manifestPath), manifestPath) ??
    {};
  if (!isRecord(document)) {
    throw invalid(manifestPath, 'top level must be a mapping');
  }

  const main = document['main'];
  if (main !== undefined && typeof main !== 'string') {
    throw invalid(manifestPath, "'main' must be a path");
  }
  const source =
    main === undefined
      ? undefined
      : await readSource(path.resolve(baseDir, main), main);

  const moduleEntries = document['modules'] ?? {};
  if (!isRecord(moduleEntries)) {
    throw invalid(manifestPath, "'modules' must map names to paths");
  }
  const modules: Record<string, string> = {};
  for (const [name, modulePath] of Object.entries(moduleEntries)) {
    if (typeof modulePath !== 'string') {
      throw invalid(manifestPath, `module '${name}' must be a path`);
    }
    modules[name] = await readSource(
      path.resolve(baseDir, modulePath),
      modulePath
    );
  }

  const variables = document['variables'] ?? {};
  if (!isRecord(variables)) {
    throw invalid(manifestPath, "'variables' must be a mapping");
  }

  const debug = document['debug'] ?? false;
  if (typeof debug !== 'boolean') {
    throw invalid(manifestPath, "'debug' must be true or false");
  }

  const duplicateFunctions = document['duplicateFunctions'];
  if (
    duplicateFunctions !== undefined &&
    !isDuplicatePolicy(duplicateFunctions)
  ) {
    throw invalid(
      manifestPath,
      `'duplicateFunctions' must be one of ${DUPLICATE_POLICIES.join(', ')}`
    );
  }

  return {
    path: absolutePath,
    source,
    modules,
    variables,
    debug,
    duplicateFunctions,
  };
}

/**
 * Create a Script from a manifest.
 * Host functions and callbacks come from `options`; variables given there
 * override manifest variables with the same name.
 */
export async function createScriptFromManifest<TProgram>(
  engine: ScriptEngine<TProgram>,
  manifestPath: string,
  options: Omit<
    ScriptOptions<TProgram>,
    'engine' | 'source' | 'modules' | 'variables' | 'duplicateFunctions'
  > & { variables?: Record<string, unknown> } = {}
): Promise<ManifestScript<TProgram>> {
  const manifest = await loadManifest(manifestPath);

  const script = new Script<TProgram>({
    ...options,
    engine,
    source: manifest.source,
    modules: manifest.modules,
    variables: { ...manifest.variables, ...options.variables },
    duplicateFunctions: manifest.duplicateFunctions,
  });

  return { script, debug: manifest.debug };
}
