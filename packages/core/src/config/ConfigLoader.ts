import { readFileSync, existsSync, statSync } from 'fs';
import { join, isAbsolute, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import { ConfigError } from '../errors/TesseraError.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../logging/Logger.js';
import { DEFAULT_BUILTINS_MODULE } from '../scope/ScopeResolver.js';
import { TESSERA_VERSION, getSchemaVersion } from '../version.js';

/**
 * Tessera configuration schema.
 *
 * YAML Location: .tessera/config.yaml
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.3.0"
 * logLevel: info
 * logFile: .tessera/inference.log
 *
 * # Module scope consulted after every scope chain
 * builtinsModule: builtins
 *
 * # JSON tree files loaded before every query (relative to project root)
 * modules:
 *   - trees/builtins.json
 *   - trees/app.json
 * ```
 */
export interface TesseraConfig {
  /**
   * Config schema version (major.minor.patch, no pre-release tag).
   * If omitted, no version check is performed.
   */
  version?: string;

  logLevel: LogLevel;

  /** Debug-level JSON log written next to console output */
  logFile?: string;

  builtinsModule: string;

  modules: string[];
}

export interface ConfigWarnings {
  warn: (msg: string) => void;
}

export const DEFAULT_CONFIG: TesseraConfig = {
  version: getSchemaVersion(TESSERA_VERSION),
  logLevel: 'warnings',
  builtinsModule: DEFAULT_BUILTINS_MODULE,
  modules: [],
};

/**
 * Load config from `<projectPath>/.tessera/config.yaml`.
 *
 * A missing file gives the defaults. Unparseable YAML is reported through
 * `logger` and also gives the defaults. Values that parse but are invalid
 * throw ConfigError.
 */
export function loadConfig(projectPath: string, logger: ConfigWarnings = console): TesseraConfig {
  const yamlPath = join(projectPath, '.tessera', 'config.yaml');
  if (!existsSync(yamlPath)) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(yamlPath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse config.yaml: ${error.message}`);
    logger.warn('Using default configuration');
    return DEFAULT_CONFIG;
  }

  // an empty file parses to null
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw invalid(`config must be a mapping, got ${describeType(parsed)}`);
  }

  const raw = new Map<string, unknown>(Object.entries(parsed));

  const version = raw.get('version');
  validateVersion(version);
  const logLevel = validateLogLevel(raw.get('logLevel'));
  const logFile = validateOptionalString(raw.get('logFile'), 'logFile');
  const builtinsModule = validateOptionalString(raw.get('builtinsModule'), 'builtinsModule');
  const modules = validateModules(raw.get('modules'), projectPath);

  for (const key of raw.keys()) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`Unknown config key "${key}" ignored`);
    }
  }

  return {
    version: typeof version === 'string' ? version : DEFAULT_CONFIG.version,
    logLevel: logLevel ?? DEFAULT_CONFIG.logLevel,
    logFile: logFile === undefined ? undefined : resolve(projectPath, logFile),
    builtinsModule: builtinsModule ?? DEFAULT_CONFIG.builtinsModule,
    modules: modules ?? DEFAULT_CONFIG.modules,
  };
}

const KNOWN_KEYS: ReadonlySet<string> = new Set(['version', 'logLevel', 'logFile', 'builtinsModule', 'modules']);

function describeType(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

function invalid(message: string, field?: string): ConfigError {
  return new ConfigError(`Config error: ${message}`, 'ERR_CONFIG_INVALID', { field }, 'Fix .tessera/config.yaml');
}

/**
 * Validate config version compatibility with the running version.
 * Compares major.minor.patch; an absent version passes.
 *
 * @param currentVersion - Override for testing (defaults to TESSERA_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw invalid(`version must be a string, got ${describeType(configVersion)}`, 'version');
  }

  if (!configVersion.trim()) {
    throw invalid('version cannot be empty', 'version');
  }

  const current = currentVersion ?? TESSERA_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with Tessera ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_VERSION',
      { field: 'version' },
      `Set version: "${currentSchema}" in .tessera/config.yaml`
    );
  }
}

export function validateLogLevel(value: unknown): LogLevel | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isLogLevel(value)) {
    throw invalid(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(value)}`, 'logLevel');
  }
  return value;
}

function validateOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalid(`${field} must be a string, got ${describeType(value)}`, field);
  }
  if (!value.trim()) {
    throw invalid(`${field} cannot be empty or whitespace-only`, field);
  }
  return value;
}

/**
 * Validate the preloaded tree files. Paths are relative to the project root,
 * must exist, and must be files. Returns absolute paths.
 */
export function validateModules(modules: unknown, projectPath: string): string[] | undefined {
  if (modules === undefined || modules === null) {
    return undefined;
  }

  if (!Array.isArray(modules)) {
    throw invalid(`modules must be an array, got ${describeType(modules)}`, 'modules');
  }

  const result: string[] = [];
  modules.forEach((entry: unknown, i: number) => {
    if (typeof entry !== 'string') {
      throw invalid(`modules[${i}] must be a string, got ${describeType(entry)}`, `modules[${i}]`);
    }
    if (!entry.trim()) {
      throw invalid(`modules[${i}] cannot be empty or whitespace-only`, `modules[${i}]`);
    }
    if (isAbsolute(entry) || entry.startsWith('~')) {
      throw invalid(`modules[${i}] must be relative to project root, got "${entry}"`, `modules[${i}]`);
    }

    const absolutePath = join(projectPath, entry);
    if (!existsSync(absolutePath)) {
      throw invalid(`modules[${i}] "${entry}" does not exist`, `modules[${i}]`);
    }
    if (!statSync(absolutePath).isFile()) {
      throw invalid(`modules[${i}] "${entry}" must be a file`, `modules[${i}]`);
    }
    result.push(absolutePath);
  });

  return result;
}
