/**
 * Unified Configuration System
 *
 * Configuration is layered (later layers win):
 *
 * 1. Defaults
 * 2. Config files found by cosmiconfig: `package.json#weft`, `.weftrc`, `weft.config.js`, ...
 * 3. Environment variables: WEFT_* (override files, for CI)
 * 4. Programmatic: config.set() calls, merged over everything loaded so far
 *    until the next reset()
 *
 * @example
 * ```typescript
 * import { config } from "@weft/core";
 *
 * config.get("debug");                        // → unknown (true/false)
 * config.isDebug();                           // → boolean
 * config.set({ compile: { dumpSource: true } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the compiled (fragment-assembled) execution path.
 */
export interface CompileConfig {
  /** When false, assembly skips code generation and wraps the interpreter */
  enabled?: boolean;
  /** Log every generated function body at info level */
  dumpSource?: boolean;
}

/**
 * Full weft configuration schema.
 */
export interface WeftConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Compiled-path options */
  compile?: CompileConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "WEFT_";

/**
 * Load configuration from environment variables.
 *
 * A double underscore separates nesting levels; single underscores inside a
 * segment become camelCase.
 *
 *   WEFT_DEBUG=1                     → { debug: true }
 *   WEFT_COMPILE__DUMP_SOURCE=true   → { compile: { dumpSource: true } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z0-9])/g, (_, ch: string) => ch.toUpperCase()))
      .join(".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;

  for (const part of path.split(".")) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "weft";

function loadConfigFromFiles(searchFrom?: string): ConfigRecord {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  const result = explorer.search(searchFrom);
  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isPlainObject(loaded)) {
    throw new Error(`weft config at ${result.filepath} must export an object`);
  }

  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: WeftConfig = {
  debug: false,
  compile: {
    enabled: true,
    dumpSource: false,
  },
};

function initializeConfig(searchFrom?: string): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv();

  // defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dotted path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically. Takes precedence over files and
 * environment variables until `reset()`.
 */
function set(values: WeftConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<ConfigRecord> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Drop the loaded configuration and search for a config file starting at
 * `directory` instead of the working directory.
 */
function loadFrom(directory: string): void {
  reset();
  initializeConfig(directory);
}

function isDebug(): boolean {
  return get("debug") === true;
}

/**
 * Resolved compile options with defaults filled in.
 */
function compileOptions(): Required<CompileConfig> {
  const enabled = get("compile.enabled");
  const dumpSource = get("compile.dumpSource");
  return {
    enabled: typeof enabled === "boolean" ? enabled : true,
    dumpSource: dumpSource === true,
  };
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  loadFrom,
  isDebug,
  compileOptions,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: WeftConfig): WeftConfig {
  return cfg;
}
