/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: POWSER_* (for CI overrides)
 * 3. Config files: .powserrc, powser.config.json, "powser" key in package.json
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@powser/core";
 *
 * config.get("debug")           // → true | false
 * config.displayTerms()         // → 3
 *
 * config.set({ display: { terms: 5 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { writeScoped } from "./writer.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Display options for finite views of a series.
 */
export interface DisplayConfig {
  /** Number of leading coefficients rendered by toString */
  terms?: number;
}

/**
 * Full configuration schema.
 */
export interface PowserConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Rendering of series prefixes */
  display?: DisplayConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

/** Coefficients shown by toString when nothing else is configured */
export const DEFAULT_DISPLAY_TERMS = 3;

// ============================================================================
// Global State
// ============================================================================

let fileAndEnvStore: ConfigRecord = {};
let overrides: ConfigRecord = {};
let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "POWSER_";

/**
 * Load configuration from environment variables.
 * Variables prefixed with POWSER_ are parsed into the config object.
 *
 * Examples:
 *   POWSER_DEBUG=1                → { debug: true }
 *   POWSER_DISPLAY_TERMS=5        → { display: { terms: 5 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // POWSER_DISPLAY_TERMS → display.terms
    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/__?/g, ".");

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

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
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

    if (isRecord(sourceValue) && isRecord(targetValue)) {
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

const MODULE_NAME = "powser";

/**
 * Load configuration from a config file in the working directory.
 * A file that cannot be read or parsed is skipped with a warning.
 */
function loadConfigFromFiles(): ConfigRecord {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.json`,
    ],
  });

  try {
    const result = explorer.search();
    if (result === null || result.isEmpty) return {};

    const loaded: unknown = result.config;
    if (!isRecord(loaded)) {
      warnIgnored(`${result.filepath}: configuration must be an object`);
      return {};
    }
    configFilePath = result.filepath;
    return loaded;
  } catch (err) {
    warnIgnored(err instanceof Error ? err.message : String(err));
    return {};
  }
}

function warnIgnored(reason: string): void {
  writeScoped("config", `warning: ignoring config file: ${reason}`);
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): ConfigRecord {
  return {
    debug: false,
    display: {
      terms: DEFAULT_DISPLAY_TERMS,
    },
  };
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  // Merge: defaults < fileConfig < envConfig
  fileAndEnvStore = deepMerge(deepMerge(defaults(), loadConfigFromFiles()), loadConfigFromEnv());
  configStore = deepMerge(fileAndEnvStore, overrides);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-separated path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically. These win over every other source.
 */
function set(values: PowserConfig): void {
  initializeConfig();
  overrides = deepMerge(overrides, values);
  configStore = deepMerge(fileAndEnvStore, overrides);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<PowserConfig> {
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
 * Sources are read again on next access.
 */
function reset(): void {
  fileAndEnvStore = {};
  overrides = {};
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Whether debug logging is enabled.
 */
function isDebug(): boolean {
  return get("debug") === true;
}

/**
 * Number of coefficients a series display renders.
 * Anything other than a positive integer falls back to the default.
 */
function displayTerms(): number {
  const terms = get("display.terms");
  if (typeof terms === "number" && Number.isInteger(terms) && terms > 0) {
    return terms;
  }
  return DEFAULT_DISPLAY_TERMS;
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
  isDebug,
  displayTerms,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: PowserConfig): PowserConfig {
  return cfg;
}

export { loadConfigFromEnv };
