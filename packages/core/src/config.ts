/**
 * Unified Configuration System
 *
 * Configuration is loaded at first access, or when a logger is created, from
 * (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: ITERUM_*
 * 3. Config files: .iterumrc, .iterumrc.json, .iterumrc.yaml, iterum.config.cjs, etc.
 * 4. package.json: "iterum" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@iterum/core";
 *
 * config.get("debug");           // → boolean
 * config.set({ debug: true });
 * ```
 *
 * @example Environment variables
 * ```bash
 * ITERUM_DEBUG=1 node app.js     # Log combinator diagnostics
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface IterumConfig {
  /** Print debug diagnostics from sequences and combinators */
  debug?: boolean;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: IterumConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "iterum";
const ENV_PREFIX = "ITERUM_";

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Read ITERUM_* variables. ITERUM_FEATURES__FAST becomes features.fast;
 * both `__` and `_` separate nested keys.
 */
function loadConfigFromEnv(): IterumConfig {
  const envConfig: IterumConfig = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

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

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }

  return current;
}

function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

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
// Config File Loading (cosmiconfig)
// ============================================================================

function loadConfigFromFiles(): IterumConfig {
  try {
    // The sync explorer has no loader for .mjs, and naming one makes it throw
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

    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    // A broken config file falls back to defaults
    console.warn(`[${MODULE_NAME}] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: IterumConfig = {
    debug: false,
  };

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Read a config value by dot-separated path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Merge values into the config. Takes precedence over files and environment.
 */
function set(values: Partial<IterumConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/** True when the value at `path` is truthy. */
function has(path: string): boolean {
  return !!get(path);
}

/** Read files and environment now, unless already loaded. */
function load(): void {
  initializeConfig();
}

function getAll(): Readonly<IterumConfig> {
  initializeConfig();
  return configStore;
}

function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Forget everything; the next access reloads files and environment.
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  load,
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};

/**
 * Identity helper that types a config object.
 *
 * @example
 * ```typescript
 * config.set(defineConfig({ debug: true }));
 * ```
 *
 * @example .iterumrc.json
 * ```json
 * { "debug": true }
 * ```
 */
export function defineConfig(values: IterumConfig): IterumConfig {
  return values;
}
