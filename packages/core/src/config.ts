/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: EXPRFUSE_* (for CI overrides)
 * 3. Config files: package.json#exprfuse, .exprfuserc, etc. (via cosmiconfig)
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@exprfuse/core";
 *
 * config.get("log.level");               // → "warn"
 * config.lengthPolicy();                 // → "strict" | "unchecked"
 *
 * config.set({ materialize: { checks: "unchecked" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** Severity threshold for scoped loggers. */
export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

/**
 * How materialization treats operand collections whose size differs from the
 * destination.
 *
 * - `"strict"`: every collection leaf is checked before the first write
 * - `"unchecked"`: sizes are a caller-verified precondition
 */
export type LengthPolicy = "strict" | "unchecked";

export interface LogConfig {
  level?: LogLevel;
}

export interface MaterializeConfig {
  checks?: LengthPolicy;
}

/**
 * Full exprfuse configuration schema.
 */
export interface ExprfuseConfig {
  /** Enable debug mode (forces the debug log level) */
  debug?: boolean;
  log?: LogConfig;
  materialize?: MaterializeConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let overrides: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

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
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "EXPRFUSE_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   EXPRFUSE_DEBUG=1                   → { debug: true }
 *   EXPRFUSE_LOG_LEVEL=debug           → { log: { level: "debug" } }
 *   EXPRFUSE_MATERIALIZE_CHECKS=unchecked
 *                                      → { materialize: { checks: "unchecked" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "exprfuse";

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  try {
    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[${MODULE_NAME}/config] WARN: ignoring unreadable config file: ${message}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: ExprfuseConfig = {
    debug: false,
    log: { level: "warn" },
    materialize: { checks: "strict" },
  };

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // defaults < fileConfig < envConfig < programmatic
  configStore = deepMerge(deepMerge(deepMerge(defaults, fileConfig), envConfig), overrides);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically. These win over every other source.
 */
function set(values: ExprfuseConfig): void {
  initializeConfig();
  overrides = deepMerge(overrides, values);
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<Record<string, unknown>> {
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
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * The effective length policy. Unknown values fall back to `"strict"`.
 */
function lengthPolicy(): LengthPolicy {
  return get("materialize.checks") === "unchecked" ? "unchecked" : "strict";
}

/**
 * The effective log level. `debug: true` forces `"debug"`; unknown values fall
 * back to `"warn"`.
 */
function logLevel(): LogLevel {
  if (has("debug")) return "debug";
  const level = get("log.level");
  return LOG_LEVELS.find((candidate) => candidate === level) ?? "warn";
}

// ============================================================================
// Export: config object
// ============================================================================

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  lengthPolicy,
  logLevel,
} as const;

/**
 * Helper for writing type-checked configuration files.
 */
export function defineConfig(cfg: ExprfuseConfig): ExprfuseConfig {
  return cfg;
}
