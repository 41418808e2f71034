/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: REFINUM_*
 * 3. Config files: package.json#refinum, .refinumrc, refinum.config.js, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@refinum/core";
 *
 * config.get("debug")          // → true | false
 * config.literalMode()         // → "error" | "warning" | "off"
 *
 * config.set({ literals: { mode: "warning" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * How the literal-check macros report a rejected literal.
 * "off" leaves literal calls to the runtime check alone.
 */
export type LiteralMode = "error" | "warning" | "off";

const LITERAL_MODES: readonly LiteralMode[] = ["error", "warning", "off"];

export interface LiteralsConfig {
  mode?: LiteralMode;
}

/**
 * Full refinum configuration schema.
 */
export interface RefinumConfig {
  /** Log binding expansion and macro activity to the console */
  debug?: boolean;
  /** Literal-check macro configuration */
  literals?: LiteralsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

export interface ConfigResetOptions {
  /** Directory the config file search starts from (default: process.cwd()) */
  searchFrom?: string;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

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

  for (const part of parts.slice(0, -1)) {
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
  let current = obj;

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

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   REFINUM_DEBUG=1                → { debug: true }
 *   REFINUM_LITERALS_MODE=warning  → { literals: { mode: "warning" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "REFINUM_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key.slice(PREFIX.length).toLowerCase().replace(/_/g, ".");

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

const MODULE_NAME = "refinum";

function loadConfigFromFiles(): Record<string, unknown> {
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

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search(searchFrom);
  } catch (error) {
    throw new Error(`[refinum] Failed to load configuration file: ${String(error)}`, {
      cause: error,
    });
  }

  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new Error(`[refinum] Configuration in ${result.filepath} must be an object`);
  }
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: RefinumConfig = {
    debug: false,
    literals: {
      mode: "error",
    },
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
 * Get a configuration value by dotted path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: RefinumConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Forget all loaded configuration; the next read reloads every source.
 */
function reset(options: ConfigResetOptions = {}): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = options.searchFrom;
}

function isDebug(): boolean {
  return get("debug") === true;
}

/**
 * The configured literal mode. Unknown values are a configuration error.
 */
function literalMode(): LiteralMode {
  const mode = get("literals.mode");
  const match = LITERAL_MODES.find((m) => m === mode);
  if (match === undefined) {
    throw new Error(
      `[refinum] Invalid literals.mode '${String(mode)}': expected one of ${LITERAL_MODES.join(", ")}`
    );
  }
  return match;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  getConfigFilePath,
  reset,
  isDebug,
  literalMode,
} as const;
