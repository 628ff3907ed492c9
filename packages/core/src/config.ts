/**
 * Configuration for @weft/core
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: WEFT_* (for CI overrides)
 * 3. Config files: .weftrc, .weftrc.json, package.json "weft" key, etc.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@weft/core";
 *
 * config.get().limits.depth       // → 0 (unbounded)
 * config.set({ debug: true });    // debug() wrappers log by default
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export type LimitsConfig = {
  /** Maximum forward-reference nesting per evaluation; 0 disables the check */
  depth?: number;
};

export type WeftConfig = {
  /** Default `verbose` flag of debug() wrappers */
  debug?: boolean;
  limits?: LimitsConfig;
};

/** Fully-populated configuration as returned by `config.get()`. */
export type ResolvedConfig = {
  readonly debug: boolean;
  readonly limits: { readonly depth: number };
};

const DEFAULTS: ResolvedConfig = {
  debug: false,
  limits: { depth: 0 },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: ResolvedConfig = DEFAULTS;
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with WEFT_ are parsed into the config object.
 *
 * Examples:
 *   WEFT_DEBUG=1               → { debug: true }
 *   WEFT_LIMITS_DEPTH=500      → { limits: { depth: 500 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "WEFT_";

  for (const [key, value] of Object.entries(env)) {
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

/**
 * Read the known keys out of a merged raw object. Values of the wrong type
 * fall back to the defaults (WEFT_LIMITS_DEPTH=0 parses as `false` and so
 * reads as the default 0).
 */
function resolve(raw: Record<string, unknown>): ResolvedConfig {
  const limits = isRecord(raw.limits) ? raw.limits : {};
  const depth = limits.depth;
  return {
    debug: typeof raw.debug === "boolean" ? raw.debug : DEFAULTS.debug,
    limits: {
      depth: typeof depth === "number" && depth >= 0 ? depth : DEFAULTS.limits.depth,
    },
  };
}

function toRaw(cfg: ResolvedConfig | WeftConfig): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  if (cfg.debug !== undefined) raw.debug = cfg.debug;
  if (cfg.limits !== undefined) {
    const limits: Record<string, unknown> = {};
    if (cfg.limits.depth !== undefined) limits.depth = cfg.limits.depth;
    raw.limits = limits;
  }
  return raw;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "weft";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search the working directory.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });
    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    console.warn(`[weft] Failed to load config file:`, error);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  // Merge: defaults < fileConfig < envConfig
  configStore = resolve(deepMerge(deepMerge(toRaw(DEFAULTS), fileConfig), envConfig));
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

function get(): ResolvedConfig {
  initializeConfig();
  return configStore;
}

/**
 * Set configuration values programmatically.
 */
function set(values: WeftConfig): void {
  initializeConfig();
  configStore = resolve(deepMerge(toRaw(configStore), toRaw(values)));
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
  configStore = DEFAULTS;
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: WeftConfig): WeftConfig {
  return cfg;
}
