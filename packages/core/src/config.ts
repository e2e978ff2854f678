/**
 * Unified Configuration System
 *
 * Provides the process-wide defaults used by decimatrix.
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: DECIMATRIX_* (for CI overrides)
 * 3. Config files: decimatrix.config.js, .decimatrixrc, package.json#decimatrix, etc.
 * 4. Defaults (lowest priority)
 *
 * Configuration only supplies defaults. Operations that depend on a value
 * (such as the rounding tolerance) resolve it once at their entry point and
 * pass it along explicitly.
 *
 * @example
 * ```typescript
 * import { config } from "@decimatrix/core";
 *
 * config.get("roundLimit")        // → 12
 * config.set({ roundLimit: 8 });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Full decimatrix configuration schema.
 */
export interface DecimatrixConfig {
  /** Enable debug logging */
  debug: boolean;
  /**
   * Number of decimal places after which figures are considered insignificant.
   * Any magnitude below 1e-roundLimit is treated as zero.
   */
  roundLimit: number;
  /** Significant digits kept by decimal arithmetic */
  precision: number;
}

export type ConfigKey = keyof DecimatrixConfig;

const DEFAULTS: DecimatrixConfig = {
  debug: false,
  roundLimit: 12,
  precision: 28,
};

const CONFIG_KEYS: readonly ConfigKey[] = ["debug", "roundLimit", "precision"];

// ============================================================================
// Global State
// ============================================================================

let configStore: DecimatrixConfig = { ...DEFAULTS };
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Validation
// ============================================================================

function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate raw values from any source into a partial config.
 * Unknown keys are ignored.
 *
 * @throws TypeError if a known key has a value of the wrong type or range
 */
function validate(values: Record<string, unknown>, source: string): Partial<DecimatrixConfig> {
  const result: Partial<DecimatrixConfig> = {};

  for (const [key, value] of Object.entries(values)) {
    if (!isConfigKey(key) || value === undefined) continue;

    switch (key) {
      case "debug":
        if (typeof value !== "boolean") {
          throw new TypeError(`${source}: 'debug' must be a boolean`);
        }
        result.debug = value;
        break;

      case "roundLimit":
        if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
          throw new TypeError(`${source}: 'roundLimit' must be a non-negative integer`);
        }
        result.roundLimit = value;
        break;

      case "precision":
        if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
          throw new TypeError(`${source}: 'precision' must be a positive integer`);
        }
        result.precision = value;
        break;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "DECIMATRIX_";

function toCamelCase(segment: string): string {
  return segment.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

/**
 * Parse an environment variable value.
 *
 *   "1" | "true"        → true
 *   "0" | "false" | ""  → false
 *   digits              → integer
 */
function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   DECIMATRIX_DEBUG=1          → { debug: true }
 *   DECIMATRIX_ROUND_LIMIT=8    → { roundLimit: 8 }
 *
 * Numeric keys accept "0" and "1" as numbers, not booleans.
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Partial<DecimatrixConfig> {
  const raw: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const name = toCamelCase(key.slice(ENV_PREFIX.length).toLowerCase());
    const parsed = parseEnvValue(value);
    raw[name] = name !== "debug" && typeof parsed === "boolean" ? Number(parsed) : parsed;
  }

  return validate(raw, "environment");
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "decimatrix";

/**
 * Load configuration from the nearest config file, if any.
 */
function loadConfigFromFiles(): Partial<DecimatrixConfig> {
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
  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new TypeError(`${result.filepath}: configuration must be an object`);
  }

  configFilePath = result.filepath;
  return validate(loaded, result.filepath);
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  // Merge: defaults < fileConfig < envConfig
  configStore = { ...DEFAULTS, ...fileConfig, ...envConfig };
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value.
 */
function get<K extends ConfigKey>(key: K): DecimatrixConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically.
 *
 * @throws TypeError if a value is invalid; nothing is applied in that case
 */
function set(values: Partial<DecimatrixConfig>): void {
  initializeConfig();
  configStore = { ...configStore, ...validate({ ...values }, "config.set") };
}

/**
 * Check if a configuration key has a truthy value.
 */
function has(key: ConfigKey): boolean {
  return !!get(key);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<DecimatrixConfig> {
  initializeConfig();
  return { ...configStore };
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so that the next read reloads every source
 * (mainly for testing).
 */
function reset(): void {
  configStore = { ...DEFAULTS };
  configLoaded = false;
  configFilePath = undefined;
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
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: Partial<DecimatrixConfig>): Partial<DecimatrixConfig> {
  return cfg;
}
