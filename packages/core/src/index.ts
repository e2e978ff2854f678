/**
 * Core module exports for @decimatrix/core
 *
 * This package provides:
 * - The unified configuration system (defaults for tolerance and precision)
 * - Scoped debug logging
 * - Typeclass interfaces (Eq, Ord, Ring, Numeric, Fractional, Show)
 */

// Configuration System
export {
  config,
  defineConfig,
  type DecimatrixConfig,
  type ConfigKey,
} from "./config.js";

// Logging
export { createLogger, type Logger, type LoggerOptions } from "./logger.js";

// Typeclasses
export {
  type Eq,
  type Ord,
  type Ordering,
  type Ring,
  type Numeric,
  type Fractional,
  type Show,
  LT,
  EQ,
  GT,
  makeOrd,
  sumWith,
  productWith,
} from "./typeclasses.js";
