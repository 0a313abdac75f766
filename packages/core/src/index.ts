/**
 * Core module exports for @powser/core
 *
 * This package provides:
 * - Configuration (defaults, config file, POWSER_* environment, programmatic)
 * - Scoped debug logging
 */

// Configuration System
export {
  config,
  defineConfig,
  loadConfigFromEnv,
  DEFAULT_DISPLAY_TERMS,
  type PowserConfig,
  type DisplayConfig,
} from "./config.js";

// Logging
export { createLogger, type Logger } from "./logger.js";
export { setLogWriter, resetLogWriter, type LogWriter } from "./writer.js";
