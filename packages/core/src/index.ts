// ============================================
// Codebundle Core
// ============================================

/**
 * @module @codebundle/core
 *
 * Bundling codec: turns a source tree into one annotated text file and
 * rebuilds the tree from it. Also provides the logger and error types the
 * CLI shares.
 */

// ============================================
// Bundle Codec
// ============================================
export * from "./bundle/index.js";

// ============================================
// Errors
// ============================================
export {
  BundleError,
  type BundleErrorOptions,
  ErrorCode,
  ErrorSeverity,
  errorMessage,
  inferSeverity,
  isBundleError,
  toBundleError,
} from "./errors/index.js";

// ============================================
// Logger
// ============================================
export {
  ConsoleTransport,
  type ConsoleTransportOptions,
  type CreateLoggerOptions,
  createLogger,
  createSilentLogger,
  JsonTransport,
  type JsonTransportOptions,
  LOG_LEVEL_PRIORITY,
  LOG_LEVELS,
  type LogEntry,
  Logger,
  type LoggerOptions,
  type LogLevel,
  type LogTransport,
  type TimerResult,
} from "./logger/index.js";

// ============================================
// Telemetry
// ============================================
export { TRACER_NAME, withSpan } from "./telemetry/index.js";

// Result type
export { Err, Ok, type Result } from "@codebundle/shared";
