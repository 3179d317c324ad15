// Factory
export type { CreateLoggerOptions } from "./factory.js";
export { createLogger, createSilentLogger } from "./factory.js";
export { Logger } from "./logger.js";
// Transports
export type { ConsoleTransportOptions } from "./transports/console.js";
export { ConsoleTransport } from "./transports/console.js";
export type { JsonTransportOptions } from "./transports/json.js";
export { JsonTransport } from "./transports/json.js";
export type {
  LogEntry,
  LoggerOptions,
  LogLevel,
  LogTransport,
  TimerResult,
} from "./types.js";
export { LOG_LEVEL_PRIORITY, LOG_LEVELS } from "./types.js";
