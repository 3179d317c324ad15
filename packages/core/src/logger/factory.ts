import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'codebundle') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** If true, output JSON lines instead of human-readable text (default: false) */
  json?: boolean;
  /** Enable colored console output (auto-detected when omitted) */
  colors?: boolean;
  /** Include timestamps in console output (default: true) */
  timestamps?: boolean;
  /** Send every console line to stderr, keeping stdout for command output (default: false) */
  stderr?: boolean;
}

/**
 * Factory function to create a Logger with common transport configurations.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * const machineLogger = createLogger({ json: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: { logger: options.name ?? "codebundle" },
  });

  if (options.console ?? true) {
    if (options.json) {
      logger.addTransport(new JsonTransport());
    } else {
      logger.addTransport(
        new ConsoleTransport({
          colors: options.colors,
          timestamps: options.timestamps,
          write: options.stderr ? (line) => console.error(line) : undefined,
        })
      );
    }
  }

  return logger;
}

/**
 * Logger used when a caller supplies none. It has no transports, so it is silent.
 */
export function createSilentLogger(): Logger {
  return new Logger();
}
