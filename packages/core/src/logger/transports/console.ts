import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const RESET = "\x1b[0m";

/**
 * ANSI color for each log level.
 */
const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m", // gray
  debug: "\x1b[36m", // cyan
  info: "\x1b[32m", // green
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  fatal: "\x1b[35m", // magenta
};

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Prefix lines with a timestamp (default: true) */
  timestamps?: boolean;
  /** Custom writers, mainly for tests (default: console.log / console.error) */
  write?: (line: string) => void;
  writeError?: (line: string) => void;
}

/**
 * Detect if colors should be enabled by default.
 * Disables colors when NO_COLOR or CI is set, or stdout is not a TTY.
 */
function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.CI) {
    return false;
  }
  return process.stdout.isTTY === true;
}

/**
 * Format a timestamp as ISO string without milliseconds.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Console transport with color support.
 * Errors and fatals go to stderr, everything else to stdout.
 *
 * @example
 * ```typescript
 * logger.addTransport(new ConsoleTransport({ colors: false }));
 * // [2026-01-02 10:00:00] [WARN ] Skipping unsafe path {"path":"../x"}
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly timestamps: boolean;
  private readonly write: (line: string) => void;
  private readonly writeError: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.timestamps = options.timestamps ?? true;
    this.write = options.write ?? ((line) => console.log(line));
    this.writeError = options.writeError ?? ((line) => console.error(line));
  }

  log(entry: LogEntry): void {
    const level = entry.level.toUpperCase().padEnd(5);
    const levelTag = this.useColors
      ? `${LEVEL_COLORS[entry.level]}[${level}]${RESET}`
      : `[${level}]`;

    let output = this.timestamps
      ? `[${formatTimestamp(entry.timestamp)}] ${levelTag} ${entry.message}`
      : `${levelTag} ${entry.message}`;

    if (entry.data !== undefined) {
      output += ` ${typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data)}`;
    }

    if (entry.level === "error" || entry.level === "fatal") {
      this.writeError(output);
    } else {
      this.write(output);
    }
  }
}
