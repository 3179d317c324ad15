// ============================================
// Codebundle Error Types
// ============================================

import { ErrorCode } from "@codebundle/shared";

export { ErrorCode };

/**
 * Error severity levels that determine handling strategy.
 */
export enum ErrorSeverity {
  /** Scoped to one file or entry; the batch continues */
  RECOVERABLE = "recoverable",
  /** User needs to fix something (configuration, arguments) */
  USER_ACTION = "user_action",
  /** The whole operation stops */
  FATAL = "fatal",
}

/**
 * Infers the appropriate severity level from an error code.
 *
 * - Per-file load failures, unsafe paths, collision exhaustion → RECOVERABLE
 * - Configuration problems → USER_ACTION
 * - Collection, bundle read, output root failures and unknown errors → FATAL
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.FILE_LOAD_FAILED:
    case ErrorCode.FILE_DECODE_FAILED:
    case ErrorCode.PATH_UNSAFE:
    case ErrorCode.PATH_RESOLUTION_FAILED:
    case ErrorCode.COLLISION_EXHAUSTED:
      return ErrorSeverity.RECOVERABLE;

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
      return ErrorSeverity.USER_ACTION;

    default:
      return ErrorSeverity.FATAL;
  }
}

/**
 * Options for creating a BundleError.
 */
export interface BundleErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for merge and split failures.
 *
 * Provides:
 * - Categorized error codes
 * - Automatic severity inference
 * - Error cause chaining
 * - Additional context
 */
export class BundleError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: BundleErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "BundleError";
    this.code = code;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BundleError);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Type guard to check if an error is a BundleError.
 */
export function isBundleError(error: unknown): error is BundleError {
  return error instanceof BundleError;
}

/**
 * Extract a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap any thrown value in a BundleError, keeping existing BundleErrors as they are.
 */
export function toBundleError(
  error: unknown,
  code: ErrorCode,
  context?: Record<string, unknown>
): BundleError {
  if (isBundleError(error)) {
    return error;
  }
  return new BundleError(errorMessage(error), code, { cause: error, context });
}
