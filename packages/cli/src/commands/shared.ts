/**
 * Helpers shared by the merge and split commands.
 *
 * @module cli/commands/shared
 */

import { BundleError, createLogger, ErrorCode, type Logger, type LogLevel, toBundleError } from "@codebundle/core";
import { Err, Ok, type Result } from "@codebundle/shared";
import chalk from "chalk";
import { type BundleConfig, loadConfig, type PartialBundleConfig } from "../config/index.js";

/**
 * Options every bundle command accepts.
 */
export interface CommonCommandOptions {
  filter?: string[];
  config?: string;
  json?: boolean;
  quiet?: boolean;
  logLevel?: LogLevel;
}

export interface CommandContext {
  config: BundleConfig;
  logger: Logger;
}

/**
 * Helper to collect multiple option values into an array.
 */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Turn command-line flags into config overrides. Flags left unset do not override.
 */
export function buildOverrides(
  options: CommonCommandOptions,
  extra: PartialBundleConfig = {}
): PartialBundleConfig {
  return {
    ...extra,
    filters: options.filter && options.filter.length > 0 ? options.filter : undefined,
    json: options.json ? true : undefined,
    logLevel: options.logLevel,
  };
}

/**
 * Load configuration and build the command logger.
 * Logs go to stderr so stdout only carries the command's own output.
 */
export function prepareCommand(
  options: CommonCommandOptions,
  extra: PartialBundleConfig = {}
): Result<CommandContext, BundleError> {
  const loaded = loadConfig({ configPath: options.config, overrides: buildOverrides(options, extra) });
  if (!loaded.ok) {
    return Err(
      new BundleError(loaded.error.message, loaded.error.code, {
        cause: loaded.error.cause,
        context: { path: loaded.error.path },
      })
    );
  }

  const config = loaded.value;
  const logger = createLogger({
    level: config.logLevel,
    json: config.json,
    timestamps: false,
    stderr: true,
  });
  return Ok({ config, logger });
}

/**
 * Print a failure and return the process exit code.
 */
export function reportFailure(error: unknown, json: boolean): number {
  const bundleError = toBundleError(error, ErrorCode.SYSTEM_UNKNOWN);
  if (json) {
    console.error(JSON.stringify({ error: bundleError.toJSON() }));
  } else {
    console.error(chalk.red(`✗ ${bundleError.message}`));
  }
  return 1;
}
