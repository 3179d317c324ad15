/**
 * CLI Split Command
 *
 * Rebuild a source tree from a bundle file.
 *
 * @module cli/commands/split
 */

import { LOG_LEVELS, splitBundleFile } from "@codebundle/core";
import { Command, Option } from "commander";
import { createProgressReporter } from "../utils/progress.js";
import { formatSplitSummary } from "../utils/summary.js";
import { type CommonCommandOptions, collect, prepareCommand, reportFailure } from "./shared.js";

export interface SplitCommandOptions extends CommonCommandOptions {
  overwrite?: boolean;
}

/**
 * Run a split and return the process exit code.
 */
export function runSplit(bundleFile: string, outputDir: string, options: SplitCommandOptions): number {
  const prepared = prepareCommand(options, { overwrite: options.overwrite ? true : undefined });
  if (!prepared.ok) {
    return reportFailure(prepared.error, options.json ?? false);
  }

  const { config, logger } = prepared.value;
  const progress = createProgressReporter({ label: "Splitting", quiet: options.quiet || config.json });

  try {
    const result = splitBundleFile(bundleFile, outputDir, {
      overwrite: config.overwrite,
      filters: config.filters,
      logger,
      onProgress: progress.update,
    });
    progress.done();
    console.log(config.json ? JSON.stringify(result, null, 2) : formatSplitSummary(result));
    return 0;
  } catch (error) {
    progress.done();
    return reportFailure(error, config.json);
  }
}

/**
 * Create the split command with all CLI options.
 */
export function createSplitCommand(): Command {
  return new Command("split")
    .description("Restore files from a bundle")
    .argument("<bundleFile>", "Bundle file to read")
    .argument("<outputDir>", "Directory to restore into (created when missing)")
    .option("--overwrite", "Replace existing files instead of renaming")
    .option("-f, --filter <glob>", "Skip entries with a path segment matching glob (repeatable)", collect, [])
    .option("-c, --config <file>", "Config file (default: nearest codebundle.toml)")
    .option("--json", "Print the result as JSON and log JSON lines")
    .option("-q, --quiet", "Hide the progress line")
    .addOption(new Option("--log-level <level>", "Minimum log level").choices([...LOG_LEVELS]))
    .action((bundleFile: string, outputDir: string, options: SplitCommandOptions) => {
      const code = runSplit(bundleFile, outputDir, options);
      if (code !== 0) {
        process.exit(code);
      }
    });
}
