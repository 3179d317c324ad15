/**
 * CLI Merge Command
 *
 * Bundle a source tree into one annotated text file.
 *
 * @module cli/commands/merge
 */

import { LOG_LEVELS, mergeSourceTree } from "@codebundle/core";
import { Command, Option } from "commander";
import { createProgressReporter } from "../utils/progress.js";
import { formatMergeSummary } from "../utils/summary.js";
import { type CommonCommandOptions, collect, prepareCommand, reportFailure } from "./shared.js";

export interface MergeCommandOptions extends CommonCommandOptions {
  ext?: string[];
}

/**
 * Run a merge and return the process exit code.
 */
export function runMerge(sourceDir: string, outputFile: string, options: MergeCommandOptions): number {
  const prepared = prepareCommand(options, {
    extensions: options.ext && options.ext.length > 0 ? options.ext : undefined,
  });
  if (!prepared.ok) {
    return reportFailure(prepared.error, options.json ?? false);
  }

  const { config, logger } = prepared.value;
  const progress = createProgressReporter({ label: "Merging", quiet: options.quiet || config.json });

  try {
    const result = mergeSourceTree(sourceDir, outputFile, {
      extensions: config.extensions,
      encodings: config.encodings,
      filters: config.filters,
      logger,
      onProgress: progress.update,
    });
    progress.done();
    console.log(config.json ? JSON.stringify(result, null, 2) : formatMergeSummary(result));
    return 0;
  } catch (error) {
    progress.done();
    return reportFailure(error, config.json);
  }
}

/**
 * Create the merge command with all CLI options.
 */
export function createMergeCommand(): Command {
  return new Command("merge")
    .description("Bundle a source tree into a single file")
    .argument("<sourceDir>", "Directory to bundle")
    .argument("<outputFile>", "Bundle file to write")
    .option("-e, --ext <ext...>", "File extensions to include (e.g. py rs .css)")
    .option("-f, --filter <glob>", "Exclude path segments matching glob (repeatable)", collect, [])
    .option("-c, --config <file>", "Config file (default: nearest codebundle.toml)")
    .option("--json", "Print the result as JSON and log JSON lines")
    .option("-q, --quiet", "Hide the progress line")
    .addOption(new Option("--log-level <level>", "Minimum log level").choices([...LOG_LEVELS]))
    .action((sourceDir: string, outputFile: string, options: MergeCommandOptions) => {
      const code = runMerge(sourceDir, outputFile, options);
      if (code !== 0) {
        process.exit(code);
      }
    });
}
