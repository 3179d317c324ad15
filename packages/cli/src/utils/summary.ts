import type { MergeResult, SplitResult } from "@codebundle/core";
import chalk from "chalk";

const plural = (count: number, noun: string) => `${count} ${noun}${count === 1 ? "" : "s"}`;

/**
 * One-line report of a finished merge.
 *
 * @example
 * ```text
 * ✓ Merged 12 files into /work/bundle.txt (1 error, ~5321 tokens)
 * ```
 */
export function formatMergeSummary(result: MergeResult): string {
  const errors = plural(result.errorCount, "error");
  return (
    `${chalk.green("✓")} Merged ${plural(result.fileCount, "file")} into ${chalk.bold(result.outputPath)} ` +
    `(${result.errorCount > 0 ? chalk.yellow(errors) : errors}, ~${result.tokenEstimate} tokens)`
  );
}

/**
 * One-line report of a finished split, followed by one line per skipped entry.
 */
export function formatSplitSummary(result: SplitResult): string {
  const lines = [
    `${chalk.green("✓")} Restored ${plural(result.written.length, "file")} ` +
      `(${result.skipped.length} skipped, ` +
      `${result.renamed} renamed, ${plural(result.errorBlocks, "error block")})`,
  ];
  for (const entry of result.skipped) {
    lines.push(chalk.yellow(`  - ${entry.displayPath}: ${entry.reason} (${entry.message})`));
  }
  return lines.join("\n");
}
