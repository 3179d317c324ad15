/**
 * Single-line percentage progress for long merges and splits.
 *
 * @module cli/utils/progress
 */

import type { ProgressCallback } from "@codebundle/core";
import chalk from "chalk";

/**
 * Minimal stream surface the reporter writes to.
 */
export interface ProgressStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface ProgressReporterOptions {
  /** Text shown before the percentage */
  label: string;
  /** Suppress all output */
  quiet?: boolean;
  /** Target stream (default: process.stderr). Nothing is drawn unless it is a TTY. */
  stream?: ProgressStream;
}

export interface ProgressReporter {
  update: ProgressCallback;
  /** Finish the line if anything was drawn */
  done(): void;
}

/**
 * Whole percentage of `current` over `total`; an empty run counts as complete.
 */
export function toPercent(current: number, total: number): number {
  if (total <= 0) {
    return 100;
  }
  return Math.min(100, Math.floor((current * 100) / total));
}

/**
 * Create a reporter that redraws `\r<label> <n>%` whenever the percentage changes.
 */
export function createProgressReporter(options: ProgressReporterOptions): ProgressReporter {
  const stream = options.stream ?? process.stderr;
  const enabled = !options.quiet && stream.isTTY === true;
  let last = -1;

  return {
    update(current, total) {
      if (!enabled) return;
      const percent = toPercent(current, total);
      if (percent === last) return;
      last = percent;
      stream.write(`\r${chalk.cyan(options.label)} ${percent}%`);
    },
    done() {
      if (enabled && last >= 0) {
        stream.write("\n");
        last = -1;
      }
    },
  };
}
