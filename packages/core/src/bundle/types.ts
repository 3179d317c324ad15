/**
 * Bundle Types
 *
 * @module bundle/types
 */

import type { ErrorCode, Result } from "@codebundle/shared";
import type { Logger } from "../logger/index.js";

/**
 * Synchronous progress notification. Merge calls it once per file,
 * split every few lines and once at completion.
 */
export type ProgressCallback = (current: number, total: number) => void;

/**
 * Glob pattern excluding matching files and directories.
 * Matched against the file name and every path segment.
 */
export interface FilterRule {
  pattern: string;
  active: boolean;
}

/**
 * Why a file could not be loaded.
 * - FILE_DECODE_FAILED: every encoding failed or looked binary
 * - FILE_LOAD_FAILED: the file could not be read
 */
export interface LoadFailure {
  code: ErrorCode.FILE_DECODE_FAILED | ErrorCode.FILE_LOAD_FAILED;
  message: string;
}

/**
 * Text content of a file and the statistics shown in the index.
 */
export interface LoadedContent {
  text: string;
  encoding: string;
  /** UTF-8 byte length */
  byteLength: number;
  /** Newline count + 1 */
  lineCount: number;
}

/**
 * One collected file on its way into a bundle.
 */
export interface SourceFile {
  absolutePath: string;
  /** POSIX, "./"-prefixed path persisted in the markers */
  displayPath: string;
  content: Result<LoadedContent, LoadFailure>;
}

/**
 * Options shared by merge and split.
 */
export interface BaseBundleOptions {
  /** Exclusion rules; inactive rules are ignored */
  filters?: readonly FilterRule[];
  /** Progress sink */
  onProgress?: ProgressCallback;
  /** Defaults to a silent logger */
  logger?: Logger;
}

export interface MergeOptions extends BaseBundleOptions {
  /** Extensions to collect (default: DEFAULT_EXTENSIONS); normalized to lower-case ".ext" */
  extensions?: readonly string[];
  /** Encodings tried in order when decoding files */
  encodings?: readonly string[];
}

export interface MergeResult {
  outputPath: string;
  /** Files written as content or error blocks */
  fileCount: number;
  /** Files written as error blocks */
  errorCount: number;
  /** Emitted characters / 4; a coarse sizing signal, not a tokenizer */
  tokenEstimate: number;
  /** Display paths in bundle order */
  files: string[];
}

export interface SplitOptions extends BaseBundleOptions {
  /** Replace existing plain files instead of renaming around them */
  overwrite?: boolean;
}

/**
 * An entry the parser declined to materialize.
 */
export interface SkippedEntry {
  displayPath: string;
  reason: "filtered" | "unsafe" | "unresolvable" | "collision" | "io";
  message: string;
}

export interface SplitResult {
  /** Absolute paths of files written, in bundle order */
  written: string[];
  skipped: SkippedEntry[];
  /** Entries written under a numbered name */
  renamed: number;
  /** Error blocks passed over */
  errorBlocks: number;
}
