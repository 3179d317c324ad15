/**
 * Bundle Writer (merge)
 *
 * Serializes a directory into bundle text:
 *
 * ```text
 * # [[ SCB ]] FILE INDEX START
 * # Total Files: 2
 * # 
 * # ./app/main.py    | SIZE: 0.1kb | LINES: 4
 * # ./app/logo.dat   [Error reading file]
 * # [[ SCB ]] FILE INDEX END
 *
 * # [[ SCB ]] START FILE: ./app/main.py
 * ...content...
 * # [[ SCB ]] END FILE: ./app/main.py
 *
 * // [[ SCB ]] START ERROR: ./app/logo.dat
 * // [[ SCB ]] ERROR: Cannot read file (binary or unsupported encoding)
 * // [[ SCB ]] END ERROR: ./app/logo.dat
 *
 * ```
 *
 * Every file is loaded before anything is written so the index columns can
 * be aligned; output is byte-identical for an unchanged tree.
 *
 * @module bundle/writer
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { BundleError, ErrorCode } from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logger/index.js";
import { withSpan } from "../telemetry/index.js";
import { collectFiles } from "./collector.js";
import {
  CHARS_PER_TOKEN,
  INDEX_END,
  INDEX_ERROR_NOTE,
  INDEX_START,
} from "./constants.js";
import { DEFAULT_ENCODINGS, loadContent } from "./content-loader.js";
import { compareDisplayPaths, computeDisplayPath } from "./display-path.js";
import { commentSyntaxFor, formatMarker } from "./markers.js";
import type { MergeOptions, MergeResult, ProgressCallback, SourceFile } from "./types.js";

/**
 * Collect, order and load every file of a source tree.
 * Per-file failures are kept on the entry; only collection errors throw.
 */
export function prepareSourceFiles(
  sourceRoot: string,
  options: Pick<MergeOptions, "extensions" | "filters" | "encodings" | "logger"> = {}
): SourceFile[] {
  const logger = options.logger ?? createSilentLogger();
  const encodings = options.encodings ?? DEFAULT_ENCODINGS;

  const paths = collectFiles(sourceRoot, {
    extensions: options.extensions,
    filters: options.filters,
  });

  const entries = paths
    .map((absolutePath) => ({
      absolutePath,
      displayPath: computeDisplayPath(sourceRoot, absolutePath),
    }))
    .sort((a, b) => compareDisplayPaths(a.displayPath, b.displayPath));

  return entries.map((entry) => {
    const content = loadContent(entry.absolutePath, encodings);
    if (content.ok) {
      logger.debug("Loaded file", { path: entry.displayPath, encoding: content.value.encoding });
    } else {
      logger.warn("Cannot read file", {
        path: entry.displayPath,
        code: content.error.code,
        reason: content.error.message,
      });
    }
    return { ...entry, content };
  });
}

/**
 * Format a byte count as kilobytes with one decimal, rounding ties to even.
 * `bytes * 10 / 1024` is exact in binary, so a tie is detected exactly.
 */
export function formatKb(bytes: number): string {
  const tenths = (bytes * 10) / 1024;
  const floor = Math.floor(tenths);
  const fraction = tenths - floor;
  const rounded = fraction > 0.5 || (fraction === 0.5 && floor % 2 === 1) ? floor + 1 : floor;
  return `${Math.floor(rounded / 10)}.${rounded % 10}`;
}

/** Display width of a path in code points. */
function displayWidth(text: string): number {
  return [...text].length;
}

function padToWidth(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - displayWidth(text)));
}

/**
 * Render the index block. Empty when there are no files.
 */
export function renderIndex(files: readonly SourceFile[]): string {
  if (files.length === 0) {
    return "";
  }

  const sizes = files.map((file) => (file.content.ok ? formatKb(file.content.value.byteLength) : ""));
  // No spread here: file counts can exceed the engine argument limit
  let pathWidth = 0;
  let sizeWidth = 0;
  let linesWidth = 0;
  files.forEach((file, i) => {
    pathWidth = Math.max(pathWidth, displayWidth(file.displayPath));
    sizeWidth = Math.max(sizeWidth, (sizes[i] ?? "").length);
    if (file.content.ok) {
      linesWidth = Math.max(linesWidth, String(file.content.value.lineCount).length);
    }
  });

  const lines = [INDEX_START, `# Total Files: ${files.length}`, "# "];
  files.forEach((file, i) => {
    const path = padToWidth(file.displayPath, pathWidth);
    if (file.content.ok) {
      const size = (sizes[i] ?? "").padStart(sizeWidth);
      const lineCount = String(file.content.value.lineCount).padStart(linesWidth);
      lines.push(`# ${path} | SIZE: ${size}kb | LINES: ${lineCount}`);
    } else {
      lines.push(`# ${path} ${INDEX_ERROR_NOTE}`);
    }
  });
  lines.push(INDEX_END);

  return `${lines.join("\n")}\n\n`;
}

/**
 * Render one file as a content block, or an error block when it failed to load.
 */
export function renderFileBlock(file: SourceFile): string {
  const syntax = commentSyntaxFor(file.absolutePath);

  if (!file.content.ok) {
    return [
      formatMarker("START_ERROR", file.displayPath, syntax),
      formatMarker("ERROR_MSG", file.content.error.message, syntax),
      formatMarker("END_ERROR", file.displayPath, syntax),
      "",
      "",
    ].join("\n");
  }

  const text = file.content.value.text;
  const terminator = text !== "" && !text.endsWith("\n") && !text.endsWith("\r") ? "\n" : "";

  return (
    `${formatMarker("START_FILE", file.displayPath, syntax)}\n` +
    text +
    terminator +
    `${formatMarker("END_FILE", file.displayPath, syntax)}\n\n`
  );
}

/**
 * Render loaded files into bundle text, notifying progress after every file.
 */
export function renderBundle(files: readonly SourceFile[], onProgress?: ProgressCallback): string {
  const parts = [renderIndex(files)];
  files.forEach((file, i) => {
    parts.push(renderFileBlock(file));
    onProgress?.(i + 1, files.length);
  });
  return parts.join("");
}

/**
 * Coarse token count for sizing a bundle: characters / 4.
 */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

/**
 * Merge a source tree into a bundle file.
 *
 * @throws BundleError COLLECTION_FAILED when the tree cannot be walked,
 * OUTPUT_WRITE_FAILED when the bundle cannot be written
 */
export function mergeSourceTree(
  sourceRoot: string,
  outputFile: string,
  options: MergeOptions = {}
): MergeResult {
  return withSpan("codebundle.merge", { "codebundle.source_root": sourceRoot }, () => {
    const logger: Logger = (options.logger ?? createSilentLogger()).child({ operation: "merge" });
    const timer = logger.time("merge");
    logger.info("Merging source tree", { sourceRoot, outputFile });

    const files = prepareSourceFiles(sourceRoot, { ...options, logger });
    const text = renderBundle(files, options.onProgress);

    const outputPath = resolve(outputFile);
    try {
      mkdirSync(dirname(outputPath), { recursive: true });
      writeFileSync(outputPath, text, "utf8");
    } catch (error) {
      throw new BundleError(`Cannot write bundle: ${outputFile}`, ErrorCode.OUTPUT_WRITE_FAILED, {
        cause: error,
        context: { outputFile },
      });
    }

    const errorCount = files.filter((file) => !file.content.ok).length;
    timer.end("Merge completed");
    logger.info("Bundle written", { outputPath, files: files.length, errors: errorCount });

    return {
      outputPath,
      fileCount: files.length,
      errorCount,
      tokenEstimate: estimateTokens(text),
      files: files.map((file) => file.displayPath),
    };
  });
}
