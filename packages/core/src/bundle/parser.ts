/**
 * Bundle Parser (split)
 *
 * Line-oriented state machine that rebuilds files from bundle text.
 *
 * States:
 * - Idle: no output open; ordinary lines are discarded
 * - Writing: one output open; ordinary lines are appended verbatim
 *
 * Malformed input never raises: stray markers are dropped, an unterminated
 * file keeps what was written, and unsafe or failing entries are skipped
 * with a log line. Only an unreadable bundle or an output root that cannot
 * be created stop the split.
 *
 * @module bundle/parser
 */

import { closeSync, mkdirSync, openSync, readFileSync, writeSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { BundleError, ErrorCode, errorMessage, isBundleError } from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logger/index.js";
import { withSpan } from "../telemetry/index.js";
import { MAX_ERROR_BLOCK_LINES, SPLIT_PROGRESS_STRIDE } from "./constants.js";
import { createSegmentFilter, pathSegments, type SegmentFilter } from "./filter.js";
import { isBlankLine, splitLinesKeepEnds } from "./lines.js";
import { type Marker, parseMarker } from "./markers.js";
import { resolveCollision, resolveDeclaredPath } from "./path-sanitizer.js";
import type { SkippedEntry, SplitOptions, SplitResult } from "./types.js";

/**
 * Segments a filter rule is tested against. A display path's leading
 * component is the merged root, which merge never filters either.
 */
function filteredSegments(declaredPath: string): string[] {
  const segments = pathSegments(declaredPath);
  return declaredPath.startsWith("./") && segments.length > 1 ? segments.slice(1) : segments;
}

/**
 * The single file open during a split.
 */
class OutputTarget {
  private fd: number | null;

  constructor(
    readonly declaredPath: string,
    readonly path: string
  ) {
    this.fd = openSync(path, "w");
  }

  write(line: string): void {
    if (this.fd === null) {
      throw new Error(`Output already closed: ${this.path}`);
    }
    writeSync(this.fd, line, null, "utf8");
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

interface ParserContext {
  outputRoot: string;
  overwrite: boolean;
  isExcluded: SegmentFilter;
  logger: Logger;
  result: SplitResult;
}

/**
 * Split bundle text into files below `outputRoot`.
 * The output root must already exist.
 */
export function splitBundleText(
  text: string,
  outputRoot: string,
  options: SplitOptions = {}
): SplitResult {
  const ctx: ParserContext = {
    outputRoot: resolve(outputRoot),
    overwrite: options.overwrite ?? false,
    isExcluded: createSegmentFilter(options.filters),
    logger: options.logger ?? createSilentLogger(),
    result: { written: [], skipped: [], renamed: 0, errorBlocks: 0 },
  };

  const lines = splitLinesKeepEnds(text);
  const total = lines.length;
  const onProgress = options.onProgress;
  let current: OutputTarget | null = null;

  try {
    let i = 0;
    while (i < total) {
      if (onProgress && i % SPLIT_PROGRESS_STRIDE === 0) {
        onProgress(i, total);
      }

      const line = lines[i] ?? "";
      const marker = parseMarker(line);

      if (marker?.kind === "START_FILE") {
        if (current) {
          finish(current, ctx);
        }
        current = openTarget(marker, ctx);
        i++;
        continue;
      }

      if (marker?.kind === "END_FILE" && current && marker.value === current.declaredPath) {
        finish(current, ctx);
        current = null;
        i++;
        // Block separator
        if (i < total && isBlankLine(lines[i] ?? "")) {
          i++;
        }
        continue;
      }

      if (marker?.kind === "START_ERROR") {
        ctx.result.errorBlocks++;
        i = skipErrorBlock(lines, i, marker, ctx.logger);
        continue;
      }

      if (marker?.kind === "ERROR_MSG") {
        // Stray error message outside an error block
        i++;
        continue;
      }

      if (current && !appendLine(current, line, ctx)) {
        current = null;
      }
      i++;
    }

    // Missing END FILE: keep what was written
    if (current) {
      ctx.logger.warn("Bundle ended inside a file block", { path: current.declaredPath });
      finish(current, ctx);
      current = null;
    }
  } finally {
    current?.close();
  }

  onProgress?.(total, total);
  return ctx.result;
}

/**
 * Split a bundle file into `outputDir`, creating it when missing.
 *
 * @throws BundleError BUNDLE_READ_FAILED or OUTPUT_ROOT_FAILED
 */
export function splitBundleFile(
  bundleFile: string,
  outputDir: string,
  options: SplitOptions = {}
): SplitResult {
  return withSpan("codebundle.split", { "codebundle.bundle_file": bundleFile }, () => {
    const logger = (options.logger ?? createSilentLogger()).child({ operation: "split" });
    const timer = logger.time("split");
    logger.info("Splitting bundle", { bundleFile, outputDir });

    try {
      mkdirSync(outputDir, { recursive: true });
    } catch (error) {
      throw new BundleError(`Cannot create output directory: ${outputDir}`, ErrorCode.OUTPUT_ROOT_FAILED, {
        cause: error,
        context: { outputDir },
      });
    }

    let text: string;
    try {
      text = readFileSync(bundleFile, "utf8");
    } catch (error) {
      throw new BundleError(`Cannot read bundle: ${bundleFile}`, ErrorCode.BUNDLE_READ_FAILED, {
        cause: error,
        context: { bundleFile },
      });
    }

    const result = splitBundleText(text, outputDir, { ...options, logger });
    timer.end("Split completed");
    logger.info("Files restored", {
      written: result.written.length,
      skipped: result.skipped.length,
      renamed: result.renamed,
    });
    return result;
  });
}

/**
 * Handle a START FILE marker: sanitize, filter, resolve collisions and open.
 * Returns null (Idle) when the entry is skipped.
 */
function openTarget(marker: Marker, ctx: ParserContext): OutputTarget | null {
  const declaredPath = marker.value;

  if (ctx.isExcluded(filteredSegments(declaredPath))) {
    ctx.logger.info("Skipping filtered path", { path: declaredPath });
    skip(ctx, declaredPath, "filtered", "Excluded by filter rule");
    return null;
  }

  const resolved = resolveDeclaredPath(ctx.outputRoot, declaredPath);
  if (!resolved.ok) {
    const reason = resolved.error.code === ErrorCode.PATH_UNSAFE ? "unsafe" : "unresolvable";
    if (reason === "unsafe") {
      ctx.logger.warn(resolved.error.message, { path: declaredPath });
    } else {
      ctx.logger.error(resolved.error.message, { path: declaredPath });
    }
    skip(ctx, declaredPath, reason, resolved.error.message);
    return null;
  }

  try {
    mkdirSync(dirname(resolved.value), { recursive: true });
    const { path, renamed } = resolveCollision(resolved.value, ctx.overwrite);
    if (renamed) {
      ctx.result.renamed++;
      ctx.logger.info("Duplicate filename detected, renamed", { path: declaredPath, target: path });
    }
    return new OutputTarget(declaredPath, path);
  } catch (error) {
    const reason = isBundleError(error) && error.code === ErrorCode.COLLISION_EXHAUSTED ? "collision" : "io";
    const message = errorMessage(error);
    ctx.logger.error(`Error processing path ${declaredPath}`, { reason: message });
    skip(ctx, declaredPath, reason, message);
    return null;
  }
}

/**
 * Close a completed target and record it as written.
 */
function finish(target: OutputTarget, ctx: ParserContext): void {
  target.close();
  ctx.result.written.push(target.path);
}

/**
 * Append a line to the open target. A failed write closes the target,
 * records the entry as skipped and returns false (Idle).
 */
function appendLine(target: OutputTarget, line: string, ctx: ParserContext): boolean {
  try {
    target.write(line);
    return true;
  } catch (error) {
    const message = errorMessage(error);
    ctx.logger.error(`Error writing ${target.declaredPath}`, { reason: message });
    target.close();
    skip(ctx, target.declaredPath, "io", message);
    return false;
  }
}

function skip(
  ctx: ParserContext,
  displayPath: string,
  reason: SkippedEntry["reason"],
  message: string
): void {
  ctx.result.skipped.push({ displayPath, reason, message });
}

/**
 * Pass over an error block starting at `start`.
 *
 * @returns index of the first line after the block (and its separator line).
 * When no matching END ERROR appears within the limit, scanning resumes on
 * the line after START ERROR.
 */
function skipErrorBlock(
  lines: readonly string[],
  start: number,
  marker: Marker,
  logger: Logger
): number {
  const limit = Math.min(lines.length, start + 1 + MAX_ERROR_BLOCK_LINES);

  for (let i = start + 1; i < limit; i++) {
    const candidate = parseMarker(lines[i] ?? "");
    if (candidate?.kind === "END_ERROR" && candidate.value === marker.value) {
      let next = i + 1;
      if (next < lines.length && isBlankLine(lines[next] ?? "")) {
        next++;
      }
      return next;
    }
  }

  logger.warn("Error block has no matching END ERROR marker", { path: marker.value });
  return start + 1;
}
