/**
 * File Collector
 *
 * Recursively enumerates the files a merge should bundle. Skips every
 * path segment that starts with "." and every entry matched by an active
 * filter rule, keeps only the requested extensions, and follows symbolic
 * links (a link back into its own ancestry is not
 * walked again).
 *
 * @module bundle/collector
 */

import { type Dirent, readdirSync, realpathSync, statSync } from "node:fs";
import { extname, join, resolve } from "node:path";
import { BundleError, ErrorCode } from "../errors/index.js";
import { DEFAULT_EXTENSIONS } from "./constants.js";
import { createSegmentFilter, type SegmentFilter } from "./filter.js";
import type { FilterRule } from "./types.js";

export interface CollectOptions {
  extensions?: readonly string[];
  filters?: readonly FilterRule[];
}

/**
 * Normalize extensions to a lower-cased, dot-prefixed set.
 *
 * @example
 * ```typescript
 * normalizeExtensions(["PY", ".Rs", "py"]) // Set { ".py", ".rs" }
 * ```
 */
export function normalizeExtensions(extensions: readonly string[]): Set<string> {
  const normalized = new Set<string>();
  for (const raw of extensions) {
    const ext = raw.trim().toLowerCase();
    if (ext === "" || ext === ".") continue;
    normalized.add(ext.startsWith(".") ? ext : `.${ext}`);
  }
  return normalized;
}

interface WalkState {
  extensions: Set<string>;
  isExcluded: SegmentFilter;
  /** Real paths of the directories on the current walk path */
  ancestors: Set<string>;
  files: string[];
}

/**
 * Collect candidate files below `sourceRoot`.
 *
 * @returns absolute paths in no particular order
 * @throws BundleError COLLECTION_FAILED when the root or a directory cannot be read
 */
export function collectFiles(sourceRoot: string, options: CollectOptions = {}): string[] {
  const root = resolve(sourceRoot);

  let isDirectory: boolean;
  try {
    isDirectory = statSync(root).isDirectory();
  } catch (error) {
    throw new BundleError(`Source directory not found: ${sourceRoot}`, ErrorCode.COLLECTION_FAILED, {
      cause: error,
      context: { sourceRoot },
    });
  }
  if (!isDirectory) {
    throw new BundleError(`Source path is not a directory: ${sourceRoot}`, ErrorCode.COLLECTION_FAILED, {
      context: { sourceRoot },
    });
  }

  const state: WalkState = {
    extensions: normalizeExtensions(options.extensions ?? DEFAULT_EXTENSIONS),
    isExcluded: createSegmentFilter(options.filters),
    ancestors: new Set(),
    files: [],
  };

  walk(root, state);
  return state.files;
}

function walk(dir: string, state: WalkState): void {
  let realDir: string;
  let entries: Dirent[];
  try {
    realDir = realpathSync(dir);
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw new BundleError(`Failed to read directory: ${dir}`, ErrorCode.COLLECTION_FAILED, {
      cause: error,
      context: { dir },
    });
  }

  // Symlink cycles
  if (state.ancestors.has(realDir)) {
    return;
  }
  state.ancestors.add(realDir);

  for (const entry of entries) {
    const name = entry.name;
    if (name.startsWith(".") || state.isExcluded([name])) {
      continue;
    }

    const fullPath = join(dir, name);
    const kind = entryKind(entry, fullPath);

    if (kind === "directory") {
      walk(fullPath, state);
    } else if (kind === "file" && state.extensions.has(extname(name).toLowerCase())) {
      state.files.push(fullPath);
    }
  }

  state.ancestors.delete(realDir);
}

/**
 * Classify an entry, resolving symbolic links. Dangling links count as neither.
 */
function entryKind(entry: Dirent, fullPath: string): "file" | "directory" | "other" {
  if (entry.isSymbolicLink()) {
    try {
      const stats = statSync(fullPath, { throwIfNoEntry: false });
      if (!stats) return "other";
      return stats.isDirectory() ? "directory" : stats.isFile() ? "file" : "other";
    } catch {
      // Link loops and unreadable targets are left out like dangling links
      return "other";
    }
  }
  if (entry.isDirectory()) return "directory";
  if (entry.isFile()) return "file";
  return "other";
}
