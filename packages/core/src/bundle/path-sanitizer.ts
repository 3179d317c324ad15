/**
 * Path Sanitizer
 *
 * Maps a display path declared in a bundle to a target below the output
 * root. Declared paths are untrusted: anything that would resolve outside
 * the root, or onto the root itself, is rejected.
 *
 * @module bundle/path-sanitizer
 */

import { existsSync, statSync } from "node:fs";
import { dirname, isAbsolute, join, parse, relative, resolve, sep, win32 } from "node:path";
import { Err, Ok, type Result } from "@codebundle/shared";
import { BundleError, ErrorCode, errorMessage } from "../errors/index.js";
import { MAX_RENAME_ATTEMPTS } from "./constants.js";

/**
 * Check that `target` lies strictly below `root`. Both must be resolved.
 */
export function isWithinRoot(target: string, root: string): boolean {
  const rel = relative(root, target);
  if (rel === "" || isAbsolute(rel)) {
    return false;
  }
  return rel !== ".." && !rel.startsWith(`..${sep}`);
}

/**
 * Resolve a declared display path against the output root.
 *
 * - The declared path is read as POSIX; a leading `/` is stripped
 * - Paths still absolute under host or Windows rules (drive letters, UNC) are rejected
 * - `..` segments are allowed only while the result stays inside the root
 *
 * @example
 * ```typescript
 * resolveDeclaredPath("/out", "safe/../safe.txt") // Ok("/out/safe.txt")
 * resolveDeclaredPath("/out", "../outside.txt")   // Err(PATH_UNSAFE)
 * ```
 */
export function resolveDeclaredPath(
  outputRoot: string,
  declaredPath: string
): Result<string, BundleError> {
  try {
    const relativePath = declaredPath.replace(/^\/+/, "");

    if (isAbsolute(relativePath) || win32.isAbsolute(relativePath)) {
      return Err(
        new BundleError(`Skipping absolute path: ${declaredPath}`, ErrorCode.PATH_UNSAFE, {
          context: { declaredPath },
        })
      );
    }

    const root = resolve(outputRoot);
    const target = resolve(root, relativePath);

    if (!isWithinRoot(target, root)) {
      return Err(
        new BundleError(`Skipping unsafe path: ${declaredPath}`, ErrorCode.PATH_UNSAFE, {
          context: { declaredPath, target },
        })
      );
    }

    return Ok(target);
  } catch (error) {
    return Err(
      new BundleError(
        `Error processing path ${declaredPath}: ${errorMessage(error)}`,
        ErrorCode.PATH_RESOLUTION_FAILED,
        { cause: error, context: { declaredPath } }
      )
    );
  }
}

/**
 * Outcome of collision handling.
 */
export interface CollisionResolution {
  path: string;
  /** True when a numbered name was chosen */
  renamed: boolean;
}

/**
 * Pick the path to write to when `target` may already exist.
 *
 * An existing entry is renamed around as `<stem>_<n><ext>` (n = 1, 2, ...)
 * unless `overwrite` is set and it is a plain file, which is then replaced.
 * Directories and other non-file entries are always renamed around.
 *
 * @throws BundleError COLLISION_EXHAUSTED after `maxAttempts` numbered names
 */
export function resolveCollision(
  target: string,
  overwrite: boolean,
  maxAttempts: number = MAX_RENAME_ATTEMPTS
): CollisionResolution {
  const existing = statSync(target, { throwIfNoEntry: false });
  if (!existing || (overwrite && existing.isFile())) {
    return { path: target, renamed: false };
  }

  const dir = dirname(target);
  const { name, ext } = parse(target);

  for (let n = 1; n <= maxAttempts; n++) {
    const candidate = join(dir, `${name}_${n}${ext}`);
    if (!existsSync(candidate)) {
      return { path: candidate, renamed: true };
    }
  }

  throw new BundleError(
    `No free name for ${target} after ${maxAttempts} attempts`,
    ErrorCode.COLLISION_EXHAUSTED,
    { context: { target, maxAttempts } }
  );
}
