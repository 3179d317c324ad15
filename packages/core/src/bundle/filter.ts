/**
 * Filter Rules
 *
 * Glob exclusions applied to the file name and to every directory segment,
 * so `node_modules` prunes a whole subtree and `*.min.css` drops single files.
 * Uses picomatch, matching the way globbing is done elsewhere in the codebase.
 *
 * @module bundle/filter
 */

import picomatch from "picomatch";
import type { FilterRule } from "./types.js";

/**
 * Predicate over path segments; true means "exclude".
 */
export type SegmentFilter = (segments: readonly string[]) => boolean;

/**
 * Compile the active rules into one predicate. With no active rules
 * nothing is excluded.
 */
export function createSegmentFilter(rules: readonly FilterRule[] = []): SegmentFilter {
  const patterns = rules.filter((rule) => rule.active).map((rule) => rule.pattern);
  if (patterns.length === 0) {
    return () => false;
  }

  const isMatch = picomatch(patterns, {
    dot: true,
    nocase: process.platform === "win32",
  });

  return (segments) => segments.some((segment) => isMatch(segment));
}

/**
 * Split a POSIX or host path into its non-empty segments, dropping `.`.
 */
export function pathSegments(path: string): string[] {
  return path.split(/[\\/]+/).filter((segment) => segment !== "" && segment !== ".");
}
