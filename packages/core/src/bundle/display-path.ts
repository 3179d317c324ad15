/**
 * Display Paths
 *
 * The display path is the only identifier persisted into a bundle. It keeps
 * the source root's own directory name as its first component so a split
 * recreates the root folder:
 *
 * ```text
 * root /work/app, file /work/app/src/main.py  → ./app/src/main.py
 * root /,         file /etc/x.conf            → ./etc/x.conf
 * ```
 *
 * @module bundle/display-path
 */

import { basename, dirname, relative, resolve, sep } from "node:path";

/**
 * Force forward slashes regardless of host conventions.
 */
export function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

/**
 * Compute the display path of a file below a source root.
 */
export function computeDisplayPath(sourceRoot: string, filePath: string): string {
  const root = resolve(sourceRoot);
  const parent = dirname(root);

  if (parent === root) {
    // Filesystem root: there is no parent whose relative path keeps the name
    const name = basename(root);
    const rel = toPosix(relative(root, filePath));
    return name ? `./${name}/${rel}` : `./${rel}`;
  }

  return `./${toPosix(relative(parent, filePath))}`;
}

/**
 * Order display paths by code point, independent of locale and traversal order.
 * UTF-8 byte order equals code point order.
 */
export function compareDisplayPaths(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}
