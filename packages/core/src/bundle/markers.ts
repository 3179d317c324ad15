/**
 * Marker Codec
 *
 * Builds and recognizes the marker lines that delimit files in a bundle:
 *
 * ```text
 * <leader> [[ SCB ]] START FILE: <displayPath><suffix>
 * <leader> [[ SCB ]] END FILE: <displayPath><suffix>
 * <leader> [[ SCB ]] START ERROR: <displayPath><suffix>
 * <leader> [[ SCB ]] ERROR: <message><suffix>
 * <leader> [[ SCB ]] END ERROR: <displayPath><suffix>
 * ```
 *
 * The leader is the line-comment token of the file's language so the bundle
 * still reads as source. Block comments (CSS) also need the closing suffix.
 *
 * @module bundle/markers
 */

import { extname } from "node:path";
import { SENTINEL } from "./constants.js";

export type MarkerKind = "START_FILE" | "END_FILE" | "START_ERROR" | "ERROR_MSG" | "END_ERROR";

export type CommentStyle = "hash" | "slash" | "triple-slash" | "block";

export interface CommentSyntax {
  leader: string;
  /** Appended to every marker line; empty for line comments */
  closingSuffix: string;
}

export const COMMENT_STYLES: Record<CommentStyle, CommentSyntax> = {
  hash: { leader: "#", closingSuffix: "" },
  slash: { leader: "//", closingSuffix: "" },
  "triple-slash": { leader: "///", closingSuffix: "" },
  block: { leader: "/*", closingSuffix: " */" },
};

const EXTENSION_STYLES: Readonly<Record<string, CommentStyle>> = {
  ".py": "hash",
  ".sh": "hash",
  ".rb": "hash",
  ".yaml": "hash",
  ".yml": "hash",
  ".toml": "hash",
  ".rs": "triple-slash",
  ".c": "slash",
  ".h": "slash",
  ".cpp": "slash",
  ".hpp": "slash",
  ".js": "slash",
  ".jsx": "slash",
  ".ts": "slash",
  ".tsx": "slash",
  ".java": "slash",
  ".go": "slash",
  ".css": "block",
};

const KEYWORDS: Record<MarkerKind, string> = {
  START_FILE: "START FILE:",
  END_FILE: "END FILE:",
  START_ERROR: "START ERROR:",
  ERROR_MSG: "ERROR:",
  END_ERROR: "END ERROR:",
};

const KIND_BY_KEYWORD: Readonly<Record<string, MarkerKind>> = {
  "START FILE": "START_FILE",
  "END FILE": "END_FILE",
  "START ERROR": "START_ERROR",
  ERROR: "ERROR_MSG",
  "END ERROR": "END_ERROR",
};

// leader, keyword, value, optional block-comment close
const MARKER_PATTERN =
  /^(\S+)\s+\[\[ SCB \]\] (START FILE|END FILE|START ERROR|END ERROR|ERROR):\s+(.+?)(\s*\*\/)?$/;

/**
 * A recognized marker line.
 */
export interface Marker {
  kind: MarkerKind;
  /** Display path, or the message for ERROR_MSG */
  value: string;
  leader: string;
  hasClosingSuffix: boolean;
}

/**
 * Comment syntax for a file, chosen by its (case-insensitive) extension.
 * Unknown extensions use `//`.
 */
export function commentSyntaxFor(filePath: string): CommentSyntax {
  const style = EXTENSION_STYLES[extname(filePath).toLowerCase()] ?? "slash";
  return COMMENT_STYLES[style];
}

/**
 * Render one marker line (without the line terminator).
 *
 * @param value - display path, or the message for ERROR_MSG
 */
export function formatMarker(kind: MarkerKind, value: string, syntax: CommentSyntax): string {
  return `${syntax.leader} ${SENTINEL} ${KEYWORDS[kind]} ${value}${syntax.closingSuffix}`;
}

/**
 * Recognize a marker line. Surrounding whitespace and the line terminator
 * are ignored, and any non-whitespace token is accepted as the leader.
 *
 * @returns the marker, or undefined for ordinary lines
 */
export function parseMarker(line: string): Marker | undefined {
  const match = MARKER_PATTERN.exec(line.trim());
  if (!match) {
    return undefined;
  }
  const [, leader = "", keyword = "", value = "", suffix] = match;
  const kind = KIND_BY_KEYWORD[keyword];
  if (!kind) {
    return undefined;
  }
  return { kind, value, leader, hasClosingSuffix: suffix !== undefined };
}
