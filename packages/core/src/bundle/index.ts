// ============================================
// Bundle Codec - Barrel Export
// ============================================

export { collectFiles, normalizeExtensions, type CollectOptions } from "./collector.js";
export {
  BINARY_SAMPLE_SIZE,
  BINARY_THRESHOLD,
  DECODE_FAILURE_MESSAGE,
  DEFAULT_EXTENSIONS,
  INDEX_END,
  INDEX_START,
  MAX_ERROR_BLOCK_LINES,
  MAX_RENAME_ATTEMPTS,
  SENTINEL,
  SPLIT_PROGRESS_STRIDE,
} from "./constants.js";
export {
  DEFAULT_ENCODINGS,
  decodeContent,
  decodeWith,
  loadContent,
  looksBinary,
} from "./content-loader.js";
export { compareDisplayPaths, computeDisplayPath, toPosix } from "./display-path.js";
export { createSegmentFilter, pathSegments, type SegmentFilter } from "./filter.js";
export { isBlankLine, splitLinesKeepEnds } from "./lines.js";
export {
  COMMENT_STYLES,
  type CommentStyle,
  type CommentSyntax,
  commentSyntaxFor,
  formatMarker,
  type Marker,
  type MarkerKind,
  parseMarker,
} from "./markers.js";
export { splitBundleFile, splitBundleText } from "./parser.js";
export {
  type CollisionResolution,
  isWithinRoot,
  resolveCollision,
  resolveDeclaredPath,
} from "./path-sanitizer.js";
export type {
  BaseBundleOptions,
  FilterRule,
  LoadedContent,
  LoadFailure,
  MergeOptions,
  MergeResult,
  ProgressCallback,
  SkippedEntry,
  SourceFile,
  SplitOptions,
  SplitResult,
} from "./types.js";
export {
  estimateTokens,
  mergeSourceTree,
  prepareSourceFiles,
  renderBundle,
  renderFileBlock,
  renderIndex,
} from "./writer.js";
