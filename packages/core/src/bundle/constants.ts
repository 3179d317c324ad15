/**
 * Bundle Format Constants
 *
 * @module bundle/constants
 */

/** Sentinel token present on every marker line */
export const SENTINEL = "[[ SCB ]]";

/** Extensions collected when the caller gives none */
export const DEFAULT_EXTENSIONS: readonly string[] = [
  ".py",
  ".rs",
  ".c",
  ".h",
  ".cpp",
  ".hpp",
  ".css",
];

/** Index block delimiters */
export const INDEX_START = `# ${SENTINEL} FILE INDEX START`;
export const INDEX_END = `# ${SENTINEL} FILE INDEX END`;

/** Annotation in the index for files that could not be loaded */
export const INDEX_ERROR_NOTE = "[Error reading file]";

/** Error block message for decode failures */
export const DECODE_FAILURE_MESSAGE = "Cannot read file (binary or unsupported encoding)";

/** Characters of decoded text sampled by the binary heuristic */
export const BINARY_SAMPLE_SIZE = 8192;

/** Fraction of non-printable characters above which text counts as binary */
export const BINARY_THRESHOLD = 0.1;

/** Split reports progress every this many lines */
export const SPLIT_PROGRESS_STRIDE = 100;

/** Lines scanned for an END ERROR marker before giving up on an error block */
export const MAX_ERROR_BLOCK_LINES = 1000;

/** Numbered names tried before a collision rename gives up */
export const MAX_RENAME_ATTEMPTS = 10_000;

/** Characters per token for the coarse token estimate */
export const CHARS_PER_TOKEN = 4;
