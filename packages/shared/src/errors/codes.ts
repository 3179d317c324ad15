// ============================================
// Codebundle Error Codes
// ============================================

/**
 * Centralized error codes.
 * Error code ranges:
 * - 1xxx: Configuration errors
 * - 2xxx: Collection and loading errors (merge)
 * - 3xxx: Path and restore errors (split)
 * - 5xxx: System errors
 */
export enum ErrorCode {
  // 1xxx - Configuration errors
  CONFIG_INVALID = 1001,
  CONFIG_NOT_FOUND = 1002,
  CONFIG_PARSE_ERROR = 1003,

  // 2xxx - Merge errors
  COLLECTION_FAILED = 2001,
  FILE_LOAD_FAILED = 2002,
  FILE_DECODE_FAILED = 2003,

  // 3xxx - Split errors
  PATH_UNSAFE = 3001,
  PATH_RESOLUTION_FAILED = 3002,
  COLLISION_EXHAUSTED = 3003,
  BUNDLE_READ_FAILED = 3004,
  OUTPUT_ROOT_FAILED = 3005,

  // 5xxx - System errors
  OUTPUT_WRITE_FAILED = 5001,
  SYSTEM_UNKNOWN = 5999,
}
