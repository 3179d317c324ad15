// ============================================
// Codebundle Errors - Barrel Export
// ============================================

export {
  BundleError,
  type BundleErrorOptions,
  ErrorCode,
  ErrorSeverity,
  errorMessage,
  inferSeverity,
  isBundleError,
  toBundleError,
} from "./types.js";
