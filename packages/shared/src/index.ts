// ============================================
// Codebundle Shared Types
// ============================================

// Error codes
export { ErrorCode } from "./errors/index.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
// Result type
export { Err, Ok } from "./types/result.js";
