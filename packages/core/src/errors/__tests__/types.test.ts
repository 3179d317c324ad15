import { describe, expect, it } from "vitest";
import {
  BundleError,
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  isBundleError,
  toBundleError,
} from "../types.js";

describe("inferSeverity", () => {
  it("should treat per-entry failures as recoverable", () => {
    expect(inferSeverity(ErrorCode.FILE_DECODE_FAILED)).toBe(ErrorSeverity.RECOVERABLE);
    expect(inferSeverity(ErrorCode.PATH_UNSAFE)).toBe(ErrorSeverity.RECOVERABLE);
    expect(inferSeverity(ErrorCode.COLLISION_EXHAUSTED)).toBe(ErrorSeverity.RECOVERABLE);
  });

  it("should treat configuration failures as user action", () => {
    expect(inferSeverity(ErrorCode.CONFIG_PARSE_ERROR)).toBe(ErrorSeverity.USER_ACTION);
  });

  it("should treat structural failures as fatal", () => {
    expect(inferSeverity(ErrorCode.COLLECTION_FAILED)).toBe(ErrorSeverity.FATAL);
    expect(inferSeverity(ErrorCode.BUNDLE_READ_FAILED)).toBe(ErrorSeverity.FATAL);
    expect(inferSeverity(ErrorCode.OUTPUT_ROOT_FAILED)).toBe(ErrorSeverity.FATAL);
  });
});

describe("BundleError", () => {
  it("should carry code, context and cause", () => {
    const cause = new Error("EACCES");
    const error = new BundleError("Cannot walk", ErrorCode.COLLECTION_FAILED, {
      cause,
      context: { root: "/src" },
    });

    expect(error.name).toBe("BundleError");
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      name: "BundleError",
      message: "Cannot walk",
      code: ErrorCode.COLLECTION_FAILED,
      severity: "fatal",
      context: { root: "/src" },
      cause: "EACCES",
    });
  });
});

describe("helpers", () => {
  it("should wrap foreign errors and keep BundleErrors", () => {
    const wrapped = toBundleError(new Error("disk full"), ErrorCode.OUTPUT_WRITE_FAILED);
    expect(isBundleError(wrapped)).toBe(true);
    expect(wrapped.message).toBe("disk full");
    expect(wrapped.code).toBe(ErrorCode.OUTPUT_WRITE_FAILED);

    const original = new BundleError("unsafe", ErrorCode.PATH_UNSAFE);
    expect(toBundleError(original, ErrorCode.SYSTEM_UNKNOWN)).toBe(original);
  });
});
