import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ErrorCode } from "@codebundle/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DECODE_FAILURE_MESSAGE } from "../constants.js";
import { decodeContent, decodeWith, loadContent, looksBinary } from "../content-loader.js";

describe("looksBinary", () => {
  it("should accept ordinary text and allowed control characters", () => {
    expect(looksBinary("def main():\n\treturn 1\r\n\f")).toBe(false);
    expect(looksBinary("")).toBe(false);
  });

  it("should reject text dominated by control characters", () => {
    expect(looksBinary("\x00\x00\x00\x01")).toBe(true);
  });

  it("should use a strict 10% threshold", () => {
    expect(looksBinary("abcdefghi\x00")).toBe(false);
    expect(looksBinary("abcdefgh\x00\x00")).toBe(true);
  });

  it("should only sample the first 8 KiB characters", () => {
    const text = "a".repeat(8192) + "\x00".repeat(5000);
    expect(looksBinary(text)).toBe(false);
  });
});

describe("decodeWith", () => {
  it("should return undefined for invalid UTF-8", () => {
    expect(decodeWith(Buffer.from([0x63, 0x61, 0x66, 0xe9]), "utf-8")).toBeUndefined();
  });

  it("should return undefined for unknown encodings", () => {
    expect(decodeWith(Buffer.from("abc"), "no-such-encoding")).toBeUndefined();
  });

  it("should map bytes one to one for latin1", () => {
    expect(decodeWith(Buffer.from([0x63, 0xe9]), "latin1")).toBe("cé");
  });
});

describe("decodeContent", () => {
  it("should decode UTF-8 and compute statistics", () => {
    const result = decodeContent(Buffer.from("héllo\nworld\n", "utf8"));
    expect(result).toEqual({
      ok: true,
      value: { text: "héllo\nworld\n", encoding: "utf-8", byteLength: 13, lineCount: 3 },
    });
  });

  it("should fall back to windows-1252 for legacy text", () => {
    const result = decodeContent(Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x20, 0x80]));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.text).toBe("café €");
      expect(result.value.encoding).toBe("windows-1252");
    }
  });

  it("should keep a UTF-8 byte order mark as content", () => {
    const body = "print('hello world')\n";
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from(body, "utf8")]);
    const result = decodeContent(bytes);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.text).toBe(`\uFEFF${body}`);
      expect(result.value.encoding).toBe("utf-8");
    }
  });

  it("should report a decode failure when every encoding looks binary", () => {
    expect(decodeContent(Buffer.from([0, 0, 0, 1]))).toEqual({
      ok: false,
      error: { code: ErrorCode.FILE_DECODE_FAILED, message: DECODE_FAILURE_MESSAGE },
    });
  });

  it("should honour a custom encoding list", () => {
    const result = decodeContent(Buffer.from([0x63, 0xe9]), ["utf-8"]);
    expect(result.ok).toBe(false);
  });
});

describe("loadContent", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "codebundle-loader-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("should load a text file", () => {
    const file = join(testDir, "a.py");
    writeFileSync(file, "x = 1");

    const result = loadContent(file);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.text).toBe("x = 1");
      expect(result.value.lineCount).toBe(1);
    }
  });

  it("should report read errors as io failures", () => {
    const result = loadContent(join(testDir, "missing.py"));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.FILE_LOAD_FAILED);
      expect(result.error.message).toContain("ENOENT");
    }
  });
});
