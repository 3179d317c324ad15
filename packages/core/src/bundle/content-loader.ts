/**
 * Content Loader
 *
 * Decodes a file to text by trying encodings in order. An encoding is
 * accepted when decoding succeeds and the text does not look binary.
 *
 * The binary check is a heuristic: text dense in rare code points can be
 * rejected and mostly-printable binary data can pass.
 *
 * @module bundle/content-loader
 */

import { readFileSync } from "node:fs";
import { Err, Ok, type Result } from "@codebundle/shared";
import { ErrorCode, errorMessage } from "../errors/index.js";
import { BINARY_SAMPLE_SIZE, BINARY_THRESHOLD, DECODE_FAILURE_MESSAGE } from "./constants.js";
import type { LoadedContent, LoadFailure } from "./types.js";

/** Encodings tried in order: UTF-8, then two single-byte legacy encodings */
export const DEFAULT_ENCODINGS: readonly string[] = ["utf-8", "windows-1252", "latin1"];

const ALLOWED_CONTROLS = new Set(["\t", "\n", "\f", "\r"]);

// Control, format, surrogate, private-use, unassigned and separator characters
const NON_PRINTABLE = /[\p{Cc}\p{Cf}\p{Cs}\p{Co}\p{Cn}\p{Zl}\p{Zp}\p{Zs}]/u;

/**
 * Check whether decoded text looks binary: more than 10% of the first
 * 8 KiB characters are neither printable nor tab, LF, form feed or CR.
 * The plain space is printable.
 */
export function looksBinary(text: string): boolean {
  const sample = text.slice(0, BINARY_SAMPLE_SIZE);
  let total = 0;
  let nonPrintable = 0;

  for (const char of sample) {
    total++;
    if (char !== " " && !ALLOWED_CONTROLS.has(char) && NON_PRINTABLE.test(char)) {
      nonPrintable++;
    }
  }

  return nonPrintable > total * BINARY_THRESHOLD;
}

/**
 * Decode bytes with one encoding.
 * `latin1` maps every byte to the code point of the same value; the other
 * names go through a strict TextDecoder that keeps a leading BOM.
 *
 * @returns the text, or undefined when the bytes are invalid for the encoding
 */
export function decodeWith(bytes: Uint8Array, encoding: string): string | undefined {
  if (encoding === "latin1") {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1");
  }
  try {
    return new TextDecoder(encoding, { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    // Invalid bytes, or an encoding this runtime does not know
    return undefined;
  }
}

/**
 * Decode bytes with the first acceptable encoding.
 */
export function decodeContent(
  bytes: Uint8Array,
  encodings: readonly string[] = DEFAULT_ENCODINGS
): Result<LoadedContent, LoadFailure> {
  for (const encoding of encodings) {
    const text = decodeWith(bytes, encoding);
    if (text === undefined || looksBinary(text)) {
      continue;
    }
    return Ok({
      text,
      encoding,
      byteLength: Buffer.byteLength(text, "utf8"),
      lineCount: countNewlines(text) + 1,
    });
  }
  return Err<LoadFailure>({ code: ErrorCode.FILE_DECODE_FAILED, message: DECODE_FAILURE_MESSAGE });
}

/**
 * Read and decode a file. Read errors become FILE_LOAD_FAILED failures instead of throwing.
 */
export function loadContent(
  filePath: string,
  encodings: readonly string[] = DEFAULT_ENCODINGS
): Result<LoadedContent, LoadFailure> {
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (error) {
    return Err<LoadFailure>({ code: ErrorCode.FILE_LOAD_FAILED, message: errorMessage(error) });
  }
  return decodeContent(bytes, encodings);
}

function countNewlines(text: string): number {
  let count = 0;
  let index = text.indexOf("\n");
  while (index !== -1) {
    count++;
    index = text.indexOf("\n", index + 1);
  }
  return count;
}
