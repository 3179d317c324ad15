/**
 * Split text into lines, keeping each line's terminator (`\r\n`, `\r` or `\n`).
 * The last line has no terminator when the text does not end with one.
 *
 * @example
 * ```typescript
 * splitLinesKeepEnds("a\r\nb\rc") // ["a\r\n", "b\r", "c"]
 * ```
 */
export function splitLinesKeepEnds(text: string): string[] {
  const lines: string[] = [];
  let start = 0;
  let i = 0;

  while (i < text.length) {
    const char = text[i];
    if (char === "\n") {
      lines.push(text.slice(start, i + 1));
      start = i + 1;
    } else if (char === "\r") {
      const end = text[i + 1] === "\n" ? i + 2 : i + 1;
      lines.push(text.slice(start, end));
      start = end;
      i = end - 1;
    }
    i++;
  }

  if (start < text.length) {
    lines.push(text.slice(start));
  }
  return lines;
}

/**
 * Check whether a line is empty apart from whitespace and its terminator.
 */
export function isBlankLine(line: string): boolean {
  return line.trim() === "";
}
