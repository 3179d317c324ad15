import { stripVTControlCharacters } from "node:util";
import { describe, expect, it } from "vitest";
import { createProgressReporter, type ProgressStream, toPercent } from "../progress.js";

function createStream(isTTY: boolean): ProgressStream & { chunks: string[] } {
  const chunks: string[] = [];
  return {
    chunks,
    isTTY,
    write(chunk: string) {
      chunks.push(stripVTControlCharacters(chunk));
      return true;
    },
  };
}

describe("toPercent", () => {
  it("floors to whole percentages", () => {
    expect(toPercent(1, 3)).toBe(33);
    expect(toPercent(3, 4)).toBe(75);
  });

  it("treats an empty run as complete and caps at 100", () => {
    expect(toPercent(0, 0)).toBe(100);
    expect(toPercent(5, 4)).toBe(100);
  });
});

describe("createProgressReporter", () => {
  it("redraws only when the percentage changes", () => {
    const stream = createStream(true);
    const progress = createProgressReporter({ label: "Merging", stream });

    progress.update(0, 10);
    progress.update(1, 10);
    progress.update(1, 10);
    progress.update(10, 10);
    progress.done();

    expect(stream.chunks).toEqual(["\rMerging 0%", "\rMerging 10%", "\rMerging 100%", "\n"]);
  });

  it("stays silent on a non-TTY stream", () => {
    const stream = createStream(false);
    const progress = createProgressReporter({ label: "Merging", stream });

    progress.update(5, 10);
    progress.done();

    expect(stream.chunks).toEqual([]);
  });

  it("stays silent when quiet", () => {
    const stream = createStream(true);
    const progress = createProgressReporter({ label: "Splitting", stream, quiet: true });

    progress.update(5, 10);
    progress.done();

    expect(stream.chunks).toEqual([]);
  });

  it("does not end a line that was never drawn", () => {
    const stream = createStream(true);
    createProgressReporter({ label: "Splitting", stream }).done();

    expect(stream.chunks).toEqual([]);
  });
});
