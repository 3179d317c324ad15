import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { compareDisplayPaths, computeDisplayPath } from "../display-path.js";

describe("computeDisplayPath", () => {
  it("should keep the root directory name as the first component", () => {
    const root = join("/work", "app");
    expect(computeDisplayPath(root, join(root, "src", "main.py"))).toBe("./app/src/main.py");
    expect(computeDisplayPath(root, join(root, "main.py"))).toBe("./app/main.py");
  });

  it("should resolve relative roots", () => {
    const root = join(process.cwd(), "fixtures");
    expect(computeDisplayPath("fixtures", join(root, "x.c"))).toBe("./fixtures/x.c");
  });

  it.skipIf(process.platform === "win32")("should handle the filesystem root", () => {
    expect(computeDisplayPath("/", "/etc/app.conf")).toBe("./etc/app.conf");
  });
});

describe("compareDisplayPaths", () => {
  it("should order by code point rather than locale", () => {
    const paths = ["./b.py", "./a/z.py", "./B.py", "./a.py"];
    expect([...paths].sort(compareDisplayPaths)).toEqual(["./B.py", "./a.py", "./a/z.py", "./b.py"]);
  });

  it("should order astral characters after the rest of the BMP", () => {
    expect(compareDisplayPaths("./\uFF5E", "./\u{1F600}")).toBeLessThan(0);
    expect(compareDisplayPaths("./same", "./same")).toBe(0);
  });
});
