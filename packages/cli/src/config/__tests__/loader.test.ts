import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ErrorCode } from "@codebundle/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { findProjectConfig, loadConfig, mergeLayers, parseEnvConfig } from "../loader.js";

describe("findProjectConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "codebundle-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("finds codebundle.toml in the start directory", () => {
    const configPath = path.join(tempDir, "codebundle.toml");
    fs.writeFileSync(configPath, "overwrite = true\n");

    expect(findProjectConfig(tempDir)).toBe(configPath);
  });

  it("finds .config/codebundle.toml", () => {
    fs.mkdirSync(path.join(tempDir, ".config"));
    const configPath = path.join(tempDir, ".config", "codebundle.toml");
    fs.writeFileSync(configPath, "");

    expect(findProjectConfig(tempDir)).toBe(configPath);
  });

  it("prefers codebundle.toml over .codebundle.toml", () => {
    const primary = path.join(tempDir, "codebundle.toml");
    fs.writeFileSync(primary, "");
    fs.writeFileSync(path.join(tempDir, ".codebundle.toml"), "");

    expect(findProjectConfig(tempDir)).toBe(primary);
  });

  it("searches parent directories", () => {
    const configPath = path.join(tempDir, ".codebundle.toml");
    fs.writeFileSync(configPath, "");
    const nested = path.join(tempDir, "a", "b");
    fs.mkdirSync(nested, { recursive: true });

    expect(findProjectConfig(nested)).toBe(configPath);
  });

  it("ignores directories with a config file name", () => {
    fs.mkdirSync(path.join(tempDir, "codebundle.toml"));
    const configPath = path.join(tempDir, ".codebundle.toml");
    fs.writeFileSync(configPath, "");

    expect(findProjectConfig(tempDir)).toBe(configPath);
  });
});

describe("parseEnvConfig", () => {
  it("maps CODEBUNDLE_* variables", () => {
    expect(
      parseEnvConfig({
        CODEBUNDLE_LOG_LEVEL: "DEBUG",
        CODEBUNDLE_OVERWRITE: "1",
        CODEBUNDLE_EXTENSIONS: "py, .rs,,md ",
      })
    ).toEqual({ logLevel: "debug", overwrite: true, extensions: ["py", ".rs", "md"] });
  });

  it("treats other overwrite values as false", () => {
    expect(parseEnvConfig({ CODEBUNDLE_OVERWRITE: "no" })).toEqual({ overwrite: false });
  });

  it("ignores empty and unrelated variables", () => {
    expect(parseEnvConfig({ CODEBUNDLE_LOG_LEVEL: " ", HOME: "/home/test" })).toEqual({});
  });
});

describe("mergeLayers", () => {
  it("lets later layers win and skips undefined", () => {
    expect(mergeLayers({ a: 1, b: [1] }, { b: [2], c: undefined }, { a: 3 })).toEqual({ a: 3, b: [2] });
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "codebundle-load-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("applies defaults when nothing is configured", () => {
    const result = loadConfig({ cwd: tempDir, skipProjectFile: true, env: {} });

    expect(result).toEqual({
      ok: true,
      value: {
        extensions: [".py", ".rs", ".c", ".h", ".cpp", ".hpp", ".css"],
        encodings: ["utf-8", "windows-1252", "latin1"],
        filters: [],
        overwrite: false,
        logLevel: "info",
        json: false,
      },
    });
  });

  it("reads the project file and normalizes its values", () => {
    fs.writeFileSync(
      path.join(tempDir, "codebundle.toml"),
      [
        'extensions = ["PY", "ts", ".py"]',
        'filters = [{ pattern = "node_modules" }, { pattern = "*.log", active = false }]',
        "overwrite = true",
        "",
      ].join("\n")
    );

    const result = loadConfig({ cwd: tempDir, env: {} });

    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.extensions).toEqual([".py", ".ts"]);
    expect(result.value.filters).toEqual([
      { pattern: "node_modules", active: true },
      { pattern: "*.log", active: false },
    ]);
    expect(result.value.overwrite).toBe(true);
  });

  it("accepts bare strings as active filter rules", () => {
    const result = loadConfig({ cwd: tempDir, skipProjectFile: true, env: {}, overrides: { filters: ["dist"] } });

    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.filters).toEqual([{ pattern: "dist", active: true }]);
  });

  it("applies file < env < overrides", () => {
    fs.writeFileSync(path.join(tempDir, "codebundle.toml"), 'logLevel = "warn"\noverwrite = true\nextensions = ["c"]\n');

    const result = loadConfig({
      cwd: tempDir,
      env: { CODEBUNDLE_LOG_LEVEL: "error", CODEBUNDLE_EXTENSIONS: "h" },
      overrides: { logLevel: "debug" },
    });

    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.logLevel).toBe("debug");
    expect(result.value.extensions).toEqual([".h"]);
    expect(result.value.overwrite).toBe(true);
  });

  it("fails on invalid TOML", () => {
    const configPath = path.join(tempDir, "codebundle.toml");
    fs.writeFileSync(configPath, "overwrite = = true\n");

    const result = loadConfig({ cwd: tempDir, env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
    expect(result.error.path).toBe(configPath);
  });

  it("fails validation with the offending key", () => {
    const result = loadConfig({ cwd: tempDir, skipProjectFile: true, env: { CODEBUNDLE_LOG_LEVEL: "loud" } });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(result.error.message).toMatch(/^Invalid configuration: logLevel: /);
  });

  it("fails when an explicit config file is missing", () => {
    const result = loadConfig({ cwd: tempDir, configPath: "missing.toml", env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
    expect(result.error.path).toBe(path.join(tempDir, "missing.toml"));
  });
});
