import * as fs from "node:fs";
import * as path from "node:path";
import { Err, ErrorCode, Ok, type Result } from "@codebundle/shared";
import * as TOML from "@iarna/toml";
import { type BundleConfig, BundleConfigSchema, type PartialBundleConfig } from "./schema.js";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ErrorCode.CONFIG_INVALID | ErrorCode.CONFIG_NOT_FOUND | ErrorCode.CONFIG_PARSE_ERROR;
  message: string;
  path?: string;
  cause?: unknown;
}

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Working directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Config overrides from command-line flags (highest priority) */
  overrides?: PartialBundleConfig;
  /** Environment to read CODEBUNDLE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Skip searching for a project config file */
  skipProjectFile?: boolean;
}

// ============================================
// Project Config Discovery
// ============================================

/** Config file names to search for in order */
export const CONFIG_FILE_NAMES = ["codebundle.toml", ".codebundle.toml", ".config/codebundle.toml"];

/**
 * Find the project configuration file by searching up from startDir to root.
 *
 * @returns Path to the first config file found, or undefined
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.statSync(configPath, { throwIfNoEntry: false })?.isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

// ============================================
// Environment
// ============================================

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

/**
 * Environment variables and how each maps onto a config key
 */
const ENV_MAPPINGS: Record<string, { key: keyof PartialBundleConfig; coerce: (value: string) => unknown }> = {
  CODEBUNDLE_LOG_LEVEL: { key: "logLevel", coerce: (value) => value.trim().toLowerCase() },
  CODEBUNDLE_OVERWRITE: { key: "overwrite", coerce: (value) => TRUE_VALUES.has(value.trim().toLowerCase()) },
  CODEBUNDLE_EXTENSIONS: {
    key: "extensions",
    coerce: (value) =>
      value
        .split(",")
        .map((ext) => ext.trim())
        .filter((ext) => ext !== ""),
  },
};

/**
 * Parse CODEBUNDLE_* environment variables into a partial config object.
 * Empty variables are ignored.
 *
 * @example
 * ```typescript
 * parseEnvConfig({ CODEBUNDLE_EXTENSIONS: "py, rs" });
 * // { extensions: ["py", "rs"] }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [envVar, mapping] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value.trim() !== "") {
      result[mapping.key] = mapping.coerce(value);
    }
  }

  return result;
}

// ============================================
// Loading
// ============================================

/**
 * Merge config layers. Later layers win; undefined values never overwrite.
 */
export function mergeLayers(...layers: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}

/**
 * Read and parse a TOML config file
 */
export function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return Err<ConfigError>({
      code: ErrorCode.CONFIG_NOT_FOUND,
      message: `Cannot read config file: ${filePath}`,
      path: filePath,
      cause: error,
    });
  }

  try {
    return Ok(TOML.parse(content));
  } catch (error) {
    return Err<ConfigError>({
      code: ErrorCode.CONFIG_PARSE_ERROR,
      message: `Failed to parse TOML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration from every source with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Config file: `configPath`, else findProjectConfig(cwd)
 * 3. Environment variables
 * 4. Command-line overrides
 *
 * @example
 * ```typescript
 * const result = loadConfig({ overrides: { overwrite: true } });
 * if (!result.ok) {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<BundleConfig, ConfigError> {
  const layers: Record<string, unknown>[] = [];

  const filePath =
    options.configPath !== undefined
      ? path.resolve(options.cwd ?? process.cwd(), options.configPath)
      : options.skipProjectFile
        ? undefined
        : findProjectConfig(options.cwd);

  if (filePath !== undefined) {
    const fileResult = readTomlFile(filePath);
    if (!fileResult.ok) {
      return fileResult;
    }
    layers.push(fileResult.value);
  }

  layers.push(parseEnvConfig(options.env));

  if (options.overrides) {
    layers.push(options.overrides);
  }

  const parseResult = BundleConfigSchema.safeParse(mergeLayers(...layers));
  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return Err<ConfigError>({
      code: ErrorCode.CONFIG_INVALID,
      message: `Invalid configuration: ${issues}`,
      path: filePath,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}
