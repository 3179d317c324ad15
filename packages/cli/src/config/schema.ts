import { DEFAULT_ENCODINGS, DEFAULT_EXTENSIONS, LOG_LEVELS, normalizeExtensions } from "@codebundle/core";
import { z } from "zod";

// ============================================
// Filter Rules
// ============================================

/**
 * A glob matched against each path segment. Inactive rules are kept so a
 * project file can switch a rule off without deleting it.
 */
export const FilterRuleSchema = z.object({
  pattern: z.string().min(1),
  active: z.boolean().default(true),
});

export type FilterRule = z.infer<typeof FilterRuleSchema>;

/**
 * A bare string in a config file is shorthand for an active rule.
 */
const FilterEntrySchema = z.union([
  z.string().min(1).transform((pattern) => ({ pattern, active: true })),
  FilterRuleSchema,
]);

// ============================================
// Bundle Configuration
// ============================================

export const LogLevelSchema = z.enum(LOG_LEVELS);

export const BundleConfigSchema = z.object({
  /** File extensions collected by merge; normalized to lower-case ".ext" */
  extensions: z
    .array(z.string())
    .default([...DEFAULT_EXTENSIONS])
    .transform((extensions) => [...normalizeExtensions(extensions)]),
  /** Decoders tried in order when loading a file */
  encodings: z.array(z.string().min(1)).min(1).default([...DEFAULT_ENCODINGS]),
  filters: z.array(FilterEntrySchema).default([]),
  overwrite: z.boolean().default(false),
  logLevel: LogLevelSchema.default("info"),
  /** Emit JSON log lines and a JSON result instead of text */
  json: z.boolean().default(false),
});

export type BundleConfig = z.infer<typeof BundleConfigSchema>;

/**
 * Shape accepted before defaults are applied (config files, env, CLI flags).
 */
export type PartialBundleConfig = z.input<typeof BundleConfigSchema>;
