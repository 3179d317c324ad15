export {
  CONFIG_FILE_NAMES,
  type ConfigError,
  findProjectConfig,
  type LoadConfigOptions,
  loadConfig,
  mergeLayers,
  parseEnvConfig,
  readTomlFile,
} from "./loader.js";
export {
  type BundleConfig,
  BundleConfigSchema,
  type FilterRule,
  FilterRuleSchema,
  LogLevelSchema,
  type PartialBundleConfig,
} from "./schema.js";
