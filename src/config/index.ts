/**
 * Configuration module exports
 */

// Defaults
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FOLDER,
  DEFAULT_IGNORED_DATABASES,
  deepMerge,
} from "./defaults";
// Environment overlay
export { buildEnvOverlay, ENV_PREFIX, parseEnvValue } from "./env";
// Loader
export {
  CONFIG_FILE_NAMES,
  ConfigError,
  findConfigFile,
  loadConfig,
} from "./loader";
// Resolver
export { checkTargetDir, getRetentionPolicy, resolvePaths } from "./resolver";
// Validator
export { validateConfig } from "./validator";
