/**
 * Configuration module exports
 */

// Defaults
export {
  CONFIG_FILE_NAMES,
  deepMerge,
  defaultConfig,
  isPlainObject,
  resolveHomeDir,
} from "./defaults";
// Environment
export { ENV_OVERRIDES, envOverrides, parseBoolean } from "./env";
// Loader
export { findConfigFile, loadConfig, parseConfigContent } from "./loader";
// Resolver
export { resolvePaths } from "./resolver";
// Validator
export { validateConfig } from "./validator";
