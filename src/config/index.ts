/**
 * @module config
 * @description Validated CPOR configuration from presets, files and the
 * environment.
 */

export * from "./schema.js";
export * from "./errors.js";
export { ENVIRONMENT_PRESETS } from "./presets.js";
export {
  DEFAULT_ENV_PREFIX,
  coerceEnvValue,
  isEnvironment,
  readEnvOverrides,
} from "./env.js";
export type { EnvValueKind } from "./env.js";
export {
  configFileFormat,
  parseConfigContent,
  readConfigFile,
  saveConfig,
  serializeConfig,
} from "./file.js";
export type { ConfigFileFormat } from "./file.js";
export { deepMerge, loadConfig, validateConfig } from "./loader.js";
export type { LoadConfigOptions } from "./loader.js";
