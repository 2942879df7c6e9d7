/**
 * Configuration Loading
 *
 * Precedence (highest to lowest):
 * 1. Environment variables
 * 2. Config file
 * 3. Environment preset
 * 4. Schema defaults
 */

import { createLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import {
  DEFAULT_ENV_PREFIX,
  isEnvironment,
  readEnvEnvironment,
  readEnvOverrides,
} from "./env.js";
import { ConfigError } from "./errors.js";
import { readConfigFile } from "./file.js";
import { ENVIRONMENT_PRESETS } from "./presets.js";
import { cporConfigSchema } from "./schema.js";
import type { CporConfig, Environment } from "./schema.js";

export interface LoadConfigOptions {
  /** JSON or YAML file layered over the preset. */
  file?: string;
  /** Preset to start from. Default: `<envPrefix>ENVIRONMENT`, else development */
  environment?: Environment;
  /** Default: process.env */
  env?: NodeJS.ProcessEnv;
  /** Default: "CPOR_" */
  envPrefix?: string;
  logger?: Logger;
}

// ─── Merging ────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Deep merge with `source` winning. Arrays are replaced, not merged, and
 * `undefined` never overrides.
 */
export function deepMerge(
  target: Readonly<Record<string, unknown>>,
  source: Readonly<Record<string, unknown>>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = result[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }
  return result;
}

// ─── Validation ─────────────────────────────────────────────────────

/**
 * Validate a merged raw configuration and apply defaults.
 * @throws {ConfigError} code=VALIDATION_ERROR listing every issue.
 */
export function validateConfig(raw: unknown): CporConfig {
  const result = cporConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message
      )
      .join("; ");
    throw new ConfigError(
      `Configuration validation failed: ${details}`,
      "VALIDATION_ERROR",
      { cause: result.error }
    );
  }
  return result.data;
}

function warnAboutRiskySettings(config: CporConfig, logger: Logger): void {
  if (config.environment === "production") {
    if (config.debug) {
      logger.warn("Debug mode enabled in production environment");
    }
    if (config.logging.level === "DEBUG") {
      logger.warn("Debug logging enabled in production environment");
    }
  }
  if (config.crypto.keyStorage === "tpm" && !config.crypto.tpmDevice) {
    logger.warn(
      "TPM storage selected but no TPM device specified, will use default"
    );
  }
}

// ─── Loading ────────────────────────────────────────────────────────

function resolveEnvironment(
  options: LoadConfigOptions,
  env: NodeJS.ProcessEnv,
  prefix: string
): Environment {
  if (options.environment) {
    return options.environment;
  }
  const named = readEnvEnvironment(env, prefix);
  if (named === undefined || named.length === 0) {
    return "development";
  }
  if (!isEnvironment(named)) {
    throw new ConfigError(`Invalid environment: ${named}`, "VALIDATION_ERROR");
  }
  return named;
}

/**
 * Build a validated configuration from preset, file and environment.
 *
 * @example
 * ```ts
 * const config = loadConfig({ file: "cpor.yaml", environment: "production" });
 * const crypto = CryptoManager.fromConfig(config.crypto);
 * ```
 *
 * @throws {ConfigError} code=LOAD_ERROR if the file cannot be read.
 * @throws {ConfigError} code=VALIDATION_ERROR if the result is invalid.
 */
export function loadConfig(options: LoadConfigOptions = {}): CporConfig {
  const env = options.env ?? process.env;
  const prefix = options.envPrefix ?? DEFAULT_ENV_PREFIX;
  const logger = options.logger ?? createLogger("cpor:config");

  const environment = resolveEnvironment(options, env, prefix);
  let merged = deepMerge(
    { environment },
    structuredClone(ENVIRONMENT_PRESETS[environment])
  );
  const sources = [`defaults (${environment})`];

  if (options.file) {
    merged = deepMerge(merged, readConfigFile(options.file));
    sources.push(options.file);
  }

  const overrides = readEnvOverrides(env, prefix);
  if (Object.keys(overrides).length > 0) {
    merged = deepMerge(merged, overrides);
    sources.push(`environment (prefix: ${prefix})`);
  }

  const config = validateConfig(merged);
  warnAboutRiskySettings(config, logger);
  logger.debug(`Configuration loaded from: ${sources.join(", ")}`);
  return config;
}
