/**
 * Configuration File Loading
 *
 * Files are JSON (`.json`) or YAML (`.yaml`, `.yml`) with snake_case keys,
 * the same spelling as the environment overrides. Keys are camelCased on
 * the way in and snake_cased on the way out.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { camelToSnake, snakeToCamel } from "../utils/case.js";
import { isRecord } from "../utils/guards.js";
import { ConfigError } from "./errors.js";
import type { CporConfig } from "./schema.js";

export type ConfigFileFormat = "json" | "yaml";

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The format implied by a file extension.
 * @throws {ConfigError} code=LOAD_ERROR for any other extension.
 */
export function configFileFormat(filePath: string): ConfigFileFormat {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case ".json":
      return "json";
    case ".yaml":
    case ".yml":
      return "yaml";
    default:
      throw new ConfigError(
        `Unsupported file format: ${extension || "(none)"}`,
        "LOAD_ERROR"
      );
  }
}

function mapKeys(value: unknown, rename: (key: string) => string): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => mapKeys(item, rename));
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [rename(key), mapKeys(item, rename)])
    );
  }
  return value;
}

// ─── Reading ────────────────────────────────────────────────────────

/**
 * Parse file content into a camelCased partial configuration.
 * @throws {ConfigError} code=LOAD_ERROR on a syntax error or a non-mapping.
 */
export function parseConfigContent(
  content: string,
  format: ConfigFileFormat,
  filePath = "(inline)"
): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = format === "json" ? JSON.parse(content) : yaml.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${format.toUpperCase()} file ${filePath}: ${reason(error)}`,
      "LOAD_ERROR",
      { cause: error }
    );
  }

  // An empty YAML document is an empty configuration.
  if (parsed === null || parsed === undefined) {
    return {};
  }
  const converted = mapKeys(parsed, snakeToCamel);
  if (!isRecord(converted)) {
    throw new ConfigError(
      `Configuration file must contain a mapping: ${filePath}`,
      "LOAD_ERROR"
    );
  }
  return converted;
}

/**
 * @throws {ConfigError} code=LOAD_ERROR if the file is missing, unreadable,
 *   of an unknown format or malformed.
 */
export function readConfigFile(filePath: string): Record<string, unknown> {
  const format = configFileFormat(filePath);
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read configuration file ${filePath}: ${reason(error)}`,
      "LOAD_ERROR",
      { cause: error }
    );
  }
  return parseConfigContent(content, format, filePath);
}

// ─── Writing ────────────────────────────────────────────────────────

/** Render a configuration with snake_case keys. */
export function serializeConfig(
  config: CporConfig,
  format: ConfigFileFormat = "yaml"
): string {
  const snake = mapKeys(config, camelToSnake);
  return format === "json"
    ? `${JSON.stringify(snake, null, 2)}\n`
    : yaml.stringify(snake);
}

/**
 * Write a configuration, creating parent directories; the format follows
 * the extension.
 * @throws {ConfigError} code=LOAD_ERROR on an unknown extension or I/O failure.
 */
export function saveConfig(config: CporConfig, filePath: string): void {
  const content = serializeConfig(config, configFileFormat(filePath));
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, "utf8");
  } catch (error) {
    throw new ConfigError(
      `Failed to save configuration to ${filePath}: ${reason(error)}`,
      "LOAD_ERROR",
      { cause: error }
    );
  }
}
