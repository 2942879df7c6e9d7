/**
 * Environment Variable Configuration
 *
 * `CPOR_<SECTION>_<FIELD>` sets a field of a section, for example
 * `CPOR_NETWORK_MAX_CONNECTIONS=250` sets `network.maxConnections`.
 * A name whose first segment is not a section sets a top-level field
 * (`CPOR_DEBUG=true`). `<PREFIX>ENVIRONMENT` picks the preset and is not
 * an override.
 *
 * Values are coerced by the type of the field they target: `CPOR_NETWORK_HOST=1`
 * stays the string "1", `CPOR_NETWORK_PORT=9000` becomes a number. Names
 * that match no field fall back to guessing from the value.
 */

import { z } from "zod";
import { snakeToCamel } from "../utils/case.js";
import {
  CONFIG_SECTIONS,
  ENVIRONMENTS,
  cporConfigSchema,
  cryptoConfigSchema,
  loggingConfigSchema,
  networkConfigSchema,
  securityConfigSchema,
} from "./schema.js";
import type { ConfigSection, Environment } from "./schema.js";

export const DEFAULT_ENV_PREFIX = "CPOR_";

type ConfigValue = string | number | boolean;

/** How a raw variable is read: by field type, or guessed when unknown. */
export type EnvValueKind = "string" | "number" | "boolean" | "auto";

type FieldShape = Readonly<Record<string, z.ZodTypeAny>>;

const ROOT_FIELDS: FieldShape = cporConfigSchema.shape;

const SECTION_FIELDS: Readonly<Record<ConfigSection, FieldShape>> = {
  network: networkConfigSchema.shape,
  crypto: cryptoConfigSchema.shape,
  security: securityConfigSchema.shape,
  logging: loggingConfigSchema.shape,
};

function unwrapField(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodDefault) {
    return unwrapField(schema.removeDefault());
  }
  if (schema instanceof z.ZodOptional) {
    return unwrapField(schema.unwrap());
  }
  if (schema instanceof z.ZodEffects) {
    return unwrapField(schema.innerType());
  }
  return schema;
}

function fieldKind(shape: FieldShape, field: string): EnvValueKind {
  const schema = Object.hasOwn(shape, field) ? shape[field] : undefined;
  if (schema === undefined) {
    return "auto";
  }
  const base = unwrapField(schema);
  if (base instanceof z.ZodNumber) {
    return "number";
  }
  if (base instanceof z.ZodBoolean) {
    return "boolean";
  }
  return "string";
}

function isConfigSection(value: string): value is ConfigSection {
  return (CONFIG_SECTIONS as readonly string[]).includes(value);
}

export function isEnvironment(value: string): value is Environment {
  return (ENVIRONMENTS as readonly string[]).includes(value);
}

/**
 * Read a raw variable as `kind`. A value that does not parse as the
 * requested kind stays a string and is left to the schema to reject.
 * `auto` coerces booleans and plain decimal numbers.
 */
export function coerceEnvValue(
  value: string,
  kind: EnvValueKind = "auto"
): ConfigValue {
  const trimmed = value.trim();
  const lower = trimmed.toLowerCase();
  const isBoolean = lower === "true" || lower === "false";

  switch (kind) {
    case "string":
      return value;
    case "boolean":
      return isBoolean ? lower === "true" : value;
    case "number": {
      const parsed = Number(trimmed);
      return trimmed.length > 0 && Number.isFinite(parsed) ? parsed : value;
    }
    case "auto":
      if (isBoolean) {
        return lower === "true";
      }
      return /^\d+(\.\d+)?$/.test(trimmed) ? Number(trimmed) : value;
  }
}

/**
 * Collect overrides from `env` into a nested, camelCased partial config.
 */
export function readEnvOverrides(
  env: NodeJS.ProcessEnv,
  prefix: string = DEFAULT_ENV_PREFIX
): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const sections: Partial<Record<ConfigSection, Record<string, ConfigValue>>> = {};

  for (const [name, raw] of Object.entries(env)) {
    if (raw === undefined || !name.startsWith(prefix)) {
      continue;
    }
    const path = name.slice(prefix.length).toLowerCase();
    if (path === "environment" || path.length === 0) {
      continue;
    }

    const separator = path.indexOf("_");
    const head = separator === -1 ? path : path.slice(0, separator);

    if (separator !== -1 && isConfigSection(head)) {
      const field = snakeToCamel(path.slice(separator + 1));
      const section = (sections[head] ??= {});
      section[field] = coerceEnvValue(raw, fieldKind(SECTION_FIELDS[head], field));
    } else {
      const field = snakeToCamel(path);
      overrides[field] = coerceEnvValue(raw, fieldKind(ROOT_FIELDS, field));
    }
  }

  return { ...overrides, ...sections };
}

/**
 * The environment named by `<prefix>ENVIRONMENT`, if it names one.
 */
export function readEnvEnvironment(
  env: NodeJS.ProcessEnv,
  prefix: string = DEFAULT_ENV_PREFIX
): string | undefined {
  return env[`${prefix}ENVIRONMENT`]?.trim().toLowerCase();
}
