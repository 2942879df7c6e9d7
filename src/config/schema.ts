/**
 * @module config/schema
 * @description zod schema for CporConfig.
 *
 * Every field has a default, so `cporConfigSchema.parse({})` yields a
 * complete development configuration. Durations are seconds.
 */

import { z } from "zod";
import { PROTOCOL_VERSION } from "../messages/schema.js";

export const ENVIRONMENTS = [
  "development",
  "testing",
  "staging",
  "production",
] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export const CONFIG_SECTIONS = [
  "network",
  "crypto",
  "security",
  "logging",
] as const;

export type ConfigSection = (typeof CONFIG_SECTIONS)[number];

export const DEFAULT_CIPHER_SUITES = [
  "ECDHE-ECDSA-AES256-GCM-SHA384",
  "ECDHE-RSA-AES256-GCM-SHA384",
];

// ─── Sections ───────────────────────────────────────────────────────

export const networkConfigSchema = z.object({
  host: z.string().min(1, "Host must be a non-empty string").default("localhost"),
  port: z.number().int().min(1).max(65535).default(8443),
  maxConnections: z.number().int().min(1).default(100),
  connectionTimeout: z.number().min(0.1).default(30),
  keepaliveInterval: z.number().min(1).default(60),
  maxMessageSize: z.number().int().min(1024).default(1_048_576),
  bufferSize: z.number().int().min(512).default(8192),
});

export const cryptoConfigSchema = z.object({
  keyStorage: z.enum(["software", "tpm"]).default("software"),
  tpmDevice: z.string().optional(),
  /** When false, a `tpm` request on a missing device fails instead of degrading. */
  allowSoftwareFallback: z.boolean().default(true),
  nonceSize: z.number().int().min(16).max(64).default(16),
  sessionKeySize: z.number().int().min(16).max(64).default(32),
  signatureAlgorithm: z
    .literal("Ed25519", {
      errorMap: () => ({
        message: "Only Ed25519 signature algorithm is supported",
      }),
    })
    .default("Ed25519"),
  enableKeyRotation: z.boolean().default(true),
  keyRotationInterval: z.number().int().min(3600).default(86_400),
});

export const securityConfigSchema = z.object({
  enableAuthentication: z.boolean().default(true),
  requireTls: z.boolean().default(true),
  maxAuthAttempts: z.number().int().min(1).default(3),
  authTimeout: z.number().min(10).default(300),
  sessionTimeout: z.number().min(60).default(3600),
  allowedCipherSuites: z
    .array(z.string().min(1))
    .default(() => [...DEFAULT_CIPHER_SUITES]),
  certificatePath: z.string().optional(),
  privateKeyPath: z.string().optional(),
});

export const loggingConfigSchema = z.object({
  level: z
    .preprocess(
      (value) => (typeof value === "string" ? value.toUpperCase() : value),
      z.enum(["DEBUG", "INFO", "WARNING", "ERROR"])
    )
    .default("INFO"),
});

// ─── Root ───────────────────────────────────────────────────────────

export const cporConfigSchema = z.object({
  environment: z.enum(ENVIRONMENTS).default("development"),
  version: z
    .literal(PROTOCOL_VERSION, {
      errorMap: (_issue, ctx) => ({
        message: `Unsupported protocol version: ${String(ctx.data)}`,
      }),
    })
    .default(PROTOCOL_VERSION),
  debug: z.boolean().default(false),
  network: networkConfigSchema.default({}),
  crypto: cryptoConfigSchema.default({}),
  security: securityConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type CporConfig = z.output<typeof cporConfigSchema>;
export type CporConfigInput = z.input<typeof cporConfigSchema>;

export type NetworkConfig = CporConfig["network"];
export type CryptoConfig = CporConfig["crypto"];
export type SecurityConfig = CporConfig["security"];
export type LoggingConfig = CporConfig["logging"];
