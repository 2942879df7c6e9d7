/**
 * @module cpor-protocol
 * @description CPOR-2 protocol core: ten signed, versioned, CBOR-encoded
 * session messages and the Ed25519 key management behind them.
 *
 * Exports the branded types and key-lifecycle events, the CryptoManager
 * with its pluggable secure storage, the canonical CBOR codec, message
 * construction/dispatch/signing, configuration loading and the logger.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Crypto Backends ────────────────────────────────────────────────
export * from "./backends/index.js";

// ─── Wire Codec ─────────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Messages ───────────────────────────────────────────────────────
export * from "./messages/index.js";

// ─── Configuration ──────────────────────────────────────────────────
export * from "./config/index.js";

// ─── Logging ────────────────────────────────────────────────────────
export { createLogger, getLogLevel, isLogLevel, LOG_LEVELS } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
