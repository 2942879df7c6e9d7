/**
 * @module backends
 * @description Ed25519 backend: primitives, the CryptoManager and the
 * simulated secure store.
 */

export { CryptoManager } from "./crypto-manager.js";
export type { CryptoManagerOptions } from "./crypto-manager.js";
export { SimulatedSecureStorage } from "./simulated-secure-storage.js";
export type { SimulatedSecureStorageOptions } from "./simulated-secure-storage.js";
export { createSecureKeyPair, createSoftwareKeyPair } from "./key-pair.js";
export * from "./ed25519.js";
