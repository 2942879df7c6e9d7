/**
 * @module backends/simulated-secure-storage
 * @description In-memory stand-in for a hardware key store.
 *
 * Behaves like a device from the caller's point of view: keys are created
 * and used by id, private material is never returned, and availability can
 * be switched off to exercise the CryptoManager's fallback policy. Used by
 * default when no real store is injected.
 */

import { TpmError } from "../interfaces/secure-storage.js";
import type { ISecureStorage } from "../interfaces/secure-storage.js";
import type {
  Ed25519PrivateKey,
  Ed25519PublicKey,
  Ed25519Signature,
} from "../types/branded.js";
import { createLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import {
  derivePublicKey,
  ed25519Sign,
  generatePrivateKey,
} from "./ed25519.js";

export interface SimulatedSecureStorageOptions {
  /** Initial availability. Default: true */
  available?: boolean;
  logger?: Logger;
}

export class SimulatedSecureStorage implements ISecureStorage {
  private readonly keys = new Map<string, Ed25519PrivateKey>();
  private readonly logger: Logger;
  private available: boolean;

  constructor(options: SimulatedSecureStorageOptions = {}) {
    this.available = options.available ?? true;
    this.logger = options.logger ?? createLogger("cpor:secure-storage");
  }

  /** Simulate the device appearing or disappearing. */
  setAvailable(available: boolean): void {
    this.available = available;
    this.logger.info(`Secure storage availability set to: ${available}`);
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async generateKey(keyId: string): Promise<Ed25519PublicKey> {
    this.requireAvailable();
    if (this.keys.has(keyId)) {
      throw new TpmError(`Key ${keyId} already exists in TPM`, "KEY_EXISTS");
    }
    const privateKey = generatePrivateKey();
    this.keys.set(keyId, privateKey);
    this.logger.info(`Generated TPM key: ${keyId}`);
    return derivePublicKey(privateKey);
  }

  async sign(keyId: string, data: Uint8Array): Promise<Ed25519Signature> {
    this.requireAvailable();
    return ed25519Sign(this.requireKey(keyId), data);
  }

  async getPublicKey(keyId: string): Promise<Ed25519PublicKey> {
    this.requireAvailable();
    return derivePublicKey(this.requireKey(keyId));
  }

  async deleteKey(keyId: string): Promise<boolean> {
    this.requireAvailable();
    const deleted = this.keys.delete(keyId);
    if (deleted) {
      this.logger.info(`Deleted TPM key: ${keyId}`);
    }
    return deleted;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private requireAvailable(): void {
    if (!this.available) {
      throw new TpmError("TPM is not available", "UNAVAILABLE");
    }
  }

  private requireKey(keyId: string): Ed25519PrivateKey {
    const key = this.keys.get(keyId);
    if (!key) {
      throw new TpmError(`Key ${keyId} not found in TPM`, "KEY_NOT_FOUND");
    }
    return key;
  }
}
