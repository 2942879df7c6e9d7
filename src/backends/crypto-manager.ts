/**
 * @module backends/crypto-manager
 * @description Ed25519 implementation of ICryptoManager.
 *
 * Software keys live in an in-process map and die with the process. Keys
 * requested with `tpm` storage are delegated to an injected ISecureStorage
 * and are addressed by id only. Persistence across restarts is the
 * caller's concern.
 *
 * Every operation that touches a key id runs under a per-id lock, since
 * secure-store calls are asynchronous and a generate racing a delete for
 * the same id must not interleave.
 */

import { CporEmitter } from "../primitives/base-emitter.js";
import { KeyedLock } from "../primitives/keyed-lock.js";
import {
  KeyGenerationError,
  KeyStorageError,
  SigningError,
  VerificationError,
} from "../interfaces/crypto-manager.js";
import type { ICryptoManager } from "../interfaces/crypto-manager.js";
import { TpmError } from "../interfaces/secure-storage.js";
import type { ISecureStorage } from "../interfaces/secure-storage.js";
import type {
  Ed25519PrivateKey,
  Ed25519Signature,
  Nonce,
  UnixTimestamp,
} from "../types/branded.js";
import { STORAGE_KINDS } from "../types/keys.js";
import type { CporEvent } from "../types/events.js";
import type {
  KeyPair,
  StorageKind,
  TpmFallbackPolicy,
  VerificationKey,
} from "../types/keys.js";
import type { CryptoConfig } from "../config/schema.js";
import { createLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import {
  DEFAULT_NONCE_LENGTH,
  ED25519_PUBLIC_KEY_LENGTH,
  ED25519_SIGNATURE_LENGTH,
  derivePublicKey,
  ed25519Sign,
  ed25519Verify,
  generateNonce,
  generatePrivateKey,
  isEd25519PublicKey,
  isEd25519Signature,
} from "./ed25519.js";
import { createSecureKeyPair, createSoftwareKeyPair } from "./key-pair.js";
import { SimulatedSecureStorage } from "./simulated-secure-storage.js";

// ─── Configuration ────────────────────────────────────────────────

export interface CryptoManagerOptions {
  /** Hardware-backed store. Default: a SimulatedSecureStorage */
  secureStorage?: ISecureStorage;
  /** Storage used when generateKeypair() is called without one. Default: "software" */
  defaultStorage?: StorageKind;
  /** Behaviour when `tpm` is requested but unavailable. Default: "software" */
  tpmFallback?: TpmFallbackPolicy;
  /** Size of nonces from createNonce(). Default: 16 */
  nonceSize?: number;
  logger?: Logger;
}

interface SoftwareKeyRecord {
  keyPair: KeyPair;
  privateKey: Ed25519PrivateKey;
}

function now(): UnixTimestamp {
  return Math.floor(Date.now() / 1000) as UnixTimestamp;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isStorageKind(value: string): value is StorageKind {
  return (STORAGE_KINDS as readonly string[]).includes(value);
}

/**
 * CryptoManager: Ed25519 keystore with pluggable secure storage.
 *
 * @example
 * ```ts
 * const crypto = new CryptoManager();
 * const keyPair = await crypto.generateKeypair("client-key");
 *
 * const data = new TextEncoder().encode("hello");
 * const signature = await crypto.signData("client-key", data);
 * crypto.verifySignature(keyPair.publicKey, data, signature); // true
 * ```
 */
export class CryptoManager extends CporEmitter implements ICryptoManager {
  private readonly secureStorage: ISecureStorage;
  private readonly softwareKeys = new Map<string, SoftwareKeyRecord>();
  private readonly locks = new KeyedLock();
  private readonly logger: Logger;
  private readonly config: {
    defaultStorage: StorageKind;
    tpmFallback: TpmFallbackPolicy;
    nonceSize: number;
  };

  constructor(options: CryptoManagerOptions = {}) {
    super();
    this.logger = options.logger ?? createLogger("cpor:crypto");
    this.secureStorage =
      options.secureStorage ??
      new SimulatedSecureStorage({ logger: this.logger });
    this.config = {
      defaultStorage: options.defaultStorage ?? "software",
      tpmFallback: options.tpmFallback ?? "software",
      nonceSize: options.nonceSize ?? DEFAULT_NONCE_LENGTH,
    };
  }

  /**
   * Build a manager from the `crypto` section of a loaded CporConfig.
   * `allowSoftwareFallback: false` maps to the `reject` policy.
   */
  static fromConfig(
    config: CryptoConfig,
    options: Pick<CryptoManagerOptions, "secureStorage" | "logger"> = {}
  ): CryptoManager {
    return new CryptoManager({
      ...options,
      defaultStorage: config.keyStorage,
      tpmFallback: config.allowSoftwareFallback ? "software" : "reject",
      nonceSize: config.nonceSize,
    });
  }

  // ─── Commands ───────────────────────────────────────────────────

  async generateKeypair(
    keyId: string,
    storage: StorageKind = this.config.defaultStorage
  ): Promise<KeyPair> {
    if (!isStorageKind(storage)) {
      throw new KeyGenerationError("storage must be 'software' or 'tpm'");
    }
    if (keyId.length === 0) {
      throw new KeyGenerationError("keyId must be a non-empty string");
    }

    return this.locks.run(keyId, async () => {
      if (this.softwareKeys.has(keyId)) {
        throw new KeyGenerationError(`Key ${keyId} already exists`);
      }

      if (storage === "tpm") {
        if (await this.secureStorage.isAvailable()) {
          return this.generateSecureKeypair(keyId);
        }
        if (this.config.tpmFallback === "reject") {
          throw new TpmError(
            `TPM not available for key ${keyId} and software fallback is disabled`,
            "UNAVAILABLE"
          );
        }
        const reason = "TPM not available, falling back to software storage";
        this.logger.warn(`${reason} (key ${keyId})`);
        this.emit({
          type: "KEY_STORAGE_FALLBACK",
          keyId,
          requestedStorage: "tpm",
          storage: "software",
          reason,
          timestamp: now(),
        });
      }

      return this.generateSoftwareKeypair(keyId, storage);
    });
  }

  /**
   * A secure-store failure only surfaces when nothing else was removed;
   * once the software key is gone the deletion is reported as done and the
   * store failure is logged.
   */
  async deleteKey(keyId: string): Promise<boolean> {
    return this.locks.run(keyId, async () => {
      let deleted = this.softwareKeys.delete(keyId);
      if (deleted) {
        this.logger.info(`Deleted software key: ${keyId}`);
      }

      let storeFailure: unknown;
      if (await this.secureStorage.isAvailable()) {
        try {
          if (await this.secureStorage.deleteKey(keyId)) {
            deleted = true;
          }
        } catch (error) {
          if (!(error instanceof TpmError && error.reason === "KEY_NOT_FOUND")) {
            storeFailure = error;
          }
        }
      }

      if (storeFailure !== undefined) {
        const message = `Failed to delete TPM key ${keyId}: ${errorMessage(storeFailure)}`;
        if (!deleted) {
          throw new KeyStorageError(message, { cause: storeFailure });
        }
        this.logger.warn(message);
      }

      if (deleted) {
        this.emit({ type: "KEY_DELETED", keyId, timestamp: now() });
      }
      return deleted;
    });
  }

  // ─── Queries ────────────────────────────────────────────────────

  async signData(keyId: string, data: Uint8Array): Promise<Ed25519Signature> {
    return this.locks.run(keyId, async () => {
      const record = this.softwareKeys.get(keyId);
      if (record) {
        try {
          return ed25519Sign(record.privateKey, data);
        } catch (error) {
          throw new SigningError(
            `Failed to sign with software key ${keyId}: ${errorMessage(error)}`,
            { cause: error }
          );
        }
      }

      if (!(await this.secureStorage.isAvailable())) {
        throw new KeyStorageError(`Key ${keyId} not found in any storage`);
      }

      let signature: Uint8Array;
      try {
        signature = await this.secureStorage.sign(keyId, data);
      } catch (error) {
        if (error instanceof TpmError && error.reason === "KEY_NOT_FOUND") {
          throw new KeyStorageError(`Key ${keyId} not found in any storage`, {
            cause: error,
          });
        }
        throw new SigningError(
          `Failed to sign with TPM key ${keyId}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      if (!isEd25519Signature(signature)) {
        throw new SigningError(
          `TPM returned a ${signature.length}-byte signature for key ${keyId}`
        );
      }
      return signature;
    });
  }

  verifySignature(
    publicKey: Uint8Array | VerificationKey,
    data: Uint8Array,
    signature: Uint8Array
  ): boolean {
    const keyBytes =
      publicKey instanceof Uint8Array ? publicKey : publicKey.publicKey;
    if (!(keyBytes instanceof Uint8Array)) {
      throw new VerificationError("Public key must be bytes or a key object");
    }
    if (!isEd25519PublicKey(keyBytes)) {
      throw new VerificationError(
        `Public key must be ${ED25519_PUBLIC_KEY_LENGTH} bytes`
      );
    }
    if (!isEd25519Signature(signature)) {
      throw new VerificationError(
        `Signature must be ${ED25519_SIGNATURE_LENGTH} bytes`
      );
    }

    try {
      return ed25519Verify(keyBytes, data, signature);
    } catch (error) {
      throw new VerificationError(
        `Signature verification failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async getKeypair(keyId: string): Promise<KeyPair | null> {
    return this.locks.run(keyId, async () => {
      const record = this.softwareKeys.get(keyId);
      if (record) {
        return record.keyPair;
      }
      if (!(await this.secureStorage.isAvailable())) {
        return null;
      }

      try {
        const publicKey = await this.secureStorage.getPublicKey(keyId);
        return createSecureKeyPair(keyId, publicKey);
      } catch (error) {
        if (error instanceof TpmError && error.reason === "KEY_NOT_FOUND") {
          return null;
        }
        throw new KeyStorageError(
          `Failed to read TPM key ${keyId}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    });
  }

  listKeys(): string[] {
    return [...this.softwareKeys.keys()];
  }

  async isSecureStorageAvailable(): Promise<boolean> {
    return this.secureStorage.isAvailable();
  }

  createNonce(): Nonce {
    return generateNonce(this.config.nonceSize);
  }

  // ─── Internal ───────────────────────────────────────────────────

  private generateSoftwareKeypair(
    keyId: string,
    requestedStorage: StorageKind
  ): KeyPair {
    let keyPair: KeyPair;
    let privateKey: Ed25519PrivateKey;
    try {
      privateKey = generatePrivateKey();
      keyPair = createSoftwareKeyPair(
        keyId,
        derivePublicKey(privateKey),
        privateKey,
        requestedStorage
      );
    } catch (error) {
      throw new KeyGenerationError(
        `Failed to generate software key pair ${keyId}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    this.softwareKeys.set(keyId, { keyPair, privateKey });
    this.logger.info(`Generated software key pair: ${keyId}`);
    this.emitGenerated(keyPair);
    return keyPair;
  }

  private async generateSecureKeypair(keyId: string): Promise<KeyPair> {
    let publicKey: Uint8Array;
    try {
      publicKey = await this.secureStorage.generateKey(keyId);
    } catch (error) {
      throw new KeyGenerationError(
        `Failed to generate TPM key pair ${keyId}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    if (!isEd25519PublicKey(publicKey)) {
      throw new KeyGenerationError(
        `TPM returned a ${publicKey.length}-byte public key for ${keyId}`
      );
    }

    const keyPair = createSecureKeyPair(keyId, publicKey);
    this.logger.info(`Generated TPM key pair: ${keyId}`);
    this.emitGenerated(keyPair);
    return keyPair;
  }

  protected override handleListenerError(error: unknown, event: CporEvent): void {
    this.logger.error(
      `${event.type} listener failed for key ${event.keyId}: ${errorMessage(error)}`
    );
  }

  private emitGenerated(keyPair: KeyPair): void {
    this.emit({
      type: "KEY_GENERATED",
      keyId: keyPair.keyId,
      storage: keyPair.storage,
      requestedStorage: keyPair.requestedStorage,
      timestamp: now(),
    });
  }
}
