/**
 * @module interfaces/crypto-manager
 * @description ICryptoManager: Ed25519 key lifecycle, signing and
 * verification for CPOR peers.
 *
 * Follows Command/Query Separation (CQS):
 * - Commands mutate the keystore (generateKeypair, deleteKey)
 * - Queries return data without side effects (signData, verifySignature,
 *   getKeypair, listKeys)
 *
 * A detected bad signature is a `false` result, never an error. Errors are
 * reserved for inputs the primitive cannot run on and for key lifecycle
 * problems.
 */

import type {
  Ed25519Signature,
  Nonce,
} from "../types/branded.js";
import type {
  KeyPair,
  StorageKind,
  VerificationKey,
} from "../types/keys.js";

// ─── Errors ─────────────────────────────────────────────────────────

export type CryptoErrorCode =
  | "INVALID_ARGUMENT"
  | "KEY_GENERATION_ERROR"
  | "SIGNING_ERROR"
  | "VERIFICATION_ERROR"
  | "KEY_STORAGE_ERROR"
  | "TPM_ERROR";

/**
 * Base class for every error raised by the Cryptography Manager.
 */
export class CryptoError extends Error {
  constructor(
    message: string,
    public readonly code: CryptoErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "CryptoError";
  }
}

/** Key generation failed or was refused (bad id, bad storage, duplicate). */
export class KeyGenerationError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "KEY_GENERATION_ERROR", options);
    this.name = "KeyGenerationError";
  }
}

/** The signing primitive could not run. */
export class SigningError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SIGNING_ERROR", options);
    this.name = "SigningError";
  }
}

/** Verification inputs were malformed (wrong lengths or key type). */
export class VerificationError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "VERIFICATION_ERROR", options);
    this.name = "VerificationError";
  }
}

/** A key is unknown, or its private material cannot be exported. */
export class KeyStorageError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "KEY_STORAGE_ERROR", options);
    this.name = "KeyStorageError";
  }
}

// ─── Interface ──────────────────────────────────────────────────────

/**
 * @interface ICryptoManager
 * @description Owns the in-process software keystore and fronts an
 * injected secure store for hardware-backed keys.
 */
export interface ICryptoManager {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Generates a new Ed25519 keypair under `keyId`.
   *
   * When `tpm` is requested and the secure store is unavailable the
   * manager's TpmFallbackPolicy decides between a software key (reported
   * on the result and via KEY_STORAGE_FALLBACK) and a TpmError.
   *
   * @throws {KeyGenerationError} on an empty id, unknown storage kind,
   *   duplicate id or a failure inside the store.
   * @throws {TpmError} reason=UNAVAILABLE when fallback is rejected.
   */
  generateKeypair(keyId: string, storage?: StorageKind): Promise<KeyPair>;

  /**
   * @command
   * @description Removes `keyId` from both stores.
   * @returns Whether anything was actually removed.
   * @throws {KeyStorageError} if the secure store fails and no software
   *   key was removed either.
   */
  deleteKey(keyId: string): Promise<boolean>;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Signs `data` with the named key, software keystore first.
   * @throws {KeyStorageError} if no store knows `keyId`.
   * @throws {SigningError} if the primitive fails.
   */
  signData(keyId: string, data: Uint8Array): Promise<Ed25519Signature>;

  /**
   * @query
   * @description Checks an Ed25519 signature.
   * @returns `false` for a well-formed but invalid signature.
   * @throws {VerificationError} if the key is not 32 bytes or the
   *   signature is not 64 bytes.
   */
  verifySignature(
    publicKey: Uint8Array | VerificationKey,
    data: Uint8Array,
    signature: Uint8Array
  ): boolean;

  /**
   * @query
   * @description Looks a key up in the software keystore, then the
   * secure store.
   */
  getKeypair(keyId: string): Promise<KeyPair | null>;

  /**
   * @query
   * @description Lists software-stored key ids. Secure-store keys are not
   * enumerable through this interface.
   */
  listKeys(): string[];

  /**
   * @query
   * @description Whether the injected secure store currently answers.
   */
  isSecureStorageAvailable(): Promise<boolean>;

  /**
   * @query
   * @description A fresh nonce of the manager's configured size.
   */
  createNonce(): Nonce;
}
