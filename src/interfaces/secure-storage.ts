/**
 * @module interfaces/secure-storage
 * @description ISecureStorage: pluggable hardware-backed key store.
 *
 * Private keys generated here never leave the store: callers get the
 * public key back and ask the store to sign. Implementations are injected
 * into the CryptoManager at construction time.
 *
 * Keys are not enumerable through this interface.
 */

import { CryptoError } from "./crypto-manager.js";
import type {
  Ed25519PublicKey,
  Ed25519Signature,
} from "../types/branded.js";

export type TpmErrorReason =
  | "UNAVAILABLE"
  | "KEY_EXISTS"
  | "KEY_NOT_FOUND"
  | "OPERATION_FAILED";

/**
 * Errors that may be thrown by ISecureStorage operations.
 */
export class TpmError extends CryptoError {
  constructor(
    message: string,
    public readonly reason: TpmErrorReason,
    options?: ErrorOptions
  ) {
    super(message, "TPM_ERROR", options);
    this.name = "TpmError";
  }
}

/**
 * @interface ISecureStorage
 */
export interface ISecureStorage {
  /**
   * @query
   * @description Whether the device is present and answering.
   */
  isAvailable(): Promise<boolean>;

  /**
   * @command
   * @description Generates an Ed25519 key inside the store.
   * @returns The 32-byte public key.
   * @throws {TpmError} reason=KEY_EXISTS if `keyId` is taken.
   */
  generateKey(keyId: string): Promise<Ed25519PublicKey>;

  /**
   * @query
   * @description Signs `data` with a stored key.
   * @returns A 64-byte signature.
   * @throws {TpmError} reason=KEY_NOT_FOUND for an unknown id.
   */
  sign(keyId: string, data: Uint8Array): Promise<Ed25519Signature>;

  /**
   * @query
   * @throws {TpmError} reason=KEY_NOT_FOUND for an unknown id.
   */
  getPublicKey(keyId: string): Promise<Ed25519PublicKey>;

  /**
   * @command
   * @returns Whether a key was removed.
   */
  deleteKey(keyId: string): Promise<boolean>;
}
