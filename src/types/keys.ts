/**
 * @module types/keys
 * @description Key material descriptors managed by the CryptoManager.
 */

import type {
  Ed25519PrivateKey,
  Ed25519PublicKey,
} from "./branded.js";

/** Where a private key lives. `tpm` keys never leave the secure store. */
export type StorageKind = "software" | "tpm";

export const STORAGE_KINDS: readonly StorageKind[] = ["software", "tpm"];

/**
 * What the manager does when `tpm` storage is requested but the secure
 * store reports itself unavailable.
 *
 * - `software`: generate an in-process key instead, log a warning and
 *   emit KEY_STORAGE_FALLBACK. The returned KeyPair reports both the
 *   requested and the actual storage.
 * - `reject`: throw TpmError with reason UNAVAILABLE.
 */
export type TpmFallbackPolicy = "software" | "reject";

/**
 * One Ed25519 identity.
 *
 * For `tpm` storage the private key is an opaque handle held by the secure
 * store; `exportPrivateKey()` throws KeyStorageError.
 */
export interface KeyPair {
  readonly keyId: string;
  readonly publicKey: Ed25519PublicKey;
  /** Storage that actually holds the private key. */
  readonly storage: StorageKind;
  /** Storage the caller asked for. Differs from `storage` after a fallback. */
  readonly requestedStorage: StorageKind;
  /** Returns a copy of the 32-byte private key seed (software keys only). */
  exportPrivateKey(): Ed25519PrivateKey;
}

/**
 * Anything carrying a parsed public key, accepted wherever a raw key is.
 * A KeyPair satisfies it.
 */
export interface VerificationKey {
  readonly publicKey: Uint8Array;
}
