/**
 * @module backends/key-pair
 * @description KeyPair factories for the two storage kinds.
 *
 * The private seed of a software key is captured in a closure and only
 * ever handed out as a copy. Secure-store keys carry no private material.
 */

import { KeyStorageError } from "../interfaces/crypto-manager.js";
import type {
  Ed25519PrivateKey,
  Ed25519PublicKey,
} from "../types/branded.js";
import type { KeyPair, StorageKind } from "../types/keys.js";

export function createSoftwareKeyPair(
  keyId: string,
  publicKey: Ed25519PublicKey,
  privateKey: Ed25519PrivateKey,
  requestedStorage: StorageKind = "software"
): KeyPair {
  const seed = new Uint8Array(privateKey);
  const keyPair: KeyPair = {
    keyId,
    publicKey,
    storage: "software",
    requestedStorage,
    exportPrivateKey: () => new Uint8Array(seed) as Ed25519PrivateKey,
  };
  return Object.freeze(keyPair);
}

export function createSecureKeyPair(
  keyId: string,
  publicKey: Ed25519PublicKey
): KeyPair {
  const keyPair: KeyPair = {
    keyId,
    publicKey,
    storage: "tpm",
    requestedStorage: "tpm",
    exportPrivateKey: (): Ed25519PrivateKey => {
      throw new KeyStorageError(
        `Cannot export private key ${keyId} from TPM storage`
      );
    },
  };
  return Object.freeze(keyPair);
}
