/**
 * @module messages/signing
 * @description Ed25519 signatures over a message's canonical encoding.
 *
 * Signer and verifier each re-encode the message, so a signature binds
 * the message's field values, not the bytes it happened to arrive in.
 */

import {
  ed25519Sign,
  ed25519Verify,
  isEd25519PrivateKey,
  isEd25519PublicKey,
  isEd25519Signature,
} from "../backends/ed25519.js";
import type { ICryptoManager } from "../interfaces/crypto-manager.js";
import type { Ed25519Signature } from "../types/branded.js";
import type { VerificationKey } from "../types/keys.js";
import { SignatureError } from "./errors.js";
import { encodeMessage } from "./registry.js";
import type { Message } from "./schema.js";

/**
 * Sign with a raw 32-byte private key seed.
 *
 * @throws {SignatureError} if the key is not a 32-byte seed.
 */
export function signMessage(
  message: Message,
  privateKey: Uint8Array
): Ed25519Signature {
  if (!(privateKey instanceof Uint8Array) || !isEd25519PrivateKey(privateKey)) {
    throw new SignatureError(
      "Failed to sign message: private key must be 32 bytes"
    );
  }
  return ed25519Sign(privateKey, encodeMessage(message));
}

/**
 * Sign through a CryptoManager, so that secure-store keys can sign too.
 *
 * @throws {KeyStorageError} if no store knows `keyId`.
 */
export async function signMessageWith(
  manager: ICryptoManager,
  keyId: string,
  message: Message
): Promise<Ed25519Signature> {
  return manager.signData(keyId, encodeMessage(message));
}

/**
 * @returns `false` for a wrong, truncated or mismatched signature.
 * @throws {SignatureError} if the public key is not 32 bytes, or the
 *   signature is not bytes at all.
 */
export function verifyMessage(
  message: Message,
  signature: Uint8Array,
  publicKey: Uint8Array | VerificationKey
): boolean {
  const keyBytes =
    publicKey instanceof Uint8Array ? publicKey : publicKey.publicKey;
  if (!(keyBytes instanceof Uint8Array)) {
    throw new SignatureError(
      "Failed to verify signature: public key must be bytes"
    );
  }
  if (!isEd25519PublicKey(keyBytes)) {
    throw new SignatureError(
      `Failed to verify signature: public key must be 32 bytes, got ${keyBytes.length}`
    );
  }
  if (!(signature instanceof Uint8Array)) {
    throw new SignatureError(
      "Failed to verify signature: signature must be bytes"
    );
  }
  if (!isEd25519Signature(signature)) {
    return false;
  }
  return ed25519Verify(keyBytes, encodeMessage(message), signature);
}
