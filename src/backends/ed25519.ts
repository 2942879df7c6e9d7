/**
 * @module backends/ed25519
 * @description Ed25519 primitives and random-material helpers on @noble.
 *
 * Provides:
 * - Key generation, signing and verification (RFC 8032, deterministic)
 * - Nonce and session-key generation
 * - Timing-safe byte comparison
 * - Key-id derivation from a public key
 *
 * All functions are pure and stateless. Length checks happen here so the
 * rest of the codebase only ever handles branded, well-sized keys.
 */

import { ed25519 } from "@noble/curves/ed25519";
import { equalBytes } from "@noble/curves/abstract/utils";
import { bytesToHex, randomBytes } from "@noble/hashes/utils";
import { CryptoError } from "../interfaces/crypto-manager.js";
import type {
  Ed25519PrivateKey,
  Ed25519PublicKey,
  Ed25519Signature,
  Nonce,
  SessionKey,
} from "../types/branded.js";

export const ED25519_PUBLIC_KEY_LENGTH = 32;
export const ED25519_PRIVATE_KEY_LENGTH = 32;
export const ED25519_SIGNATURE_LENGTH = 64;

export const MIN_NONCE_LENGTH = 1;
export const MAX_NONCE_LENGTH = 1024;
export const DEFAULT_NONCE_LENGTH = 16;
export const SESSION_KEY_LENGTH = 32;

// ─── Branding ──────────────────────────────────────────────────────

export function isEd25519PublicKey(
  value: Uint8Array
): value is Ed25519PublicKey {
  return value.length === ED25519_PUBLIC_KEY_LENGTH;
}

export function isEd25519PrivateKey(
  value: Uint8Array
): value is Ed25519PrivateKey {
  return value.length === ED25519_PRIVATE_KEY_LENGTH;
}

export function isEd25519Signature(
  value: Uint8Array
): value is Ed25519Signature {
  return value.length === ED25519_SIGNATURE_LENGTH;
}

/**
 * Check a raw public key's length and brand it.
 * @throws {CryptoError} code=INVALID_ARGUMENT unless 32 bytes.
 */
export function toEd25519PublicKey(bytes: Uint8Array): Ed25519PublicKey {
  if (!isEd25519PublicKey(bytes)) {
    throw new CryptoError(
      `Public key must be ${ED25519_PUBLIC_KEY_LENGTH} bytes, got ${bytes.length}`,
      "INVALID_ARGUMENT"
    );
  }
  return bytes;
}

// ─── Keys ──────────────────────────────────────────────────────────

/** A fresh random 32-byte private key seed. */
export function generatePrivateKey(): Ed25519PrivateKey {
  return ed25519.utils.randomPrivateKey() as Ed25519PrivateKey;
}

export function derivePublicKey(privateKey: Ed25519PrivateKey): Ed25519PublicKey {
  return ed25519.getPublicKey(privateKey) as Ed25519PublicKey;
}

/**
 * Structural validity of an Ed25519 key.
 *
 * Public keys must be 32 bytes and decode to a curve point; private keys
 * must be 32 bytes (every 32-byte seed is valid).
 */
export function isValidEd25519Key(
  bytes: Uint8Array,
  kind: "public" | "private" = "public"
): boolean {
  if (kind === "private") {
    return isEd25519PrivateKey(bytes);
  }
  if (bytes.length !== ED25519_PUBLIC_KEY_LENGTH) {
    return false;
  }
  try {
    ed25519.ExtendedPoint.fromHex(bytes);
    return true;
  } catch {
    return false;
  }
}

// ─── Sign / Verify ─────────────────────────────────────────────────

export function ed25519Sign(
  privateKey: Ed25519PrivateKey,
  data: Uint8Array
): Ed25519Signature {
  return ed25519.sign(data, privateKey) as Ed25519Signature;
}

/**
 * Verify with lengths already checked by the caller. Returns `false` for
 * any signature that does not match, including keys that are not on the
 * curve.
 */
export function ed25519Verify(
  publicKey: Ed25519PublicKey,
  data: Uint8Array,
  signature: Ed25519Signature
): boolean {
  return ed25519.verify(signature, data, publicKey);
}

// ─── Random Material ───────────────────────────────────────────────

/**
 * Cryptographically secure random bytes.
 * @throws {CryptoError} code=INVALID_ARGUMENT unless 1 ≤ size ≤ 1024.
 */
export function generateNonce(size: number = DEFAULT_NONCE_LENGTH): Nonce {
  if (
    !Number.isInteger(size) ||
    size < MIN_NONCE_LENGTH ||
    size > MAX_NONCE_LENGTH
  ) {
    throw new CryptoError(
      `Nonce size must be between ${MIN_NONCE_LENGTH} and ${MAX_NONCE_LENGTH} bytes`,
      "INVALID_ARGUMENT"
    );
  }
  return randomBytes(size) as Nonce;
}

export function generateSessionKey(): SessionKey {
  return randomBytes(SESSION_KEY_LENGTH) as SessionKey;
}

/** Equality whose running time depends only on the lengths. */
export function constantTimeCompare(a: Uint8Array, b: Uint8Array): boolean {
  return equalBytes(a, b);
}

// ─── Identifiers ───────────────────────────────────────────────────

/**
 * Stable key id from a public key: `${prefix}_${hex(first 8 bytes)}`.
 * @throws {CryptoError} code=INVALID_ARGUMENT unless 32 bytes.
 */
export function deriveKeyId(publicKey: Uint8Array, prefix = "cpor"): string {
  const key = toEd25519PublicKey(publicKey);
  return `${prefix}_${bytesToHex(key.subarray(0, 8))}`;
}
