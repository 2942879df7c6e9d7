/**
 * @module types/branded
 * @description Branded types for compile-time safety across the CPOR core.
 *
 * A raw Uint8Array can never be passed where an Ed25519PublicKey is expected
 * without going through a function that checked its length first. Brands
 * exist only at the type level, never at runtime.
 *
 * @example
 * ```ts
 * const raw = new Uint8Array(32);
 * // Type error: Uint8Array is not assignable to Ed25519PublicKey
 * const key: Ed25519PublicKey = raw;
 * // Correct:
 * const key = toEd25519PublicKey(raw);
 * ```
 */

/** Unique symbol for branding. Not exported. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Key Brands ─────────────────────────────────────────────────────

/** A 32-byte Ed25519 public key. */
export type Ed25519PublicKey = Brand<Uint8Array, "Ed25519PublicKey">;

/** A 32-byte Ed25519 private key seed. Only software keys expose one. */
export type Ed25519PrivateKey = Brand<Uint8Array, "Ed25519PrivateKey">;

/** A 64-byte Ed25519 signature (R || S). */
export type Ed25519Signature = Brand<Uint8Array, "Ed25519Signature">;

// ─── Random Material ────────────────────────────────────────────────

/** Cryptographically secure random bytes used once (anti-replay). */
export type Nonce = Brand<Uint8Array, "Nonce">;

/** A 32-byte symmetric session key. */
export type SessionKey = Brand<Uint8Array, "SessionKey">;

// ─── Time ───────────────────────────────────────────────────────────

/** A Unix timestamp in seconds. */
export type UnixTimestamp = Brand<number, "UnixTimestamp">;
