/**
 * @module types/events
 * @description Event catalog for the CPOR key lifecycle.
 *
 * Key-storage decisions that matter for compliance (a requested hardware
 * key that ended up in software) are emitted as typed events so callers
 * can audit them without parsing log output.
 */

import type { UnixTimestamp } from "./branded.js";
import type { StorageKind } from "./keys.js";

// ─── Key Events ─────────────────────────────────────────────────────

/** Emitted after a keypair has been generated and stored. */
export interface KeyGeneratedEvent {
  readonly type: "KEY_GENERATED";
  readonly keyId: string;
  readonly storage: StorageKind;
  readonly requestedStorage: StorageKind;
  readonly timestamp: UnixTimestamp;
}

/** Emitted when a `tpm` key was requested but a software key was generated. */
export interface KeyStorageFallbackEvent {
  readonly type: "KEY_STORAGE_FALLBACK";
  readonly keyId: string;
  readonly requestedStorage: "tpm";
  readonly storage: "software";
  readonly reason: string;
  readonly timestamp: UnixTimestamp;
}

/** Emitted when a key was removed from at least one store. */
export interface KeyDeletedEvent {
  readonly type: "KEY_DELETED";
  readonly keyId: string;
  readonly timestamp: UnixTimestamp;
}

// ─── Event Map ──────────────────────────────────────────────────────

export interface CporEventMap {
  KEY_GENERATED: KeyGeneratedEvent;
  KEY_STORAGE_FALLBACK: KeyStorageFallbackEvent;
  KEY_DELETED: KeyDeletedEvent;
}

export type CporEventType = keyof CporEventMap;

export type CporEvent = CporEventMap[CporEventType];
