/**
 * @module codec
 * @description Canonical CBOR codec for CPOR wire records.
 *
 * A wire record is the snake_case mapping a message is flattened to before
 * it leaves the process. Encoding is canonical: map keys are sorted
 * length-first, then bytewise, so two records with the same entries encode
 * to the same bytes regardless of insertion order. Signatures are computed
 * over exactly these bytes.
 *
 * Byte strings (CBOR major type 2) decode to Uint8Array.
 */

import { decode, encode } from "cborg";
import { SerializationError } from "../messages/errors.js";
import { isRecord } from "../utils/guards.js";

/** A message flattened to its wire field names. Unset fields are absent. */
export type WireRecord = Record<string, unknown>;

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─── Encode ─────────────────────────────────────────────────────────

/**
 * Canonical CBOR encoding of a wire record.
 *
 * @throws {SerializationError} if a value has no CBOR representation.
 */
export function encodeRecord(record: Readonly<WireRecord>): Uint8Array {
  try {
    return encode(record);
  } catch (error) {
    throw new SerializationError(
      `Failed to serialize message to CBOR: ${reason(error)}`,
      { cause: error }
    );
  }
}

// ─── Decode ─────────────────────────────────────────────────────────

/**
 * Decode a single CBOR data item of any shape.
 *
 * @throws {SerializationError} on malformed or trailing bytes.
 */
export function decodeCbor(bytes: Uint8Array): unknown {
  try {
    const decoded: unknown = decode(bytes);
    return decoded;
  } catch (error) {
    throw new SerializationError(
      `Failed to decode CBOR data: ${reason(error)}`,
      { cause: error }
    );
  }
}

/**
 * Decode bytes that must hold a wire record.
 *
 * @throws {SerializationError} on malformed bytes or a non-mapping item.
 */
export function decodeRecord(bytes: Uint8Array): WireRecord {
  const decoded = decodeCbor(bytes);
  if (!isRecord(decoded)) {
    throw new SerializationError(
      "Failed to decode CBOR data: CBOR data must be a mapping"
    );
  }
  return decoded;
}
