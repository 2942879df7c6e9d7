/**
 * @module messages/parse
 * @description Decode bytes of unknown kind into a typed message.
 *
 * The `type` discriminant is required unless the caller opts into legacy
 * inference for peers that omit it.
 */

import { decodeRecord } from "../codec/index.js";
import type { WireRecord } from "../codec/index.js";
import { createLogger } from "../utils/logger.js";
import { InvalidMessageError } from "./errors.js";
import { inferLegacyMessageKind } from "./legacy.js";
import { isMessageKind, messageFromRecord } from "./registry.js";
import type { Message, MessageKind } from "./schema.js";

const logger = createLogger("cpor:messages");

export interface ParseOptions {
  /** Infer the kind of records without `type` from their fields. Default: false */
  legacy?: boolean;
}

/**
 * Resolve the kind a wire record claims to be.
 *
 * @throws {InvalidMessageError} for an unknown discriminant, or a missing
 *   one outside legacy mode.
 */
export function resolveMessageKind(
  record: Readonly<WireRecord>,
  options: ParseOptions = {}
): MessageKind {
  if (Object.hasOwn(record, "type")) {
    const discriminant = record.type;
    if (!isMessageKind(discriminant)) {
      throw new InvalidMessageError(
        `Unknown message type: ${String(discriminant)}`
      );
    }
    return discriminant;
  }

  if (!options.legacy) {
    throw new InvalidMessageError("Missing message type discriminant");
  }
  const kind = inferLegacyMessageKind(record);
  logger.debug(`Inferred legacy message kind: ${kind}`);
  return kind;
}

/**
 * Decode, resolve the kind, and validate.
 *
 * @throws {SerializationError} if the bytes are not a CBOR mapping.
 * @throws {InvalidMessageError} if the kind cannot be resolved or a field
 *   is invalid.
 */
export function parseMessage(
  bytes: Uint8Array,
  options: ParseOptions = {}
): Message {
  const record = decodeRecord(bytes);
  return messageFromRecord(resolveMessageKind(record, options), record);
}
