/**
 * @module messages/legacy
 * @description Structural kind inference for records that predate the
 * `type` discriminant.
 *
 * The predicates overlap: a record can satisfy more than one. Their order
 * is part of the contract and the first match wins:
 *
 *  1. `client_id` and (`client_pubkey` or `public_key`)                → connect_request
 *  2. `session_id`, `accepted` and (`server_pubkey` or `server_public_key`) → connect_response
 *  3. (`sequence_number` or `sequence_counter`) and `payload`          → generic
 *  4. (`last_sequence_number` or `last_received_sequence`) and `client_nonce` → resume_request
 *  5. (`resume_accepted` or `status_code`) and (`server_nonce` or `resume_sequence`) → resume_response
 *  6. `messages` and `batch_id`                                        → batch
 *  7. `heartbeat_id`, or `timestamp` without `type`                    → heartbeat
 *  8. `reason` and (`graceful` or `final_sequence`)                    → close
 *  9. `ack_sequence` or `ack_counter`                                  → ack
 * 10. `error_code` and (`error_message` or `message`)                  → error
 *
 * Presence is tested by key, so a key holding `null` still counts.
 */

import type { WireRecord } from "../codec/index.js";
import { InvalidMessageError } from "./errors.js";
import type { MessageKind } from "./schema.js";

type Predicate = (has: (key: string) => boolean) => boolean;

const LEGACY_PREDICATES: ReadonlyArray<readonly [Predicate, MessageKind]> = [
  [(has) => has("client_id") && (has("client_pubkey") || has("public_key")), "connect_request"],
  [
    (has) =>
      has("session_id") &&
      has("accepted") &&
      (has("server_pubkey") || has("server_public_key")),
    "connect_response",
  ],
  [(has) => (has("sequence_number") || has("sequence_counter")) && has("payload"), "generic"],
  [
    (has) =>
      (has("last_sequence_number") || has("last_received_sequence")) &&
      has("client_nonce"),
    "resume_request",
  ],
  [
    (has) =>
      (has("resume_accepted") || has("status_code")) &&
      (has("server_nonce") || has("resume_sequence")),
    "resume_response",
  ],
  [(has) => has("messages") && has("batch_id"), "batch"],
  [(has) => has("heartbeat_id") || (has("timestamp") && !has("type")), "heartbeat"],
  [(has) => has("reason") && (has("graceful") || has("final_sequence")), "close"],
  [(has) => has("ack_sequence") || has("ack_counter"), "ack"],
  [(has) => has("error_code") && (has("error_message") || has("message")), "error"],
];

/**
 * Guess the kind of a record from the fields it carries.
 *
 * @throws {InvalidMessageError} when no predicate matches.
 */
export function inferLegacyMessageKind(record: Readonly<WireRecord>): MessageKind {
  const has = (key: string): boolean => Object.hasOwn(record, key);
  for (const [matches, kind] of LEGACY_PREDICATES) {
    if (matches(has)) {
      return kind;
    }
  }
  throw new InvalidMessageError(
    `Cannot determine message type from data: ${JSON.stringify(Object.keys(record))}`
  );
}
