/**
 * @module messages/schema
 * @description zod schemas for the ten CPOR-2 message kinds.
 *
 * Each schema is the single validation gate for its kind: it applies
 * defaults, checks every field and cross-field rule, and freezes the
 * result. Mappings and lists are deep-copied and frozen. Byte fields are
 * private copies exposed as read-only views: a typed array cannot be
 * frozen, so writing through one is a compile-time error only.
 *
 * Issue messages name the wire (snake_case) field so that errors read the
 * same whether a message was built in code or decoded off the wire.
 *
 * Shape key order is wire field order: base fields first, then the
 * discriminant, then the kind's own fields.
 */

import { z } from "zod";
import { ED25519_PUBLIC_KEY_LENGTH } from "../backends/ed25519.js";
import { isRecord } from "../utils/guards.js";

/** The protocol generation every message must carry. */
export const PROTOCOL_VERSION = "CPOR-2";

export const MIN_NONCE_BYTES = 16;
export const DEFAULT_MAX_MESSAGE_SIZE = 1_048_576;

export const ACK_TYPES = ["message", "heartbeat", "batch"] as const;
export const ERROR_SEVERITIES = ["warning", "error", "fatal"] as const;
export const KEY_STORAGE_KINDS = ["tpm", "software"] as const;

// ─── Field Builders ─────────────────────────────────────────────────

function fixedMessage(message: string): z.ZodErrorMap {
  return () => ({ message });
}

/** Byte fields are copied at construction and typed read-only. */
export type ByteView = Readonly<Uint8Array>;

/** A decoded mapping, frozen all the way down. */
export type FrozenRecord = Readonly<Record<string, unknown>>;

function copyBytes(value: Uint8Array): ByteView {
  return new Uint8Array(value);
}

/**
 * Deep copy of a decoded value with every mapping and list frozen. Nested
 * byte strings are copied; a typed array cannot be frozen.
 */
function freezeValue(value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return new Uint8Array(value);
  }
  if (Array.isArray(value)) {
    return Object.freeze(value.map(freezeValue));
  }
  if (isRecord(value)) {
    return freezeRecord(value);
  }
  return value;
}

function freezeRecord(value: Readonly<Record<string, unknown>>): FrozenRecord {
  return Object.freeze(
    Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, freezeValue(item)])
    )
  );
}

function bytes(message: string) {
  return z.custom<Uint8Array>((value) => value instanceof Uint8Array, {
    message,
  });
}

function text(field: string) {
  return z.string({ errorMap: fixedMessage(`${field} must be a string`) });
}

function nonEmptyString(field: string) {
  const message = `${field} must be a non-empty string`;
  return z.string({ errorMap: fixedMessage(message) }).min(1, message);
}

function integer(field: string) {
  const message = `${field} must be an integer`;
  return z.number({ errorMap: fixedMessage(message) }).int(message);
}

function nonNegativeInteger(field: string) {
  const message = `${field} must be a non-negative integer`;
  return z
    .number({ errorMap: fixedMessage(message) })
    .int(message)
    .nonnegative(message);
}

function positiveInteger(field: string) {
  const message = `${field} must be a positive integer`;
  return z
    .number({ errorMap: fixedMessage(message) })
    .int(message)
    .positive(message);
}

function flag(field: string) {
  return z.boolean({ errorMap: fixedMessage(`${field} must be a boolean`) });
}

function byteString(field: string) {
  return bytes(`${field} must be bytes`).transform(copyBytes);
}

function publicKeyBytes(field: string) {
  const missing = `${field} must be non-empty bytes`;
  return bytes(missing)
    .refine((value) => value.length > 0, missing)
    .refine(
      (value) => value.length === ED25519_PUBLIC_KEY_LENGTH,
      `${field} must be ${ED25519_PUBLIC_KEY_LENGTH} bytes for Ed25519`
    )
    .transform(copyBytes);
}

function nonceBytes(field: string, suffix = "") {
  const missing = `${field} must be non-empty bytes`;
  return bytes(missing)
    .refine((value) => value.length > 0, missing)
    .refine(
      (value) => value.length >= MIN_NONCE_BYTES,
      `${field} must be at least ${MIN_NONCE_BYTES} bytes${suffix}`
    )
    .transform(copyBytes);
}

function stringList(field: string) {
  return z
    .array(
      z.string({ errorMap: fixedMessage(`${field} must be a list of strings`) }),
      { errorMap: fixedMessage(`${field} must be a list`) }
    )
    .transform((values) => Object.freeze([...values]))
    .default(() => []);
}

function mapping(field: string) {
  return z
    .record(z.string(), z.unknown(), {
      errorMap: fixedMessage(`${field} must be a mapping`),
    })
    .transform(freezeRecord);
}

function discriminant<K extends string>(kind: K) {
  return z.literal(kind, { errorMap: fixedMessage(`type must be '${kind}'`) });
}

const baseShape = {
  version: z
    .literal(PROTOCOL_VERSION, {
      errorMap: (_issue, ctx) => ({
        message: `Invalid protocol version: ${String(ctx.data)}`,
      }),
    })
    .default(PROTOCOL_VERSION),
  messageId: text("message_id").optional(),
  timestamp: nonNegativeInteger("timestamp").optional(),
};

// ─── Connection ─────────────────────────────────────────────────────

export const connectRequestShape = {
  ...baseShape,
  type: discriminant("connect_request").default("connect_request"),
  clientId: nonEmptyString("client_id"),
  clientPubkey: publicKeyBytes("client_pubkey"),
  resumeSequence: nonNegativeInteger("resume_sequence").default(0),
  nonce: nonceBytes("nonce", " for security"),
  registrationFlag: flag("registration_flag").default(false),
  protocolVersion: text("protocol_version").default(PROTOCOL_VERSION),
  capabilities: stringList("capabilities"),
  keyStorage: z
    .enum(KEY_STORAGE_KINDS, {
      errorMap: fixedMessage("key_storage must be 'tpm' or 'software'"),
    })
    .optional(),
};

export const connectRequestSchema = z.object(connectRequestShape).readonly();

export const connectResponseShape = {
  ...baseShape,
  type: discriminant("connect_response").default("connect_response"),
  sessionId: nonEmptyString("session_id"),
  serverPubkey: publicKeyBytes("server_pubkey"),
  accepted: flag("accepted").default(false),
  resumeSequence: nonNegativeInteger("resume_sequence").default(0),
  statusCode: integer("status_code").default(0),
  errorMessage: text("error_message").optional(),
  serverCapabilities: stringList("server_capabilities"),
  maxMessageSize: positiveInteger("max_message_size").default(
    DEFAULT_MAX_MESSAGE_SIZE
  ),
  ephemeralPubkey: publicKeyBytes("ephemeral_pubkey").optional(),
};

export const connectResponseSchema = z
  .object(connectResponseShape)
  .superRefine((message, ctx) => {
    if (message.statusCode !== 0 && !message.errorMessage) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["errorMessage"],
        message: "error_message required when status_code != 0",
      });
    }
  })
  .readonly();

// ─── Data ───────────────────────────────────────────────────────────

export const genericMessageShape = {
  ...baseShape,
  type: discriminant("generic").default("generic"),
  sequenceNumber: nonNegativeInteger("sequence_number"),
  payload: byteString("payload"),
  messageType: nonEmptyString("message_type").default("data"),
  priority: integer("priority").default(0),
  requiresAck: flag("requires_ack").default(true),
};

export const genericMessageSchema = z.object(genericMessageShape).readonly();

// ─── Resumption ─────────────────────────────────────────────────────

export const resumeRequestShape = {
  ...baseShape,
  type: discriminant("resume_request").default("resume_request"),
  clientId: nonEmptyString("client_id"),
  lastSequenceNumber: nonNegativeInteger("last_sequence_number"),
  clientNonce: nonceBytes("client_nonce"),
};

export const resumeRequestSchema = z.object(resumeRequestShape).readonly();

export const resumeResponseShape = {
  ...baseShape,
  type: discriminant("resume_response").default("resume_response"),
  statusCode: integer("status_code").default(0),
  resumeSequence: nonNegativeInteger("resume_sequence"),
  errorMessage: text("error_message").optional(),
  sessionId: nonEmptyString("session_id"),
  resumeAccepted: flag("resume_accepted").default(false),
  serverNonce: nonceBytes("server_nonce"),
};

export const resumeResponseSchema = z
  .object(resumeResponseShape)
  .superRefine((message, ctx) => {
    if (!message.resumeAccepted && !message.errorMessage) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["errorMessage"],
        message: "error_message required when resume_accepted=false",
      });
    }
  })
  .readonly();

// ─── Batching ───────────────────────────────────────────────────────

export const batchMessageShape = {
  ...baseShape,
  type: discriminant("batch").default("batch"),
  messages: z
    .array(mapping("messages entry"), {
      errorMap: fixedMessage("messages must be a list"),
    })
    .transform((entries) => Object.freeze([...entries])),
  batchId: nonEmptyString("batch_id"),
  totalCount: positiveInteger("total_count"),
};

export const batchMessageSchema = z
  .object(batchMessageShape)
  .superRefine((message, ctx) => {
    if (message.messages.length > message.totalCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["messages"],
        message: "messages count cannot exceed total_count",
      });
    }
  })
  .readonly();

// ─── Liveness & Closure ─────────────────────────────────────────────

export const heartbeatMessageShape = {
  ...baseShape,
  type: discriminant("heartbeat").default("heartbeat"),
  heartbeatId: nonEmptyString("heartbeat_id"),
  clientSequence: nonNegativeInteger("client_sequence"),
  serverSequence: nonNegativeInteger("server_sequence"),
  requiresResponse: flag("requires_response").default(true),
};

export const heartbeatMessageSchema = z
  .object(heartbeatMessageShape)
  .readonly();

export const closeMessageShape = {
  ...baseShape,
  type: discriminant("close").default("close"),
  reason: nonEmptyString("reason"),
  finalSequence: nonNegativeInteger("final_sequence").optional(),
  graceful: flag("graceful").default(true),
};

export const closeMessageSchema = z.object(closeMessageShape).readonly();

// ─── Acknowledgment & Errors ────────────────────────────────────────

export const ackMessageShape = {
  ...baseShape,
  type: discriminant("ack").default("ack"),
  ackSequence: nonNegativeInteger("ack_sequence"),
  ackType: z.enum(ACK_TYPES, {
    errorMap: fixedMessage(`ack_type must be one of: ${ACK_TYPES.join(", ")}`),
  }),
  errorCode: integer("error_code").optional(),
};

export const ackMessageSchema = z.object(ackMessageShape).readonly();

export const errorMessageShape = {
  ...baseShape,
  type: discriminant("error").default("error"),
  errorCode: integer("error_code").default(0),
  errorMessage: nonEmptyString("error_message"),
  severity: z.enum(ERROR_SEVERITIES, {
    errorMap: fixedMessage(
      `severity must be one of: ${ERROR_SEVERITIES.join(", ")}`
    ),
  }),
  recoverable: flag("recoverable").default(true),
  details: mapping("details").optional(),
};

export const errorMessageSchema = z.object(errorMessageShape).readonly();

// ─── Types ──────────────────────────────────────────────────────────

export type ConnectRequest = z.output<typeof connectRequestSchema>;
export type ConnectResponse = z.output<typeof connectResponseSchema>;
export type GenericMessage = z.output<typeof genericMessageSchema>;
export type ResumeRequest = z.output<typeof resumeRequestSchema>;
export type ResumeResponse = z.output<typeof resumeResponseSchema>;
export type BatchMessage = z.output<typeof batchMessageSchema>;
export type HeartbeatMessage = z.output<typeof heartbeatMessageSchema>;
export type CloseMessage = z.output<typeof closeMessageSchema>;
export type AckMessage = z.output<typeof ackMessageSchema>;
export type ErrorMessage = z.output<typeof errorMessageSchema>;

export type ConnectRequestInit = z.input<typeof connectRequestSchema>;
export type ConnectResponseInit = z.input<typeof connectResponseSchema>;
export type GenericMessageInit = z.input<typeof genericMessageSchema>;
export type ResumeRequestInit = z.input<typeof resumeRequestSchema>;
export type ResumeResponseInit = z.input<typeof resumeResponseSchema>;
export type BatchMessageInit = z.input<typeof batchMessageSchema>;
export type HeartbeatMessageInit = z.input<typeof heartbeatMessageSchema>;
export type CloseMessageInit = z.input<typeof closeMessageSchema>;
export type AckMessageInit = z.input<typeof ackMessageSchema>;
export type ErrorMessageInit = z.input<typeof errorMessageSchema>;

/** Discriminant → message type. */
export interface MessageMap {
  connect_request: ConnectRequest;
  connect_response: ConnectResponse;
  generic: GenericMessage;
  resume_request: ResumeRequest;
  resume_response: ResumeResponse;
  batch: BatchMessage;
  heartbeat: HeartbeatMessage;
  close: CloseMessage;
  ack: AckMessage;
  error: ErrorMessage;
}

/** Discriminant → constructor input (defaulted fields optional). */
export interface MessageInitMap {
  connect_request: ConnectRequestInit;
  connect_response: ConnectResponseInit;
  generic: GenericMessageInit;
  resume_request: ResumeRequestInit;
  resume_response: ResumeResponseInit;
  batch: BatchMessageInit;
  heartbeat: HeartbeatMessageInit;
  close: CloseMessageInit;
  ack: AckMessageInit;
  error: ErrorMessageInit;
}

export type MessageKind = keyof MessageMap;

export type Message = MessageMap[MessageKind];
