/**
 * @module messages/registry
 * @description Closed table from discriminant to message kind, and the
 * conversions every kind shares.
 *
 * The table is built once at module load and frozen; there is no way to
 * register a kind at run time.
 *
 * @example
 * ```ts
 * const request = createMessage("connect_request", {
 *   clientId: "c1",
 *   clientPubkey: publicKey,
 *   nonce: generateNonce(),
 * });
 * const bytes = encodeMessage(request);
 * const decoded = decodeMessage("connect_request", bytes);
 * ```
 */

import type { z } from "zod";
import { decodeRecord, encodeRecord } from "../codec/index.js";
import type { WireRecord } from "../codec/index.js";
import { camelToSnake } from "../utils/case.js";
import { InvalidMessageError } from "./errors.js";
import {
  ackMessageSchema,
  ackMessageShape,
  batchMessageSchema,
  batchMessageShape,
  closeMessageSchema,
  closeMessageShape,
  connectRequestSchema,
  connectRequestShape,
  connectResponseSchema,
  connectResponseShape,
  errorMessageSchema,
  errorMessageShape,
  genericMessageSchema,
  genericMessageShape,
  heartbeatMessageSchema,
  heartbeatMessageShape,
  resumeRequestSchema,
  resumeRequestShape,
  resumeResponseSchema,
  resumeResponseShape,
} from "./schema.js";
import type {
  AckMessage,
  AckMessageInit,
  BatchMessage,
  BatchMessageInit,
  CloseMessage,
  CloseMessageInit,
  ConnectRequest,
  ConnectRequestInit,
  ConnectResponse,
  ConnectResponseInit,
  ErrorMessage,
  ErrorMessageInit,
  GenericMessage,
  GenericMessageInit,
  HeartbeatMessage,
  HeartbeatMessageInit,
  Message,
  MessageInitMap,
  MessageKind,
  MessageMap,
  ResumeRequest,
  ResumeRequestInit,
  ResumeResponse,
  ResumeResponseInit,
} from "./schema.js";

// ─── Registry ───────────────────────────────────────────────────────

type SchemaMap = {
  readonly [K in MessageKind]: z.ZodType<
    MessageMap[K],
    z.ZodTypeDef,
    MessageInitMap[K]
  >;
};

/** One field of a kind: its TypeScript property and its wire name. */
export interface MessageField {
  readonly key: string;
  readonly wireName: string;
}

const MESSAGE_SCHEMAS: SchemaMap = Object.freeze({
  connect_request: connectRequestSchema,
  connect_response: connectResponseSchema,
  generic: genericMessageSchema,
  resume_request: resumeRequestSchema,
  resume_response: resumeResponseSchema,
  batch: batchMessageSchema,
  heartbeat: heartbeatMessageSchema,
  close: closeMessageSchema,
  ack: ackMessageSchema,
  error: errorMessageSchema,
});

/** Every discriminant, in protocol order. */
export const MESSAGE_KINDS = Object.freeze([
  "connect_request",
  "connect_response",
  "generic",
  "resume_request",
  "resume_response",
  "batch",
  "heartbeat",
  "close",
  "ack",
  "error",
] as const satisfies readonly MessageKind[]);

function fieldsOf(shape: z.ZodRawShape): readonly MessageField[] {
  return Object.freeze(
    Object.keys(shape).map((key) => ({ key, wireName: camelToSnake(key) }))
  );
}

const MESSAGE_FIELDS: { readonly [K in MessageKind]: readonly MessageField[] } =
  Object.freeze({
    connect_request: fieldsOf(connectRequestShape),
    connect_response: fieldsOf(connectResponseShape),
    generic: fieldsOf(genericMessageShape),
    resume_request: fieldsOf(resumeRequestShape),
    resume_response: fieldsOf(resumeResponseShape),
    batch: fieldsOf(batchMessageShape),
    heartbeat: fieldsOf(heartbeatMessageShape),
    close: fieldsOf(closeMessageShape),
    ack: fieldsOf(ackMessageShape),
    error: fieldsOf(errorMessageShape),
  });

export function isMessageKind(value: unknown): value is MessageKind {
  return (
    typeof value === "string" && Object.hasOwn(MESSAGE_SCHEMAS, value)
  );
}

export function isMessageOfKind<K extends MessageKind>(
  message: Message,
  kind: K
): message is MessageMap[K] {
  return message.type === kind;
}

/** The ordered fields of a kind, wire names included. */
export function messageFields(kind: MessageKind): readonly MessageField[] {
  return MESSAGE_FIELDS[kind];
}

// ─── Construction ───────────────────────────────────────────────────

/**
 * Validate `fields` against `kind` and return a frozen message.
 *
 * @throws {InvalidMessageError} naming the first offending wire field.
 */
export function createMessage<K extends MessageKind>(
  kind: K,
  fields: MessageInitMap[K]
): MessageMap[K] {
  return validate(kind, fields);
}

function validate<K extends MessageKind>(
  kind: K,
  input: unknown
): MessageMap[K] {
  const result = MESSAGE_SCHEMAS[kind].safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new InvalidMessageError(issue?.message ?? `Invalid ${kind} message`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function createConnectRequest(fields: ConnectRequestInit): ConnectRequest {
  return createMessage("connect_request", fields);
}

export function createConnectResponse(
  fields: ConnectResponseInit
): ConnectResponse {
  return createMessage("connect_response", fields);
}

export function createGenericMessage(fields: GenericMessageInit): GenericMessage {
  return createMessage("generic", fields);
}

export function createResumeRequest(fields: ResumeRequestInit): ResumeRequest {
  return createMessage("resume_request", fields);
}

export function createResumeResponse(
  fields: ResumeResponseInit
): ResumeResponse {
  return createMessage("resume_response", fields);
}

export function createBatchMessage(fields: BatchMessageInit): BatchMessage {
  return createMessage("batch", fields);
}

export function createHeartbeatMessage(
  fields: HeartbeatMessageInit
): HeartbeatMessage {
  return createMessage("heartbeat", fields);
}

export function createCloseMessage(fields: CloseMessageInit): CloseMessage {
  return createMessage("close", fields);
}

export function createAckMessage(fields: AckMessageInit): AckMessage {
  return createMessage("ack", fields);
}

export function createErrorMessage(fields: ErrorMessageInit): ErrorMessage {
  return createMessage("error", fields);
}

// ─── Wire Records ───────────────────────────────────────────────────

/**
 * Flatten a message to its wire record, in field order, with unset
 * optional fields left out.
 */
export function messageToRecord(message: Message): WireRecord {
  const values: { readonly [key: string]: unknown } = message;
  const record: WireRecord = {};
  for (const { key, wireName } of MESSAGE_FIELDS[message.type]) {
    const value = values[key];
    if (value !== undefined) {
      record[wireName] = value;
    }
  }
  return record;
}

/**
 * Build a message of a known kind from a wire record. Keys that are not
 * fields of `kind` are ignored, and `null` counts as unset.
 *
 * @throws {InvalidMessageError} if the record violates the kind's contract,
 *   including a `type` naming another kind.
 */
export function messageFromRecord<K extends MessageKind>(
  kind: K,
  record: Readonly<WireRecord>
): MessageMap[K] {
  const fields: Record<string, unknown> = {};
  for (const { key, wireName } of MESSAGE_FIELDS[kind]) {
    const value = record[wireName];
    if (value !== undefined && value !== null) {
      fields[key] = value;
    }
  }
  return validate(kind, fields);
}

// ─── Binary ─────────────────────────────────────────────────────────

/** Canonical CBOR bytes of a message. These are the bytes that get signed. */
export function encodeMessage(message: Message): Uint8Array {
  return encodeRecord(messageToRecord(message));
}

/**
 * Inverse of encodeMessage() for a message of known kind.
 *
 * @throws {SerializationError} on malformed CBOR or a non-mapping item.
 * @throws {InvalidMessageError} on a field violation.
 */
export function decodeMessage<K extends MessageKind>(
  kind: K,
  bytes: Uint8Array
): MessageMap[K] {
  return messageFromRecord(kind, decodeRecord(bytes));
}
