import { describe, it, expect, expectTypeOf } from "vitest";
import { derivePublicKey, generatePrivateKey } from "../src/backends/ed25519.js";
import {
  InvalidMessageError,
  MESSAGE_KINDS,
  PROTOCOL_VERSION,
  createAckMessage,
  createBatchMessage,
  createCloseMessage,
  createConnectRequest,
  createConnectResponse,
  createErrorMessage,
  createGenericMessage,
  createHeartbeatMessage,
  createMessage,
  createResumeRequest,
  createResumeResponse,
  decodeMessage,
  encodeMessage,
  isMessageKind,
  isMessageOfKind,
  messageFields,
  messageFromRecord,
  messageToRecord,
  signMessage,
  verifyMessage,
} from "../src/messages/index.js";
import type { ByteView, FrozenRecord, Message } from "../src/messages/index.js";
import { encodeRecord } from "../src/codec/index.js";
import { filledBytes } from "./helpers.js";

const CLIENT_KEY = filledBytes(32, 1);
const SERVER_KEY = filledBytes(32, 3);
const NONCE = filledBytes(16, 2);

function sampleMessages(): Message[] {
  return [
    createConnectRequest({
      clientId: "c1",
      clientPubkey: CLIENT_KEY,
      nonce: NONCE,
      capabilities: ["resume", "batch"],
      keyStorage: "software",
    }),
    createConnectResponse({
      sessionId: "s1",
      serverPubkey: SERVER_KEY,
      accepted: true,
      ephemeralPubkey: CLIENT_KEY,
    }),
    createGenericMessage({
      sequenceNumber: 9,
      payload: new Uint8Array([0xde, 0xad]),
      messageId: "m-9",
      timestamp: 1_700_000_000,
    }),
    createResumeRequest({
      clientId: "c1",
      lastSequenceNumber: 41,
      clientNonce: NONCE,
    }),
    createResumeResponse({
      resumeSequence: 42,
      sessionId: "s1",
      resumeAccepted: true,
      serverNonce: NONCE,
    }),
    createBatchMessage({
      messages: [{ type: "ack", ack_sequence: 1, ack_type: "message" }],
      batchId: "b1",
      totalCount: 2,
    }),
    createHeartbeatMessage({
      heartbeatId: "hb-1",
      clientSequence: 10,
      serverSequence: 12,
    }),
    createCloseMessage({ reason: "shutdown", finalSequence: 100 }),
    createAckMessage({ ackSequence: 5, ackType: "heartbeat", errorCode: 0 }),
    createErrorMessage({
      errorCode: 503,
      errorMessage: "overloaded",
      severity: "warning",
      details: { retry_after: 5 },
    }),
  ];
}

describe("Message Registry", () => {
  describe("MESSAGE_KINDS", () => {
    it("should list the ten kinds in protocol order", () => {
      expect(MESSAGE_KINDS).toEqual([
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
      ]);
      expect(Object.isFrozen(MESSAGE_KINDS)).toBe(true);
    });
  });

  describe("isMessageKind()", () => {
    it("should accept registered discriminants only", () => {
      expect(isMessageKind("ack")).toBe(true);
      expect(isMessageKind("bogus")).toBe(false);
      expect(isMessageKind("toString")).toBe(false);
      expect(isMessageKind(5)).toBe(false);
    });
  });

  describe("isMessageOfKind()", () => {
    it("should narrow by discriminant", () => {
      const message: Message = createCloseMessage({ reason: "bye" });
      expect(isMessageOfKind(message, "close")).toBe(true);
      expect(isMessageOfKind(message, "ack")).toBe(false);
    });
  });

  describe("messageFields()", () => {
    it("should list base fields, then the discriminant, then the kind's own", () => {
      expect(messageFields("close").map((field) => field.wireName)).toEqual([
        "version",
        "message_id",
        "timestamp",
        "type",
        "reason",
        "final_sequence",
        "graceful",
      ]);
    });
  });
});

describe("Message Construction", () => {
  describe("createConnectRequest()", () => {
    it("should apply defaults", () => {
      const request = createConnectRequest({
        clientId: "c1",
        clientPubkey: CLIENT_KEY,
        nonce: NONCE,
      });

      expect(request.type).toBe("connect_request");
      expect(request.version).toBe(PROTOCOL_VERSION);
      expect(request.resumeSequence).toBe(0);
      expect(request.registrationFlag).toBe(false);
      expect(request.protocolVersion).toBe("CPOR-2");
      expect(request.capabilities).toEqual([]);
      expect(request.keyStorage).toBeUndefined();
      expect(request.messageId).toBeUndefined();
    });

    it("should freeze the message and its lists", () => {
      const request = createConnectRequest({
        clientId: "c1",
        clientPubkey: CLIENT_KEY,
        nonce: NONCE,
        capabilities: ["resume"],
      });
      expect(Object.isFrozen(request)).toBe(true);
      expect(Object.isFrozen(request.capabilities)).toBe(true);
    });

    it("should copy byte fields", () => {
      const key = filledBytes(32, 1);
      const request = createConnectRequest({
        clientId: "c1",
        clientPubkey: key,
        nonce: NONCE,
      });
      key[0] = 0xff;
      expect(request.clientPubkey[0]).toBe(1);
    });

    it("should reject a 31-byte public key", () => {
      expect(() =>
        createConnectRequest({
          clientId: "c1",
          clientPubkey: filledBytes(31, 1),
          nonce: NONCE,
        })
      ).toThrow("client_pubkey must be 32 bytes for Ed25519");
    });

    it("should reject an empty public key", () => {
      expect(() =>
        createConnectRequest({
          clientId: "c1",
          clientPubkey: new Uint8Array(0),
          nonce: NONCE,
        })
      ).toThrow("client_pubkey must be non-empty bytes");
    });

    it("should reject a short nonce", () => {
      expect(() =>
        createConnectRequest({
          clientId: "c1",
          clientPubkey: CLIENT_KEY,
          nonce: filledBytes(15, 2),
        })
      ).toThrow("nonce must be at least 16 bytes for security");
    });

    it("should reject an empty client id", () => {
      expect(() =>
        createConnectRequest({
          clientId: "",
          clientPubkey: CLIENT_KEY,
          nonce: NONCE,
        })
      ).toThrow(InvalidMessageError);
      expect(() =>
        createConnectRequest({
          clientId: "",
          clientPubkey: CLIENT_KEY,
          nonce: NONCE,
        })
      ).toThrow("client_id must be a non-empty string");
    });
  });

  describe("createConnectResponse()", () => {
    it("should require an error message for a non-zero status", () => {
      expect(() =>
        createConnectResponse({
          sessionId: "s1",
          serverPubkey: SERVER_KEY,
          statusCode: 1,
        })
      ).toThrow("error_message required when status_code != 0");
    });

    it("should accept a non-zero status with an error message", () => {
      const response = createConnectResponse({
        sessionId: "s1",
        serverPubkey: SERVER_KEY,
        statusCode: 1,
        errorMessage: "unauthorized",
      });
      expect(response.accepted).toBe(false);
      expect(response.maxMessageSize).toBe(1_048_576);
      expect(response.serverCapabilities).toEqual([]);
    });

    it("should reject a zero max message size", () => {
      expect(() =>
        createConnectResponse({
          sessionId: "s1",
          serverPubkey: SERVER_KEY,
          maxMessageSize: 0,
        })
      ).toThrow("max_message_size must be a positive integer");
    });

    it("should check the ephemeral key length", () => {
      expect(() =>
        createConnectResponse({
          sessionId: "s1",
          serverPubkey: SERVER_KEY,
          ephemeralPubkey: filledBytes(16, 1),
        })
      ).toThrow("ephemeral_pubkey must be 32 bytes for Ed25519");
    });
  });

  describe("createGenericMessage()", () => {
    it("should apply defaults", () => {
      const message = createGenericMessage({
        sequenceNumber: 0,
        payload: new Uint8Array(0),
      });
      expect(message.messageType).toBe("data");
      expect(message.priority).toBe(0);
      expect(message.requiresAck).toBe(true);
    });

    it("should reject a negative sequence number", () => {
      expect(() =>
        createGenericMessage({ sequenceNumber: -1, payload: new Uint8Array(0) })
      ).toThrow("sequence_number must be a non-negative integer");
    });

    it("should reject a fractional sequence number", () => {
      expect(() =>
        createGenericMessage({ sequenceNumber: 1.5, payload: new Uint8Array(0) })
      ).toThrow("sequence_number must be a non-negative integer");
    });
  });

  describe("createResumeRequest()", () => {
    it("should reject a short client nonce", () => {
      expect(() =>
        createResumeRequest({
          clientId: "c1",
          lastSequenceNumber: 0,
          clientNonce: filledBytes(8, 2),
        })
      ).toThrow("client_nonce must be at least 16 bytes");
    });
  });

  describe("createResumeResponse()", () => {
    it("should require an error message when resumption is refused", () => {
      expect(() =>
        createResumeResponse({
          resumeSequence: 0,
          sessionId: "s1",
          serverNonce: NONCE,
        })
      ).toThrow("error_message required when resume_accepted=false");
    });
  });

  describe("createBatchMessage()", () => {
    it("should reject more messages than total_count", () => {
      expect(() =>
        createBatchMessage({
          messages: [{}, {}, {}],
          batchId: "b1",
          totalCount: 2,
        })
      ).toThrow("messages count cannot exceed total_count");
    });

    it("should reject a zero total_count", () => {
      expect(() =>
        createBatchMessage({ messages: [], batchId: "b1", totalCount: 0 })
      ).toThrow("total_count must be a positive integer");
    });
  });

  describe("createHeartbeatMessage()", () => {
    it("should default requires_response to true", () => {
      const heartbeat = createHeartbeatMessage({
        heartbeatId: "hb",
        clientSequence: 0,
        serverSequence: 0,
      });
      expect(heartbeat.requiresResponse).toBe(true);
    });
  });

  describe("createCloseMessage()", () => {
    it("should reject an empty reason", () => {
      expect(() => createCloseMessage({ reason: "" })).toThrow(
        "reason must be a non-empty string"
      );
    });

    it("should default to a graceful close", () => {
      expect(createCloseMessage({ reason: "bye" }).graceful).toBe(true);
    });
  });

  describe("createErrorMessage()", () => {
    it("should default to a recoverable error", () => {
      const error = createErrorMessage({
        errorMessage: "oops",
        severity: "error",
      });
      expect(error.errorCode).toBe(0);
      expect(error.recoverable).toBe(true);
      expect(error.details).toBeUndefined();
    });
  });

  describe("createMessage()", () => {
    it("should dispatch on the kind", () => {
      const ack = createMessage("ack", { ackSequence: 3, ackType: "batch" });
      expect(ack.type).toBe("ack");
      expect(ack.ackSequence).toBe(3);
    });
  });
});

describe("Wire Records", () => {
  describe("messageToRecord()", () => {
    it("should use wire names in field order and omit unset fields", () => {
      const record = messageToRecord(createCloseMessage({ reason: "bye" }));
      expect(record).toEqual({
        version: "CPOR-2",
        type: "close",
        reason: "bye",
        graceful: true,
      });
      expect(Object.keys(record)).toEqual(["version", "type", "reason", "graceful"]);
    });
  });

  describe("messageFromRecord()", () => {
    it("should ignore unknown keys and treat null as unset", () => {
      const close = messageFromRecord("close", {
        type: "close",
        reason: "bye",
        final_sequence: null,
        extra: 1,
      });
      expect(close.finalSequence).toBeUndefined();
      expect(close.graceful).toBe(true);
      expect(close).not.toHaveProperty("extra");
    });

    it("should reject an unknown ack type", () => {
      expect(() =>
        messageFromRecord("ack", { ack_sequence: 5, ack_type: "bogus" })
      ).toThrow("ack_type must be one of: message, heartbeat, batch");
    });

    it("should reject an unknown severity", () => {
      expect(() =>
        messageFromRecord("error", { error_message: "x", severity: "panic" })
      ).toThrow("severity must be one of: warning, error, fatal");
    });

    it("should reject an unknown key storage", () => {
      expect(() =>
        messageFromRecord("connect_request", {
          client_id: "c1",
          client_pubkey: CLIENT_KEY,
          nonce: NONCE,
          key_storage: "hsm",
        })
      ).toThrow("key_storage must be 'tpm' or 'software'");
    });

    it("should reject capabilities that are not a list", () => {
      expect(() =>
        messageFromRecord("connect_request", {
          client_id: "c1",
          client_pubkey: CLIENT_KEY,
          nonce: NONCE,
          capabilities: "resume",
        })
      ).toThrow("capabilities must be a list");
    });

    it("should reject a wrong protocol version", () => {
      expect(() =>
        messageFromRecord("close", { version: "CPOR-1", reason: "bye" })
      ).toThrow("Invalid protocol version: CPOR-1");
    });

    it("should reject a type naming another kind", () => {
      expect(() =>
        messageFromRecord("ack", {
          type: "close",
          ack_sequence: 1,
          ack_type: "message",
        })
      ).toThrow("type must be 'ack'");
    });

    it("should reject a missing payload", () => {
      expect(() =>
        messageFromRecord("generic", { sequence_number: 1 })
      ).toThrow("payload must be bytes");
    });
  });
});

describe("Binary Encoding", () => {
  describe("encodeMessage() / decodeMessage()", () => {
    it("should round-trip a connect request", () => {
      const request = createConnectRequest({
        clientId: "c1",
        clientPubkey: CLIENT_KEY,
        nonce: NONCE,
        capabilities: ["resume"],
      });

      const decoded = decodeMessage("connect_request", encodeMessage(request));

      expect(decoded).toEqual(request);
      expect(decoded.clientPubkey).toEqual(CLIENT_KEY);
      expect(decoded.capabilities).toEqual(["resume"]);
    });

    it.each(
      sampleMessages().map((message): [string, Message] => [message.type, message])
    )(
      "should round-trip %s",
      (_kind, message) => {
        const bytes = encodeMessage(message);
        const decoded = decodeMessage(message.type, bytes);
        expect(decoded).toEqual(message);
        expect(encodeMessage(decoded)).toEqual(bytes);
      }
    );

    it("should produce the same bytes for equal messages", () => {
      const first = createAckMessage({ ackSequence: 1, ackType: "message" });
      const second = createAckMessage({ ackType: "message", ackSequence: 1 });
      expect(encodeMessage(first)).toEqual(encodeMessage(second));
    });

    it("should reject bytes of another kind", () => {
      const ack = createAckMessage({ ackSequence: 1, ackType: "message" });
      expect(() => decodeMessage("close", encodeMessage(ack))).toThrow(
        "type must be 'close'"
      );
    });

    it("should surface field violations from the wire", () => {
      const bytes = encodeRecord({
        type: "ack",
        ack_sequence: 5,
        ack_type: "bogus",
      });
      expect(() => decodeMessage("ack", bytes)).toThrow(InvalidMessageError);
    });
  });
});

describe("Message Immutability", () => {
  it("should freeze batch entries all the way down", () => {
    const batch = createBatchMessage({
      messages: [{ a: 1, nested: { list: [1, 2] } }],
      batchId: "b1",
      totalCount: 1,
    });
    const entry: FrozenRecord = batch.messages[0] ?? {};

    expect(Object.isFrozen(batch.messages)).toBe(true);
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.nested)).toBe(true);
    expect(Reflect.set(entry, "a", 2)).toBe(false);
    expect(entry).toEqual({ a: 1, nested: { list: [1, 2] } });
  });

  it("should keep a signature valid after attempted writes", () => {
    const privateKey = generatePrivateKey();
    const batch = createBatchMessage({
      messages: [{ a: 1 }],
      batchId: "b1",
      totalCount: 1,
    });
    const bytes = encodeMessage(batch);
    const signature = signMessage(batch, privateKey);

    Reflect.set(batch.messages[0] ?? {}, "a", 2);
    Reflect.set(batch, "batchId", "b2");

    expect(encodeMessage(batch)).toEqual(bytes);
    expect(verifyMessage(batch, signature, derivePublicKey(privateKey))).toBe(true);
  });

  it("should not share mappings with the caller", () => {
    const entry = { a: 1, blob: new Uint8Array([1, 2]) };
    const batch = createBatchMessage({ messages: [entry], batchId: "b1", totalCount: 1 });

    entry.a = 2;
    entry.blob[0] = 99;

    expect(batch.messages[0]).toEqual({ a: 1, blob: new Uint8Array([1, 2]) });
  });

  it("should freeze error details", () => {
    const error = createErrorMessage({
      errorMessage: "overloaded",
      severity: "warning",
      details: { retry: { after: 5 } },
    });
    const details: FrozenRecord = error.details ?? {};

    expect(Object.isFrozen(details)).toBe(true);
    expect(Object.isFrozen(details.retry)).toBe(true);
    expect(Reflect.set(details, "f", 9)).toBe(false);
    expect(details).toEqual({ retry: { after: 5 } });
  });

  it("should expose byte fields as read-only copies", () => {
    const payload = new Uint8Array([1, 2]);
    const message = createGenericMessage({ sequenceNumber: 0, payload });

    payload[0] = 99;

    expect(message.payload).toEqual(new Uint8Array([1, 2]));
    expectTypeOf(message.payload).toEqualTypeOf<ByteView>();
  });
});
