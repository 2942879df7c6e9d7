/**
 * @module messages/errors
 * @description Error taxonomy of the message layer.
 *
 * A detected bad signature is never one of these: verifyMessage() answers
 * `false`. SignatureError means the primitive could not run at all.
 */

export type ProtocolErrorCode =
  | "INVALID_MESSAGE"
  | "SERIALIZATION_ERROR"
  | "SIGNATURE_ERROR";

export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly code: ProtocolErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

/** A field broke its kind's contract, or the kind could not be resolved. */
export class InvalidMessageError extends ProtocolError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_MESSAGE", options);
    this.name = "InvalidMessageError";
  }
}

/** Bytes were not valid CBOR, or did not decode to a mapping. */
export class SerializationError extends ProtocolError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SERIALIZATION_ERROR", options);
    this.name = "SerializationError";
  }
}

export class SignatureError extends ProtocolError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SIGNATURE_ERROR", options);
    this.name = "SignatureError";
  }
}
