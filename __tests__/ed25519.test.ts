import { describe, it, expect } from "vitest";
import {
  constantTimeCompare,
  deriveKeyId,
  derivePublicKey,
  ed25519Sign,
  ed25519Verify,
  generateNonce,
  generatePrivateKey,
  generateSessionKey,
  isValidEd25519Key,
  toEd25519PublicKey,
} from "../src/backends/ed25519.js";
import { CryptoError } from "../src/interfaces/crypto-manager.js";
import { filledBytes } from "./helpers.js";

describe("Ed25519 Primitives", () => {
  describe("ed25519Sign() / ed25519Verify()", () => {
    it("should verify a signature over the signed data only", () => {
      const privateKey = generatePrivateKey();
      const publicKey = derivePublicKey(privateKey);
      const data = new TextEncoder().encode("hello");

      const signature = ed25519Sign(privateKey, data);

      expect(signature.length).toBe(64);
      expect(ed25519Verify(publicKey, data, signature)).toBe(true);
      expect(ed25519Verify(publicKey, new TextEncoder().encode("hellx"), signature)).toBe(
        false
      );
    });
  });

  describe("isValidEd25519Key()", () => {
    it("should accept a derived public key", () => {
      expect(isValidEd25519Key(derivePublicKey(generatePrivateKey()))).toBe(true);
    });

    it("should reject a public key of the wrong length", () => {
      expect(isValidEd25519Key(filledBytes(31, 1))).toBe(false);
    });

    it("should check private keys by length", () => {
      expect(isValidEd25519Key(filledBytes(32, 7), "private")).toBe(true);
      expect(isValidEd25519Key(filledBytes(16, 7), "private")).toBe(false);
    });
  });

  describe("toEd25519PublicKey()", () => {
    it("should reject a key that is not 32 bytes", () => {
      expect(() => toEd25519PublicKey(filledBytes(31, 1))).toThrow(
        "Public key must be 32 bytes, got 31"
      );
    });
  });

  describe("generateNonce()", () => {
    it("should default to 16 bytes", () => {
      expect(generateNonce().length).toBe(16);
    });

    it("should accept sizes from 1 to 1024", () => {
      expect(generateNonce(1).length).toBe(1);
      expect(generateNonce(1024).length).toBe(1024);
    });

    it("should reject sizes outside 1 to 1024", () => {
      expect(() => generateNonce(0)).toThrow(CryptoError);
      expect(() => generateNonce(1025)).toThrow(CryptoError);
      expect(() => generateNonce(1.5)).toThrow(
        "Nonce size must be between 1 and 1024 bytes"
      );
    });

    it("should not repeat", () => {
      expect(generateNonce()).not.toEqual(generateNonce());
    });
  });

  describe("generateSessionKey()", () => {
    it("should return 32 bytes", () => {
      expect(generateSessionKey().length).toBe(32);
    });
  });

  describe("constantTimeCompare()", () => {
    it("should compare contents", () => {
      expect(constantTimeCompare(filledBytes(4, 1), filledBytes(4, 1))).toBe(true);
      expect(constantTimeCompare(filledBytes(4, 1), filledBytes(4, 2))).toBe(false);
      expect(constantTimeCompare(filledBytes(4, 1), filledBytes(5, 1))).toBe(false);
    });
  });

  describe("deriveKeyId()", () => {
    it("should use the first eight bytes of the public key", () => {
      expect(deriveKeyId(filledBytes(32, 1))).toBe("cpor_0101010101010101");
    });

    it("should take a custom prefix", () => {
      expect(deriveKeyId(filledBytes(32, 0xab), "node")).toBe("node_abababababababab");
    });

    it("should reject a key that is not 32 bytes", () => {
      expect(() => deriveKeyId(filledBytes(31, 1))).toThrow(CryptoError);
    });
  });
});
