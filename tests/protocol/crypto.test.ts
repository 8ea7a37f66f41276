import { describe, it, expect, beforeAll } from "vitest";
import {
  sodiumReady,
  generateKeypair,
  keypairFromSeed,
  serializeSigningKey,
  deserializeSigningKey,
  serializeVerifyKey,
  deserializeVerifyKey,
  publicKeyFingerprint,
  signBytes,
  verifyBytes,
  Ed25519Signer,
  ed25519Verifier,
  ED25519,
} from "../../src/protocol/crypto.js";
import { SigningError } from "../../src/protocol/errors.js";

beforeAll(async () => {
  await sodiumReady;
});

describe("generateKeypair", () => {
  it("produces correct key sizes", () => {
    const kp = generateKeypair();
    expect(kp.seed.length).toBe(32);
    expect(kp.signingKey.length).toBe(64);
    expect(kp.verifyKey.length).toBe(32);
  });

  it("produces different keypairs each call", () => {
    const kp1 = generateKeypair();
    const kp2 = generateKeypair();
    expect(Buffer.from(kp1.seed).equals(Buffer.from(kp2.seed))).toBe(false);
  });

  it("rejects a seed of the wrong length", () => {
    expect(() => keypairFromSeed(new Uint8Array(31))).toThrow(SigningError);
  });
});

describe("key serialization", () => {
  it("roundtrips signing key through serialize/deserialize", () => {
    const kp = generateKeypair();
    const restored = deserializeSigningKey(serializeSigningKey(kp.seed));
    expect(Buffer.from(restored.seed).equals(Buffer.from(kp.seed))).toBe(true);
    expect(Buffer.from(restored.signingKey).equals(Buffer.from(kp.signingKey))).toBe(true);
    expect(Buffer.from(restored.verifyKey).equals(Buffer.from(kp.verifyKey))).toBe(true);
  });

  it("roundtrips verify key through serialize/deserialize", () => {
    const kp = generateKeypair();
    const restored = deserializeVerifyKey(serializeVerifyKey(kp.verifyKey));
    expect(Buffer.from(restored).equals(Buffer.from(kp.verifyKey))).toBe(true);
  });

  it("serializes without padding", () => {
    expect(serializeVerifyKey(new Uint8Array(32))).toBe("A".repeat(43));
  });
});

describe("publicKeyFingerprint", () => {
  it("produces 64-char hex string", () => {
    expect(publicKeyFingerprint(generateKeypair().verifyKey)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is the SHA-256 of the key bytes", () => {
    // SHA-256 of 32 zero bytes.
    expect(publicKeyFingerprint(new Uint8Array(32))).toBe(
      "66687aadf862bd776c8fc18b8e9f8e20089714856ee233b3902a591d0d5f2925"
    );
  });
});

describe("signBytes / verifyBytes", () => {
  const data = new TextEncoder().encode("signed bytes");

  it("verifies its own signature", () => {
    const kp = generateKeypair();
    const sig = signBytes(data, kp.signingKey);
    expect(sig.length).toBe(64);
    expect(verifyBytes(data, sig, kp.verifyKey)).toBe(true);
  });

  it("is deterministic", () => {
    const kp = generateKeypair();
    expect(signBytes(data, kp.signingKey)).toEqual(signBytes(data, kp.signingKey));
  });

  it("returns false for other data", () => {
    const kp = generateKeypair();
    const sig = signBytes(data, kp.signingKey);
    expect(verifyBytes(new TextEncoder().encode("other bytes"), sig, kp.verifyKey)).toBe(false);
  });

  it("returns false for another key", () => {
    const sig = signBytes(data, generateKeypair().signingKey);
    expect(verifyBytes(data, sig, generateKeypair().verifyKey)).toBe(false);
  });

  it("returns false instead of throwing on wrong lengths", () => {
    const kp = generateKeypair();
    const sig = signBytes(data, kp.signingKey);
    expect(verifyBytes(data, sig.slice(0, 63), kp.verifyKey)).toBe(false);
    expect(verifyBytes(data, sig, kp.verifyKey.slice(0, 31))).toBe(false);
    expect(verifyBytes(data, new Uint8Array(0), new Uint8Array(0))).toBe(false);
  });

  it("rejects a signing key of the wrong length", () => {
    expect(() => signBytes(data, new Uint8Array(32))).toThrow(SigningError);
  });
});

describe("Ed25519Signer", () => {
  it("exposes the public half of its secret key", () => {
    const kp = generateKeypair();
    const signer = new Ed25519Signer(kp.signingKey);
    expect(signer.scheme).toBe(ED25519);
    expect(signer.publicKey).toEqual(kp.verifyKey);
  });

  it("builds from a seed and from a keypair alike", () => {
    const kp = generateKeypair();
    expect(Ed25519Signer.fromSeed(kp.seed).publicKey).toEqual(
      Ed25519Signer.fromKeypair(kp).publicKey
    );
  });

  it("refuses a keypair whose halves do not match", () => {
    const kp = generateKeypair();
    const mismatched = { ...kp, verifyKey: generateKeypair().verifyKey };
    expect(() => Ed25519Signer.fromKeypair(mismatched)).toThrow(SigningError);
  });

  it("signs what ed25519Verifier accepts", () => {
    const signer = Ed25519Signer.generate();
    const data = new Uint8Array([1, 2, 3]);
    expect(ed25519Verifier.verify(signer.publicKey, data, signer.sign(data))).toBe(true);
  });
});
