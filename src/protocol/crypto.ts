/**
 * Cryptographic primitives for the kutyus protocol.
 *
 * Wraps libsodium-wrappers for Ed25519 signing and verification. The rest of
 * the protocol only sees the Signer and Verifier interfaces, so the scheme
 * can be replaced without touching frame building or chain validation.
 */

import { createHash } from "node:crypto";
import { createRequire } from "node:module";

import { SigningError } from "./errors.js";
import { b64Decode, b64Encode, bytesEqual } from "./types.js";

// The package's ESM entry imports a file it does not ship; load the CommonJS build.
const sodium: typeof import("libsodium-wrappers") =
  createRequire(import.meta.url)("libsodium-wrappers");

// ---------------------------------------------------------------------------
// Sodium initialization
// ---------------------------------------------------------------------------

/**
 * Promise that resolves when libsodium is ready.
 * Callers must await this before first use of any crypto function.
 */
export const sodiumReady: Promise<void> = sodium.ready;

/** Name of the only scheme shipped with the library. */
export const ED25519 = "ed25519";

// ---------------------------------------------------------------------------
// Key type aliases
// ---------------------------------------------------------------------------

/** 64-byte Ed25519 secret key (seed + public). */
export type SigningKey = Uint8Array;

/** 32-byte Ed25519 public key. */
export type VerifyKey = Uint8Array;

/** 32-byte seed. */
export type Seed = Uint8Array;

export interface Keypair {
  signingKey: SigningKey;
  verifyKey: VerifyKey;
  seed: Seed;
}

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

/**
 * A private signing capability bound to one public key.
 */
export interface Signer {
  readonly scheme: string;
  readonly publicKey: Uint8Array;
  sign(data: Uint8Array): Uint8Array;
}

/**
 * Signature verification. Returns false for any invalid input; never throws
 * on bad keys or signatures.
 */
export interface Verifier {
  readonly scheme: string;
  verify(publicKey: Uint8Array, data: Uint8Array, signature: Uint8Array): boolean;
}

// ---------------------------------------------------------------------------
// Key generation and serialization
// ---------------------------------------------------------------------------

/**
 * Generate an Ed25519 keypair.
 */
export function generateKeypair(): Keypair {
  return keypairFromSeed(sodium.randombytes_buf(sodium.crypto_sign_SEEDBYTES));
}

/**
 * Derive the keypair belonging to a 32-byte seed.
 *
 * @throws {SigningError} If the seed has the wrong length.
 */
export function keypairFromSeed(seed: Seed): Keypair {
  if (seed.length !== sodium.crypto_sign_SEEDBYTES) {
    throw new SigningError(
      `Seed must be ${sodium.crypto_sign_SEEDBYTES} bytes, got ${seed.length}`
    );
  }
  const kp = sodium.crypto_sign_seed_keypair(seed);
  return {
    signingKey: kp.privateKey,
    verifyKey: kp.publicKey,
    seed,
  };
}

/**
 * Serialize a signing key to URL-safe base64 (32-byte seed).
 */
export function serializeSigningKey(seed: Seed): string {
  return b64Encode(seed);
}

/**
 * Restore a keypair from its base64-encoded seed.
 */
export function deserializeSigningKey(s: string): Keypair {
  return keypairFromSeed(b64Decode(s));
}

/**
 * Serialize a verify (public) key to URL-safe base64.
 */
export function serializeVerifyKey(key: VerifyKey): string {
  return b64Encode(key);
}

/**
 * Restore a verify key from its base64 encoding.
 */
export function deserializeVerifyKey(s: string): VerifyKey {
  return b64Decode(s);
}

/**
 * Return the SHA-256 hex digest of the verify key bytes.
 *
 * A 64-character, human-comparable rendering of a feed's author.
 */
export function publicKeyFingerprint(verifyKey: VerifyKey): string {
  return createHash("sha256").update(Buffer.from(verifyKey)).digest("hex");
}

// ---------------------------------------------------------------------------
// Signing and verification
// ---------------------------------------------------------------------------

/**
 * Sign data with the Ed25519 signing key.
 *
 * @returns The 64-byte detached signature.
 * @throws {SigningError} If the key has the wrong length.
 */
export function signBytes(data: Uint8Array, signingKey: SigningKey): Uint8Array {
  if (signingKey.length !== sodium.crypto_sign_SECRETKEYBYTES) {
    throw new SigningError(
      `Signing key must be ${sodium.crypto_sign_SECRETKEYBYTES} bytes, got ${signingKey.length}`
    );
  }
  return sodium.crypto_sign_detached(data, signingKey);
}

/**
 * Verify a detached Ed25519 signature.
 */
export function verifyBytes(
  data: Uint8Array,
  signature: Uint8Array,
  verifyKey: VerifyKey
): boolean {
  if (
    signature.length !== sodium.crypto_sign_BYTES ||
    verifyKey.length !== sodium.crypto_sign_PUBLICKEYBYTES
  ) {
    return false;
  }
  return sodium.crypto_sign_verify_detached(signature, data, verifyKey);
}

/**
 * Ed25519 signing capability over an in-memory secret key.
 */
export class Ed25519Signer implements Signer {
  readonly scheme = ED25519;
  readonly publicKey: VerifyKey;
  private readonly _signingKey: SigningKey;

  constructor(signingKey: SigningKey) {
    if (signingKey.length !== sodium.crypto_sign_SECRETKEYBYTES) {
      throw new SigningError(
        `Signing key must be ${sodium.crypto_sign_SECRETKEYBYTES} bytes, got ${signingKey.length}`
      );
    }
    this._signingKey = signingKey;
    // The public key is the last 32 bytes of the 64-byte Ed25519 secret key.
    this.publicKey = signingKey.slice(sodium.crypto_sign_SEEDBYTES);
  }

  static fromKeypair(keypair: Keypair): Ed25519Signer {
    const signer = new Ed25519Signer(keypair.signingKey);
    if (!bytesEqual(signer.publicKey, keypair.verifyKey)) {
      throw new SigningError("Keypair verify key does not match its signing key");
    }
    return signer;
  }

  static fromSeed(seed: Seed): Ed25519Signer {
    return new Ed25519Signer(keypairFromSeed(seed).signingKey);
  }

  static generate(): Ed25519Signer {
    return new Ed25519Signer(generateKeypair().signingKey);
  }

  sign(data: Uint8Array): Uint8Array {
    return signBytes(data, this._signingKey);
  }
}

/** Ed25519 verification capability. */
export const ed25519Verifier: Verifier = {
  scheme: ED25519,
  verify: (publicKey, data, signature) => verifyBytes(data, signature, publicKey),
};
