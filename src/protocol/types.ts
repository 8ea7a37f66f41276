/**
 * Core types, constants, and utility functions for the kutyus protocol.
 */

/** Wire format version written as the first byte of every encoding. */
export const FORMAT_VERSION = 1;

/** Length of a SHA-512 digest in bytes. */
export const DIGEST_LENGTH = 64;

/** Maximum size of a Message's content data in bytes (64 KB). */
export const MAX_CONTENT_SIZE = 65536;

/** Content type used when the producer does not name one. */
export const DEFAULT_CONTENT_TYPE = "blob";

/** Kind tags following the version byte. */
export enum EncodingKind {
  MESSAGE = 0x4d,
  SIGNABLE = 0x53,
  FRAME = 0x46,
}

/** 64-byte SHA-512 digest. */
export type Digest = Uint8Array;

/** `previous` of every genesis Message: 64 zero bytes. */
export const GENESIS_PREVIOUS: Digest = new Uint8Array(DIGEST_LENGTH);

/**
 * Tagged opaque payload. The tag tells applications how to read `data`;
 * the protocol never looks inside.
 */
export interface Content {
  readonly type: string;
  readonly data: Uint8Array;
}

/**
 * The logical content unit, carrying its chain metadata.
 */
export interface Message {
  /** Public key of the feed owner. */
  readonly author: Uint8Array;
  /** 1 for the first message of a feed, +1 for each one after. */
  readonly sequence: number;
  /** Digest of the preceding Frame, or GENESIS_PREVIOUS. */
  readonly previous: Digest;
  /** Milliseconds since the Unix epoch; non-decreasing within a feed. */
  readonly timestamp: number;
  readonly content: Content;
}

/**
 * A signed Message with its content address.
 */
export interface Frame {
  readonly id: Digest;
  readonly message: Message;
  readonly signature: Uint8Array;
}

/**
 * Build a Content value from a string or bytes.
 */
export function content(
  data: string | Uint8Array,
  type: string = DEFAULT_CONTENT_TYPE
): Content {
  return {
    type,
    data: typeof data === "string" ? new TextEncoder().encode(data) : data,
  };
}

/**
 * Byte-wise equality.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * URL-safe base64 encode, stripping padding.
 */
export function b64Encode(data: Uint8Array): string {
  return Buffer.from(data).toString("base64url");
}

/**
 * URL-safe base64 decode, tolerating missing padding.
 */
export function b64Decode(s: string): Uint8Array {
  return new Uint8Array(Buffer.from(s, "base64url"));
}

/** Lowercase hex. */
export function toHex(data: Uint8Array): string {
  return Buffer.from(data).toString("hex");
}

/**
 * Parse a hex string.
 *
 * @throws {TypeError} On odd length or non-hex characters.
 */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new TypeError(`Invalid hex string of length ${hex.length}`);
  }
  return new Uint8Array(Buffer.from(hex, "hex"));
}
