/**
 * Content addressing and chain-link digests (SHA-512).
 */

import { createHash } from "node:crypto";

import { encodeFrame, encodeMessage } from "./codec.js";
import { GENESIS_PREVIOUS, bytesEqual, toHex, type Digest, type Frame, type Message } from "./types.js";

/**
 * SHA-512 of the given bytes.
 */
export function digest(data: Uint8Array): Digest {
  return new Uint8Array(createHash("sha512").update(data).digest());
}

/**
 * The content address of a Message: digest(encodeMessage(message)).
 */
export function messageId(message: Message): Digest {
  return digest(encodeMessage(message));
}

/**
 * Digest over the full signed Frame. The next Message of the feed carries
 * this value in `previous`, binding the chain to signed history.
 */
export function frameDigest(frame: Frame): Digest {
  return digest(encodeFrame(frame));
}

export function digestEquals(a: Digest, b: Digest): boolean {
  return bytesEqual(a, b);
}

/** True for the all-zero genesis sentinel. */
export function isGenesisPrevious(previous: Digest): boolean {
  return bytesEqual(previous, GENESIS_PREVIOUS);
}

/** Hex rendering used in logs and error details. */
export function digestHex(d: Digest): string {
  return toHex(d);
}
