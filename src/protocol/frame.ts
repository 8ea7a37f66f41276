/**
 * Frame building -- the producer-side entry point.
 *
 * A Frame wraps one Message with its content address and the author's
 * signature over the canonical `(id, message)` tuple. The builder does not
 * consult feed history: supplying the right sequence and previous digest is
 * the caller's job (buildNextFrame derives both from the preceding Frame).
 */

import { encodeMessage, encodeSignableBytes } from "./codec.js";
import type { Signer } from "./crypto.js";
import { InvalidSequenceError, SigningError } from "./errors.js";
import { digest, frameDigest } from "./hash.js";
import {
  DIGEST_LENGTH,
  bytesEqual,
  type Content,
  type Digest,
  type Frame,
  type Message,
} from "./types.js";

/**
 * Create a signed Frame.
 *
 * @throws {InvalidSequenceError} If `sequence` is not an integer >= 1.
 * @throws {SigningError} If the signer's public key is not `author`.
 * @throws {MalformedMessageError} If any other field violates its constraint.
 */
export function buildFrame(
  signer: Signer,
  author: Uint8Array,
  sequence: number,
  previous: Digest,
  timestamp: number,
  content: Content
): Frame {
  if (!Number.isSafeInteger(sequence) || sequence < 1) {
    throw new InvalidSequenceError(`Sequence must be an integer >= 1, got ${sequence}`);
  }
  if (!bytesEqual(signer.publicKey, author)) {
    throw new SigningError("Signer public key does not match the message author");
  }

  // Object.freeze does not freeze typed-array elements, so keep private copies.
  const message: Message = Object.freeze({
    author: author.slice(),
    sequence,
    previous: previous.slice(),
    timestamp,
    content: Object.freeze({ type: content.type, data: content.data.slice() }),
  });

  const messageBytes = encodeMessage(message);
  const id = digest(messageBytes);
  const signature = signer.sign(encodeSignableBytes(id, messageBytes));

  return Object.freeze({ id, message, signature });
}

/**
 * Create the first Frame of the signer's feed.
 */
export function buildGenesisFrame(
  signer: Signer,
  timestamp: number,
  content: Content
): Frame {
  const genesisPrevious = new Uint8Array(DIGEST_LENGTH);
  return buildFrame(signer, signer.publicKey, 1, genesisPrevious, timestamp, content);
}

/**
 * Create the Frame that directly follows `previousFrame` in the same feed.
 */
export function buildNextFrame(
  signer: Signer,
  previousFrame: Frame,
  timestamp: number,
  content: Content
): Frame {
  return buildFrame(
    signer,
    previousFrame.message.author,
    previousFrame.message.sequence + 1,
    frameDigest(previousFrame),
    timestamp,
    content
  );
}
