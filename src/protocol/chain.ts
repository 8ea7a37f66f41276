/**
 * Chain validation -- the consumer-side entry point.
 *
 * A feed is either Empty or Linked to its last accepted Frame. The state is
 * threaded through explicitly: validateFrame reads it and returns the next
 * one, holding nothing between calls. Callers must serialize validations for
 * the same author; different authors are independent.
 */

import { encodeMessage, encodeSignableBytes } from "./codec.js";
import { ed25519Verifier, type Verifier } from "./crypto.js";
import { MalformedMessageError } from "./errors.js";
import { digest, digestHex, frameDigest, isGenesisPrevious } from "./hash.js";
import { bytesEqual, type Frame } from "./types.js";

/** Why a candidate Frame was refused. */
export enum RejectReason {
  MALFORMED = "Malformed",
  ID_MISMATCH = "IdMismatch",
  BAD_SIGNATURE = "BadSignature",
  INVALID_GENESIS = "InvalidGenesis",
  AUTHOR_MISMATCH = "AuthorMismatch",
  SEQUENCE_GAP = "SequenceGap",
  BROKEN_LINK = "BrokenLink",
  TIME_REGRESSION = "TimeRegression",
}

export interface EmptyFeed {
  readonly kind: "empty";
}

export interface LinkedFeed {
  readonly kind: "linked";
  readonly last: Frame;
}

export type FeedState = EmptyFeed | LinkedFeed;

export type ValidationOutcome =
  | { readonly status: "accepted"; readonly state: LinkedFeed }
  | { readonly status: "rejected"; readonly reason: RejectReason; readonly detail: string };

export type FeedValidation =
  | { readonly ok: true; readonly state: FeedState; readonly count: number }
  | {
      readonly ok: false;
      readonly state: FeedState;
      readonly index: number;
      readonly sequence: number;
      readonly reason: RejectReason;
      readonly detail: string;
    };

export const EMPTY_FEED: EmptyFeed = Object.freeze({ kind: "empty" });

export function linkedTo(frame: Frame): LinkedFeed {
  return Object.freeze({ kind: "linked", last: frame });
}

/**
 * State for a feed whose last stored Frame is `last`, or Empty for none.
 */
export function feedStateOf(last: Frame | null | undefined): FeedState {
  return last ? linkedTo(last) : EMPTY_FEED;
}

function reject(reason: RejectReason, detail: string): ValidationOutcome {
  return { status: "rejected", reason, detail };
}

/**
 * Check a candidate Frame against the current state of its feed.
 *
 * Never throws for a bad Frame: every failure is a rejected outcome.
 */
export function validateFrame(
  candidate: Frame,
  state: FeedState,
  verifier: Verifier = ed25519Verifier
): ValidationOutcome {
  const { message } = candidate;

  let messageBytes: Uint8Array;
  try {
    messageBytes = encodeMessage(message);
  } catch (err) {
    if (err instanceof MalformedMessageError) {
      return reject(RejectReason.MALFORMED, err.message);
    }
    throw err;
  }

  if (!bytesEqual(digest(messageBytes), candidate.id)) {
    return reject(RejectReason.ID_MISMATCH, "Frame id is not the digest of its message");
  }

  const signable = encodeSignableBytes(candidate.id, messageBytes);
  if (!verifier.verify(message.author, signable, candidate.signature)) {
    return reject(RejectReason.BAD_SIGNATURE, `Signature does not verify under the author's ${verifier.scheme} key`);
  }

  if (state.kind === "empty") {
    if (message.sequence !== 1) {
      return reject(
        RejectReason.INVALID_GENESIS,
        `First frame of a feed must have sequence 1, got ${message.sequence}`
      );
    }
    if (!isGenesisPrevious(message.previous)) {
      return reject(
        RejectReason.INVALID_GENESIS,
        "First frame of a feed must carry the genesis sentinel as previous"
      );
    }
    return { status: "accepted", state: linkedTo(candidate) };
  }

  const prev = state.last.message;
  if (!bytesEqual(message.author, prev.author)) {
    return reject(RejectReason.AUTHOR_MISMATCH, "Frame belongs to a different feed");
  }
  if (message.sequence !== prev.sequence + 1) {
    return reject(
      RejectReason.SEQUENCE_GAP,
      `Expected sequence ${prev.sequence + 1}, got ${message.sequence}`
    );
  }
  const expected = frameDigest(state.last);
  if (!bytesEqual(message.previous, expected)) {
    return reject(
      RejectReason.BROKEN_LINK,
      `previous ${digestHex(message.previous).slice(0, 16)}... does not match ` +
        `frame ${prev.sequence} digest ${digestHex(expected).slice(0, 16)}...`
    );
  }
  if (message.timestamp < prev.timestamp) {
    return reject(
      RejectReason.TIME_REGRESSION,
      `Timestamp ${message.timestamp} is earlier than ${prev.timestamp}`
    );
  }

  return { status: "accepted", state: linkedTo(candidate) };
}

/**
 * Validate an ordered run of Frames from one feed, stopping at the first
 * rejection.
 */
export function validateFeed(
  frames: Iterable<Frame>,
  initialState: FeedState = EMPTY_FEED,
  verifier: Verifier = ed25519Verifier
): FeedValidation {
  let state: FeedState = initialState;
  let index = 0;
  for (const frame of frames) {
    const outcome = validateFrame(frame, state, verifier);
    if (outcome.status === "rejected") {
      return {
        ok: false,
        state,
        index,
        sequence: frame.message.sequence,
        reason: outcome.reason,
        detail: outcome.detail,
      };
    }
    state = outcome.state;
    index++;
  }
  return { ok: true, state, count: index };
}
