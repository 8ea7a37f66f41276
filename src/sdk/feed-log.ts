/**
 * Validated, append-only feed log over a FeedStore.
 *
 * accept() is the atomic "read last state, validate, append" path: the head
 * is read, the candidate validated against it and stored inside one
 * FeedStore.atomically() call, so two accepts for the same author cannot
 * both extend the same head.
 */

import {
  EMPTY_FEED,
  feedStateOf,
  validateFeed,
  validateFrame,
  type FeedState,
  type FeedValidation,
  type ValidationOutcome,
} from "../protocol/chain.js";
import { decodeFrame } from "../protocol/codec.js";
import {
  ed25519Verifier,
  publicKeyFingerprint,
  type Signer,
  type Verifier,
} from "../protocol/crypto.js";
import { FrameRejectedError } from "../protocol/errors.js";
import { buildGenesisFrame, buildNextFrame } from "../protocol/frame.js";
import { toHex, type Content, type Frame } from "../protocol/types.js";
import { createLogger, type Logger } from "./logger.js";
import type { FeedStore } from "./store.js";

export class FeedLog {
  private readonly _store: FeedStore;
  private readonly _verifier: Verifier;
  private readonly _logger: Logger;
  private readonly _now: () => number;

  constructor(
    store: FeedStore,
    options?: {
      verifier?: Verifier;
      logger?: Logger;
      /** Clock used by publish() when no timestamp is given. */
      now?: () => number;
    }
  ) {
    this._store = store;
    this._verifier = options?.verifier ?? ed25519Verifier;
    this._logger = options?.logger ?? createLogger();
    this._now = options?.now ?? Date.now;
  }

  get store(): FeedStore {
    return this._store;
  }

  /** Current chain state of the author's feed. */
  state(author: Uint8Array): FeedState {
    return feedStateOf(this._store.latest(author));
  }

  /**
   * Validate `frame` against the stored head of its feed and append it if
   * accepted. Rejections are returned, not thrown.
   */
  accept(frame: Frame): ValidationOutcome {
    const { author, sequence } = frame.message;
    const outcome = this._store.atomically(() => {
      const result = validateFrame(frame, this.state(author), this._verifier);
      if (result.status === "accepted") {
        this._store.append(frame);
      }
      return result;
    });

    const feed = publicKeyFingerprint(author).slice(0, 16);
    if (outcome.status === "accepted") {
      this._logger.debug({ feed, sequence, id: toHex(frame.id).slice(0, 16) }, "frame accepted");
    } else {
      this._logger.warn(
        { feed, sequence, reason: outcome.reason, detail: outcome.detail },
        "frame rejected"
      );
    }
    return outcome;
  }

  /**
   * Decode an encoded frame and accept it.
   *
   * @throws {DecodeError} If the bytes are not a frame.
   */
  acceptEncoded(bytes: Uint8Array): ValidationOutcome {
    return this.accept(decodeFrame(bytes));
  }

  /**
   * Build the next frame of the signer's own feed and append it.
   *
   * The timestamp is raised to the previous frame's when the clock is behind
   * it, keeping the feed monotonic.
   *
   * @throws {FrameRejectedError} If the built frame does not validate.
   */
  publish(signer: Signer, content: Content, timestamp?: number): Frame {
    return this._store.atomically(() => {
      const state = this.state(signer.publicKey);
      const requested = timestamp ?? this._now();

      const frame =
        state.kind === "empty"
          ? buildGenesisFrame(signer, requested, content)
          : buildNextFrame(
              signer,
              state.last,
              Math.max(requested, state.last.message.timestamp),
              content
            );

      const outcome = this.accept(frame);
      if (outcome.status === "rejected") {
        throw new FrameRejectedError(outcome.reason, outcome.detail);
      }
      return frame;
    });
  }

  /**
   * Re-validate the author's stored feed from its first frame.
   */
  audit(author: Uint8Array): FeedValidation {
    const report = validateFeed(this._store.iterate(author, 1), EMPTY_FEED, this._verifier);
    if (!report.ok) {
      this._logger.error(
        {
          feed: publicKeyFingerprint(author).slice(0, 16),
          sequence: report.sequence,
          reason: report.reason,
        },
        "stored feed failed audit"
      );
    }
    return report;
  }
}
