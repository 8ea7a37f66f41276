/**
 * Persistence contract for validated feeds, and an in-process implementation.
 *
 * Stores keep the exact encoded Frame bytes so a feed can be re-validated
 * later (audits, chain repair). append() is a compare-and-append: a frame is
 * stored only if it extends the current head of its author's feed.
 */

import { decodeFrame, encodeFrame } from "../protocol/codec.js";
import { StoreClosedError, StoreConflictError } from "../protocol/errors.js";
import { fromHex, toHex, type Frame } from "../protocol/types.js";

export interface FeedStore {
  /**
   * Store a frame that extends its feed's head.
   *
   * @throws {StoreConflictError} If the sequence is not head + 1.
   */
  append(frame: Frame): void;

  /** Last stored frame of the author's feed. */
  latest(author: Uint8Array): Frame | null;

  get(author: Uint8Array, sequence: number): Frame | null;

  /** Frames from `fromSequence` on, ascending. Each iteration re-reads the store. */
  iterate(author: Uint8Array, fromSequence?: number): Iterable<Frame>;

  /** Authors with at least one stored frame. */
  authors(): Uint8Array[];

  /** Run `fn` so that no other append interleaves with it. */
  atomically<T>(fn: () => T): T;

  /** Release the store. Every later call but close() throws StoreClosedError. */
  close(): void;
}

/**
 * Throw unless `frame` is the next frame after a head at `headSequence`.
 */
export function assertExtendsHead(frame: Frame, headSequence: number): void {
  const expected = headSequence + 1;
  if (frame.message.sequence !== expected) {
    throw new StoreConflictError(
      `Feed ${toHex(frame.message.author).slice(0, 16)}... expects sequence ` +
        `${expected}, got ${frame.message.sequence}`
    );
  }
}

export class MemoryFeedStore implements FeedStore {
  private _feeds: Map<string, Uint8Array[]> | null = new Map();

  append(frame: Frame): void {
    const feeds = this._requireFeeds();
    const key = toHex(frame.message.author);
    const feed = feeds.get(key) ?? [];
    assertExtendsHead(frame, feed.length);
    feed.push(encodeFrame(frame));
    feeds.set(key, feed);
  }

  latest(author: Uint8Array): Frame | null {
    const feed = this._requireFeeds().get(toHex(author));
    if (!feed || feed.length === 0) return null;
    return decodeFrame(feed[feed.length - 1]);
  }

  get(author: Uint8Array, sequence: number): Frame | null {
    const encoded = this._requireFeeds().get(toHex(author))?.[sequence - 1];
    return encoded ? decodeFrame(encoded) : null;
  }

  iterate(author: Uint8Array, fromSequence = 1): Iterable<Frame> {
    this._requireFeeds();
    const key = toHex(author);
    return {
      [Symbol.iterator]: () => this._frames(key, fromSequence),
    };
  }

  private *_frames(key: string, fromSequence: number): Generator<Frame> {
    const feed = this._requireFeeds().get(key) ?? [];
    for (let i = Math.max(fromSequence, 1) - 1; i < feed.length; i++) {
      yield decodeFrame(feed[i]);
    }
  }

  authors(): Uint8Array[] {
    return [...this._requireFeeds().keys()].sort().map((key) => fromHex(key));
  }

  atomically<T>(fn: () => T): T {
    this._requireFeeds();
    return fn();
  }

  close(): void {
    this._feeds = null;
  }

  private _requireFeeds(): Map<string, Uint8Array[]> {
    if (this._feeds === null) {
      throw new StoreClosedError("Feed store is closed.");
    }
    return this._feeds;
  }
}
