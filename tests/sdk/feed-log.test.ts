import { describe, it, expect, beforeAll, beforeEach } from "vitest";

import { EMPTY_FEED, RejectReason } from "../../src/protocol/chain.js";
import { encodeFrame } from "../../src/protocol/codec.js";
import { Ed25519Signer, sodiumReady } from "../../src/protocol/crypto.js";
import {
  FrameRejectedError,
  StoreConflictError,
  TruncatedInputError,
} from "../../src/protocol/errors.js";
import { buildFrame, buildGenesisFrame, buildNextFrame } from "../../src/protocol/frame.js";
import { frameDigest } from "../../src/protocol/hash.js";
import { content, type Frame } from "../../src/protocol/types.js";
import { FeedLog } from "../../src/sdk/feed-log.js";
import { createLogger } from "../../src/sdk/logger.js";
import { MemoryFeedStore, type FeedStore } from "../../src/sdk/store.js";
import { SqliteFeedStore } from "../../src/sdk/sqlite-store.js";

let signer: Ed25519Signer;

beforeAll(async () => {
  await sodiumReady;
  signer = Ed25519Signer.generate();
});

const quiet = () => createLogger("silent");

describe("FeedLog", () => {
  let store: MemoryFeedStore;
  let log: FeedLog;
  let clock: number;

  beforeEach(() => {
    store = new MemoryFeedStore();
    clock = 5000;
    log = new FeedLog(store, { logger: quiet(), now: () => clock });
  });

  it("starts every feed Empty", () => {
    expect(log.state(signer.publicKey)).toEqual(EMPTY_FEED);
  });

  it("accepts a genesis frame and stores it", () => {
    const genesis = buildGenesisFrame(signer, 1000, content("hello"));
    expect(log.accept(genesis).status).toBe("accepted");
    expect(store.latest(signer.publicKey)).toEqual(genesis);
    expect(log.state(signer.publicKey)).toEqual({ kind: "linked", last: genesis });
  });

  it("does not store a rejected frame", () => {
    const genesis = buildGenesisFrame(signer, 1000, content("hello"));
    const orphan = buildNextFrame(signer, genesis, 1001, content("world"));
    const outcome = log.accept(orphan);
    expect(outcome.status === "rejected" && outcome.reason).toBe(RejectReason.INVALID_GENESIS);
    expect(store.latest(signer.publicKey)).toBeNull();
  });

  it("rejects the same frame twice", () => {
    const genesis = buildGenesisFrame(signer, 1000, content("hello"));
    log.accept(genesis);
    const again = log.accept(genesis);
    expect(again.status === "rejected" && again.reason).toBe(RejectReason.SEQUENCE_GAP);
  });

  it("accepts encoded frames", () => {
    const genesis = buildGenesisFrame(signer, 1000, content("hello"));
    expect(log.acceptEncoded(encodeFrame(genesis)).status).toBe("accepted");
  });

  it("throws decode errors for bytes that are not a frame", () => {
    expect(() => log.acceptEncoded(new Uint8Array([1, 0x46, 0]))).toThrow(TruncatedInputError);
  });

  describe("publish", () => {
    it("builds a genesis frame for a new feed", () => {
      const frame = log.publish(signer, content("first"));
      expect(frame.message.sequence).toBe(1);
      expect(frame.message.timestamp).toBe(5000);
      expect(store.latest(signer.publicKey)).toEqual(frame);
    });

    it("links each frame to the previous one", () => {
      const first = log.publish(signer, content("first"));
      clock = 6000;
      const second = log.publish(signer, content("second"));
      expect(second.message.sequence).toBe(2);
      expect(second.message.previous).toEqual(frameDigest(first));
      expect(second.message.timestamp).toBe(6000);
    });

    it("uses an explicit timestamp", () => {
      expect(log.publish(signer, content("first"), 1234).message.timestamp).toBe(1234);
    });

    it("keeps timestamps monotonic when the clock goes back", () => {
      log.publish(signer, content("first"));
      clock = 4000;
      expect(log.publish(signer, content("second")).message.timestamp).toBe(5000);
    });

    it("throws when the built frame is rejected", () => {
      const refusing = new FeedLog(store, {
        logger: quiet(),
        verifier: { scheme: "none", verify: () => false },
      });
      expect(() => refusing.publish(signer, content("x"))).toThrow(FrameRejectedError);
      try {
        refusing.publish(signer, content("x"));
      } catch (err) {
        expect(err instanceof FrameRejectedError && err.reason).toBe(RejectReason.BAD_SIGNATURE);
      }
    });
  });

  describe("audit", () => {
    it("passes for a published feed", () => {
      for (let i = 0; i < 4; i++) log.publish(signer, content(`entry ${i}`));
      const report = log.audit(signer.publicKey);
      expect(report.ok).toBe(true);
      if (report.ok) expect(report.count).toBe(4);
    });

    it("reports the first broken frame of a tampered store", () => {
      const genesis = buildGenesisFrame(signer, 1000, content("a"));
      // Sequence 2 that links to nothing: the store accepts it, the chain does not.
      const unlinked = buildFrame(
        signer,
        signer.publicKey,
        2,
        new Uint8Array(64).fill(1),
        1001,
        content("b")
      );
      store.append(genesis);
      store.append(unlinked);
      const report = log.audit(signer.publicKey);
      expect(report.ok).toBe(false);
      if (!report.ok) {
        expect(report.index).toBe(1);
        expect(report.sequence).toBe(2);
        expect(report.reason).toBe(RejectReason.BROKEN_LINK);
      }
    });
  });
});

describe("FeedLog over SQLite", () => {
  it("keeps a head that a second writer cannot fork", () => {
    const store = new SqliteFeedStore(":memory:");
    store.open();
    const log = new FeedLog(store, { logger: quiet() });

    const genesis = buildGenesisFrame(signer, 1000, content("a"));
    const left = buildNextFrame(signer, genesis, 1001, content("left"));
    const right = buildNextFrame(signer, genesis, 1001, content("right"));

    expect(log.accept(genesis).status).toBe("accepted");
    expect(log.accept(left).status).toBe("accepted");
    const outcome = log.accept(right);
    expect(outcome.status === "rejected" && outcome.reason).toBe(RejectReason.SEQUENCE_GAP);
    expect(store.latest(signer.publicKey)).toEqual(left);
    store.close();
  });

  it("surfaces the store's compare-and-append check", () => {
    // A store whose head moves between validation and append.
    const inner = new MemoryFeedStore();
    const genesis = buildGenesisFrame(signer, 1000, content("a"));
    const racing: FeedStore = {
      append: (frame: Frame) => {
        inner.append(genesis);
        inner.append(frame);
      },
      latest: (author) => inner.latest(author),
      get: (author, sequence) => inner.get(author, sequence),
      iterate: (author, from) => inner.iterate(author, from),
      authors: () => inner.authors(),
      atomically: (fn) => fn(),
      close: () => inner.close(),
    };
    const log = new FeedLog(racing, { logger: quiet() });
    expect(() => log.accept(genesis)).toThrow(StoreConflictError);
  });
});
