/**
 * kutyus -- signed, append-only, per-author message logs.
 *
 * Top-level package exports: FeedLog and stores, protocol.
 */

export { FeedLog, FeedConfig, MemoryFeedStore, SqliteFeedStore, openFeedLog, createLogger } from "./sdk/index.js";
export type { FeedStore, Logger, LogLevel } from "./sdk/index.js";
export * as protocol from "./protocol/index.js";
