/**
 * kutyus SDK -- persistence collaborators for validated feeds.
 */

export { FeedConfig, type LogLevel } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { type FeedStore, MemoryFeedStore, assertExtendsHead } from "./store.js";
export { SqliteFeedStore } from "./sqlite-store.js";
export { FeedLog } from "./feed-log.js";
export { openFeedLog } from "./open.js";
