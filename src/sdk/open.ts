/**
 * Entry point wiring FeedConfig to an on-disk feed log.
 */

import { FeedConfig } from "./config.js";
import { FeedLog } from "./feed-log.js";
import { createLogger } from "./logger.js";
import { SqliteFeedStore } from "./sqlite-store.js";

/**
 * Open the SQLite-backed feed log described by `config`.
 *
 * The caller owns the returned log's store and must close it.
 */
export function openFeedLog(config: FeedConfig = new FeedConfig()): FeedLog {
  const store = new SqliteFeedStore(config.dbPath);
  store.open();
  return new FeedLog(store, { logger: createLogger(config.logLevel) });
}
