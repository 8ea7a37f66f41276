/**
 * SDK configuration.
 *
 * Priority (highest wins): constructor arg > env var > default.
 */

import { homedir } from "node:os";
import { join } from "node:path";

const VALID_LOG_LEVELS = new Set([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

export class FeedConfig {
  readonly dataDir: string;
  readonly dbPath: string;
  readonly logLevel: LogLevel;

  constructor(
    options: {
      dataDir?: string | null;
      logLevel?: string | null;
    } = {}
  ) {
    // KUTYUS_HOME env var overrides ~/.kutyus (useful for testing / isolation).
    const kutyusHome = process.env["KUTYUS_HOME"];
    this.dataDir = options.dataDir ?? (kutyusHome || join(homedir(), ".kutyus"));
    this.dbPath = join(this.dataDir, "feeds", "feeds.db");

    const level = options.logLevel ?? process.env["KUTYUS_LOG_LEVEL"] ?? "info";
    if (!isLogLevel(level)) {
      throw new Error(
        `Invalid log level '${level}'. ` +
          `Must be one of: ${JSON.stringify([...VALID_LOG_LEVELS].sort())}`
      );
    }
    this.logLevel = level;
  }
}
