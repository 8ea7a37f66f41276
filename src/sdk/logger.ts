/**
 * Structured logging for the SDK, backed by pino.
 */

import pino from "pino";

import type { LogLevel } from "./config.js";

export type Logger = pino.Logger;

export const createLogger = (level: LogLevel = "info", name = "kutyus"): Logger =>
  pino({ name, level });
