// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Process-wide pino logger. Components take a child via `logger.child({ component })`,
 * and the HTTP server hands the same instance to Fastify.
 */

import { pino, type Logger } from "pino";

import type { LogConfig } from "./types.js";

export type { Logger } from "pino";

export function createLogger(config: LogConfig): Logger {
  if (config.pretty) {
    return pino({
      level: config.level,
      transport: { target: "pino-pretty", options: { colorize: true } },
    });
  }
  return pino({ level: config.level });
}

/** A logger that drops everything. Default for library use and tests. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
