/**
 * @swapescrow/escrow — Logging.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { EscrowConfig } from "./config.js";

/**
 * JSON logger at the configured level; pretty-printed in development.
 */
export function createLogger(
  config: Pick<EscrowConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** Default for programs constructed without a logger. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
