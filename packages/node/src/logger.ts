/**
 * @compliance-ledger/node — Logger.
 *
 * pino on stderr, so reports printed on stdout stay machine-readable.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { LedgerConfig } from "./config.js";

export function createLogger(config: Pick<LedgerConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}
