/**
 * Logging.
 *
 * pino JSON lines on stderr, so stdout carries only the summary line.
 * In development the pino-pretty transport formats them for humans.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ReconcilerLogEvent } from "@stockrecon/reconciler";
import type { CliEnv } from "./config.js";

export type { Logger } from "pino";

export function createLogger(env: Pick<CliEnv, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (env.NODE_ENV === "development") {
    return pino({
      level: env.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: env.LOG_LEVEL }, pino.destination(2));
}

/** Route engine events to the logger. */
export function reconcilerLogFn(logger: Logger): (event: ReconcilerLogEvent) => void {
  return (event) => {
    switch (event.kind) {
      case "record-rejected": {
        const { source, recordKey, field, reason, message } = event.failure;
        logger.warn({ source, recordKey, field, reason }, message);
        break;
      }
      case "normalized":
        logger.info(
          { source: event.source, normalized: event.normalized, rejected: event.rejected },
          "Source normalized",
        );
        break;
      case "joined":
        logger.info({ keys: event.keys, stats: event.stats }, "Sources joined");
        break;
    }
  };
}
