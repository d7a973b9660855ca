/**
 * @shipledger/engine — Process logger.
 *
 * Logs go to stderr so command output on stdout stays clean. Development
 * runs pretty-print through pino-pretty; everything else writes JSON lines.
 */

import { destination, pino } from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

export function createLogger(
  config: Pick<AppConfig, "NODE_ENV" | "LOG_LEVEL">,
  stream?: DestinationStream,
): Logger {
  if (config.NODE_ENV === "development" && stream === undefined) {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, stream ?? destination(2));
}
