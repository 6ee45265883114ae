/**
 * @setcheck/cli — Logging.
 *
 * One pino logger per run. Logs go to stderr so stdout carries only
 * the report.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { CliConfig } from "./config.js";

export function createLogger(
  level: CliConfig["logLevel"],
  destination: DestinationStream = pino.destination({ dest: 2, sync: true }),
): Logger {
  return pino({ name: "setcheck", level }, destination);
}
