/**
 * logger.ts — Shared pino logger for every launcher module
 *
 * A single pino instance is created at import time and exported here.
 * Every module should import `logger` and call `.child({ module: "<name>" })`
 * to create a scoped logger that includes the module name in every entry.
 *
 * Output streams:
 *   • stderr : pino-pretty, colorised, warnings and above only so the
 *               game's own terminal output stays readable
 *   • debug file: NDJSON, appended; attached once the data directory is
 *               known via attachLogFile()
 *
 * Both streams are synchronous: a fatal exit must not lose the last lines.
 *
 * Log level:
 *   • GAMEWRAP_LOG_LEVEL env var: "fatal" … "trace"; invalid values fall back
 *   • otherwise → "debug"
 */

import pino from "pino";
import pretty from "pino-pretty";
import { z } from "zod";

const LogLevelSchema = z
  .enum(["fatal", "error", "warn", "info", "debug", "trace"])
  .catch("debug");

const level = LogLevelSchema.parse(process.env.GAMEWRAP_LOG_LEVEL ?? "debug");

const streams = pino.multistream([
  {
    level: "warn",
    stream: pretty({ colorize: true, destination: 2, sync: true }),
  },
]);

export const logger = pino({ level }, streams);

/**
 * Starts appending every entry at the configured level to `path`.
 * The parent directory is created when missing.
 */
export function attachLogFile(path: string): void {
  streams.add({
    level,
    stream: pino.destination({ dest: path, append: true, mkdir: true, sync: true }),
  });
}
