// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";
import { VERSION } from "../config/config.js";

/** File descriptor for stderr; stdout is reserved for command output. */
const STDERR_FD = 2;

/**
 * Create a configured pino logger instance.
 *
 * - JSON output on stderr (pino default format)
 * - Base fields: `service` and `version`
 * - Optional pretty-print via `pino-pretty` transport for interactive use
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "libby-book-monitor",
      version: VERSION,
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: STDERR_FD,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service,version",
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(STDERR_FD));
}
