// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

export type Logger = pino.Logger;

export const SERVICE_NAME = "sru-catalog-client";

/** Paths redacted from log output so keys never reach a log line. */
const SECRET_PATHS: string[] = [
  "*.apiKey",
  "*.password",
  "headers.authorization",
  "headers.Authorization",
];

/**
 * Create the root logger.
 *
 * - JSON output (pino default)
 * - Base fields: `service` and `version`
 * - Optional pretty-print via `pino-pretty` transport
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: SERVICE_NAME,
      version: process.env["npm_package_version"] ?? "dev",
    },
    ...(config.redactSecrets
      ? {
          redact: {
            paths: SECRET_PATHS,
            censor: "[REDACTED]",
          },
        }
      : {}),
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service,version",
          destination: 2,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

/** Logger used by a client that was not given one: prints nothing. */
export function silentLogger(): pino.Logger {
  return pino({ level: "silent" });
}
