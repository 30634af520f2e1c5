// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads SRU_* environment variables, validated with Zod.  Every setting has
// a default so the client works with zero configuration.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { ClientConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_PROFILE } from "./profiles.js";

export const DEFAULT_USER_AGENT = "sru-catalog-client/0.1.0";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
  SRU_PROFILE: z.string().min(1).default(DEFAULT_PROFILE),
  SRU_BASE_URL: z.string().url().optional(),
  SRU_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SRU_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SRU_LOG_PRETTY: booleanFlag.default("false"),
  SRU_MAX_RECORDS_WARNING: z.coerce.number().int().positive().default(100),
  SRU_RATE_LIMIT: z.coerce.number().positive().optional(),
  SRU_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  SRU_API_KEY: z.string().min(1).optional(),
});

/**
 * Build the client configuration from environment variables.
 *
 * @throws ConfigurationError  naming the first invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  // Empty variables count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("SRU_") && value !== ""),
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Invalid configuration ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "rejected"}`,
      { cause: result.error },
    );
  }
  const e = result.data;

  const config: ClientConfig = {
    profile: e.SRU_PROFILE,
    timeoutMs: e.SRU_TIMEOUT_MS,
    maxRecordsWarningThreshold: e.SRU_MAX_RECORDS_WARNING,
    userAgent: e.SRU_USER_AGENT,
    logging: {
      level: e.SRU_LOG_LEVEL,
      prettyPrint: e.SRU_LOG_PRETTY,
      redactSecrets: true,
    },
  };
  if (e.SRU_BASE_URL !== undefined) config.baseUrl = e.SRU_BASE_URL;
  if (e.SRU_RATE_LIMIT !== undefined) config.rateLimit = e.SRU_RATE_LIMIT;
  if (e.SRU_API_KEY !== undefined) config.apiKey = e.SRU_API_KEY;
  return config;
}
