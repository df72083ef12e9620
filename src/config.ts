/**
 * Server configuration, read once at startup from the environment.
 */

import * as z from "zod/v4";
import { LOGIN_TIMEOUT_MS, SERVER_SESSION_TTL_MS, SESSION_TTL_MS } from "./auth/session-types.js";
import { NOTEHUB_API_BASE, REQUEST_TIMEOUT_MS } from "./notehub/client.js";
import { ValidationError } from "./shared/errors.js";
import { LOG_LEVELS, type LogLevel } from "./shared/logger.js";

const milliseconds = z.coerce.number().int().positive();

const EnvSchema = z.object({
  NOTEHUB_API_BASE: z.url().default(NOTEHUB_API_BASE),
  NOTEHUB_SESSION_TTL_MS: milliseconds
    .lt(SERVER_SESSION_TTL_MS, {
      message: `must be below the ${SERVER_SESSION_TTL_MS}ms Notehub session lifetime`,
    })
    .default(SESSION_TTL_MS),
  NOTEHUB_LOGIN_TIMEOUT_MS: milliseconds.default(LOGIN_TIMEOUT_MS),
  NOTEHUB_REQUEST_TIMEOUT_MS: milliseconds.default(REQUEST_TIMEOUT_MS),
  NOTEHUB_RETRY_ON_REJECTED_TOKEN: z.stringbool().default(true),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface AppConfig {
  apiBase: string;
  sessionTtlMs: number;
  loginTimeoutMs: number;
  requestTimeoutMs: number;
  retryOnRejectedToken: boolean;
  logLevel: LogLevel;
}

/**
 * Validate the environment and build the server configuration.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration:\n${z.prettifyError(parsed.error)}`);
  }

  const vars = parsed.data;
  return {
    apiBase: vars.NOTEHUB_API_BASE,
    sessionTtlMs: vars.NOTEHUB_SESSION_TTL_MS,
    loginTimeoutMs: vars.NOTEHUB_LOGIN_TIMEOUT_MS,
    requestTimeoutMs: vars.NOTEHUB_REQUEST_TIMEOUT_MS,
    retryOnRejectedToken: vars.NOTEHUB_RETRY_ON_REJECTED_TOKEN,
    logLevel: vars.LOG_LEVEL,
  };
}
