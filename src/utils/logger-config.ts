/**
 * Pino options shared by the Fastify request logger (server.ts) and the
 * standalone logger in telemetry.ts, so both redact the same fields.
 */

import type { LoggerOptions } from "pino";

/**
 * Values that must never reach a log line: provider credentials, auth
 * headers and the free text of AI questions.
 */
export const REDACT_PATHS: readonly string[] = [
  "*.apiKey",
  "*.api_key",
  "*.openaiApiKey",
  "*.anthropicApiKey",
  "*.authorization",
  "*.token",
  "*.secret",
  "*.headers.authorization",
  "*.headers.x-api-key",
  "*.headers.cookie",
  "*.question",
  "*.prompt",
];

export const REDACT_CENSOR = "[REDACTED]";

export function createLoggerConfig(level: string) {
  return {
    level,
    redact: { paths: [...REDACT_PATHS], censor: REDACT_CENSOR },
  } satisfies LoggerOptions;
}
