import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction, for code that runs outside a
 * Fastify request (adapters, retry helper).
 *
 * Redaction paths are shared with the Fastify logger through
 * src/utils/logger-config.ts.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryData = Record<string, unknown>;

type TelemetrySink = (eventName: string, data: TelemetryData) => void;

let testSink: TelemetrySink | null = null;

/**
 * Install a sink that receives every emitted event (tests only)
 */
export function setTestSink(sink: TelemetrySink | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 */
export const TelemetryEvents = {
  BfhlCompleted: "bfhl.request.completed",
  BfhlFailed: "bfhl.request.failed",

  LlmAnswerCompleted: "llm.answer.completed",
  LlmRetry: "llm.retry",
  LlmRetrySuccess: "llm.retry.success",
  LlmRetryExhausted: "llm.retry.exhausted",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Emit a structured event to the log (and the test sink, if installed)
 */
export function emit(event: TelemetryEventName, data: TelemetryData): void {
  if (testSink) {
    testSink(event, data);
  }
  log.info({ event, ...data });
}
