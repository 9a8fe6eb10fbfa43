/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * The environment is parsed once into a frozen Config object; request
 * handlers receive the parts they need instead of reading process.env.
 */

import { z } from "zod";
import {
  clampTimeout,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_ROUTE_TIMEOUT_MS,
} from "./timeouts.js";

/**
 * Largest Fibonacci count whose terms all fit in a JSON number exactly.
 * F(78) = 8944394323791464 is the last term below Number.MAX_SAFE_INTEGER.
 */
export const FIBONACCI_N_CEILING = 79;

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

/**
 * Optional string that treats empty/whitespace as undefined
 */
const optionalString = z
  .union([z.string(), z.undefined()])
  .transform((val) => {
    if (val === undefined) return undefined;
    const trimmed = val.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  });

/**
 * Comma-separated list, trimmed, empty entries dropped
 */
const commaList = z
  .union([z.string(), z.undefined()])
  .transform((val) =>
    val
      ? val
          .split(",")
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
      : [],
  );

const timeoutMs = (defaultMs: number) =>
  z.coerce.number().positive().default(defaultMs).transform(clampTimeout);

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * LLM Provider enum
 */
export const LLMProvider = z.enum(["openai", "anthropic", "fixtures"]);
export type LLMProviderName = z.infer<typeof LLMProvider>;

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
    routeTimeoutMs: timeoutMs(DEFAULT_ROUTE_TIMEOUT_MS),
    allowedOrigins: commaList.transform((origins) =>
      origins.length > 0 ? origins : DEFAULT_ORIGINS,
    ),
  }),

  envelope: z.object({
    officialEmail: z.string().email().default("service@example.com"),
  }),

  llm: z.object({
    provider: LLMProvider.default("openai"),
    model: optionalString,
    openaiApiKey: optionalString,
    anthropicApiKey: optionalString,
    timeoutMs: timeoutMs(DEFAULT_LLM_TIMEOUT_MS),
    maxAttempts: z.coerce.number().int().min(1).max(5).default(1),
  }),

  limits: z.object({
    maxFibonacciN: z.coerce.number().int().min(0).max(FIBONACCI_N_CEILING).default(FIBONACCI_N_CEILING),
    maxArraySize: z.coerce.number().int().positive().default(1000),
    maxAiQuestionLength: z.coerce.number().int().positive().default(5000),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type Limits = Config["limits"];

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(env: NodeJS.ProcessEnv): Config {
  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      routeTimeoutMs: env.ROUTE_TIMEOUT_MS,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    envelope: {
      officialEmail: env.OFFICIAL_EMAIL,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      openaiApiKey: env.OPENAI_API_KEY,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxAttempts: env.LLM_MAX_ATTEMPTS,
    },
    limits: {
      maxFibonacciN: env.MAX_FIBONACCI_N,
      maxArraySize: env.MAX_ARRAY_SIZE,
      maxAiQuestionLength: env.MAX_AI_QUESTION_LENGTH,
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    console.error("❌ Configuration validation failed:");
    console.error(JSON.stringify(parsed.error.issues, null, 2));
    throw new Error("Invalid configuration. Please check environment variables.");
  }

  const cfg = parsed.data;
  if (cfg.server.nodeEnv === "production" && cfg.server.allowedOrigins.includes("*")) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  return deepFreeze(cfg);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

let _cachedConfig: Config | null = null;

/**
 * Get configuration, parsing the environment on first access.
 *
 * The result is frozen and cached; tests reset it with _resetConfigCache()
 * after stubbing environment variables.
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig(process.env);
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
