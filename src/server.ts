// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import { getConfig, type Config } from "./config/index.js";
import { getAdapter } from "./adapters/llm/router.js";
import type { LLMAdapter } from "./adapters/llm/types.js";
import { healthRoute } from "./routes/health.js";
import { bfhlRoute } from "./routes/bfhl.js";
import { SERVICE_VERSION } from "./version.js";
import { getOrGenerateRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { ApiError, toApiError } from "./utils/errors.js";
import { errorEnvelope } from "./utils/envelope.js";
import { createLoggerConfig } from "./utils/logger-config.js";

export interface BuildOptions {
  /** Defaults to the environment-derived config */
  config?: Config;
  /** Defaults to the adapter selected by config.llm */
  adapter?: LLMAdapter;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? getConfig();
  const adapter = options.adapter ?? getAdapter(config.llm);
  const officialEmail = config.envelope.officialEmail;

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    connectionTimeout: config.server.routeTimeoutMs,
    requestTimeout: config.server.routeTimeoutMs,
    genReqId: getOrGenerateRequestId,
  });

  // CORS: allowlist from ALLOWED_ORIGINS ('*' only outside production)
  const origins = config.server.allowedOrigins;
  await app.register(cors, {
    origin: origins.includes("*") ? true : [...origins],
  });

  // Security headers; CSP is irrelevant for a JSON API
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });

  // Response hook: Add X-Request-Id header to every response
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Centralized error handler: every failure leaves as an error envelope
  app.setErrorHandler((error, request, reply) => {
    const apiError = toApiError(error);
    const statusCode = apiError.statusCode;

    if (statusCode >= 500) {
      request.log.error(
        {
          err: apiError.cause ?? error,
          code: apiError.code,
          request_id: getRequestId(request),
          method: request.method,
          url: request.url,
        },
        `[${apiError.code}] ${apiError.message}`
      );
    } else {
      request.log.warn(
        {
          code: apiError.code,
          request_id: getRequestId(request),
          method: request.method,
          url: request.url,
        },
        `[${apiError.code}] ${apiError.message}`
      );
    }

    return reply.status(statusCode).send(errorEnvelope(officialEmail, apiError.message));
  });

  app.setNotFoundHandler((request, reply) => {
    const notFound = new ApiError("NOT_FOUND", "Endpoint not found");
    request.log.warn({ method: request.method, url: request.url }, "route not found");
    return reply.status(notFound.statusCode).send(errorEnvelope(officialEmail, notFound.message));
  });

  await healthRoute(app, officialEmail);
  await bfhlRoute(app, { config, adapter });

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      const config = getConfig();
      const adapter = getAdapter(config.llm);

      // Boot summary: Log configuration before starting server
      app.log.info({
        service: "bfhl-arithmetic-service",
        version: SERVICE_VERSION,
        provider: adapter.name,
        model: adapter.model,
        body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
        cors_origins: config.server.allowedOrigins,
        route_timeout_ms: config.server.routeTimeoutMs,
        llm_timeout_ms: config.llm.timeoutMs,
        llm_max_attempts: config.llm.maxAttempts,
        limits: config.limits,
      }, "bfhl service starting");

      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("❌ Failed to start server:", err);
      process.exit(1);
    });
}
