/**
 * POST /bfhl - multiplexed arithmetic / one-word answer endpoint
 *
 * The single key of the JSON body selects the operation:
 * fibonacci, prime, lcm, hcf or AI. Errors are thrown as ApiError and
 * rendered by the server's error handler.
 */

import type { FastifyInstance, FastifyRequest } from "fastify";
import type { Config } from "../config/index.js";
import type { LLMAdapter } from "../adapters/llm/types.js";
import { recognisedOperation, validateBfhlRequest } from "../validators/bfhl-request.js";
import { dispatchBfhl } from "../services/bfhl.js";
import { successEnvelope } from "../utils/envelope.js";
import { badRequest, toApiError } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { getRequestId } from "../utils/request-id.js";
import { registerMethodNotAllowed } from "./method-not-allowed.js";

export interface BfhlRouteOptions {
  config: Config;
  adapter: LLMAdapter;
}

function isJsonRequest(request: FastifyRequest): boolean {
  const contentType = request.headers["content-type"];
  if (typeof contentType !== "string") return false;
  const mediaType = contentType.split(";")[0]?.trim().toLowerCase();
  return mediaType === "application/json";
}

export async function bfhlRoute(app: FastifyInstance, { config, adapter }: BfhlRouteOptions) {
  app.post("/bfhl", async (request, reply) => {
    const requestId = getRequestId(request);
    const startTime = Date.now();
    let operation: string | undefined;

    try {
      if (!isJsonRequest(request)) {
        throw badRequest("Content-Type must be application/json");
      }

      const validated = validateBfhlRequest(request.body, config.limits);
      operation = validated.kind;

      const data = await dispatchBfhl(validated, {
        adapter,
        requestId,
        llmTimeoutMs: config.llm.timeoutMs,
      });

      emit(TelemetryEvents.BfhlCompleted, {
        request_id: requestId,
        operation,
        latency_ms: Date.now() - startTime,
      });

      reply.code(200);
      return successEnvelope(config.envelope.officialEmail, data);
    } catch (error) {
      const apiError = toApiError(error);
      emit(TelemetryEvents.BfhlFailed, {
        request_id: requestId,
        operation: operation ?? recognisedOperation(request.body) ?? "unknown",
        code: apiError.code,
        latency_ms: Date.now() - startTime,
      });
      throw apiError;
    }
  });

  registerMethodNotAllowed(app, "/bfhl", ["POST"]);
}
