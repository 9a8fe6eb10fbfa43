import type { FastifyInstance } from "fastify";
import { emptySuccessEnvelope } from "../utils/envelope.js";
import { registerMethodNotAllowed } from "./method-not-allowed.js";

/**
 * GET /health - liveness check
 *
 * Always 200 with the success envelope and no `data` field.
 */
export async function healthRoute(app: FastifyInstance, officialEmail: string) {
  app.get("/health", async (_req, reply) => {
    reply.code(200);
    return emptySuccessEnvelope(officialEmail);
  });

  registerMethodNotAllowed(app, "/health", ["GET"]);
}
