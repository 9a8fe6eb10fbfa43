import type { FastifyInstance, HTTPMethods } from "fastify";
import { ApiError } from "../utils/errors.js";

const ALL_METHODS: HTTPMethods[] = ["GET", "POST", "PUT", "PATCH", "DELETE"];

/**
 * Answer 405 for every method a path does not serve.
 *
 * The `Allow` header is set here; the envelope comes from the server's
 * error handler. HEAD follows GET and OPTIONS stays with the CORS
 * preflight handler.
 */
export function registerMethodNotAllowed(app: FastifyInstance, url: string, allowed: HTTPMethods[]): void {
  const rejected = ALL_METHODS.filter((method) => !allowed.includes(method));
  if (rejected.length === 0) return;

  const allowHeader = allowed.includes("GET") ? [...allowed, "HEAD"] : allowed;

  app.route({
    method: rejected,
    url,
    handler: async (_req, reply) => {
      reply.header("Allow", allowHeader.join(", "));
      throw new ApiError("METHOD_NOT_ALLOWED", "Method not allowed");
    },
  });
}
