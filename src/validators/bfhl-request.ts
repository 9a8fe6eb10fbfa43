/**
 * POST /bfhl request validation
 *
 * Turns a parsed JSON body into a BfhlOperation. Structural problems with
 * the body (not an object, zero or several keys, unknown key) are
 * BAD_REQUEST; a recognised key with a value of the wrong type, shape or
 * range is UNPROCESSABLE_ENTITY.
 *
 * @module validators/bfhl-request
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { Limits } from "../config/index.js";
import {
  BFHL_OPERATIONS,
  buildValueSchemas,
  isBfhlOperationKind,
  type BfhlOperation,
  type BfhlOperationKind,
  type BfhlValueSchemas,
} from "../schemas/bfhl.js";
import { badRequest, unprocessable } from "../utils/errors.js";

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Schemas only depend on limits, and Config is frozen for the process lifetime
const schemaCache = new WeakMap<Limits, BfhlValueSchemas>();

function schemasFor(limits: Limits): BfhlValueSchemas {
  let schemas = schemaCache.get(limits);
  if (!schemas) {
    schemas = buildValueSchemas(limits);
    schemaCache.set(limits, schemas);
  }
  return schemas;
}

function parseValue<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    // First issue is the most specific one the client can act on
    throw unprocessable(result.error.issues[0]?.message ?? "Invalid value");
  }
  return result.data;
}

/**
 * The operation a body asks for, if it is an object with exactly one
 * recognised key, whether or not its value is valid.
 */
export function recognisedOperation(body: unknown): BfhlOperationKind | undefined {
  if (!isJsonObject(body)) return undefined;
  const keys = Object.keys(body);
  const [key] = keys;
  return keys.length === 1 && key !== undefined && isBfhlOperationKind(key) ? key : undefined;
}

/**
 * Validate a /bfhl request body.
 *
 * @throws ApiError BAD_REQUEST or UNPROCESSABLE_ENTITY
 */
export function validateBfhlRequest(body: unknown, limits: Limits): BfhlOperation {
  if (body === undefined || body === null) {
    throw badRequest("Request body is required");
  }
  if (!isJsonObject(body)) {
    throw badRequest("Request body must be a JSON object");
  }

  const keys = Object.keys(body);
  if (keys.length === 0) {
    throw badRequest("Request body is required");
  }
  if (keys.length > 1) {
    throw badRequest("Request must contain exactly one key");
  }

  const [key] = keys;
  if (key === undefined || !isBfhlOperationKind(key)) {
    throw badRequest(`Invalid operation. Allowed: ${BFHL_OPERATIONS.join(", ")}`);
  }

  const value = body[key];
  const schemas = schemasFor(limits);

  switch (key) {
    case "fibonacci":
      return { kind: key, n: parseValue(schemas.fibonacci, value) };
    case "prime":
      return { kind: key, values: parseValue(schemas.prime, value) };
    case "lcm":
      return { kind: key, values: parseValue(schemas.lcm, value) };
    case "hcf":
      return { kind: key, values: parseValue(schemas.hcf, value) };
    case "AI":
      return { kind: key, question: parseValue(schemas.AI, value) };
  }
}
