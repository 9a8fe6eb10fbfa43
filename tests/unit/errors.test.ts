import { describe, it, expect } from "vitest";
import {
  ApiError,
  badRequest,
  getStatusCodeForErrorCode,
  toApiError,
  unprocessable,
} from "../../src/utils/errors.js";

function fastifyLikeError(code: string | undefined, statusCode: number, message = "parser failure"): Error {
  return Object.assign(new Error(message), { code, statusCode });
}

describe("ApiError", () => {
  it("derives the HTTP status from the code", () => {
    expect(badRequest("nope").statusCode).toBe(400);
    expect(unprocessable("nope").statusCode).toBe(422);
    expect(new ApiError("UPSTREAM_ERROR", "AI service error").statusCode).toBe(500);
  });

  it("keeps the cause without exposing it in the message", () => {
    const cause = new Error("socket hang up");
    const error = new ApiError("UPSTREAM_ERROR", "AI service error", cause);

    expect(error.message).toBe("AI service error");
    expect(error.cause).toBe(cause);
    expect(error.name).toBe("ApiError");
  });
});

describe("getStatusCodeForErrorCode", () => {
  it.each([
    ["BAD_REQUEST", 400],
    ["NOT_FOUND", 404],
    ["METHOD_NOT_ALLOWED", 405],
    ["PAYLOAD_TOO_LARGE", 413],
    ["UNPROCESSABLE_ENTITY", 422],
    ["UPSTREAM_ERROR", 500],
    ["INTERNAL", 500],
  ] as const)("%s -> %i", (code, status) => {
    expect(getStatusCodeForErrorCode(code)).toBe(status);
  });
});

describe("toApiError", () => {
  it("returns ApiError instances unchanged", () => {
    const error = unprocessable("fibonacci requires an integer");
    expect(toApiError(error)).toBe(error);
  });

  it("maps an unsupported content type to BAD_REQUEST", () => {
    const mapped = toApiError(fastifyLikeError("FST_ERR_CTP_INVALID_MEDIA_TYPE", 415));
    expect(mapped.code).toBe("BAD_REQUEST");
    expect(mapped.message).toBe("Content-Type must be application/json");
  });

  it("maps an empty JSON body to BAD_REQUEST", () => {
    const mapped = toApiError(fastifyLikeError("FST_ERR_CTP_EMPTY_JSON_BODY", 400));
    expect(mapped.code).toBe("BAD_REQUEST");
    expect(mapped.message).toBe("Request body is required");
  });

  it("maps an oversized body to PAYLOAD_TOO_LARGE", () => {
    const mapped = toApiError(fastifyLikeError("FST_ERR_CTP_BODY_TOO_LARGE", 413));
    expect(mapped.code).toBe("PAYLOAD_TOO_LARGE");
    expect(mapped.statusCode).toBe(413);
  });

  it("maps malformed JSON to BAD_REQUEST without echoing the parser message", () => {
    const mapped = toApiError(fastifyLikeError(undefined, 400, "Unexpected token } in JSON at position 9"));
    expect(mapped.code).toBe("BAD_REQUEST");
    expect(mapped.message).toBe("Request body must be valid JSON");
  });

  it("hides anything else behind a generic INTERNAL error", () => {
    const cause = new TypeError("Cannot read properties of undefined (reading 'x')");
    const mapped = toApiError(cause);

    expect(mapped.code).toBe("INTERNAL");
    expect(mapped.message).toBe("Internal server error");
    expect(mapped.cause).toBe(cause);
  });

  it("handles non-Error throwables", () => {
    expect(toApiError("boom").code).toBe("INTERNAL");
    expect(toApiError(undefined).code).toBe("INTERNAL");
  });
});
