import { createHash } from "node:crypto";

/**
 * Idempotency key for one logical one-word call.
 *
 * Derived from the request ID and question, so every retry attempt made by
 * withRetry for the same request sends the same key.
 */
export function makeIdempotencyKey(requestId: string, question: string): string {
  return createHash("sha256").update(`${requestId}\n${question}`).digest("hex").slice(0, 32);
}
