import { randomUUID } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import type { FastifyRequest } from 'fastify';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

const SAFE_REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Incoming IDs end up in log lines, so only a conservative charset is accepted
 */
export function isRequestIdSafe(id: string): boolean {
  return SAFE_REQUEST_ID.test(id);
}

/**
 * Extract request ID from incoming headers or generate a new one.
 * Wired into Fastify as `genReqId`, so `request.id` carries the result.
 */
export function getOrGenerateRequestId(raw: IncomingMessage): string {
  const incomingId = raw.headers?.[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === 'string') {
    const trimmed = incomingId.trim();
    if (trimmed.length > 0 && isRequestIdSafe(trimmed)) {
      return trimmed;
    }
  }

  return generateRequestId();
}

/**
 * Get request ID from Fastify request
 */
export function getRequestId(request?: FastifyRequest): string {
  if (!request) {
    return 'unknown';
  }
  return request.id || 'unknown';
}
