import { randomUUID } from "node:crypto";
import type { FastifyRequest } from "fastify";
import type { IncomingHttpHeaders } from "node:http";

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = "X-Request-Id";
export const REQUEST_ID_HEADER_LOWER = "x-request-id";

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Take the caller's X-Request-Id when present, otherwise generate one.
 * Wired into Fastify as `genReqId`, so `request.id` always holds it.
 */
export function getOrGenerateRequestId(headers: IncomingHttpHeaders | undefined): string {
  const incomingId = headers?.[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === "string") {
    const trimmed = incomingId.trim();
    if (trimmed.length > 0 && trimmed.length <= MAX_REQUEST_ID_LENGTH) {
      return trimmed;
    }
  }

  return generateRequestId();
}

/**
 * Get request ID from Fastify request
 */
export function getRequestId(request?: FastifyRequest): string {
  if (!request || !request.id) {
    return "unknown";
  }
  return request.id;
}
