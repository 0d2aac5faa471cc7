import { ZodError } from "zod";
import type { FastifyRequest } from "fastify";
import { getRequestId } from "./request-id.js";

/**
 * Error codes for structured error responses
 */
export type ErrorCode =
  | "BAD_INPUT"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "TOKENIZER_FAILURE"
  | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Caller broke the input contract (bad subject, bad budget, bad sections).
 * Raised before any source or tokenizer work starts.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * The tokenizer could not encode or decode text. Truncation cannot be
 * trusted without it, so this is never retried or absorbed.
 */
export class TokenizationError extends Error {
  constructor(
    message: string,
    public readonly operation: "encode" | "decode",
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TokenizationError";
  }
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string,
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    "BAD_INPUT",
    "Validation failed",
    {
      validation_errors: error.flatten(),
    },
    requestId,
  );
}

function numericProperty(error: Error, key: "statusCode" | "status"): number | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === "number" ? value : undefined;
}

/**
 * Strip file paths, credentials and email addresses from a message
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, "[path]")
    .replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]")
    .replace(/[A-Z_]+_?SECRET=\S+/gi, "[SECRET_REDACTED]")
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, "[email]");
}

const ERROR_CODES: readonly ErrorCode[] = ["BAD_INPUT", "NOT_FOUND", "RATE_LIMITED", "TOKENIZER_FAILURE", "INTERNAL"];

function isErrorCode(value: unknown): value is ErrorCode {
  return ERROR_CODES.some((code) => code === value);
}

/**
 * Already-built envelope thrown by a plugin (rate-limit's errorResponseBuilder)
 */
function asThrownEnvelope(error: unknown, requestId?: string): ErrorV1 | null {
  if (typeof error !== "object" || error === null || error instanceof Error) return null;
  const schema: unknown = Reflect.get(error, "schema");
  const code: unknown = Reflect.get(error, "code");
  const message: unknown = Reflect.get(error, "message");
  if (schema !== "error.v1" || !isErrorCode(code) || typeof message !== "string") return null;

  const rawDetails: unknown = Reflect.get(error, "details");
  const details =
    typeof rawDetails === "object" && rawDetails !== null && !Array.isArray(rawDetails)
      ? Object.fromEntries(Object.entries(rawDetails))
      : undefined;
  const thrownId: unknown = Reflect.get(error, "request_id");
  return buildErrorV1(code, message, details, typeof thrownId === "string" ? thrownId : requestId);
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  const envelope = asThrownEnvelope(error, requestId);
  if (envelope) {
    return envelope;
  }

  if (error instanceof ValidationError) {
    return buildErrorV1(
      "BAD_INPUT",
      error.message,
      error.field ? { field: error.field } : undefined,
      requestId,
    );
  }

  if (error instanceof TokenizationError) {
    return buildErrorV1(
      "TOKENIZER_FAILURE",
      "Tokenizer failed; context could not be measured",
      { operation: error.operation },
      requestId,
    );
  }

  if (error instanceof Error) {
    const status = numericProperty(error, "statusCode") ?? numericProperty(error, "status");

    if (status === 429 || error.message.toLowerCase().includes("rate limit")) {
      return buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: 60 }, requestId);
    }

    // Fastify body parsing / payload errors
    if (status !== undefined && status >= 400 && status < 500) {
      if (status === 404) {
        return buildErrorV1("NOT_FOUND", sanitizeErrorMessage(error.message), undefined, requestId);
      }
      return buildErrorV1("BAD_INPUT", sanitizeErrorMessage(error.message), undefined, requestId);
    }

    const message = sanitizeErrorMessage(error.message || "An unexpected error occurred");
    return buildErrorV1("INTERNAL", message, undefined, requestId);
  }

  if (typeof error === "string") {
    return buildErrorV1("INTERNAL", sanitizeErrorMessage(error), undefined, requestId);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "RATE_LIMITED":
      return 429;
    case "TOKENIZER_FAILURE":
    case "INTERNAL":
    default:
      return 500;
  }
}
