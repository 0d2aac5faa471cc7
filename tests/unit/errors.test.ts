import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  buildErrorV1,
  getStatusCodeForErrorCode,
  sanitizeErrorMessage,
  toErrorV1,
  TokenizationError,
  ValidationError,
} from "../../src/utils/errors.js";

describe("error utilities", () => {
  describe("buildErrorV1", () => {
    it("omits empty details and request ids", () => {
      expect(buildErrorV1("BAD_INPUT", "Invalid request", {})).toEqual({
        schema: "error.v1",
        code: "BAD_INPUT",
        message: "Invalid request",
      });
    });

    it("includes details and request id when given", () => {
      expect(buildErrorV1("INTERNAL", "Server error", { a: 1 }, "req-123")).toEqual({
        schema: "error.v1",
        code: "INTERNAL",
        message: "Server error",
        details: { a: 1 },
        request_id: "req-123",
      });
    });
  });

  describe("toErrorV1", () => {
    it("maps ZodError to BAD_INPUT", () => {
      const result = z.object({ subject_a: z.string() }).safeParse({});
      expect(result.success).toBe(false);
      if (!result.success) {
        const error = toErrorV1(result.error);
        expect(error.code).toBe("BAD_INPUT");
        expect(error.message).toBe("Validation failed");
        expect(error.details).toHaveProperty("validation_errors");
      }
    });

    it("maps ValidationError to BAD_INPUT with its field", () => {
      expect(toErrorV1(new ValidationError("max_tokens must be a positive integer", "max_tokens"))).toEqual({
        schema: "error.v1",
        code: "BAD_INPUT",
        message: "max_tokens must be a positive integer",
        details: { field: "max_tokens" },
      });
    });

    it("maps TokenizationError to TOKENIZER_FAILURE", () => {
      const error = toErrorV1(new TokenizationError("tokenizer failed to encode text", "encode"));
      expect(error).toEqual({
        schema: "error.v1",
        code: "TOKENIZER_FAILURE",
        message: "Tokenizer failed; context could not be measured",
        details: { operation: "encode" },
      });
      expect(getStatusCodeForErrorCode(error.code)).toBe(500);
    });

    it("maps status 429 to RATE_LIMITED", () => {
      const error = Object.assign(new Error("slow down"), { statusCode: 429 });
      expect(toErrorV1(error).code).toBe("RATE_LIMITED");
    });

    it("maps other 4xx statuses", () => {
      const badJson = Object.assign(new Error("Unexpected token"), { statusCode: 400 });
      const missing = Object.assign(new Error("Not here"), { statusCode: 404 });
      expect(toErrorV1(badJson).code).toBe("BAD_INPUT");
      expect(toErrorV1(missing).code).toBe("NOT_FOUND");
    });

    it("passes through envelopes thrown by plugins", () => {
      const thrown = {
        statusCode: 429,
        schema: "error.v1",
        code: "RATE_LIMITED",
        message: "Too many requests",
        details: { retry_after_seconds: 12 },
        request_id: "req-9",
      };
      expect(toErrorV1(thrown)).toEqual({
        schema: "error.v1",
        code: "RATE_LIMITED",
        message: "Too many requests",
        details: { retry_after_seconds: 12 },
        request_id: "req-9",
      });
    });

    it("maps anything else to INTERNAL with a sanitized message", () => {
      const error = toErrorV1(new Error("failed to read /etc/secrets/app.json"));
      expect(error).toEqual({
        schema: "error.v1",
        code: "INTERNAL",
        message: "failed to read [path]",
      });
      expect(toErrorV1(42).message).toBe("An unexpected error occurred");
    });
  });

  describe("sanitizeErrorMessage", () => {
    it("redacts keys and email addresses", () => {
      expect(sanitizeErrorMessage("GOOGLE_KG_API_KEY=test-secret missing")).toBe("[KEY_REDACTED] missing");
      expect(sanitizeErrorMessage("contact ops@example.org")).toBe("contact [email]");
    });
  });

  describe("getStatusCodeForErrorCode", () => {
    it("maps codes to HTTP statuses", () => {
      expect(getStatusCodeForErrorCode("BAD_INPUT")).toBe(400);
      expect(getStatusCodeForErrorCode("NOT_FOUND")).toBe(404);
      expect(getStatusCodeForErrorCode("RATE_LIMITED")).toBe(429);
      expect(getStatusCodeForErrorCode("INTERNAL")).toBe(500);
    });
  });
});
