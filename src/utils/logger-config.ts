/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * SECURITY: Source credentials (Google KG API key) travel in query strings
 * and config objects; every path they can appear under is listed here.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  "*.apiKey",
  "*.api_key",
  "*.apikey",
  "*.key",
  "*.secret",
  "*.token",
  "*.authorization",
  "*.credentials",

  "*.headers.authorization",
  "*.headers.x-api-key",
  "*.headers.cookie",

  "*.sources.googleKg.apiKey",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}

/**
 * Replace the value of any `key=` query parameter in a URL so request URLs
 * can be logged without leaking credentials.
 */
export function redactUrl(url: string): string {
  return url.replace(/([?&]key=)[^&]*/gi, `$1${REDACT_CENSOR}`);
}
