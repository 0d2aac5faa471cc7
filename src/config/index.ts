/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Source adapters never read `process.env` themselves: the server builds a
 * `SourcesConfig` once at startup and hands it to the adapter constructors.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Endpoint URL; empty values fall back to the default
 */
const endpointUrl = (fallback: string) =>
  z
    .union([z.string(), z.undefined()])
    .transform((val) => (val === undefined || val.trim() === "" ? fallback : val.trim()))
    .pipe(z.string().url());

/**
 * Optional secret that treats empty strings as unset
 */
const optionalSecret = z
  .union([z.string(), z.undefined()])
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

/**
 * Per-adapter timeout bounds (ms)
 */
export const MIN_SOURCE_TIMEOUT_MS = 100;
export const MAX_SOURCE_TIMEOUT_MS = 30_000;

/**
 * Per-adapter retry ceiling
 */
export const MAX_SOURCE_RETRIES = 5;

const clampedInt = (min: number, max: number, fallback: number) =>
  z.coerce
    .number()
    .int()
    .default(fallback)
    .transform((val) => Math.max(min, Math.min(max, val)));

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
    allowedOrigins: z
      .string()
      .transform((val) =>
        val
          .split(",")
          .map((o) => o.trim())
          .filter((o) => o.length > 0),
      )
      .optional(),
  }),

  rateLimits: z.object({
    defaultRpm: z.coerce.number().int().positive().default(120),
  }),

  sources: z.object({
    timeoutMs: clampedInt(MIN_SOURCE_TIMEOUT_MS, MAX_SOURCE_TIMEOUT_MS, 5000),
    maxRetries: clampedInt(0, MAX_SOURCE_RETRIES, 1),
    resultLimit: z.coerce.number().int().positive().max(100).default(10),
    userAgent: z.string().optional(),
    dbpedia: z.object({
      enabled: booleanString.default(true),
      sparqlUrl: endpointUrl("https://dbpedia.org/sparql"),
    }),
    wikidata: z.object({
      enabled: booleanString.default(true),
      sparqlUrl: endpointUrl("https://query.wikidata.org/sparql"),
      apiUrl: endpointUrl("https://www.wikidata.org/w/api.php"),
    }),
    googleKg: z.object({
      enabled: booleanString.default(true),
      url: endpointUrl("https://kgsearch.googleapis.com/v1/entities:search"),
      apiKey: optionalSecret,
    }),
  }),

  arxiv: z.object({
    enabled: booleanString.default(true),
    apiUrl: endpointUrl("http://export.arxiv.org/api/query"),
    maxResults: z.coerce.number().int().positive().max(50).default(5),
  }),

  context: z.object({
    defaultMaxTokens: z.coerce.number().int().positive().default(6000),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SourcesConfig = Config["sources"];
export type ArxivConfig = Config["arxiv"];

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    rateLimits: {
      defaultRpm: env.RATE_LIMIT_RPM,
    },
    sources: {
      timeoutMs: env.SOURCE_TIMEOUT_MS,
      maxRetries: env.SOURCE_MAX_RETRIES,
      resultLimit: env.SOURCE_RESULT_LIMIT,
      userAgent: env.SOURCE_USER_AGENT,
      dbpedia: {
        enabled: env.DBPEDIA_ENABLED,
        sparqlUrl: env.DBPEDIA_SPARQL_URL,
      },
      wikidata: {
        enabled: env.WIKIDATA_ENABLED,
        sparqlUrl: env.WIKIDATA_SPARQL_URL,
        apiUrl: env.WIKIDATA_API_URL,
      },
      googleKg: {
        enabled: env.GOOGLE_KG_ENABLED,
        url: env.GOOGLE_KG_URL,
        apiKey: env.GOOGLE_KG_API_KEY,
      },
    },
    arxiv: {
      enabled: env.ARXIV_ENABLED,
      apiUrl: env.ARXIV_API_URL,
      maxResults: env.ARXIV_MAX_RESULTS,
    },
    context: {
      defaultMaxTokens: env.CONTEXT_MAX_TOKENS,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("❌ Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

/**
 * Lazily parsed configuration
 *
 * Defers parsing until first call so tests can set environment variables
 * before the config is parsed. Parsed once, cached thereafter.
 */
let _cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
