// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import interactionsRoute from "./routes/v1.interactions.js";
import neighborsRoute from "./routes/v1.neighbors.js";
import contextRoute from "./routes/v1.context.js";
import type { ServiceDeps } from "./routes/types.js";
import { createArticleProvider, createSourceAdapters } from "./adapters/sources/index.js";
import { gptTokenizer } from "./context/tokenizer.js";
import { getConfig, type Config } from "./config/index.js";
import { ROUTE_TIMEOUT_MS } from "./config/timeouts.js";
import { SERVICE_VERSION } from "./version.js";
import { getOrGenerateRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, getStatusCodeForErrorCode, toErrorV1 } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";

const SERVICE_NAME = "pharmacontext-service";

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

function resolveAllowedOrigins(cfg: Config): string[] {
  const origins = cfg.server.allowedOrigins ?? DEFAULT_ORIGINS;

  if (cfg.server.nodeEnv === "production" && origins.some((origin) => origin === "*" || origin === '"*"')) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  return origins;
}

/**
 * Production collaborators, built from the validated config
 */
export function createServiceDeps(cfg: Config = getConfig()): ServiceDeps {
  return {
    adapters: createSourceAdapters(cfg.sources),
    articles: createArticleProvider(cfg.arxiv, cfg.sources),
    tokenizer: gptTokenizer,
    sourceTimeoutMs: cfg.sources.timeoutMs,
    defaultMaxTokens: cfg.context.defaultMaxTokens,
  };
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(overrides: Partial<ServiceDeps> = {}) {
  const cfg = getConfig();
  const deps: ServiceDeps = { ...createServiceDeps(cfg), ...overrides };

  const app = Fastify({
    logger: createLoggerConfig(cfg.server.logLevel),
    bodyLimit: cfg.server.bodyLimitBytes,
    connectionTimeout: ROUTE_TIMEOUT_MS,
    requestTimeout: ROUTE_TIMEOUT_MS,
    genReqId: (req) => getOrGenerateRequestId(req.headers),
  });

  await app.register(cors, {
    origin: resolveAllowedOrigins(cfg),
  });

  // Pure JSON API: no CSP, cross-origin reads allowed
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  });

  await app.register(rateLimit, {
    global: true,
    max: cfg.rateLimits.defaultRpm,
    timeWindow: "1 minute",
    errorResponseBuilder: (req, context) => {
      const requestId = getRequestId(req);
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn(
        {
          event: "rate_limit_hit",
          max: cfg.rateLimits.defaultRpm,
          request_id: requestId,
        },
        "Rate limit exceeded",
      );

      return {
        statusCode: 429,
        ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: retryAfter }, requestId),
      };
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error(
        {
          error,
          request_id: errorV1.request_id,
          method: request.method,
          url: request.url,
        },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    } else {
      app.log.warn(
        {
          request_id: errorV1.request_id,
          code: errorV1.code,
          method: request.method,
          url: request.url,
        },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    }

    const retryAfter = errorV1.details?.retry_after_seconds;
    if (errorV1.code === "RATE_LIMITED" && typeof retryAfter === "number") {
      reply.header("Retry-After", retryAfter);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send(buildErrorV1("NOT_FOUND", `Route ${request.method} ${request.url} not found`, undefined, getRequestId(request)));
  });

  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    sources: deps.adapters.map((adapter) => adapter.name),
    articles: deps.articles?.name ?? null,
    limits: {
      source_timeout_ms: deps.sourceTimeoutMs,
      source_max_retries: cfg.sources.maxRetries,
      route_timeout_ms: ROUTE_TIMEOUT_MS,
      default_max_tokens: deps.defaultMaxTokens,
      body_limit_bytes: cfg.server.bodyLimitBytes,
      rate_limit_rpm: cfg.rateLimits.defaultRpm,
    },
  }));

  await app.register(interactionsRoute, deps);
  await app.register(neighborsRoute, deps);
  await app.register(contextRoute, deps);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  const cfg = getConfig();

  build()
    .then(async (app) => {
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          node_env: cfg.server.nodeEnv,
          rate_limit_rpm: cfg.rateLimits.defaultRpm,
          body_limit_mb: (cfg.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
          cors_origins: resolveAllowedOrigins(cfg),
          source_timeout_ms: cfg.sources.timeoutMs,
          source_max_retries: cfg.sources.maxRetries,
          google_kg_key_configured: Boolean(cfg.sources.googleKg.apiKey),
          arxiv_enabled: cfg.arxiv.enabled,
          route_timeout_ms: ROUTE_TIMEOUT_MS,
        },
        "pharmacontext-service starting",
      );

      await app.listen({ port: cfg.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
