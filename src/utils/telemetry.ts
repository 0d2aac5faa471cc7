import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * to ensure both Fastify and standalone Pino loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

/**
 * Test sink for capturing telemetry events in tests
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: ((eventName: string, data: TelemetryShape) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: TelemetryShape) => void) | null): void {
  // Direct env check avoids a config import during module initialization
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  SourceFetchSucceeded: "sources.fetch.succeeded",
  SourceFetchFailed: "sources.fetch.failed",
  SourceRetry: "sources.fetch.retry",

  NeighborsAggregated: "interactions.neighbors.aggregated",
  InteractionReportBuilt: "interactions.report.built",

  ContextAssembled: "context.assembled",
  ContextTruncated: "context.truncated",
  SubjectContextCollected: "context.subjects.collected",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let statsd: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  statsd = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "pharmacontext.",
    globalTags: {
      service: env.DD_SERVICE || "pharmacontext-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

export type TelemetryLeaf = string | number | boolean | null;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

function sanitizeTelemetryValue(
  value: unknown,
): TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape> | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function sendMetrics(event: TelemetryEventName, data: TelemetryShape): void {
  if (!statsd) return;

  switch (event) {
    case TelemetryEvents.SourceFetchSucceeded:
    case TelemetryEvents.SourceFetchFailed: {
      const outcome = event === TelemetryEvents.SourceFetchSucceeded ? "ok" : "failed";
      const tags: Record<string, string> = {
        source: String(data.source ?? "unknown"),
        outcome,
      };
      if (typeof data.reason === "string") tags.reason = data.reason;
      statsd.increment("sources.fetch", 1, tags);
      if (typeof data.latency_ms === "number") {
        statsd.histogram("sources.fetch.latency_ms", data.latency_ms, tags);
      }
      break;
    }

    case TelemetryEvents.ContextAssembled: {
      if (typeof data.total_tokens === "number") {
        statsd.histogram("context.total_tokens", data.total_tokens);
      }
      break;
    }

    case TelemetryEvents.ContextTruncated: {
      statsd.increment("context.truncated", 1);
      break;
    }

    default:
      break;
  }
}

/**
 * Emit a telemetry event: structured pino log, test sink, optional StatsD.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  try {
    sendMetrics(event, eventData);
  } catch (error) {
    log.warn({ error, event }, "Failed to send metrics");
  }
}
