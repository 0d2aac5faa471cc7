/**
 * HTTP-backed knowledge source base
 *
 * Owns the per-call timeout, transient-error retries, structured logging and
 * telemetry for every public endpoint the service talks to. Subclasses only
 * build requests and parse payloads; anything they throw is classified into
 * a `SourceFailureReason` here and never escapes `execute`.
 */

import { z } from "zod";
import { logger } from "../../utils/simple-logger.js";
import { redactUrl } from "../../utils/logger-config.js";
import { emit, TelemetryEvents } from "../../utils/telemetry.js";
import type { HttpSourceConfig, SourceFailureReason, SourceFetchOptions } from "./types.js";

/**
 * HTTP status codes that should trigger retries
 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * Error raised inside a source; `reason` decides how it is reported
 */
export class SourceRequestError extends Error {
  constructor(
    message: string,
    public readonly reason: SourceFailureReason,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "SourceRequestError";
  }
}

export type ExecuteOutcome<T> =
  | { ok: true; value: T; latencyMs: number }
  | { ok: false; reason: SourceFailureReason; message: string; latencyMs: number };

function isRetryable(error: unknown): boolean {
  if (error instanceof SourceRequestError) {
    return error.statusCode !== undefined && RETRYABLE_STATUS_CODES.has(error.statusCode);
  }
  // Node's fetch reports connection failures as TypeError("fetch failed")
  return error instanceof TypeError;
}

function classify(error: unknown): { reason: SourceFailureReason; message: string } {
  if (error instanceof SourceRequestError) {
    return { reason: error.reason, message: error.message };
  }
  if (error instanceof z.ZodError) {
    return { reason: "malformed_response", message: "Response did not match the expected shape" };
  }
  if (error instanceof SyntaxError) {
    return { reason: "malformed_response", message: error.message };
  }
  if (error instanceof TypeError) {
    return { reason: "network", message: error.message };
  }
  if (error instanceof Error) {
    return { reason: "adapter_error", message: error.message };
  }
  return { reason: "adapter_error", message: String(error) };
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
    function done() {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }
  });
}

export abstract class HttpSource {
  abstract readonly name: string;

  protected readonly timeoutMs: number;
  protected readonly maxRetries: number;
  protected readonly userAgent: string;

  constructor(config: HttpSourceConfig) {
    this.timeoutMs = config.timeoutMs;
    this.maxRetries = config.maxRetries;
    this.userAgent = config.userAgent;
  }

  /**
   * Run `query` under this source's timeout and the caller's signal.
   * Resolves with a failure outcome instead of rejecting.
   */
  protected async execute<T>(
    subject: string,
    options: SourceFetchOptions | undefined,
    query: (subject: string, signal: AbortSignal) => Promise<T>,
  ): Promise<ExecuteOutcome<T>> {
    const startTime = Date.now();
    const controller = new AbortController();
    const parent = options?.signal;

    const timeoutId = setTimeout(() => {
      controller.abort(
        new SourceRequestError(`${this.name} request timed out after ${this.timeoutMs}ms`, "timeout"),
      );
    }, this.timeoutMs);

    const onParentAbort = () => {
      controller.abort(new SourceRequestError(`${this.name} request cancelled`, "cancelled"));
    };
    if (parent?.aborted) {
      onParentAbort();
    } else {
      parent?.addEventListener("abort", onParentAbort, { once: true });
    }

    try {
      const value = await query(subject, controller.signal);
      if (controller.signal.aborted) {
        throw controller.signal.reason;
      }
      const latencyMs = Date.now() - startTime;

      emit(TelemetryEvents.SourceFetchSucceeded, {
        source: this.name,
        subject,
        latency_ms: latencyMs,
      });

      return { ok: true, value, latencyMs };
    } catch (error) {
      const latencyMs = Date.now() - startTime;
      // An aborted signal wins over whatever error the aborted request produced
      const { reason, message } = classify(controller.signal.aborted ? controller.signal.reason : error);

      logger.warn({
        event: "sources.fetch.failed",
        source: this.name,
        subject,
        reason,
        error: message,
        latency_ms: latencyMs,
      });
      emit(TelemetryEvents.SourceFetchFailed, {
        source: this.name,
        reason,
        latency_ms: latencyMs,
      });

      return { ok: false, reason, message, latencyMs };
    } finally {
      clearTimeout(timeoutId);
      parent?.removeEventListener("abort", onParentAbort);
    }
  }

  /**
   * GET a JSON document, retrying transient failures
   */
  protected async getJson(url: URL, signal: AbortSignal, accept = "application/json"): Promise<unknown> {
    const response = await this.request(url, signal, accept);
    const body = await response.text();
    try {
      return JSON.parse(body);
    } catch {
      throw new SourceRequestError(`${this.name} returned invalid JSON`, "malformed_response");
    }
  }

  /**
   * GET a text document (XML feeds), retrying transient failures
   */
  protected async getText(url: URL, signal: AbortSignal, accept: string): Promise<string> {
    const response = await this.request(url, signal, accept);
    return response.text();
  }

  private async request(url: URL, signal: AbortSignal, accept: string, attempt = 0): Promise<Response> {
    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          Accept: accept,
          "User-Agent": this.userAgent,
        },
        signal,
      });

      if (!response.ok) {
        throw new SourceRequestError(
          `${this.name} request failed: ${response.status}`,
          "http_status",
          response.status,
        );
      }

      return response;
    } catch (error) {
      if (signal.aborted || attempt >= this.maxRetries || !isRetryable(error)) {
        throw error;
      }

      logger.warn({
        event: "sources.fetch.retry",
        source: this.name,
        url: redactUrl(url.toString()),
        attempt: attempt + 1,
        max_retries: this.maxRetries,
        error: error instanceof Error ? error.message : String(error),
      });
      emit(TelemetryEvents.SourceRetry, { source: this.name, attempt: attempt + 1 });

      // Exponential backoff
      await delay(Math.pow(2, attempt) * 100, signal);
      if (signal.aborted) {
        throw error;
      }
      return this.request(url, signal, accept, attempt + 1);
    }
  }
}
