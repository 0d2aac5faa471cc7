/**
 * Neighbor aggregation
 *
 * Fans one subject out to every adapter in parallel and unions the results.
 * Each adapter runs under its own timeout and its own abort signal; a slow,
 * failing or throwing adapter turns into a `SourceFailure` and never affects
 * its siblings. Union is commutative, so completion order is irrelevant.
 */

import {
  neighborsOf,
  sourceFailure,
  type SourceAdapter,
  type SourceResult,
} from "../adapters/sources/types.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { logger } from "../utils/simple-logger.js";
import { normalizeName, parseSubject } from "./subject.js";
import type { AggregateOptions, NeighborAggregation, NeighborSet } from "./types.js";

/** Default per-adapter timeout when the caller gives none */
export const DEFAULT_ADAPTER_TIMEOUT_MS = 5000;

/**
 * Invoke one adapter under a timeout, converting every abnormal ending
 * (timeout, rejection, cancellation) into a failure result.
 */
export async function runAdapter(
  adapter: SourceAdapter,
  subject: string,
  options: AggregateOptions = {},
): Promise<SourceResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_ADAPTER_TIMEOUT_MS;
  const startTime = Date.now();
  const controller = new AbortController();
  const parent = options.signal;

  let settle: (result: SourceResult) => void = () => undefined;
  const interrupted = new Promise<SourceResult>((resolve) => {
    settle = resolve;
  });

  const timeoutId = setTimeout(() => {
    controller.abort();
    settle(sourceFailure(adapter.name, "timeout", `timed out after ${timeoutMs}ms`, Date.now() - startTime));
  }, timeoutMs);

  const onParentAbort = () => {
    controller.abort();
    settle(sourceFailure(adapter.name, "cancelled", "aggregation cancelled", Date.now() - startTime));
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  // Deferred so a synchronous throw is caught like a rejection
  const fetched = Promise.resolve()
    .then(() => adapter.fetch(subject, { signal: controller.signal }))
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({
        event: "sources.adapter.rejected",
        source: adapter.name,
        subject,
        error: message,
      });
      return sourceFailure(adapter.name, "adapter_error", message, Date.now() - startTime);
    });

  try {
    return await Promise.race([fetched, interrupted]);
  } finally {
    clearTimeout(timeoutId);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Union of neighbor names; names are whitespace-normalized, empties dropped
 */
export function unionNeighbors(results: readonly SourceResult[]): Set<string> {
  const neighbors = new Set<string>();
  for (const result of results) {
    for (const name of neighborsOf(result)) {
      const normalized = normalizeName(name);
      if (normalized.length > 0) neighbors.add(normalized);
    }
  }
  return neighbors;
}

/**
 * Aggregate a subject across adapters, keeping each adapter's outcome.
 * Throws ValidationError for a bad subject before any adapter runs.
 */
export async function collectNeighbors(
  rawSubject: string,
  adapters: readonly SourceAdapter[],
  options: AggregateOptions = {},
): Promise<NeighborAggregation> {
  const subject = parseSubject(rawSubject);
  options.signal?.throwIfAborted();

  const sources = await Promise.all(adapters.map((adapter) => runAdapter(adapter, subject, options)));

  // Partial results of a cancelled aggregation are discarded
  options.signal?.throwIfAborted();

  const neighbors = unionNeighbors(sources);
  const failed = sources.filter((result) => !result.ok).map((result) => result.source);

  emit(TelemetryEvents.NeighborsAggregated, {
    subject,
    adapter_count: adapters.length,
    failed_sources: failed,
    neighbor_count: neighbors.size,
  });

  return { subject, neighbors, sources };
}

/**
 * Union of `adapter.fetch(subject)` over all adapters. The empty set is a
 * valid outcome, including when every adapter fails.
 */
export async function aggregate(
  subject: string,
  adapters: readonly SourceAdapter[],
  options: AggregateOptions = {},
): Promise<NeighborSet> {
  const aggregation = await collectNeighbors(subject, adapters, options);
  return aggregation.neighbors;
}
