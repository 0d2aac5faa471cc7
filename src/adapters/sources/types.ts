/**
 * Knowledge Source Adapter Types
 *
 * Every knowledge source (DBpedia, Wikidata, Google Knowledge Graph, or a
 * caller-supplied stand-in) sits behind `SourceAdapter`. `fetch` never
 * rejects: failures come back as a `SourceFailure` whose neighbor set is
 * empty, so one outage cannot block an aggregation.
 */

export type SourceFailureReason =
  | "timeout"
  | "network"
  | "http_status"
  | "malformed_response"
  | "missing_credential"
  | "unresolved_subject"
  | "cancelled"
  | "adapter_error";

export interface SourceSuccess {
  ok: true;
  source: string;
  neighbors: ReadonlySet<string>;
  latencyMs: number;
}

export interface SourceFailure {
  ok: false;
  source: string;
  reason: SourceFailureReason;
  message: string;
  latencyMs: number;
}

export type SourceResult = SourceSuccess | SourceFailure;

export interface SourceFetchOptions {
  /** Aborted when the per-call timeout fires or the caller gives up */
  signal?: AbortSignal;
}

export interface SourceAdapter {
  /** Stable, human-readable source name ("DBpedia") */
  readonly name: string;
  fetch(subject: string, options?: SourceFetchOptions): Promise<SourceResult>;
}

/**
 * Connection settings shared by HTTP-backed sources
 */
export interface HttpSourceConfig {
  timeoutMs: number;
  maxRetries: number;
  userAgent: string;
}

/**
 * Neighbor set of a result: empty for failures
 */
export function neighborsOf(result: SourceResult): ReadonlySet<string> {
  return result.ok ? result.neighbors : new Set<string>();
}

export function sourceSuccess(source: string, neighbors: Iterable<string>, latencyMs: number): SourceSuccess {
  return { ok: true, source, neighbors: new Set(neighbors), latencyMs };
}

export function sourceFailure(
  source: string,
  reason: SourceFailureReason,
  message: string,
  latencyMs: number,
): SourceFailure {
  return { ok: false, source, reason, message, latencyMs };
}
