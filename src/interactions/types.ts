import type { SourceResult } from "../adapters/sources/types.js";

/**
 * Deduplicated, unordered related-entity names for one subject
 */
export type NeighborSet = ReadonlySet<string>;

/**
 * Pairwise interaction report. Built fresh per query and frozen.
 *
 * - `common` is exactly `neighborsA ∩ neighborsB`
 * - `direct` holds when either subject lists the other as a neighbor
 */
export interface InteractionReport {
  readonly subjectA: string;
  readonly subjectB: string;
  readonly direct: boolean;
  readonly common: NeighborSet;
  readonly neighborsA: NeighborSet;
  readonly neighborsB: NeighborSet;
}

/**
 * Neighbor set plus the outcome of every adapter that produced it
 */
export interface NeighborAggregation {
  readonly subject: string;
  readonly neighbors: NeighborSet;
  readonly sources: readonly SourceResult[];
}

export interface InteractionAnalysis {
  readonly report: InteractionReport;
  readonly sourcesA: readonly SourceResult[];
  readonly sourcesB: readonly SourceResult[];
}

export interface AggregateOptions {
  /** Per-adapter timeout; a timed-out adapter counts as failed */
  timeoutMs?: number;
  /** Caller cancellation: aborts in-flight adapters and rejects the aggregation */
  signal?: AbortSignal;
}
