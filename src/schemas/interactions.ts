import { z } from "zod";
import type { SourceResult } from "../adapters/sources/types.js";
import type { InteractionGraph } from "../interactions/graph-view.js";
import type { InteractionReport, NeighborSet } from "../interactions/types.js";

export const InteractionInput = z
  .object({
    subject_a: z.string(),
    subject_b: z.string(),
    include_graph: z.boolean().optional(),
  })
  .strict();

export const NeighborsParams = z.object({
  subject: z.string(),
});

export type SourceStatus =
  | { source: string; ok: true; neighbor_count: number; latency_ms: number }
  | { source: string; ok: false; reason: string; message: string; latency_ms: number };

export interface InteractionReportV1 {
  schema: "interaction-report.v1";
  subject_a: string;
  subject_b: string;
  direct: boolean;
  common: string[];
  neighbors_a: string[];
  neighbors_b: string[];
  sources: { a: SourceStatus[]; b: SourceStatus[] };
  graph?: InteractionGraph;
}

export interface NeighborsV1 {
  schema: "neighbors.v1";
  subject: string;
  neighbors: string[];
  sources: SourceStatus[];
}

export function sortedNames(set: NeighborSet): string[] {
  return [...set].sort();
}

export function toSourceStatus(result: SourceResult): SourceStatus {
  if (result.ok) {
    return {
      source: result.source,
      ok: true,
      neighbor_count: result.neighbors.size,
      latency_ms: result.latencyMs,
    };
  }
  return {
    source: result.source,
    ok: false,
    reason: result.reason,
    message: result.message,
    latency_ms: result.latencyMs,
  };
}

export function toInteractionReportV1(
  report: InteractionReport,
  sourcesA: readonly SourceResult[],
  sourcesB: readonly SourceResult[],
  graph?: InteractionGraph,
): InteractionReportV1 {
  const body: InteractionReportV1 = {
    schema: "interaction-report.v1",
    subject_a: report.subjectA,
    subject_b: report.subjectB,
    direct: report.direct,
    common: sortedNames(report.common),
    neighbors_a: sortedNames(report.neighborsA),
    neighbors_b: sortedNames(report.neighborsB),
    sources: {
      a: sourcesA.map(toSourceStatus),
      b: sourcesB.map(toSourceStatus),
    },
  };
  if (graph) {
    body.graph = graph;
  }
  return body;
}
