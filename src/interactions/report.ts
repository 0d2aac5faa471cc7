/**
 * Interaction reports
 *
 * `direct` is an OR of two membership tests, not a requirement that both
 * subjects list each other. Relation types are not harmonized across
 * sources: a DBpedia "related drug" and a Wikidata "significant drug
 * interaction" are the same kind of edge here.
 */

import type { SourceAdapter } from "../adapters/sources/types.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { collectNeighbors } from "./aggregate.js";
import { parseSubject } from "./subject.js";
import type { AggregateOptions, InteractionAnalysis, InteractionReport, NeighborSet } from "./types.js";

export function intersect(a: NeighborSet, b: NeighborSet): Set<string> {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  const common = new Set<string>();
  for (const name of small) {
    if (large.has(name)) common.add(name);
  }
  return common;
}

/**
 * Derive a report from two already-aggregated neighbor sets
 */
export function createInteractionReport(
  subjectA: string,
  subjectB: string,
  neighborsA: NeighborSet,
  neighborsB: NeighborSet,
): InteractionReport {
  return Object.freeze({
    subjectA,
    subjectB,
    direct: neighborsA.has(subjectB) || neighborsB.has(subjectA),
    common: intersect(neighborsA, neighborsB),
    neighborsA: new Set(neighborsA),
    neighborsB: new Set(neighborsB),
  });
}

/**
 * Aggregate both subjects concurrently and derive their report, keeping the
 * per-source outcomes for diagnostics. Both subjects are validated before
 * any adapter is invoked.
 */
export async function analyzeInteraction(
  rawSubjectA: string,
  rawSubjectB: string,
  adapters: readonly SourceAdapter[],
  options: AggregateOptions = {},
): Promise<InteractionAnalysis> {
  const subjectA = parseSubject(rawSubjectA, "subject_a");
  const subjectB = parseSubject(rawSubjectB, "subject_b");

  const [a, b] = await Promise.all([
    collectNeighbors(subjectA, adapters, options),
    collectNeighbors(subjectB, adapters, options),
  ]);

  const report = createInteractionReport(subjectA, subjectB, a.neighbors, b.neighbors);

  emit(TelemetryEvents.InteractionReportBuilt, {
    direct: report.direct,
    common_count: report.common.size,
    neighbors_a_count: report.neighborsA.size,
    neighbors_b_count: report.neighborsB.size,
  });

  return { report, sourcesA: a.sources, sourcesB: b.sources };
}

/**
 * Public operation: pairwise interaction report for two subjects
 */
export async function buildInteractionReport(
  subjectA: string,
  subjectB: string,
  adapters: readonly SourceAdapter[],
  options: AggregateOptions = {},
): Promise<InteractionReport> {
  const analysis = await analyzeInteraction(subjectA, subjectB, adapters, options);
  return analysis.report;
}
