import type { InteractionReport } from "./types.js";

export type GraphNodeRole = "subject" | "neighbor";
export type GraphEdgeKind = "a" | "b" | "common";

export interface InteractionGraphNode {
  id: string;
  role: GraphNodeRole;
  shared: boolean;
}

export interface InteractionGraphEdge {
  from: string;
  to: string;
  kind: GraphEdgeKind;
}

export interface InteractionGraph {
  nodes: InteractionGraphNode[];
  edges: InteractionGraphEdge[];
}

const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Node/edge view of a report for a UI to draw. Edges into shared
 * neighbors are tagged "common". Output order is deterministic.
 */
export function toInteractionGraph(report: InteractionReport): InteractionGraph {
  const { subjectA, subjectB, common } = report;
  const subjects = new Set([subjectA, subjectB]);

  const nodes = [...subjects].map((id): InteractionGraphNode => ({ id, role: "subject", shared: false }));
  const neighborIds = new Set([...report.neighborsA, ...report.neighborsB]);
  for (const id of [...neighborIds].sort(byName)) {
    if (subjects.has(id)) continue;
    nodes.push({ id, role: "neighbor", shared: common.has(id) });
  }

  const edges: InteractionGraphEdge[] = [];
  for (const to of [...report.neighborsA].sort(byName)) {
    edges.push({ from: subjectA, to, kind: common.has(to) ? "common" : "a" });
  }
  for (const to of [...report.neighborsB].sort(byName)) {
    edges.push({ from: subjectB, to, kind: common.has(to) ? "common" : "b" });
  }

  return { nodes, edges };
}
