export { aggregate, collectNeighbors, runAdapter, unionNeighbors, DEFAULT_ADAPTER_TIMEOUT_MS } from "./aggregate.js";
export { analyzeInteraction, buildInteractionReport, createInteractionReport, intersect } from "./report.js";
export { toInteractionGraph } from "./graph-view.js";
export type { InteractionGraph, InteractionGraphEdge, InteractionGraphNode } from "./graph-view.js";
export {
  entityNameFromIdentifier,
  normalizeName,
  parseSubject,
  parseSubjectList,
  subjectsEqual,
  toResourceName,
  MAX_SUBJECT_LENGTH,
} from "./subject.js";
export type {
  AggregateOptions,
  InteractionAnalysis,
  InteractionReport,
  NeighborAggregation,
  NeighborSet,
} from "./types.js";
