import { normalizeName } from "../../interactions/subject.js";
import { HttpSource } from "./http-source.js";
import {
  sourceFailure,
  sourceSuccess,
  type SourceAdapter,
  type SourceFetchOptions,
  type SourceResult,
} from "./types.js";

/**
 * HTTP source that yields related-entity names for a subject.
 * Subclasses return display names; whitespace normalization and
 * de-duplication happen here.
 */
export abstract class NeighborSource extends HttpSource implements SourceAdapter {
  protected abstract queryNeighbors(subject: string, signal: AbortSignal): Promise<string[]>;

  async fetch(subject: string, options?: SourceFetchOptions): Promise<SourceResult> {
    const outcome = await this.execute(subject, options, (s, signal) => this.queryNeighbors(s, signal));

    if (!outcome.ok) {
      return sourceFailure(this.name, outcome.reason, outcome.message, outcome.latencyMs);
    }

    const names = outcome.value.map(normalizeName).filter((name) => name.length > 0);
    return sourceSuccess(this.name, names, outcome.latencyMs);
  }
}
