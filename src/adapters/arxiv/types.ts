import type { HttpSourceConfig, SourceFailureReason } from "../sources/types.js";

export interface ArxivPaper {
  /** Abstract page URL, e.g. http://arxiv.org/abs/2101.00001v1 */
  id: string;
  title: string;
  summary: string;
}

export interface ArxivClientConfig extends HttpSourceConfig {
  apiUrl: string;
  maxResults: number;
}

export type ArxivSearchResult =
  | { ok: true; papers: ArxivPaper[]; latencyMs: number }
  | { ok: false; reason: SourceFailureReason; message: string; latencyMs: number };

/**
 * Anything that can list articles about a subject. The ArXiv client is the
 * production implementation; tests pass in-process stand-ins.
 */
export interface ArticleProvider {
  readonly name: string;
  searchPapers(query: string, options?: { signal?: AbortSignal }): Promise<ArxivSearchResult>;
}
