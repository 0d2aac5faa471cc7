import type { ArticleProvider } from "../adapters/arxiv/types.js";
import type { SourceAdapter } from "../adapters/sources/types.js";
import type { Tokenizer } from "../context/types.js";

/**
 * Collaborators handed to every route plugin. Built once by `build()`;
 * tests pass in-process stand-ins.
 */
export interface ServiceDeps {
  adapters: readonly SourceAdapter[];
  articles: ArticleProvider | null;
  tokenizer: Tokenizer;
  /** Per-adapter timeout used by aggregation */
  sourceTimeoutMs: number;
  /** Budget applied when a request omits max_tokens */
  defaultMaxTokens: number;
}
