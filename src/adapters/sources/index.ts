/**
 * Knowledge source wiring
 *
 * Builds the adapter set from a validated config snapshot once, at startup.
 * Adapters never read configuration while serving a request.
 */

import type { ArxivConfig, SourcesConfig } from "../../config/index.js";
import { SERVICE_VERSION } from "../../version.js";
import { ArxivClient } from "../arxiv/client.js";
import type { ArticleProvider } from "../arxiv/types.js";
import { DbpediaSource } from "./dbpedia.js";
import { GoogleKgSource } from "./google-kg.js";
import type { HttpSourceConfig, SourceAdapter } from "./types.js";
import { WikidataSource } from "./wikidata.js";

export { DbpediaSource } from "./dbpedia.js";
export { GoogleKgSource } from "./google-kg.js";
export { WikidataSource } from "./wikidata.js";
export { HttpSource, SourceRequestError } from "./http-source.js";
export { NeighborSource } from "./neighbor-source.js";
export * from "./types.js";

export const DEFAULT_USER_AGENT = `pharmacontext-service/${SERVICE_VERSION}`;

function httpConfig(sources: SourcesConfig): HttpSourceConfig {
  return {
    timeoutMs: sources.timeoutMs,
    maxRetries: sources.maxRetries,
    userAgent: sources.userAgent ?? DEFAULT_USER_AGENT,
  };
}

/**
 * Enabled neighbor sources, in a fixed order
 */
export function createSourceAdapters(sources: SourcesConfig): SourceAdapter[] {
  const shared = httpConfig(sources);
  const adapters: SourceAdapter[] = [];

  if (sources.dbpedia.enabled) {
    adapters.push(
      new DbpediaSource({
        ...shared,
        sparqlUrl: sources.dbpedia.sparqlUrl,
        resultLimit: sources.resultLimit,
      }),
    );
  }

  if (sources.wikidata.enabled) {
    adapters.push(
      new WikidataSource({
        ...shared,
        sparqlUrl: sources.wikidata.sparqlUrl,
        apiUrl: sources.wikidata.apiUrl,
        resultLimit: sources.resultLimit,
      }),
    );
  }

  if (sources.googleKg.enabled) {
    adapters.push(
      new GoogleKgSource({
        ...shared,
        url: sources.googleKg.url,
        apiKey: sources.googleKg.apiKey,
        resultLimit: sources.resultLimit,
      }),
    );
  }

  return adapters;
}

/**
 * ArXiv article provider, or null when disabled
 */
export function createArticleProvider(arxiv: ArxivConfig, sources: SourcesConfig): ArticleProvider | null {
  if (!arxiv.enabled) {
    return null;
  }
  return new ArxivClient({
    ...httpConfig(sources),
    apiUrl: arxiv.apiUrl,
    maxResults: arxiv.maxResults,
  });
}
