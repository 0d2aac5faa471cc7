/**
 * ArXiv Client
 *
 * Queries the ArXiv Atom API for papers mentioning a subject. Used to fill
 * the "articles" context sections; failures degrade to an empty list.
 */

import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import { normalizeName } from "../../interactions/subject.js";
import { HttpSource, SourceRequestError } from "../sources/http-source.js";
import type { ArticleProvider, ArxivClientConfig, ArxivPaper, ArxivSearchResult } from "./types.js";

const ATOM_MEDIA_TYPE = "application/atom+xml";

const TextNodeSchema = z.union([
  z.string(),
  z.number().transform(String),
  z.object({ "#text": z.union([z.string(), z.number().transform(String)]) }).transform((node) => node["#text"]),
]);

const AtomFeedSchema = z.object({
  feed: z.object({
    entry: z
      .array(
        z.object({
          id: TextNodeSchema,
          title: TextNodeSchema,
          summary: TextNodeSchema.default(""),
        }),
      )
      .default([]),
  }),
});

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name) => name === "entry",
});

/**
 * Parse an Atom feed into papers with whitespace-collapsed text
 */
export function parseArxivFeed(xml: string): ArxivPaper[] {
  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new SourceRequestError(`ArXiv feed is not valid XML: ${detail}`, "malformed_response");
  }

  const feed = AtomFeedSchema.parse(document);
  return feed.feed.entry.map((entry) => ({
    id: entry.id.trim(),
    title: normalizeName(entry.title),
    summary: normalizeName(entry.summary),
  }));
}

export class ArxivClient extends HttpSource implements ArticleProvider {
  readonly name = "ArXiv";
  private readonly apiUrl: string;
  private readonly maxResults: number;

  constructor(config: ArxivClientConfig) {
    super(config);
    this.apiUrl = config.apiUrl;
    this.maxResults = config.maxResults;
  }

  async searchPapers(query: string, options?: { signal?: AbortSignal }): Promise<ArxivSearchResult> {
    const outcome = await this.execute(query, options, async (q, signal) => {
      const url = new URL(this.apiUrl);
      url.searchParams.set("search_query", q);
      url.searchParams.set("start", "0");
      url.searchParams.set("max_results", String(this.maxResults));

      const xml = await this.getText(url, signal, ATOM_MEDIA_TYPE);
      return parseArxivFeed(xml);
    });

    if (!outcome.ok) {
      return outcome;
    }
    return { ok: true, papers: outcome.value, latencyMs: outcome.latencyMs };
  }
}
