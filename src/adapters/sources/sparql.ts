/**
 * SPARQL 1.1 protocol helpers (SELECT queries, JSON results)
 */

import { z } from "zod";
import { NeighborSource } from "./neighbor-source.js";

export const SPARQL_RESULTS_MEDIA_TYPE = "application/sparql-results+json";

const SparqlTermSchema = z.object({
  type: z.string(),
  value: z.string(),
  "xml:lang": z.string().optional(),
});

export const SparqlResultsSchema = z.object({
  head: z.object({ vars: z.array(z.string()) }).optional(),
  results: z.object({
    bindings: z.array(z.record(SparqlTermSchema)),
  }),
});

export type SparqlBinding = z.infer<typeof SparqlResultsSchema>["results"]["bindings"][number];

/**
 * Characters that may not appear inside an IRI reference (`<...>`)
 */
const IRI_UNSAFE = /[\s<>"{}|\\^`]/g;

/**
 * Wrap an absolute IRI for inclusion in a query, percent-encoding
 * characters the IRI grammar forbids.
 */
export function iriRef(iri: string): string {
  const safe = iri.replace(IRI_UNSAFE, (ch) => encodeURIComponent(ch));
  return `<${safe}>`;
}

/**
 * Values of one variable across all bindings, skipping unbound rows
 */
export function bindingValues(bindings: SparqlBinding[], variable: string): string[] {
  const values: string[] = [];
  for (const binding of bindings) {
    const term = binding[variable];
    if (term) values.push(term.value);
  }
  return values;
}

export abstract class SparqlSource extends NeighborSource {
  protected abstract readonly endpoint: string;

  protected async select(query: string, signal: AbortSignal): Promise<SparqlBinding[]> {
    const url = new URL(this.endpoint);
    url.searchParams.set("query", query);
    url.searchParams.set("format", "json");

    const body = await this.getJson(url, signal, SPARQL_RESULTS_MEDIA_TYPE);
    return SparqlResultsSchema.parse(body).results.bindings;
  }
}
