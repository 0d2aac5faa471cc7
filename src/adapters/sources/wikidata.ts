import { z } from "zod";
import { SourceRequestError } from "./http-source.js";
import { bindingValues, SparqlSource } from "./sparql.js";
import type { HttpSourceConfig } from "./types.js";

export interface WikidataSourceConfig extends HttpSourceConfig {
  sparqlUrl: string;
  apiUrl: string;
  resultLimit: number;
}

/** Wikidata property "significant drug interaction" */
export const SIGNIFICANT_DRUG_INTERACTION = "P769";

const ENTITY_ID = /^Q\d+$/;

const SearchEntitiesSchema = z.object({
  search: z.array(
    z.object({
      id: z.string(),
      label: z.string().optional(),
    }),
  ),
});

/**
 * Wikidata: resolves the subject's item id through `wbsearchentities`,
 * then lists English labels of its significant drug interactions.
 */
export class WikidataSource extends SparqlSource {
  readonly name = "Wikidata";
  protected readonly endpoint: string;
  private readonly apiUrl: string;
  private readonly resultLimit: number;

  constructor(config: WikidataSourceConfig) {
    super(config);
    this.endpoint = config.sparqlUrl;
    this.apiUrl = config.apiUrl;
    this.resultLimit = config.resultLimit;
  }

  /**
   * Look up the best-matching item id ("Q407431") for a name
   */
  async resolveEntityId(subject: string, signal: AbortSignal): Promise<string> {
    const url = new URL(this.apiUrl);
    url.searchParams.set("action", "wbsearchentities");
    url.searchParams.set("search", subject);
    url.searchParams.set("language", "en");
    url.searchParams.set("type", "item");
    url.searchParams.set("limit", "1");
    url.searchParams.set("format", "json");

    const body = SearchEntitiesSchema.parse(await this.getJson(url, signal));
    const id = body.search[0]?.id;

    if (!id || !ENTITY_ID.test(id)) {
      throw new SourceRequestError(`No Wikidata item matches "${subject}"`, "unresolved_subject");
    }
    return id;
  }

  buildQuery(entityId: string): string {
    if (!ENTITY_ID.test(entityId)) {
      throw new SourceRequestError(`Invalid Wikidata item id "${entityId}"`, "unresolved_subject");
    }
    return [
      "SELECT ?interaction ?interactionLabel WHERE {",
      `  wd:${entityId} wdt:${SIGNIFICANT_DRUG_INTERACTION} ?interaction .`,
      '  SERVICE wikibase:label { bd:serviceParam wikibase:language "en". }',
      `} LIMIT ${this.resultLimit}`,
    ].join("\n");
  }

  protected async queryNeighbors(subject: string, signal: AbortSignal): Promise<string[]> {
    const entityId = await this.resolveEntityId(subject, signal);
    const bindings = await this.select(this.buildQuery(entityId), signal);

    return bindingValues(bindings, "interactionLabel");
  }
}
