import { entityNameFromIdentifier, toResourceName } from "../../interactions/subject.js";
import { bindingValues, iriRef, SparqlSource } from "./sparql.js";
import type { HttpSourceConfig } from "./types.js";

export interface DbpediaSourceConfig extends HttpSourceConfig {
  sparqlUrl: string;
  resultLimit: number;
}

const DBPEDIA_RESOURCE_BASE = "http://dbpedia.org/resource/";

/**
 * DBpedia: drugs linked to the subject's resource page through either
 * `dbo:relatedDrug` or `dbo:drugInteraction`. Both relations are unioned
 * as the same kind of neighbor.
 */
export class DbpediaSource extends SparqlSource {
  readonly name = "DBpedia";
  protected readonly endpoint: string;
  private readonly resultLimit: number;

  constructor(config: DbpediaSourceConfig) {
    super(config);
    this.endpoint = config.sparqlUrl;
    this.resultLimit = config.resultLimit;
  }

  buildQuery(subject: string): string {
    const resource = iriRef(`${DBPEDIA_RESOURCE_BASE}${toResourceName(subject)}`);
    return [
      "PREFIX dbo: <http://dbpedia.org/ontology/>",
      "SELECT DISTINCT ?related WHERE {",
      `  { ${resource} dbo:relatedDrug ?related . }`,
      "  UNION",
      `  { ${resource} dbo:drugInteraction ?related . }`,
      `} LIMIT ${this.resultLimit}`,
    ].join("\n");
  }

  protected async queryNeighbors(subject: string, signal: AbortSignal): Promise<string[]> {
    const bindings = await this.select(this.buildQuery(subject), signal);
    return bindingValues(bindings, "related").map(entityNameFromIdentifier);
  }
}
