import { z } from "zod";
import { SourceRequestError } from "./http-source.js";
import { NeighborSource } from "./neighbor-source.js";
import type { HttpSourceConfig } from "./types.js";

export interface GoogleKgSourceConfig extends HttpSourceConfig {
  url: string;
  apiKey?: string;
  resultLimit: number;
}

const EntitySearchSchema = z.object({
  itemListElement: z
    .array(
      z.object({
        result: z
          .object({
            name: z.string().optional(),
          })
          .passthrough()
          .optional(),
      }),
    )
    .default([]),
});

/**
 * Google Knowledge Graph Search: names of entities returned for the subject.
 * Without an API key every call fails with `missing_credential`.
 */
export class GoogleKgSource extends NeighborSource {
  readonly name = "GoogleKG";
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly resultLimit: number;

  constructor(config: GoogleKgSourceConfig) {
    super(config);
    this.url = config.url;
    this.apiKey = config.apiKey;
    this.resultLimit = config.resultLimit;
  }

  protected async queryNeighbors(subject: string, signal: AbortSignal): Promise<string[]> {
    if (!this.apiKey) {
      throw new SourceRequestError("Google Knowledge Graph API key not configured", "missing_credential");
    }

    const url = new URL(this.url);
    url.searchParams.set("query", subject);
    url.searchParams.set("key", this.apiKey);
    url.searchParams.set("limit", String(this.resultLimit));
    url.searchParams.set("languages", "en");

    const body = EntitySearchSchema.parse(await this.getJson(url, signal));
    const names: string[] = [];
    for (const item of body.itemListElement) {
      if (item.result?.name) names.push(item.result.name);
    }
    return names;
  }
}
