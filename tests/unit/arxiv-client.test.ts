import { describe, it, expect, afterEach, vi } from "vitest";
import { ArxivClient, parseArxivFeed } from "../../src/adapters/arxiv/index.js";
import { textResponse } from "../helpers/fakes.js";

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xmlns:opensearch="http://a9.com/-/spec/opensearch/1.1/">
  <title type="html">ArXiv Query: search_query=all:warfarin</title>
  <opensearch:totalResults>2</opensearch:totalResults>
  <entry>
    <id>http://arxiv.org/abs/2101.00001v1</id>
    <title>Warfarin   dosing
      models</title>
    <summary>  A study of
      anticoagulant dosing. </summary>
  </entry>
  <entry>
    <id>http://arxiv.org/abs/2101.00002v2</id>
    <title>Drug interaction graphs</title>
    <summary>Graphs.</summary>
  </entry>
</feed>`;

function makeClient() {
  return new ArxivClient({
    timeoutMs: 1000,
    maxRetries: 0,
    userAgent: "test-agent",
    apiUrl: "http://export.arxiv.test/api/query",
    maxResults: 2,
  });
}

describe("parseArxivFeed", () => {
  it("extracts papers with collapsed whitespace", () => {
    expect(parseArxivFeed(FEED)).toEqual([
      {
        id: "http://arxiv.org/abs/2101.00001v1",
        title: "Warfarin dosing models",
        summary: "A study of anticoagulant dosing.",
      },
      {
        id: "http://arxiv.org/abs/2101.00002v2",
        title: "Drug interaction graphs",
        summary: "Graphs.",
      },
    ]);
  });

  it("returns no papers for a feed without entries", () => {
    expect(parseArxivFeed(`<feed xmlns="http://www.w3.org/2005/Atom"><title>empty</title></feed>`)).toEqual([]);
  });

  it("treats a single entry as a list", () => {
    const single = `<feed><entry><id>x</id><title>Only</title><summary>One.</summary></entry></feed>`;
    expect(parseArxivFeed(single)).toEqual([{ id: "x", title: "Only", summary: "One." }]);
  });
});

describe("ArxivClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("queries the Atom API and returns papers", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      textResponse(FEED, 200, "application/atom+xml"),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await makeClient().searchPapers("warfarin");

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.papers.map((p) => p.title)).toEqual(["Warfarin dosing models", "Drug interaction graphs"]);
    }

    const [input, init] = fetchMock.mock.calls[0] ?? [];
    const url = new URL(String(input));
    expect(url.searchParams.get("search_query")).toBe("warfarin");
    expect(url.searchParams.get("start")).toBe("0");
    expect(url.searchParams.get("max_results")).toBe("2");
    expect(init?.headers).toEqual({ Accept: "application/atom+xml", "User-Agent": "test-agent" });
  });

  it("reports a non-feed body as malformed", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => textResponse("not a feed")));

    const result = await makeClient().searchPapers("warfarin");

    expect(result).toMatchObject({ ok: false, reason: "malformed_response" });
  });

  it("reports upstream errors without throwing", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => textResponse("down", 500)));

    const result = await makeClient().searchPapers("warfarin");

    expect(result).toMatchObject({ ok: false, reason: "http_status", message: "ArXiv request failed: 500" });
  });
});
