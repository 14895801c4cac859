import { describe, expect, it } from "vitest";

import { EventBus } from "../../src/events/event-bus.js";
import {
  BraveSearchClient,
  buildBackgroundContext,
  createSearchClient,
  extractWebResults,
  formatResults,
  type SearchClient
} from "../../src/research/search.js";
import { collect } from "../helpers/fakes.js";

const jsonResponse = (status: number, body: unknown): Response =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

describe("formatResults", () => {
  it("numbers results and omits empty descriptions", () => {
    const text = formatResults([
      { title: "Acme raises Series B", description: "A $40M round.", url: "https://news.test/a" },
      { title: "Acme hires CFO", description: "", url: "https://news.test/b" }
    ]);

    expect(text).toBe(
      [
        "1. Acme raises Series B",
        "   A $40M round.",
        "   Source: https://news.test/a",
        "",
        "2. Acme hires CFO",
        "   Source: https://news.test/b"
      ].join("\n")
    );
  });

  it("returns null for no results", () => {
    expect(formatResults([])).toBeNull();
  });
});

describe("extractWebResults", () => {
  it("tolerates missing or malformed sections", () => {
    expect(extractWebResults(null)).toEqual([]);
    expect(extractWebResults({ web: { results: "nope" } })).toEqual([]);
    expect(extractWebResults({ web: { results: [{ title: 3, url: "https://x.test" }, "junk"] } })).toEqual([
      { title: "", description: "", url: "https://x.test" }
    ]);
  });
});

describe("BraveSearchClient", () => {
  it("queries the web search endpoint with the subscription token", async () => {
    const seen: Array<{ url: string; token: string | null }> = [];
    const fetchImpl: typeof fetch = async (input, init) => {
      seen.push({ url: String(input), token: new Headers(init?.headers).get("x-subscription-token") });
      return jsonResponse(200, {
        web: {
          results: [
            { title: "One", description: "first", url: "https://r.test/1" },
            { title: "Two", description: "second", url: "https://r.test/2" }
          ]
        }
      });
    };
    const client = new BraveSearchClient({ apiKey: "test-secret", fetchImpl });

    const text = await client.search("acme news", 1);

    expect(text).toBe("1. One\n   first\n   Source: https://r.test/1");
    expect(seen).toEqual([
      {
        url: "https://api.search.brave.com/res/v1/web/search?q=acme+news&count=1&text_decorations=false&search_lang=en",
        token: "test-secret"
      }
    ]);
  });

  it("returns null and raises a warning on an error status", async () => {
    const bus = new EventBus();
    const warnings = collect(bus, "warning.raised");
    const fetchImpl: typeof fetch = async () => jsonResponse(503, {});
    const client = new BraveSearchClient({ apiKey: "test-secret", fetchImpl, bus });

    await expect(client.search("acme")).resolves.toBeNull();
    expect(warnings.map((warning) => warning.message)).toEqual(['Brave search returned 503 for "acme"']);
    expect(warnings[0]?.source).toBe("research");
  });

  it("returns null when the request fails", async () => {
    const bus = new EventBus();
    const warnings = collect(bus, "warning.raised");
    const fetchImpl: typeof fetch = async () => {
      throw new Error("offline");
    };
    const client = new BraveSearchClient({ apiKey: "test-secret", fetchImpl, bus });

    await expect(client.search("acme")).resolves.toBeNull();
    expect(warnings.map((warning) => warning.message)).toEqual(['Brave search failed for "acme": offline']);
  });
});

describe("buildBackgroundContext", () => {
  it("assembles one section per query that returned results", async () => {
    const queries: string[] = [];
    const search: SearchClient = {
      async search(query) {
        queries.push(query);
        return query.includes("latest") ? `results for ${query}` : null;
      }
    };

    const context = await buildBackgroundContext("Acme", "proposer", search);

    expect(queries).toEqual([
      "Acme latest news funding valuation",
      "Acme revenue growth market share competitors"
    ]);
    expect(context).toBe("LATEST ACME UPDATES:\nresults for Acme latest news funding valuation");
  });

  it("uses investor-oriented queries for the evaluator", async () => {
    const search: SearchClient = { search: async (query) => query };

    const context = await buildBackgroundContext("Fund", "evaluator", search);

    expect(context).toBe(
      [
        "FUND INVESTMENT STRATEGY:",
        "Fund investment strategy portfolio",
        "",
        "RECENT DEALS:",
        "Fund recent investments deal terms"
      ].join("\n")
    );
  });

  it("returns null without a search client or results", async () => {
    await expect(buildBackgroundContext("Acme", "proposer", null)).resolves.toBeNull();
    await expect(buildBackgroundContext("Acme", "proposer", { search: async () => null })).resolves.toBeNull();
  });
});

describe("createSearchClient", () => {
  it("is enabled only when BRAVE_API_KEY is set", () => {
    expect(createSearchClient({})).toBeNull();
    expect(createSearchClient({ BRAVE_API_KEY: "  " })).toBeNull();
    expect(createSearchClient({ BRAVE_API_KEY: "test-secret" })).toBeInstanceOf(BraveSearchClient);
  });
});
