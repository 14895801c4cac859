import { errorMessage } from "../core/errors.js";
import type { EventBus } from "../events/event-bus.js";
import type { PartyRole } from "../protocol/messages.js";

const BRAVE_SEARCH_URL = "https://api.search.brave.com/res/v1/web/search";
const SEARCH_TIMEOUT_MS = 10_000;

export type SearchResult = {
  title: string;
  description: string;
  url: string;
};

/** Web search used to ground an agent's persona; `null` means no usable results. */
export interface SearchClient {
  search(query: string, count?: number): Promise<string | null>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const stringField = (record: Record<string, unknown>, key: string): string => {
  const value = record[key];
  return typeof value === "string" ? value : "";
};

export const extractWebResults = (body: unknown): SearchResult[] => {
  if (!isRecord(body) || !isRecord(body.web) || !Array.isArray(body.web.results)) {
    return [];
  }
  return body.web.results.filter(isRecord).map((result) => ({
    title: stringField(result, "title"),
    description: stringField(result, "description"),
    url: stringField(result, "url")
  }));
};

export const formatResults = (results: readonly SearchResult[]): string | null => {
  if (results.length === 0) {
    return null;
  }
  return results
    .map((result, index) => {
      const lines = [`${index + 1}. ${result.title}`];
      if (result.description) {
        lines.push(`   ${result.description}`);
      }
      lines.push(`   Source: ${result.url}`);
      return lines.join("\n");
    })
    .join("\n\n");
};

export class BraveSearchClient implements SearchClient {
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;
  private readonly bus: EventBus | null;

  constructor(options: { apiKey: string; fetchImpl?: typeof fetch; bus?: EventBus }) {
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.bus = options.bus ?? null;
  }

  async search(query: string, count = 3): Promise<string | null> {
    const url = new URL(BRAVE_SEARCH_URL);
    url.searchParams.set("q", query);
    url.searchParams.set("count", String(count));
    url.searchParams.set("text_decorations", "false");
    url.searchParams.set("search_lang", "en");

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          Accept: "application/json",
          "X-Subscription-Token": this.apiKey
        },
        signal: AbortSignal.timeout(SEARCH_TIMEOUT_MS)
      });
      if (!response.ok) {
        this.warn(`Brave search returned ${response.status} for "${query}"`);
        return null;
      }
      const body: unknown = await response.json();
      return formatResults(extractWebResults(body).slice(0, count));
    } catch (error) {
      this.warn(`Brave search failed for "${query}": ${errorMessage(error)}`);
      return null;
    }
  }

  private warn(message: string): void {
    this.bus?.emit({
      type: "warning.raised",
      payload: { message, source: "research", recorded_at: new Date().toISOString() }
    });
  }
}

export const researchQueries = (name: string, role: PartyRole): Array<{ heading: string; query: string }> =>
  role === "proposer"
    ? [
        { heading: `LATEST ${name.toUpperCase()} UPDATES`, query: `${name} latest news funding valuation` },
        { heading: "MARKET POSITION", query: `${name} revenue growth market share competitors` }
      ]
    : [
        { heading: `${name.toUpperCase()} INVESTMENT STRATEGY`, query: `${name} investment strategy portfolio` },
        { heading: "RECENT DEALS", query: `${name} recent investments deal terms` }
      ];

/**
 * Background research for an agent's context, or `null` when search is
 * unavailable or every query came back empty.
 */
export const buildBackgroundContext = async (
  name: string,
  role: PartyRole,
  search: SearchClient | null
): Promise<string | null> => {
  if (!search) {
    return null;
  }
  const sections: string[] = [];
  for (const { heading, query } of researchQueries(name, role)) {
    const results = await search.search(query);
    if (results) {
      sections.push(`${heading}:\n${results}`);
    }
  }
  return sections.length > 0 ? sections.join("\n\n") : null;
};

export const createSearchClient = (
  env: NodeJS.ProcessEnv = process.env,
  bus?: EventBus
): SearchClient | null => {
  const apiKey = env.BRAVE_API_KEY?.trim();
  return apiKey ? new BraveSearchClient({ apiKey, bus }) : null;
};
