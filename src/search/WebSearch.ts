import { fetchWithTimeout, isRecord, readJsonBody } from "../core/http.js";
import { createTaggedError } from "../core/Retry.js";

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchResponse {
  query: string;
  /** Short direct answer or abstract, empty when the provider has none */
  summary: string;
  hits: SearchHit[];
}

export interface SearchOptions {
  maxResults?: number;
  signal?: AbortSignal;
}

/**
 * Read-only external lookup used by the agent's `web_search` tool.
 * Implementations must not cache: every call goes to the provider.
 */
export interface SearchProvider {
  readonly name: string;
  search(query: string, options?: SearchOptions): Promise<SearchResponse>;
}

export interface DuckDuckGoSearchConfig {
  /** Default: https://api.duckduckgo.com/ */
  endpoint?: string;
  timeoutMs?: number;
}

/**
 * DuckDuckGo Instant Answer API.
 */
export class DuckDuckGoSearchProvider implements SearchProvider {
  readonly name = "duckduckgo";
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(config: DuckDuckGoSearchConfig = {}) {
    this.endpoint = config.endpoint ?? "https://api.duckduckgo.com/";
    this.timeoutMs = config.timeoutMs ?? 15_000;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    const maxResults = options.maxResults ?? 5;
    const url = new URL(this.endpoint);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "json");
    url.searchParams.set("no_html", "1");
    url.searchParams.set("skip_disambig", "1");

    const response = await fetchWithTimeout(
      url,
      { headers: { Accept: "application/json" } },
      { timeoutMs: this.timeoutMs, signal: options.signal },
    );
    if (!response.ok) {
      throw createTaggedError("UPSTREAM_ERROR", `Search failed: HTTP ${response.status}`, {
        status: response.status,
      });
    }
    const body = await readJsonBody(response);

    return parseInstantAnswer(query, body, maxResults);
  }
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

/**
 * Flatten an Instant Answer body. Grouped RelatedTopics (`{ Name, Topics }`)
 * are expanded in order.
 */
export function parseInstantAnswer(query: string, body: unknown, maxResults = 5): SearchResponse {
  if (!isRecord(body)) return { query, summary: "", hits: [] };

  const summary = readString(body, "Answer") || readString(body, "AbstractText") || readString(body, "Definition");
  const hits: SearchHit[] = [];

  const abstractUrl = readString(body, "AbstractURL");
  if (abstractUrl && readString(body, "AbstractText")) {
    hits.push({
      title: readString(body, "Heading") || query,
      url: abstractUrl,
      snippet: readString(body, "AbstractText"),
    });
  }

  const visit = (topics: unknown): void => {
    if (!Array.isArray(topics)) return;
    for (const topic of topics) {
      if (hits.length >= maxResults) return;
      if (!isRecord(topic)) continue;
      if (Array.isArray(topic.Topics)) {
        visit(topic.Topics);
        continue;
      }
      const text = readString(topic, "Text");
      const url = readString(topic, "FirstURL");
      if (text && url) {
        hits.push({ title: text.split(" - ")[0] ?? text, url, snippet: text });
      }
    }
  };
  visit(body.Results);
  visit(body.RelatedTopics);

  return { query, summary, hits: hits.slice(0, maxResults) };
}
