import type { SearchCapability, SearchResult } from "../capabilities.js";
import { tokenize } from "../../helpers/text.js";
import { FirecrawlService } from "./firecrawlService.js";
import type { FirecrawlSearchItem } from "./firecrawlService.js";

export function rankSearchResults(query: string, results: SearchResult[]): SearchResult[] {
  const queryTokens = tokenize(query);
  if (!queryTokens.length) return results;
  const querySet = new Set(queryTokens);

  return results
    .map((result, idx) => {
      const titleMatches = tokenize(result.title).filter((t) => querySet.has(t)).length;
      const snippetMatches = tokenize(result.snippet).filter((t) => querySet.has(t)).length;
      const score = (titleMatches * 2 + snippetMatches) / queryTokens.length;
      return { result: { ...result, score }, idx };
    })
    .sort((a, b) => (b.result.score !== a.result.score ? b.result.score - a.result.score : a.idx - b.idx))
    .map(({ result }) => result);
}

export function toSearchResults(items: FirecrawlSearchItem[]): SearchResult[] {
  return items.map((item) => ({
    title: item.title ?? "Untitled result",
    url: item.url,
    snippet: item.description ?? "",
    score: 0,
  }));
}

export type FirecrawlSearchOptions = {
  apiKey?: string;
  service?: Pick<FirecrawlService, "safeSearch">;
  /** Most recent queries kept; 0 disables caching. */
  cacheSize?: number;
};

const DEFAULT_CACHE_SIZE = 100;

const copyResults = (results: SearchResult[]): SearchResult[] => results.map((result) => ({ ...result }));

/**
 * Search capability over Firecrawl, ranked by token overlap with the query.
 * The most recent queries are cached; callers always get their own copy.
 * Returns undefined when no API key or service is available.
 */
export function createFirecrawlSearch(options: FirecrawlSearchOptions = {}): SearchCapability | undefined {
  const apiKey = options.apiKey ?? process.env.FIRECRAWL_API_KEY;
  const service = options.service ?? (apiKey ? new FirecrawlService(apiKey) : undefined);
  if (!service) return undefined;

  const cacheSize = Math.max(0, options.cacheSize ?? DEFAULT_CACHE_SIZE);
  const cache = new Map<string, SearchResult[]>();
  return async (query: string) => {
    const key = query.trim().toLowerCase();
    if (!key) return [];
    const cached = cache.get(key);
    if (cached) {
      // Re-insert so eviction drops the least recently used query.
      cache.delete(key);
      cache.set(key, cached);
      return copyResults(cached);
    }
    const results = rankSearchResults(query, toSearchResults(await service.safeSearch(query.trim())));
    if (cacheSize > 0) {
      cache.set(key, results);
      const oldest = cache.keys().next();
      if (cache.size > cacheSize && !oldest.done) cache.delete(oldest.value);
    }
    return copyResults(results);
  };
}
