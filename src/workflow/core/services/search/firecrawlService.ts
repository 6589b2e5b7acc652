import { Firecrawl } from "firecrawl";
import * as z from "zod";

export const MAX_PAGES = 5;

export type FirecrawlSearchItem = {
  title: string | null;
  description: string | null;
  url: string;
};

const SearchItemSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  metadata: z
    .object({
      title: z.string().nullish(),
      description: z.string().nullish(),
      sourceURL: z.string().nullish(),
    })
    .nullish(),
});

const SearchResponseSchema = z.object({
  items: z.array(z.unknown()).optional(),
  web: z.array(z.unknown()).optional(),
});

export function isAllowedUrl(raw: string): boolean {
  try {
    const url = new URL(raw);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

/** Flattens the search payload shapes the SDK has returned across versions. */
export function toSearchItems(response: unknown): FirecrawlSearchItem[] {
  const parsed = SearchResponseSchema.safeParse(response);
  if (!parsed.success) return [];
  const rawItems = parsed.data.items ?? parsed.data.web ?? [];
  const items: FirecrawlSearchItem[] = [];
  for (const raw of rawItems) {
    const item = SearchItemSchema.safeParse(raw);
    if (!item.success) continue;
    const url = item.data.url ?? item.data.metadata?.sourceURL ?? "";
    if (!url || !isAllowedUrl(url)) continue;
    items.push({
      title: item.data.title ?? item.data.metadata?.title ?? null,
      description: item.data.description ?? item.data.metadata?.description ?? null,
      url,
    });
  }
  return items;
}

export class FirecrawlService {
  private client: Firecrawl;

  constructor(apiKey: string) {
    this.client = new Firecrawl({ apiKey });
  }

  async safeSearch(query: string): Promise<FirecrawlSearchItem[]> {
    const response: unknown = await this.client.search(query, { limit: MAX_PAGES });
    return toSearchItems(response);
  }
}
