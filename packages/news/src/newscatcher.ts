/**
 * NewsCatcher API Client
 * Keyword search over the NewsCatcher v2 index
 */

import {
  logger,
  withRetry,
  NetworkError,
  RetrievalError,
  type ChildLogger,
} from "@foresight/core";
import { toIsoDate } from "./dates.js";
import { siteOf } from "./sites.js";
import {
  NewsCatcherSearchResponseSchema,
  type DateRange,
  type DocumentSource,
  type NewsCatcherArticle,
  type RawDocument,
  type SearchOptions,
} from "./types.js";

const NEWSCATCHER_BASE_URL = "https://api.newscatcherapi.com/v2";
const MAX_PAGE_SIZE = 100;

// Characters the search endpoint rejects, raw or percent-encoded
const REJECTED_QUERY_CHARS = /[[\]/\\:^]|%5B|%5D|%2F|%5C|%3A|%5E/gi;

export interface NewsCatcherClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Attempts per request for rate limits and server errors */
  maxAttempts?: number;
  retryDelayMs?: number;
}

/**
 * Strip characters NewsCatcher rejects and squeeze whitespace
 */
export function cleanNewsCatcherQuery(query: string): string {
  return query.replace(REJECTED_QUERY_CHARS, " ").replace(/\s+/g, " ").trim();
}

/**
 * Map a NewsCatcher hit to the shared document shape
 */
export function normalizeNewsCatcherArticle(article: NewsCatcherArticle): RawDocument {
  return {
    title: article.title?.trim() ?? "",
    link: article.link,
    text: (article.summary ?? article.excerpt ?? "").trim(),
    publishedAt: toIsoDate(article.published_date),
    sourceSite: article.clean_url ?? siteOf(article.link),
  };
}

/**
 * NewsCatcher document source
 */
export class NewsCatcherClient implements DocumentSource {
  readonly id = "newscatcher";

  private readonly log: ChildLogger;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: NewsCatcherClientOptions) {
    this.log = logger.child({ component: "newscatcher" });
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? NEWSCATCHER_BASE_URL;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 5_000;
  }

  /**
   * Search articles published within the range
   */
  async search(query: string, range: DateRange, options: SearchOptions): Promise<RawDocument[]> {
    const cleaned = cleanNewsCatcherQuery(query);
    if (!cleaned) return [];

    const params = new URLSearchParams({
      q: cleaned,
      lang: "en",
      sort_by: "relevancy",
      page_size: String(Math.min(Math.max(options.limit, 1), MAX_PAGE_SIZE)),
      from: range.start,
      to: range.end,
    });

    const response = await withRetry(() => this.request(`/search?${params.toString()}`, cleaned), {
      maxAttempts: this.maxAttempts,
      delayMs: this.retryDelayMs,
      label: "NewsCatcher search",
      context: { source: this.id, query: cleaned },
    });

    const documents = (response.articles ?? []).map(normalizeNewsCatcherArticle);
    this.log.debug("Search complete", { query: cleaned, hits: documents.length });
    return documents.slice(0, options.limit);
  }

  /**
   * Make request to the API and validate the payload
   */
  private async request(path: string, query: string) {
    const url = `${this.baseUrl}${path}`;
    this.log.debug("NewsCatcher request", { path });

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          "x-api-key": this.apiKey,
          Accept: "application/json",
        },
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new NetworkError(`Failed to reach NewsCatcher: ${cause?.message ?? String(error)}`, cause);
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new RetrievalError(`NewsCatcher API error: ${errorText}`, this.id, {
        statusCode: response.status,
        query,
      });
    }

    const parsed = NewsCatcherSearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new RetrievalError(`Malformed NewsCatcher response: ${parsed.error.message}`, this.id, {
        query,
      });
    }
    return parsed.data;
  }
}
