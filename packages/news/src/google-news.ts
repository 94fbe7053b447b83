/**
 * Google News Source
 * RSS search feed for discovery, page extraction for full text
 */

import Parser from "rss-parser";
import { logger, NetworkError, RetrievalError, type ChildLogger } from "@foresight/core";
import { toIsoDate } from "./dates.js";
import { PageFetcher } from "./page.js";
import { isBlockedSite } from "./sites.js";
import type { DateRange, DocumentSource, RawDocument, SearchOptions } from "./types.js";

const GOOGLE_NEWS_RSS_URL = "https://news.google.com/rss/search";

export interface GoogleNewsItem {
  title: string;
  publisher: string;
  link: string;
  publishedAt: string | null;
}

export interface GoogleNewsSourceOptions {
  pages?: PageFetcher;
  /** Feed locale, e.g. "en-US" */
  language?: string;
  country?: string;
}

/**
 * Build the RSS search URL; the date window is expressed with search operators
 */
export function buildGoogleNewsUrl(query: string, range: DateRange, language = "en-US", country = "US"): string {
  const q = `${query} after:${range.start} before:${range.end}`;
  const lang = language.split("-")[0];
  return `${GOOGLE_NEWS_RSS_URL}?q=${encodeURIComponent(q)}&hl=${language}&gl=${country}&ceid=${country}:${lang}`;
}

/**
 * Titles arrive as "Headline - Publisher"
 */
export function splitPublisher(title: string): { headline: string; publisher: string } {
  const index = title.lastIndexOf(" - ");
  if (index <= 0) return { headline: title.trim(), publisher: "" };
  return { headline: title.slice(0, index).trim(), publisher: title.slice(index + 3).trim() };
}

/**
 * Google News document source
 */
export class GoogleNewsSource implements DocumentSource {
  readonly id = "google-news";

  private readonly log: ChildLogger;
  private readonly parser: Parser;
  private readonly pages: PageFetcher;
  private readonly language: string;
  private readonly country: string;

  constructor(options: GoogleNewsSourceOptions = {}) {
    this.log = logger.child({ component: "google-news" });
    this.parser = new Parser();
    this.pages = options.pages ?? new PageFetcher();
    this.language = options.language ?? "en-US";
    this.country = options.country ?? "US";
  }

  /**
   * List feed items for a query, without fetching pages
   */
  async listItems(query: string, range: DateRange): Promise<GoogleNewsItem[]> {
    const url = buildGoogleNewsUrl(query, range, this.language, this.country);

    let response: Response;
    try {
      response = await fetch(url, { headers: { Accept: "application/rss+xml, application/xml" } });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new NetworkError(`Failed to reach Google News: ${cause?.message ?? String(error)}`, cause);
    }

    if (!response.ok) {
      throw new RetrievalError(`Google News feed error: HTTP ${response.status}`, this.id, {
        statusCode: response.status,
        query,
      });
    }

    const feed = await this.parser.parseString(await response.text());
    const items: GoogleNewsItem[] = [];

    for (const item of feed.items) {
      if (!item.link || !item.title) continue;
      const { headline, publisher } = splitPublisher(item.title);
      items.push({
        title: headline,
        publisher,
        link: item.link,
        publishedAt: toIsoDate(item.isoDate ?? item.pubDate),
      });
    }

    return items;
  }

  /**
   * Search and extract full text for the first `limit` retrievable items
   */
  async search(query: string, range: DateRange, options: SearchOptions): Promise<RawDocument[]> {
    const items = (await this.listItems(query, range))
      .filter((item) => !isBlockedSite(item.link))
      .slice(0, options.limit);

    const settled = await Promise.allSettled(items.map((item) => this.pages.fetch(item.link)));
    const documents: RawDocument[] = [];

    settled.forEach((result, index) => {
      const item = items[index];
      if (result.status === "rejected") {
        this.log.warn("Page extraction failed", {
          url: item.link,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
        return;
      }
      const page = result.value;
      if (!page) return;

      documents.push({
        title: item.title || page.title,
        link: page.url,
        text: page.text,
        publishedAt: item.publishedAt ?? page.publishedAt,
        sourceSite: item.publisher || page.siteName,
      });
    });

    this.log.debug("Search complete", { query, items: items.length, extracted: documents.length });
    return documents;
  }
}
