/**
 * Article Page Extraction
 * Fetches a page and pulls readable text with Mozilla Readability over linkedom
 */

import { Readability } from "@mozilla/readability";
import { parseHTML } from "linkedom";
import { logger, NetworkError, RetrievalError, type ChildLogger } from "@foresight/core";
import { toIsoDate } from "./dates.js";
import { isBlockedSite, siteOf } from "./sites.js";
import type { ExtractedPage } from "./types.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const USER_AGENT = "Mozilla/5.0 (compatible; ForesightBot/0.1)";

// Checked in order; the first present wins
const PUBLISHED_META_SELECTORS = [
  'meta[property="article:published_time"]',
  'meta[property="og:published_time"]',
  'meta[name="pubdate"]',
  'meta[name="publish-date"]',
  'meta[name="date"]',
  'meta[itemprop="datePublished"]',
];

const URL_PATTERN = /https?:\/\/[^\s<>"')\]]+/gi;

/**
 * Unique URLs in free text, trailing punctuation removed
 */
export function extractUrls(text: string): string[] {
  const matches = text.match(URL_PATTERN);
  if (!matches) return [];
  return [...new Set(matches.map((url) => url.replace(/[.,;:!?)]+$/, "")))];
}

function collapseLines(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n")
    .trim();
}

function publishedDateOf(document: Document): string | null {
  for (const selector of PUBLISHED_META_SELECTORS) {
    const content = document.querySelector(selector)?.getAttribute("content");
    const date = toIsoDate(content);
    if (date) return date;
  }

  const time = document.querySelector("time[datetime]")?.getAttribute("datetime");
  return toIsoDate(time);
}

/**
 * Extract title, text and publish date from raw HTML.
 * Returns null when Readability finds no article body.
 */
export function extractPage(html: string, url: string): ExtractedPage | null {
  const { document } = parseHTML(html);

  // Readability rewrites the DOM, so read metadata first
  const publishedAt = publishedDateOf(document);
  const siteName =
    document.querySelector('meta[property="og:site_name"]')?.getAttribute("content")?.trim() ||
    siteOf(url);

  const article = new Readability(document, { charThreshold: 100 }).parse();
  const text = article?.textContent ? collapseLines(article.textContent) : "";
  if (!text) return null;

  return {
    url,
    title: article?.title?.trim() || document.title.trim(),
    text,
    publishedAt,
    siteName,
  };
}

export interface PageFetcherOptions {
  timeoutMs?: number;
  /** Extra blocked host fragments on top of the bundled list */
  blockedSites?: string[];
}

/**
 * Fetches pages and extracts their article text
 */
export class PageFetcher {
  private readonly log: ChildLogger;
  private readonly timeoutMs: number;
  private readonly blockedSites: string[];

  constructor(options: PageFetcherOptions = {}) {
    this.log = logger.child({ component: "page-fetcher" });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.blockedSites = options.blockedSites ?? [];
  }

  /**
   * Fetch and extract. Null for blocked sites and pages without an article body.
   */
  async fetch(url: string): Promise<ExtractedPage | null> {
    if (isBlockedSite(url, this.blockedSites)) {
      this.log.debug("Skipping blocked site", { url });
      return null;
    }

    let response: Response;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: {
          "User-Agent": USER_AGENT,
          Accept: "text/html,application/xhtml+xml",
        },
        redirect: "follow",
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new NetworkError(`Failed to fetch page ${url}: ${cause?.message ?? String(error)}`, cause);
    }

    if (!response.ok) {
      throw new RetrievalError(`Page fetch failed with HTTP ${response.status}`, "page", {
        statusCode: response.status,
        context: { url },
      });
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (contentType && !contentType.includes("html")) {
      this.log.debug("Skipping non-HTML page", { url, contentType });
      return null;
    }

    const html = await response.text();
    // Redirect targets (news aggregators) are the canonical link
    return extractPage(html, response.url || url);
  }
}
