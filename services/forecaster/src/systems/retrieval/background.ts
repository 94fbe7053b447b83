/**
 * Background URLs
 * Pages linked from the question background, added as top-rated evidence
 */

import { logger } from "@foresight/core";
import { extractUrls, type ExtractedPage } from "@foresight/news";
import { RATING_SCALE } from "../../shared/parsing/response.js";
import type { Article } from "./types.js";

const log = logger.child({ component: "background-urls" });

export const BACKGROUND_SEARCH_TERM = "background-url";

/**
 * Anything that can turn a URL into an extracted page (PageFetcher in production)
 */
export interface PageSource {
  fetch(url: string): Promise<ExtractedPage | null>;
}

export interface BackgroundOptions {
  minArticleLength: number;

  /** Pages published on or after this date are dropped */
  retrievalEnd: string;

  /** Id of the first article created */
  firstId: number;
}

/**
 * URLs mentioned in the background plus any listed explicitly, in order
 */
export function backgroundUrls(background: string, explicit: readonly string[] = []): string[] {
  return [...new Set([...extractUrls(background), ...explicit])];
}

/**
 * Fetch background pages not already among `existing`. Failures are logged
 * and skipped.
 */
export async function retrieveBackgroundArticles(
  urls: readonly string[],
  existing: readonly Pick<Article, "link">[],
  pages: PageSource,
  options: BackgroundOptions
): Promise<Article[]> {
  const known = new Set(existing.map((article) => article.link));
  const candidates = urls.filter((url) => !known.has(url));
  if (candidates.length === 0) return [];

  const settled = await Promise.allSettled(candidates.map((url) => pages.fetch(url)));

  const articles: Article[] = [];
  settled.forEach((result, index) => {
    const url = candidates[index];
    if (result.status === "rejected") {
      log.warn("Background page fetch failed", {
        url,
        error: result.reason instanceof Error ? result.reason.message : String(result.reason),
      });
      return;
    }

    const page = result.value;
    if (!page || page.text.length < options.minArticleLength) return;
    if (page.publishedAt !== null && page.publishedAt >= options.retrievalEnd) {
      log.debug("Background page published after retrieval window", { url, publishedAt: page.publishedAt });
      return;
    }

    articles.push({
      id: options.firstId + articles.length,
      title: page.title,
      link: url,
      publishedAt: page.publishedAt,
      text: page.text,
      summary: page.text,
      relevanceRating: RATING_SCALE.max,
      relevanceReasoning: null,
      searchTerm: BACKGROUND_SEARCH_TERM,
      sourceSite: page.siteName,
    });
  });

  log.info("Background pages added", { candidates: candidates.length, added: articles.length });
  return articles;
}
