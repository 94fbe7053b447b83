/**
 * Multi-Source Retriever
 * Fans query lists out to document sources and normalizes the hits
 */

import { logger } from "@foresight/core";
import { isValidDateRange, type DateRange, type DocumentSource, type RawDocument } from "@foresight/news";
import type { RetrievalConfig } from "./config.js";
import type { Article, QueryPlan } from "./types.js";

const log = logger.child({ component: "retriever" });

interface SearchTask {
  source: DocumentSource;
  query: string;
}

export function toArticle(id: number, document: RawDocument, searchTerm: string): Article {
  return {
    id,
    title: document.title,
    link: document.link,
    publishedAt: document.publishedAt,
    text: document.text,
    summary: document.text,
    relevanceRating: null,
    relevanceReasoning: null,
    searchTerm,
    sourceSite: document.sourceSite,
  };
}

/**
 * Drop repeats of (link, title), compared case-insensitively. The first
 * occurrence is kept.
 */
export function dedupeArticles(articles: readonly Article[]): Article[] {
  const seen = new Set<string>();
  const unique: Article[] = [];

  for (const article of articles) {
    const key = `${article.link.toLowerCase()}\u0000${article.title.toLowerCase()}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(article);
  }

  return unique;
}

/**
 * Search every (source, query) pair concurrently. A failing pair is logged
 * and skipped; an invalid date range returns nothing without calling out.
 */
export async function retrieveArticles(
  queryPlan: QueryPlan,
  range: DateRange,
  sources: readonly DocumentSource[],
  config: Pick<RetrievalConfig, "articlesPerQuery" | "minArticleLength">
): Promise<Article[]> {
  if (!isValidDateRange(range)) {
    log.warn("Invalid retrieval date range, skipping retrieval", { start: range.start, end: range.end });
    return [];
  }

  const tasks: SearchTask[] = sources.flatMap((source) => {
    const queries = queryPlan[source.id] ?? [];
    if (queries.length === 0) {
      log.debug("No queries planned for source", { source: source.id });
    }
    return queries.map((query) => ({ source, query: query.text }));
  });

  const settled = await Promise.allSettled(
    tasks.map((task) => task.source.search(task.query, range, { limit: config.articlesPerQuery }))
  );

  const collected: Article[] = [];
  let discarded = 0;

  settled.forEach((result, index) => {
    const { source, query } = tasks[index];
    if (result.status === "rejected") {
      log.error("Source search failed", result.reason, { source: source.id, query });
      return;
    }

    for (const document of result.value.slice(0, config.articlesPerQuery)) {
      if (document.text.length < config.minArticleLength) {
        discarded++;
        continue;
      }
      collected.push(toArticle(collected.length, document, query));
    }
  });

  const articles = dedupeArticles(collected);

  log.info("Retrieved articles", {
    tasks: tasks.length,
    collected: collected.length,
    discardedShort: discarded,
    unique: articles.length,
  });

  return articles;
}
